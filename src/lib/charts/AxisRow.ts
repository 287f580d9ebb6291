/**
 * AxisRow - one logical chart row.
 *
 * Owns its series bindings (one line each, overlaid on the same y-range),
 * an optional baseline and the raw values the readouts show.
 */
import { ValueCountMismatchError } from '../core/errors';
import { SeriesBinding } from './SeriesBinding';
import type { SeriesStyle } from './styles';

/** [min, max] with min < max */
export type AxisRange = readonly [min: number, max: number];

export interface AxisRowConfig {
    index: number;
    range: AxisRange;
    size: number;
    styles: readonly SeriesStyle[];
    legends: readonly string[];
    label: string;
    ticks: readonly number[];
    showReadout: boolean;
}

export interface BaselineState {
    value: number;
    visible: boolean;
}

export class AxisRow {
    public readonly index: number;
    public readonly range: AxisRange;
    public readonly label: string;
    public readonly ticks: readonly number[];
    public readonly showReadout: boolean;
    public readonly bindings: readonly SeriesBinding[];

    private baselineValue = 0;
    private baselineVisible = false;
    private readonly latestValues: number[];

    constructor(config: AxisRowConfig) {
        this.index = config.index;
        this.range = config.range;
        this.label = config.label;
        this.ticks = config.ticks;
        this.showReadout = config.showReadout;
        this.bindings = config.styles.map(
            (style, i) => new SeriesBinding(style, config.legends[i] ?? '', config.size)
        );
        this.latestValues = new Array<number>(this.bindings.length).fill(0);
    }

    get seriesCount(): number {
        return this.bindings.length;
    }

    /** Ticks double as gridline positions. */
    get showGrid(): boolean {
        return this.ticks.length > 0;
    }

    get baseline(): BaselineState {
        return { value: this.baselineValue, visible: this.baselineVisible };
    }

    /** Most recent raw sample per binding. */
    get latest(): readonly number[] {
        return this.latestValues;
    }

    /**
     * @param values one value per bound series, in binding order
     */
    update(values: ArrayLike<number>): void {
        if (values.length !== this.bindings.length) {
            throw new ValueCountMismatchError(this.bindings.length, values.length);
        }

        for (let i = 0; i < this.bindings.length; i++) {
            this.bindings[i].append(values[i]);
            this.latestValues[i] = values[i];
        }
    }

    showBaseline(value: number): void {
        this.baselineValue = value;
        this.baselineVisible = true;
    }

    /**
     * Hides the baseline but keeps its level, so showLastBaseline() can bring it back.
     */
    hideBaseline(): void {
        this.baselineVisible = false;
    }

    showLastBaseline(): void {
        this.baselineVisible = true;
    }
}
