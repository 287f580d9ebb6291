/**
 * PlotEngine - rolling-window engine behind the strip charts
 *
 * USAGE:
 * ```typescript
 * const engine = new PlotEngine({
 *   yRanges: [[-1, 1], [0, 5]],
 *   styles: ['r-', ['b-', 'g--']],
 *   size: 100
 * }, () => slot.get());
 *
 * const frame = engine.update();
 * renderer.draw(frame);
 * ```
 *
 * ARCHITECTURE:
 * - PlotEngine = orchestrator (pulls values, distributes them, builds the frame)
 * - AxisRow = one row (bindings, baseline, readouts)
 * - PhasePanel = optional x/y scatter fed by the first two values
 * - RenderLoop = calls update() on an interval and hands frames to a renderer
 */
import { AxisRow, type AxisRange } from '../charts/AxisRow';
import { PhasePanel } from '../charts/PhasePanel';
import {
    DEFAULT_PHASE_STYLE,
    DEFAULT_STYLE,
    resolveRowStyle,
    stylesOf,
    toSeriesStyle,
    type RowStyleInput,
    type StyleInput,
} from '../charts/styles';
import {
    ConfigurationMismatchError,
    IndexOutOfRangeError,
    InvalidConfigurationError,
    ValueCountMismatchError,
} from '../core/errors';
import type {
    CloseNotifier,
    Drawable,
    PlotFrame,
    PlotLayout,
    ValuesAccessor,
} from './types';

/**
 * Configuration options for PlotEngine
 */
export interface PlotEngineOptions {
    yRanges: ReadonlyArray<AxisRange>;          // One [min, max] per row, defines the row count
    size?: number;                              // Samples per buffer (default: 100)
    phaseRanges?: { x: AxisRange; y: AxisRange } | null; // Adds a phase panel fed by the first two values
    windowTitle?: string;                       // Title shown above the rows (default: none)
    styles?: ReadonlyArray<RowStyleInput>;      // Per row: 'b-' or ['r-', 'g--'] for an overlay (default: 'b-')
    yLabels?: ReadonlyArray<string>;            // Per row axis label (default: '')
    yTicks?: ReadonlyArray<ReadonlyArray<number>>; // Per row tick / grid positions (default: none)
    legends?: ReadonlyArray<string | ReadonlyArray<string>>; // Per row, one entry per overlaid series
    showReadouts?: boolean;                     // Live numeric readout per series (default: false)
    readoutPrecision?: number;                  // Decimals of the readout (default: 6)
    phaseStyle?: StyleInput;                    // Phase scatter style (default: 'o')
    intervalMs?: number;                        // Redraw interval for the render loop (default: 20)
}

export interface PlotEngineStats {
    frames: number;
    waitingFrames: number;
    rows: number;
    series: number;
    size: number;
}

const WAITING_TEXT = 'Waiting for data';

export function formatReadout(value: number, precision: number): string {
    if (Number.isNaN(value)) return 'nan';
    if (value === Infinity) return '+inf';
    if (value === -Infinity) return '-inf';
    if (Object.is(value, -0)) return `-${(0).toFixed(precision)}`;
    return `${value >= 0 ? '+' : ''}${value.toFixed(precision)}`;
}

function checkRange(range: AxisRange, what: string): void {
    const [min, max] = range;
    if (!Number.isFinite(min) || !Number.isFinite(max) || min >= max) {
        throw new InvalidConfigurationError(`${what} must satisfy min < max, got [${min}, ${max}]`);
    }
}

/**
 * Per-row list or its default; a list of the wrong length fails fast.
 */
function perRow<T>(rowCount: number, values: ReadonlyArray<T> | undefined, name: string, fallback: T): T[] {
    if (values === undefined) {
        return new Array<T>(rowCount).fill(fallback);
    }
    if (values.length !== rowCount) {
        throw new ConfigurationMismatchError(name, rowCount, values.length);
    }
    return [...values];
}

export class PlotEngine {
    // === Core Components ===
    private readonly rows: readonly AxisRow[];
    private readonly phase: PhasePanel | null;
    private readonly values: ValuesAccessor;

    // === Configuration ===
    public readonly size: number;
    public readonly intervalMs: number;
    public readonly windowTitle: string;
    private readonly readoutPrecision: number;

    // === State ===
    private open = true;
    private waiting = false;
    private closeRegistered = false;
    private readonly closeListeners: Array<() => void> = [];
    private frameCount = 0;
    private waitingFrameCount = 0;

    constructor(options: PlotEngineOptions, values: ValuesAccessor) {
        const rowCount = options.yRanges.length;
        if (rowCount < 1) {
            throw new InvalidConfigurationError('At least one y-range is required');
        }

        this.size = options.size ?? 100;
        if (!Number.isInteger(this.size) || this.size < 1) {
            throw new InvalidConfigurationError(`size must be an integer >= 1, got ${this.size}`);
        }

        this.intervalMs = options.intervalMs ?? 20;
        if (!(this.intervalMs > 0)) {
            throw new InvalidConfigurationError(`intervalMs must be > 0, got ${this.intervalMs}`);
        }

        this.readoutPrecision = options.readoutPrecision ?? 6;
        if (!Number.isInteger(this.readoutPrecision) || this.readoutPrecision < 0 || this.readoutPrecision > 100) {
            throw new InvalidConfigurationError(`readoutPrecision must be an integer in [0, 100], got ${this.readoutPrecision}`);
        }

        this.windowTitle = options.windowTitle ?? '';
        this.values = values;

        // ========== PER-ROW LISTS ==========
        const styles = perRow<RowStyleInput>(rowCount, options.styles, 'styles', DEFAULT_STYLE).map(resolveRowStyle);
        const labels = perRow(rowCount, options.yLabels, 'ylabels', '');
        const ticks = perRow<ReadonlyArray<number>>(rowCount, options.yTicks, 'yticks', []);
        const legends = perRow<string | ReadonlyArray<string>>(rowCount, options.legends, 'legends', '');

        // ========== ROWS ==========
        this.rows = options.yRanges.map((range, index) => {
            checkRange(range, `yRanges[${index}]`);

            const rowStyles = stylesOf(styles[index]);
            const rowLegends = this.resolveLegends(legends[index], rowStyles.length, index);

            return new AxisRow({
                index,
                range,
                size: this.size,
                styles: rowStyles,
                legends: rowLegends,
                label: labels[index],
                ticks: [...ticks[index]],
                showReadout: options.showReadouts ?? false,
            });
        });

        // ========== PHASE PANEL ==========
        if (options.phaseRanges) {
            checkRange(options.phaseRanges.x, 'phaseRanges.x');
            checkRange(options.phaseRanges.y, 'phaseRanges.y');
            this.phase = new PhasePanel({
                xRange: options.phaseRanges.x,
                yRange: options.phaseRanges.y,
                size: this.size,
                style: toSeriesStyle(options.phaseStyle ?? DEFAULT_PHASE_STYLE),
            });
        } else {
            this.phase = null;
        }
    }

    get isOpen(): boolean {
        return this.open;
    }

    /** True while the data source has not delivered anything since the last live frame. */
    get isWaiting(): boolean {
        return this.waiting;
    }

    get rowCount(): number {
        return this.rows.length;
    }

    get phasePanel(): PhasePanel | null {
        return this.phase;
    }

    /**
     * Length the data source must return: 2 phase values (if any) + one per series.
     */
    get expectedValueCount(): number {
        return (this.phase ? 2 : 0) + this.seriesCount;
    }

    get layout(): PlotLayout {
        return {
            title: this.windowTitle,
            size: this.size,
            rows: this.rows.map((row) => ({
                index: row.index,
                range: row.range,
                label: row.label,
                ticks: row.ticks,
                series: row.bindings.map((binding) => ({ style: binding.style, label: binding.label })),
                showReadout: row.showReadout,
            })),
            phase: this.phase
                ? { xRange: this.phase.xRange, yRange: this.phase.yRange, style: this.phase.style }
                : null,
        };
    }

    row(index: number): AxisRow {
        if (!Number.isInteger(index) || index < 0 || index >= this.rows.length) {
            throw new IndexOutOfRangeError(index, this.rows.length);
        }
        return this.rows[index];
    }

    // ========================================
    // BASELINES
    // ========================================

    showBaseline(rowIndex: number, value: number): void {
        this.row(rowIndex).showBaseline(value);
    }

    hideBaseline(rowIndex: number): void {
        this.row(rowIndex).hideBaseline();
    }

    showLastBaseline(rowIndex: number): void {
        this.row(rowIndex).showLastBaseline();
    }

    baselineValue(rowIndex: number): number {
        return this.row(rowIndex).baseline.value;
    }

    // ========================================
    // LIFECYCLE
    // ========================================

    /**
     * Registers with the (single) source of close notifications.
     */
    listenForClose(notifier: CloseNotifier): void {
        if (this.closeRegistered) {
            throw new Error('PlotEngine: a close notifier is already registered');
        }
        this.closeRegistered = true;
        notifier.onClose(() => this.markClosed());
    }

    /**
     * Observe the Open -> Closed transition. Called at most once per listener.
     * Returns a function that removes the listener again.
     */
    onClose(listener: () => void): () => void {
        this.closeListeners.push(listener);
        return () => {
            const index = this.closeListeners.indexOf(listener);
            if (index !== -1) {
                this.closeListeners.splice(index, 1);
            }
        };
    }

    /** Same as receiving the close notification. */
    markClosed(): void {
        if (!this.open) {
            return;
        }

        this.open = false;
        console.log('PlotEngine: closed.');

        for (const listener of this.closeListeners.splice(0)) {
            listener();
        }
    }

    // ========================================
    // FRAME UPDATE
    // ========================================

    /**
     * Pulls one set of values, rolls every buffer and returns what to redraw.
     */
    update(): PlotFrame {
        const frameIndex = this.frameCount++;

        if (!this.open) {
            return { status: 'closed', frameIndex, drawables: [] };
        }

        const values = this.values();
        if (values === null) {
            this.waiting = true;
            this.waitingFrameCount++;
            return {
                status: 'waiting',
                frameIndex,
                drawables: [{
                    kind: 'text',
                    id: 'title',
                    role: 'title',
                    row: null,
                    text: this.windowTitle ? `${this.windowTitle} (waiting for data)` : WAITING_TEXT,
                }],
            };
        }

        const expected = this.expectedValueCount;
        if (values.length !== expected) {
            throw new ValueCountMismatchError(expected, values.length);
        }

        this.waiting = false;

        let offset = 0;
        if (this.phase) {
            this.phase.update(values[0], values[1]);
            offset = 2;
        }

        for (const row of this.rows) {
            const rowValues = new Array<number>(row.seriesCount);
            for (let i = 0; i < row.seriesCount; i++) {
                rowValues[i] = values[offset + i];
            }
            row.update(rowValues);
            offset += row.seriesCount;
        }

        return { status: 'live', frameIndex, drawables: this.collectDrawables() };
    }

    getStats(): PlotEngineStats {
        return {
            frames: this.frameCount,
            waitingFrames: this.waitingFrameCount,
            rows: this.rows.length,
            series: this.seriesCount,
            size: this.size,
        };
    }

    // ========================================
    // PRIVATE METHODS
    // ========================================

    private get seriesCount(): number {
        return this.rows.reduce((sum, row) => sum + row.seriesCount, 0);
    }

    private resolveLegends(entry: string | ReadonlyArray<string>, seriesCount: number, rowIndex: number): string[] {
        if (typeof entry === 'string') {
            // A plain string labels the first series of the row
            const legends = new Array<string>(seriesCount).fill('');
            legends[0] = entry;
            return legends;
        }
        if (entry.length !== seriesCount) {
            throw new ConfigurationMismatchError(`legends for row ${rowIndex}`, seriesCount, entry.length);
        }
        return [...entry];
    }

    /**
     * Order: phase scatter, lines, visible baselines, readouts, title.
     */
    private collectDrawables(): Drawable[] {
        const drawables: Drawable[] = [];

        if (this.phase) {
            drawables.push({
                kind: 'scatter',
                id: 'phase',
                style: this.phase.style,
                x: this.phase.x.contents(),
                y: this.phase.y.contents(),
            });
        }

        for (const row of this.rows) {
            row.bindings.forEach((binding, series) => {
                drawables.push({
                    kind: 'line',
                    id: `line:${row.index}:${series}`,
                    row: row.index,
                    series,
                    style: binding.style,
                    label: binding.label,
                    y: binding.contents(),
                });
            });
        }

        for (const row of this.rows) {
            const baseline = row.baseline;
            if (baseline.visible) {
                drawables.push({ kind: 'baseline', id: `baseline:${row.index}`, row: row.index, value: baseline.value });
            }
        }

        for (const row of this.rows) {
            if (!row.showReadout) {
                continue;
            }
            row.latest.forEach((value, series) => {
                drawables.push({
                    kind: 'text',
                    id: `readout:${row.index}:${series}`,
                    role: 'readout',
                    row: row.index,
                    text: formatReadout(value, this.readoutPrecision),
                });
            });
        }

        if (this.windowTitle) {
            drawables.push({ kind: 'text', id: 'title', role: 'title', row: null, text: this.windowTitle });
        }

        return drawables;
    }
}
