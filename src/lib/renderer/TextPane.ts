/**
 * TextPane - one chart area drawn into character cells.
 *
 * Line 0 is the top of the pane (the range maximum). Drawing order decides
 * what stays visible: grid first, then baseline, then data.
 */
import type { AxisRange } from '../charts/AxisRow';
import type { DownsampleResult } from '../core/Downsampler';
import { PANE_PADDING, type PaneRect } from './plotLayout';

export const GRID_GLYPH = '·';
export const BASELINE_GLYPH = '─';
const EMPTY = ' ';

export function formatAxisValue(value: number): string {
    return value.toFixed(2).padStart(PANE_PADDING.label).slice(-PANE_PADDING.label);
}

export class TextPane {
    private readonly cells: string[][];
    private readonly labels = new Map<number, string>();

    constructor(
        private readonly rect: PaneRect,
        private readonly range: AxisRange
    ) {
        this.cells = Array.from({ length: rect.height }, () => new Array<string>(rect.width).fill(EMPTY));

        this.labels.set(0, formatAxisValue(range[1]));
        this.labels.set(rect.height - 1, formatAxisValue(range[0]));
    }

    /**
     * Text line for a value, or null when it falls outside the range.
     */
    lineOf(value: number): number | null {
        const [min, max] = this.range;
        if (Number.isNaN(value) || value < min || value > max) {
            return null;
        }
        return Math.round(((max - value) / (max - min)) * (this.rect.height - 1));
    }

    drawGrid(ticks: readonly number[]): void {
        for (const tick of ticks) {
            const line = this.lineOf(tick);
            if (line === null) {
                continue;
            }

            this.labels.set(line, formatAxisValue(tick));
            this.fillLine(line, GRID_GLYPH);
        }
    }

    drawBaseline(value: number): void {
        const line = this.lineOf(value);
        if (line !== null) {
            this.fillLine(line, BASELINE_GLYPH, [EMPTY, GRID_GLYPH]);
        }
    }

    /**
     * One column per bucket. A downsampled bucket is drawn as a vertical span
     * from its max to its min, clipped to the pane.
     */
    drawSeries(columns: DownsampleResult, glyph: string): void {
        const count = Math.min(columns.columnCount, this.rect.width);

        for (let column = 0; column < count; column++) {
            const min = columns.min[column];
            const max = columns.max[column];

            if (!columns.isDownsampled) {
                const line = this.lineOf(min);
                if (line !== null) {
                    this.cells[line][column] = glyph;
                }
                continue;
            }

            if (Number.isNaN(min) || Number.isNaN(max)) {
                continue;
            }

            const top = this.lineOf(this.clamp(max));
            const bottom = this.lineOf(this.clamp(min));
            if (top === null || bottom === null) {
                continue;
            }
            for (let line = top; line <= bottom; line++) {
                this.cells[line][column] = glyph;
            }
        }
    }

    /**
     * Unconnected (x, y) points; the pane's own range is the y axis.
     */
    drawScatter(xs: readonly number[], ys: readonly number[], xRange: AxisRange, glyph: string): void {
        const [xMin, xMax] = xRange;
        const count = Math.min(xs.length, ys.length);

        for (let i = 0; i < count; i++) {
            const x = xs[i];
            const line = this.lineOf(ys[i]);
            if (line === null || Number.isNaN(x) || x < xMin || x > xMax) {
                continue;
            }

            const column = Math.round(((x - xMin) / (xMax - xMin)) * (this.rect.width - 1));
            this.cells[line][column] = glyph;
        }
    }

    render(): string[] {
        return this.cells.map((cells, line) => {
            const label = this.labels.get(line) ?? ''.padStart(PANE_PADDING.label);
            return `${label}|${cells.join('')}`;
        });
    }

    private fillLine(line: number, glyph: string, replaces: readonly string[] = [EMPTY]): void {
        const cells = this.cells[line];
        for (let column = 0; column < cells.length; column++) {
            if (replaces.includes(cells[column])) {
                cells[column] = glyph;
            }
        }
    }

    private clamp(value: number): number {
        return Math.min(this.range[1], Math.max(this.range[0], value));
    }
}
