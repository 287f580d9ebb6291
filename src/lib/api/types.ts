import type { AxisRange } from '../charts/AxisRow';
import type { SeriesStyle } from '../charts/styles';

/**
 * Pull interface for the newest values: phase channels first (when a phase
 * panel exists), then one value per series in row-then-binding order.
 * null means "no data yet".
 */
export type ValuesAccessor = () => ArrayLike<number> | null;

export interface LineDrawable {
    kind: 'line';
    id: string;
    row: number;
    series: number;
    style: SeriesStyle;
    label: string;
    /** Oldest first, always `size` entries */
    y: number[];
}

export interface BaselineDrawable {
    kind: 'baseline';
    id: string;
    row: number;
    value: number;
}

export interface ScatterDrawable {
    kind: 'scatter';
    id: string;
    style: SeriesStyle;
    x: number[];
    y: number[];
}

export interface TextDrawable {
    kind: 'text';
    id: string;
    role: 'readout' | 'title';
    /** Row the text belongs to, null for the window title */
    row: number | null;
    text: string;
}

export type Drawable = LineDrawable | BaselineDrawable | ScatterDrawable | TextDrawable;

export type FrameStatus = 'live' | 'waiting' | 'closed';

/**
 * Everything the renderer must redraw for one frame. Elements that are not
 * listed (e.g. a hidden baseline) are not drawn.
 */
export interface PlotFrame {
    status: FrameStatus;
    frameIndex: number;
    drawables: Drawable[];
}

export interface RowLayout {
    index: number;
    range: AxisRange;
    label: string;
    ticks: readonly number[];
    series: ReadonlyArray<{ style: SeriesStyle; label: string }>;
    showReadout: boolean;
}

export interface PhaseLayout {
    xRange: AxisRange;
    yRange: AxisRange;
    style: SeriesStyle;
}

/**
 * Static part of the chart, fixed at construction.
 */
export interface PlotLayout {
    title: string;
    size: number;
    rows: readonly RowLayout[];
    phase: PhaseLayout | null;
}

/**
 * The painting side. A renderer may also be a CloseNotifier (a window that can be closed).
 */
export interface FrameRenderer {
    open(layout: PlotLayout): void;
    draw(frame: PlotFrame): void;
    close(): void;
}

/**
 * Source of a single "the window was closed" notification.
 */
export interface CloseNotifier {
    onClose(handler: () => void): void;
}

export function isCloseNotifier(value: object): value is CloseNotifier {
    return 'onClose' in value && typeof value.onClose === 'function';
}
