/**
 * TerminalRenderer - paints frames as text.
 *
 * Only what the frame lists gets drawn: a row without drawables (e.g. while
 * waiting for data) is left out, a baseline missing from the frame is not shown.
 * Closing the "window" means SIGINT/SIGTERM.
 */
import type { Writable } from 'node:stream';
import { Downsampler } from '../core/Downsampler';
import type { SeriesStyle } from '../charts/styles';
import type {
    CloseNotifier,
    Drawable,
    FrameRenderer,
    LineDrawable,
    PlotFrame,
    PlotLayout,
    RowLayout,
} from '../api/types';
import { getPaneRect } from './plotLayout';
import { TextPane } from './TextPane';

export interface TerminalRendererOptions {
    output?: Writable;          // Where frames go (default: process.stdout)
    columns?: number;           // Terminal width (default: output columns or 80)
    rowHeight?: number;         // Text lines per chart row (default: 8)
    phaseHeight?: number;       // Text lines of the phase panel (default: 10)
    clearScreen?: boolean;      // Home cursor + clear before each frame (default: true)
    handleSignals?: boolean;    // Treat SIGINT/SIGTERM as window close (default: true)
}

const CLEAR = '\x1b[H\x1b[2J';

const MARKER_GLYPHS: Readonly<Record<SeriesStyle['marker'], string>> = {
    none: '*',
    point: '.',
    pixel: ',',
    circle: 'o',
    plus: '+',
    x: 'x',
    star: '*',
    square: '#',
};

const LINE_GLYPHS: Readonly<Record<SeriesStyle['line'], string>> = {
    solid: '*',
    dashed: '+',
    dashdot: '~',
    dotted: ':',
    none: '*',
};

export function glyphFor(style: SeriesStyle): string {
    return style.marker !== 'none' ? MARKER_GLYPHS[style.marker] : LINE_GLYPHS[style.line];
}

function resolveColumns(output: Writable | undefined, columns: number | undefined): number {
    if (columns !== undefined) {
        return columns;
    }
    if (output && 'columns' in output && typeof output.columns === 'number') {
        return output.columns;
    }
    return 80;
}

export class TerminalRenderer implements FrameRenderer, CloseNotifier {
    private readonly output: Writable;
    private readonly columns: number;
    private readonly rowHeight: number;
    private readonly phaseHeight: number;
    private readonly clearScreen: boolean;
    private readonly handleSignals: boolean;

    private layout: PlotLayout | null = null;
    private readonly downsampler: Downsampler;
    private readonly closeHandlers: Array<() => void> = [];
    private signalsAttached = false;

    private readonly onSignal = (): void => {
        this.detachSignals();
        for (const handler of this.closeHandlers.splice(0)) {
            handler();
        }
    };

    constructor(options: TerminalRendererOptions = {}) {
        this.output = options.output ?? process.stdout;
        this.columns = resolveColumns(options.output ?? process.stdout, options.columns);
        this.rowHeight = options.rowHeight ?? 8;
        this.phaseHeight = options.phaseHeight ?? 10;
        this.clearScreen = options.clearScreen ?? true;
        this.handleSignals = options.handleSignals ?? true;
        this.downsampler = new Downsampler(this.columns);
    }

    onClose(handler: () => void): void {
        this.closeHandlers.push(handler);
        if (this.handleSignals && !this.signalsAttached) {
            process.once('SIGINT', this.onSignal);
            process.once('SIGTERM', this.onSignal);
            this.signalsAttached = true;
        }
    }

    open(layout: PlotLayout): void {
        this.layout = layout;
        this.downsampler.onResize(getPaneRect(this.columns, layout.size, this.rowHeight).width);
    }

    draw(frame: PlotFrame): void {
        const screen = this.compose(frame);
        this.output.write(`${this.clearScreen ? CLEAR : ''}${screen.join('\n')}\n`);
    }

    close(): void {
        this.detachSignals();
        this.layout = null;
    }

    /**
     * Text lines for one frame.
     */
    compose(frame: PlotFrame): string[] {
        const layout = this.layout;
        if (!layout) {
            throw new Error('TerminalRenderer: open() must be called before draw()');
        }

        const screen: string[] = [];

        const title = frame.drawables.find((d) => d.kind === 'text' && d.role === 'title');
        if (title && title.kind === 'text') {
            screen.push(title.text);
        }

        const scatter = frame.drawables.find((d) => d.kind === 'scatter');
        if (scatter && scatter.kind === 'scatter' && layout.phase) {
            const pane = new TextPane(
                getPaneRect(this.columns, this.phaseHeight * 2, this.phaseHeight),
                layout.phase.yRange
            );
            pane.drawScatter(scatter.x, scatter.y, layout.phase.xRange, glyphFor(scatter.style));
            screen.push(...pane.render());
        }

        for (const row of layout.rows) {
            screen.push(...this.composeRow(row, layout.size, frame.drawables));
        }

        return screen;
    }

    private composeRow(row: RowLayout, size: number, drawables: readonly Drawable[]): string[] {
        const lines: LineDrawable[] = [];
        const readouts: string[] = [];
        let baseline: number | null = null;

        for (const drawable of drawables) {
            if (drawable.kind === 'line' && drawable.row === row.index) {
                lines.push(drawable);
            } else if (drawable.kind === 'baseline' && drawable.row === row.index) {
                baseline = drawable.value;
            } else if (drawable.kind === 'text' && drawable.role === 'readout' && drawable.row === row.index) {
                readouts.push(drawable.text);
            }
        }

        if (lines.length === 0 && baseline === null && readouts.length === 0) {
            return [];
        }

        const rect = getPaneRect(this.columns, size, this.rowHeight);
        const pane = new TextPane(rect, row.range);
        pane.drawGrid(row.ticks);
        if (baseline !== null) {
            pane.drawBaseline(baseline);
        }
        for (const line of lines) {
            pane.drawSeries(this.downsampler.process(line.y, rect.width), glyphFor(line.style));
        }

        const legends = lines.filter((line) => line.label !== '').map((line) => `${glyphFor(line.style)} ${line.label}`);
        const header = [row.label, ...legends, ...readouts].filter((part) => part !== '').join('  ');

        return header === '' ? pane.render() : [header, ...pane.render()];
    }

    private detachSignals(): void {
        if (!this.signalsAttached) {
            return;
        }
        process.removeListener('SIGINT', this.onSignal);
        process.removeListener('SIGTERM', this.onSignal);
        this.signalsAttached = false;
    }
}
