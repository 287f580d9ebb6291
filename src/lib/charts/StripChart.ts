import { PlotEngine, type PlotEngineOptions, type PlotEngineStats } from '../api/PlotEngine';
import { RenderLoop } from '../api/RenderLoop';
import { isCloseNotifier, type FrameRenderer, type ValuesAccessor } from '../api/types';

export interface StripChartOptions extends PlotEngineOptions {
    values: ValuesAccessor;
}

/**
 * StripChart - engine plus render loop behind one object.
 *
 * ```typescript
 * const slot = new CurrentValuesSlot(2);
 * const chart = new StripChart({ yRanges: [[-1, 1], [-1, 1]], values: () => slot.get() });
 * await chart.start(new TerminalRenderer());
 * ```
 */
export class StripChart {
    private readonly engine: PlotEngine;
    private loop: RenderLoop | null = null;
    private closeBound = false;
    private failure: { error: unknown } | null = null;

    constructor(options: StripChartOptions) {
        const { values, ...engineOptions } = options;
        this.engine = new PlotEngine(engineOptions, values);
    }

    get isOpen(): boolean {
        return this.engine.isOpen;
    }

    get plotEngine(): PlotEngine {
        return this.engine;
    }

    /**
     * Runs the render loop until the renderer's window (or close()) closes the chart.
     * Rejects with the first error reported through fail() or supervise().
     */
    async start(renderer: FrameRenderer): Promise<void> {
        if (this.loop?.isRunning) {
            throw new Error('StripChart: already started');
        }

        if (!this.closeBound && isCloseNotifier(renderer)) {
            this.engine.listenForClose(renderer);
            this.closeBound = true;
        }

        this.loop = new RenderLoop(this.engine, renderer, { intervalMs: this.engine.intervalMs });
        try {
            await this.loop.run();
        } finally {
            this.loop = null;
        }

        if (this.failure) {
            throw this.failure.error;
        }
    }

    /** Leaves the render loop without closing the chart. */
    stop(): void {
        this.loop?.stop();
    }

    close(): void {
        this.engine.markClosed();
    }

    /** Closes the chart because its data source broke. */
    fail(error: unknown): void {
        if (!this.failure) {
            this.failure = { error };
        }
        this.engine.markClosed();
    }

    /**
     * Ties a producer task to the chart: a rejection closes the chart instead
     * of surfacing as an unhandled rejection. The returned promise never rejects.
     */
    supervise(task: Promise<void>): Promise<void> {
        return task.catch((error: unknown) => this.fail(error));
    }

    showBaseline(rowIndex: number, value: number): void {
        this.engine.showBaseline(rowIndex, value);
    }

    hideBaseline(rowIndex: number): void {
        this.engine.hideBaseline(rowIndex);
    }

    showLastBaseline(rowIndex: number): void {
        this.engine.showLastBaseline(rowIndex);
    }

    baselineValue(rowIndex: number): number {
        return this.engine.baselineValue(rowIndex);
    }

    getStats(): PlotEngineStats {
        return this.engine.getStats();
    }
}
