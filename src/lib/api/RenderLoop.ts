/**
 * RenderLoop - drives PlotEngine.update() at a fixed interval
 *
 * Frames never overlap: the next tick is only scheduled once the current
 * update and draw have returned. A slow frame shortens the following delay
 * (down to 0) instead of queueing extra frames.
 */
import type { PlotEngine } from './PlotEngine';
import type { FrameRenderer, PlotFrame } from './types';

export interface RenderLoopOptions {
    intervalMs?: number;    // Delay between frames (default: engine.intervalMs)
}

interface Settlement {
    resolve: () => void;
    reject: (error: unknown) => void;
}

export class RenderLoop {
    private readonly intervalMs: number;

    private running = false;
    private timer: NodeJS.Timeout | null = null;
    private settlement: Settlement | null = null;
    private removeCloseListener: (() => void) | null = null;

    constructor(
        private readonly engine: PlotEngine,
        private readonly renderer: FrameRenderer,
        options: RenderLoopOptions = {}
    ) {
        this.intervalMs = Math.max(0, options.intervalMs ?? engine.intervalMs);
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Resolves when the engine closes or stop() is called; rejects when a frame fails.
     */
    run(): Promise<void> {
        if (this.running) {
            return Promise.reject(new Error('RenderLoop: already running'));
        }

        return new Promise<void>((resolve, reject) => {
            this.settlement = { resolve, reject };
            this.running = true;

            try {
                this.renderer.open(this.engine.layout);
            } catch (error) {
                this.finish({ error });
                return;
            }

            this.removeCloseListener = this.engine.onClose(() => this.stop());
            console.log(`RenderLoop: started (${this.intervalMs} ms interval).`);
            this.schedule(0);
        });
    }

    stop(): void {
        this.finish();
    }

    // ========================================
    // PRIVATE METHODS
    // ========================================

    private schedule(delayMs: number): void {
        if (!this.running) {
            return;
        }
        this.timer = setTimeout(() => this.tick(), delayMs);
    }

    private tick(): void {
        this.timer = null;
        if (!this.running) {
            return;
        }

        if (!this.engine.isOpen) {
            this.finish();
            return;
        }

        const started = performance.now();

        let frame: PlotFrame;
        try {
            frame = this.engine.update();
        } catch (error) {
            this.finish({ error });
            return;
        }

        try {
            this.renderer.draw(frame);
        } catch (error) {
            // A window torn down while closing may throw on its last draw
            if (!this.engine.isOpen) {
                console.warn('RenderLoop: renderer failed during shutdown:', error);
                this.finish();
                return;
            }
            this.finish({ error });
            return;
        }

        const elapsed = performance.now() - started;
        this.schedule(Math.max(0, this.intervalMs - elapsed));
    }

    private finish(failure?: { error: unknown }): void {
        if (!this.running) {
            return;
        }

        this.running = false;
        if (this.timer !== null) {
            clearTimeout(this.timer);
            this.timer = null;
        }

        this.removeCloseListener?.();
        this.removeCloseListener = null;

        try {
            this.renderer.close();
        } catch (error) {
            console.warn('RenderLoop: renderer failed to close:', error);
        }

        console.log(`RenderLoop: stopped after ${this.engine.getStats().frames} frames.`);

        const settlement = this.settlement;
        this.settlement = null;
        if (failure) {
            settlement?.reject(failure.error);
        } else {
            settlement?.resolve();
        }
    }
}
