import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PlotEngine } from '../lib/api/PlotEngine';
import { RenderLoop } from '../lib/api/RenderLoop';
import type { CloseNotifier, FrameRenderer, PlotFrame, PlotLayout, ValuesAccessor } from '../lib/api/types';
import { StripChart } from '../lib/charts/StripChart';
import { ValueCountMismatchError } from '../lib/core/errors';

class RecordingRenderer implements FrameRenderer {
    readonly layouts: PlotLayout[] = [];
    readonly frames: PlotFrame[] = [];
    closed = 0;

    constructor(private readonly onDraw: (frame: PlotFrame, count: number) => void = () => { }) { }

    open(layout: PlotLayout): void {
        this.layouts.push(layout);
    }

    draw(frame: PlotFrame): void {
        this.frames.push(frame);
        this.onDraw(frame, this.frames.length);
    }

    close(): void {
        this.closed++;
    }
}

class WindowRenderer extends RecordingRenderer implements CloseNotifier {
    private readonly handlers: Array<() => void> = [];

    onClose(handler: () => void): void {
        this.handlers.push(handler);
    }

    closeWindow(): void {
        this.handlers.forEach((handler) => handler());
    }
}

function engineWith(values: ValuesAccessor): PlotEngine {
    return new PlotEngine({ yRanges: [[-1, 1]], size: 4, intervalMs: 1 }, values);
}

describe('RenderLoop', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => { });
        vi.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('draws frames until the engine closes', async () => {
        const engine = engineWith(() => [0.5]);
        const renderer = new RecordingRenderer((_frame, count) => {
            if (count === 3) engine.markClosed();
        });

        await new RenderLoop(engine, renderer).run();

        expect(renderer.layouts).toHaveLength(1);
        expect(renderer.frames.map((f) => f.status)).toEqual(['live', 'live', 'live']);
        expect(renderer.frames.map((f) => f.frameIndex)).toEqual([0, 1, 2]);
        expect(renderer.closed).toBe(1);
        expect(engine.row(0).bindings[0].contents()).toEqual([0, 0.5, 0.5, 0.5]);
    });

    it('keeps drawing waiting frames while there is no data', async () => {
        const engine = engineWith(() => null);
        const renderer = new RecordingRenderer((_frame, count) => {
            if (count === 2) engine.markClosed();
        });

        await new RenderLoop(engine, renderer).run();

        expect(renderer.frames.map((f) => f.status)).toEqual(['waiting', 'waiting']);
    });

    it('leaves the engine open when stopped', async () => {
        const engine = engineWith(() => [0]);
        let loop: RenderLoop | null = null;
        const renderer = new RecordingRenderer((_frame, count) => {
            if (count === 2) loop?.stop();
        });
        loop = new RenderLoop(engine, renderer);

        await loop.run();

        expect(engine.isOpen).toBe(true);
        expect(loop.isRunning).toBe(false);
        expect(renderer.frames).toHaveLength(2);
        expect(renderer.closed).toBe(1);
    });

    it('drops its close listener once stopped', async () => {
        const engine = engineWith(() => [0]);
        let loop: RenderLoop | null = null;
        const renderer = new RecordingRenderer(() => loop?.stop());
        loop = new RenderLoop(engine, renderer);
        const stop = vi.spyOn(loop, 'stop');

        await loop.run();
        engine.markClosed();

        expect(stop).toHaveBeenCalledTimes(1);
    });

    it('rejects when the engine fails', async () => {
        const engine = engineWith(() => [1, 2]);
        const renderer = new RecordingRenderer();

        await expect(new RenderLoop(engine, renderer).run()).rejects.toBeInstanceOf(ValueCountMismatchError);
        expect(renderer.frames).toHaveLength(0);
        expect(renderer.closed).toBe(1);
    });

    it('rejects when the renderer fails on an open engine', async () => {
        const engine = engineWith(() => [0]);
        const renderer = new RecordingRenderer(() => {
            throw new Error('draw failed');
        });

        await expect(new RenderLoop(engine, renderer).run()).rejects.toThrow('draw failed');
    });

    it('ignores a renderer failure while the window closes', async () => {
        const engine = engineWith(() => [0]);
        const renderer = new RecordingRenderer(() => {
            engine.markClosed();
            throw new Error('window gone');
        });

        await expect(new RenderLoop(engine, renderer).run()).resolves.toBeUndefined();
        expect(renderer.closed).toBe(1);
    });

    it('refuses a second run while running', async () => {
        const engine = engineWith(() => [0]);
        const loop = new RenderLoop(engine, new RecordingRenderer());

        const first = loop.run();
        await expect(loop.run()).rejects.toThrow('already running');

        engine.markClosed();
        await first;
        expect(loop.isRunning).toBe(false);
    });
});

describe('StripChart', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('closes when the renderer window closes', async () => {
        const chart = new StripChart({ yRanges: [[0, 10]], size: 3, intervalMs: 1, values: () => [7] });
        const renderer = new WindowRenderer((_frame, count) => {
            if (count === 2) renderer.closeWindow();
        });

        await chart.start(renderer);

        expect(chart.isOpen).toBe(false);
        expect(renderer.frames).toHaveLength(2);
        expect(chart.getStats()).toEqual({ frames: 2, waitingFrames: 0, rows: 1, series: 1, size: 3 });
    });

    it('returns at once when started after closing', async () => {
        const chart = new StripChart({ yRanges: [[0, 1]], intervalMs: 1, values: () => [0] });
        const renderer = new RecordingRenderer();
        chart.close();

        await chart.start(renderer);

        expect(renderer.frames).toHaveLength(0);
        expect(renderer.closed).toBe(1);
    });

    it('can be restarted after stop()', async () => {
        const chart = new StripChart({ yRanges: [[0, 1]], size: 2, intervalMs: 1, values: () => [1] });
        const renderer = new WindowRenderer((_frame, count) => {
            if (count === 1) chart.stop();
            if (count === 2) renderer.closeWindow();
        });

        await chart.start(renderer);
        expect(chart.isOpen).toBe(true);

        await chart.start(renderer);
        expect(chart.isOpen).toBe(false);
        expect(renderer.layouts).toHaveLength(2);
        expect(chart.plotEngine.row(0).bindings[0].contents()).toEqual([1, 1]);
    });

    it('closes and rejects when a supervised producer fails', async () => {
        const chart = new StripChart({ yRanges: [[0, 1]], intervalMs: 1, values: () => [0] });
        let breakInput: (error: Error) => void = () => { };
        const task = chart.supervise(new Promise<void>((_resolve, reject) => {
            breakInput = reject;
        }));
        const renderer = new RecordingRenderer((_frame, count) => {
            if (count === 2) breakInput(new Error('input closed'));
        });

        await expect(chart.start(renderer)).rejects.toThrow('input closed');
        await expect(task).resolves.toBeUndefined();
        expect(chart.isOpen).toBe(false);
        expect(renderer.closed).toBe(1);
    });

    it('keeps the first failure', async () => {
        const chart = new StripChart({ yRanges: [[0, 1]], intervalMs: 1, values: () => null });
        chart.fail(new Error('worker crashed'));
        chart.fail(new Error('worker exited'));

        await expect(chart.start(new RecordingRenderer())).rejects.toThrow('worker crashed');
    });

    it('forwards baseline control to the engine', () => {
        const chart = new StripChart({ yRanges: [[0, 1], [0, 1]], values: () => null });

        chart.showBaseline(1, 0.75);
        chart.hideBaseline(1);

        expect(chart.baselineValue(1)).toBe(0.75);
        expect(chart.plotEngine.row(1).baseline.visible).toBe(false);

        chart.showLastBaseline(1);
        expect(chart.plotEngine.row(1).baseline).toEqual({ value: 0.75, visible: true });
    });
});
