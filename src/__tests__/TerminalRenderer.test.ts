import { Writable } from 'node:stream';
import { afterEach, describe, expect, it } from 'vitest';
import { PlotEngine, type PlotEngineOptions } from '../lib/api/PlotEngine';
import type { ValuesAccessor } from '../lib/api/types';
import { parseStyle } from '../lib/charts/styles';
import { TerminalRenderer, glyphFor } from '../lib/renderer/TerminalRenderer';

function sequence(frames: Array<number[] | null>): ValuesAccessor {
    let index = 0;
    return () => frames[index++] ?? null;
}

function collect(): { output: Writable; text: () => string } {
    const chunks: string[] = [];
    const output = new Writable({
        write(chunk, _encoding, callback) {
            chunks.push(String(chunk));
            callback();
        },
    });
    return { output, text: () => chunks.join('') };
}

function run(options: PlotEngineOptions, frames: Array<number[] | null>): PlotEngine {
    const engine = new PlotEngine(options, sequence(frames));
    for (let i = 0; i < frames.length - 1; i++) {
        engine.update();
    }
    return engine;
}

describe('glyphFor', () => {
    it('prefers the marker and falls back to the line kind', () => {
        expect(glyphFor(parseStyle('b-'))).toBe('*');
        expect(glyphFor(parseStyle('r--'))).toBe('+');
        expect(glyphFor(parseStyle('k:'))).toBe(':');
        expect(glyphFor(parseStyle('g.'))).toBe('.');
        expect(glyphFor(parseStyle('s'))).toBe('#');
    });
});

describe('TerminalRenderer', () => {
    const renderers: TerminalRenderer[] = [];

    function renderer(columns: number, extra: { rowHeight?: number; phaseHeight?: number } = {}): TerminalRenderer {
        const r = new TerminalRenderer({ output: collect().output, columns, handleSignals: false, ...extra });
        renderers.push(r);
        return r;
    }

    afterEach(() => {
        renderers.splice(0).forEach((r) => r.close());
    });

    it('composes title, row header and pane', () => {
        const engine = run({
            yRanges: [[-1, 1]],
            size: 4,
            yTicks: [[0]],
            legends: ['temp'],
            showReadouts: true,
            readoutPrecision: 2,
            windowTitle: 'T',
        }, [[1], [0], [-1], [0.5]]);
        const frame = engine.update();
        const r = renderer(13, { rowHeight: 3 });
        r.open(engine.layout);

        expect(r.compose(frame)).toEqual([
            'T',
            '* temp  +0.50',
            '    1.00|*   ',
            '    0.00|·*·*',
            '   -1.00|  * ',
        ]);
    });

    it('puts the phase panel above the rows', () => {
        const engine = new PlotEngine({
            yRanges: [[0, 1]],
            size: 2,
            phaseRanges: { x: [0, 1], y: [0, 1] },
        }, sequence([[1, 1, 0.5]]));
        const frame = engine.update();
        const r = renderer(13, { rowHeight: 3, phaseHeight: 2 });
        r.open(engine.layout);

        expect(r.compose(frame)).toEqual([
            '    1.00|   o',
            '    0.00|o   ',
            '    1.00|  ',
            '        | *',
            '    0.00|* ',
        ]);
    });

    it('shows only the title while waiting', () => {
        const engine = new PlotEngine({ yRanges: [[0, 1], [0, 1]] }, () => null);
        const r = renderer(80);
        r.open(engine.layout);

        expect(r.compose(engine.update())).toEqual(['Waiting for data']);
    });

    it('writes each frame to the output', () => {
        const sink = collect();
        const engine = new PlotEngine({ yRanges: [[0, 1]], size: 1 }, () => [1]);
        const r = new TerminalRenderer({ output: sink.output, columns: 20, rowHeight: 2, clearScreen: false, handleSignals: false });
        r.open(engine.layout);

        r.draw(engine.update());

        expect(sink.text()).toBe('    1.00|*\n    0.00| \n');
    });

    it('needs open() before composing', () => {
        const engine = new PlotEngine({ yRanges: [[0, 1]] }, () => null);

        expect(() => renderer(80).compose(engine.update())).toThrow('open() must be called');
    });

    it('detaches its signal handlers on close', () => {
        const before = process.listenerCount('SIGTERM');
        const r = new TerminalRenderer({ output: collect().output, columns: 80 });

        r.onClose(() => { });
        expect(process.listenerCount('SIGTERM')).toBe(before + 1);

        r.close();
        expect(process.listenerCount('SIGTERM')).toBe(before);
    });
});
