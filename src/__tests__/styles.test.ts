import { describe, expect, it } from 'vitest';
import { parseStyle, resolveRowStyle, stylesOf } from '../lib/charts/styles';
import { InvalidConfigurationError } from '../lib/core/errors';

describe('parseStyle', () => {
    it('reads colour and solid line', () => {
        expect(parseStyle('b-')).toEqual({ color: 'blue', line: 'solid', marker: 'none' });
    });

    it('reads two-character line tokens', () => {
        expect(parseStyle('r--')).toEqual({ color: 'red', line: 'dashed', marker: 'none' });
        expect(parseStyle('k-.')).toEqual({ color: 'black', line: 'dashdot', marker: 'none' });
    });

    it('treats a bare marker as an unconnected scatter', () => {
        expect(parseStyle('o')).toEqual({ color: 'blue', line: 'none', marker: 'circle' });
        expect(parseStyle('g.')).toEqual({ color: 'green', line: 'none', marker: 'point' });
    });

    it('combines marker and line', () => {
        expect(parseStyle('mo:')).toEqual({ color: 'magenta', line: 'dotted', marker: 'circle' });
    });

    it('defaults an empty format to a solid blue line', () => {
        expect(parseStyle('')).toEqual({ color: 'blue', line: 'solid', marker: 'none' });
    });

    it('rejects unknown tokens', () => {
        expect(() => parseStyle('q-')).toThrow(InvalidConfigurationError);
        expect(() => parseStyle('rr')).toThrow('Unrecognized style format "rr" at position 1');
    });
});

describe('resolveRowStyle', () => {
    it('resolves a single style', () => {
        const style = resolveRowStyle('r-');

        expect(style.kind).toBe('single');
        expect(stylesOf(style)).toEqual([{ color: 'red', line: 'solid', marker: 'none' }]);
    });

    it('resolves an overlay in order', () => {
        const style = resolveRowStyle(['r-', { color: '#00ff00', line: 'dotted', marker: 'none' }]);

        expect(style.kind).toBe('overlay');
        expect(stylesOf(style).map((s) => s.color)).toEqual(['red', '#00ff00']);
    });

    it('rejects an empty overlay', () => {
        expect(() => resolveRowStyle([])).toThrow(InvalidConfigurationError);
    });
});
