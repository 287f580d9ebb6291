/**
 * Series styles and the compact format shorthand ('b-', 'r--', 'o', 'k:').
 *
 * A row's style is either one style or an overlay of several; user input is
 * resolved exactly once, when the engine is constructed.
 */
import { InvalidConfigurationError } from '../core/errors';

export type LineKind = 'solid' | 'dashed' | 'dashdot' | 'dotted' | 'none';
export type MarkerKind = 'none' | 'point' | 'pixel' | 'circle' | 'plus' | 'x' | 'star' | 'square';

export interface SeriesStyle {
    readonly color: string;
    readonly line: LineKind;
    readonly marker: MarkerKind;
}

export type StyleInput = string | SeriesStyle;

/** One style, or an array of styles overlaid on the same row. */
export type RowStyleInput = StyleInput | ReadonlyArray<StyleInput>;

export type RowStyle =
    | { readonly kind: 'single'; readonly style: SeriesStyle }
    | { readonly kind: 'overlay'; readonly styles: readonly SeriesStyle[] };

export const DEFAULT_STYLE = 'b-';
export const DEFAULT_PHASE_STYLE = 'o';

const COLORS: Readonly<Record<string, string>> = {
    b: 'blue',
    g: 'green',
    r: 'red',
    c: 'cyan',
    m: 'magenta',
    y: 'yellow',
    k: 'black',
    w: 'white',
};

const MARKERS: Readonly<Record<string, MarkerKind>> = {
    '.': 'point',
    ',': 'pixel',
    'o': 'circle',
    '+': 'plus',
    'x': 'x',
    '*': 'star',
    's': 'square',
};

// Two-character tokens first so '-.' is not read as '-' followed by the '.' marker
const LINES: ReadonlyArray<readonly [string, LineKind]> = [
    ['--', 'dashed'],
    ['-.', 'dashdot'],
    ['-', 'solid'],
    [':', 'dotted'],
];

export function parseStyle(format: string): SeriesStyle {
    let color: string | null = null;
    let line: LineKind | null = null;
    let marker: MarkerKind | null = null;

    let i = 0;
    while (i < format.length) {
        const lineToken = LINES.find(([token]) => format.startsWith(token, i));
        if (lineToken && line === null) {
            line = lineToken[1];
            i += lineToken[0].length;
            continue;
        }

        const ch = format[i];
        const markerKind = MARKERS[ch];
        if (markerKind !== undefined && marker === null) {
            marker = markerKind;
            i++;
            continue;
        }

        const namedColor = COLORS[ch];
        if (namedColor !== undefined && color === null) {
            color = namedColor;
            i++;
            continue;
        }

        throw new InvalidConfigurationError(`Unrecognized style format "${format}" at position ${i}`);
    }

    return Object.freeze({
        color: color ?? 'blue',
        // A bare marker ('o', 'r.') means an unconnected scatter
        line: line ?? (marker !== null ? 'none' : 'solid'),
        marker: marker ?? 'none',
    });
}

export function toSeriesStyle(input: StyleInput): SeriesStyle {
    if (typeof input === 'string') {
        return parseStyle(input);
    }
    return Object.freeze({ color: input.color, line: input.line, marker: input.marker });
}

function isStyleList(input: RowStyleInput): input is ReadonlyArray<StyleInput> {
    return Array.isArray(input);
}

export function resolveRowStyle(input: RowStyleInput): RowStyle {
    if (!isStyleList(input)) {
        return { kind: 'single', style: toSeriesStyle(input) };
    }

    if (input.length === 0) {
        throw new InvalidConfigurationError('An overlay needs at least one style');
    }
    return { kind: 'overlay', styles: Object.freeze(input.map(toSeriesStyle)) };
}

export function stylesOf(rowStyle: RowStyle): readonly SeriesStyle[] {
    return rowStyle.kind === 'single' ? [rowStyle.style] : rowStyle.styles;
}
