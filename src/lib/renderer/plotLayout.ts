/** Character cells reserved left of every pane: tick labels plus the axis bar. */
export const PANE_PADDING = {
    label: 8,
    axis: 1,
} as const;

export const GUTTER_WIDTH = PANE_PADDING.label + PANE_PADDING.axis;

export interface PaneRect {
    /** Data columns right of the gutter */
    width: number;
    /** Text lines */
    height: number;
}

/**
 * Pane for one row: never wider than the sample window, at least 1x2 cells.
 */
export function getPaneRect(terminalColumns: number, windowSize: number, height: number): PaneRect {
    const available = Math.max(1, Math.floor(terminalColumns) - GUTTER_WIDTH);
    return {
        width: Math.max(1, Math.min(windowSize, available)),
        height: Math.max(2, Math.floor(height)),
    };
}
