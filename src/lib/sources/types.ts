/**
 * Where producers put the newest values (normally a CurrentValuesSlot).
 */
export interface ValueSink {
    set(values: ArrayLike<number>): void;
}

/**
 * A data-acquisition activity. run() keeps writing to the sink at its own
 * pace and resolves once `signal` is aborted or the input ends.
 */
export interface ValueProducer {
    readonly kind: string;
    run(sink: ValueSink, signal: AbortSignal): Promise<void>;
}

export function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}
