import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { ValueProducer, ValueSink } from './types';

export interface LineInputProducerOptions {
    expectedCount?: number; // Lines with another value count are skipped (default: accept any)
}

/**
 * Numbers separated by commas and/or whitespace, or null when the line is
 * empty or holds anything that is not a number.
 */
export function parseValueLine(line: string): number[] | null {
    const tokens = line.trim().split(/[\s,]+/).filter((token) => token.length > 0);
    if (tokens.length === 0) {
        return null;
    }

    const values = tokens.map(Number);
    return values.some(Number.isNaN) ? null : values;
}

/**
 * Reads value lines from a text stream: a serial port, a pipe, stdin.
 * Garbled lines are counted and dropped, the stream keeps going.
 */
export class LineInputProducer implements ValueProducer {
    public readonly kind = 'line-input';

    private readonly expectedCount: number | null;
    private skipped = 0;
    private accepted = 0;

    constructor(
        private readonly input: Readable,
        options: LineInputProducerOptions = {}
    ) {
        this.expectedCount = options.expectedCount ?? null;
    }

    get skippedLines(): number {
        return this.skipped;
    }

    get acceptedLines(): number {
        return this.accepted;
    }

    async run(sink: ValueSink, signal: AbortSignal): Promise<void> {
        if (signal.aborted) {
            return;
        }

        const lines = createInterface({ input: this.input, crlfDelay: Infinity });
        const onAbort = (): void => lines.close();
        signal.addEventListener('abort', onAbort, { once: true });

        try {
            for await (const line of lines) {
                const values = parseValueLine(line);
                if (values === null || (this.expectedCount !== null && values.length !== this.expectedCount)) {
                    this.skipped++;
                    continue;
                }

                this.accepted++;
                sink.set(values);
            }
        } finally {
            signal.removeEventListener('abort', onAbort);
            lines.close();
        }
    }
}
