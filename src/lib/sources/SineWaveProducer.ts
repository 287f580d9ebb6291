import { setTimeout as delay } from 'node:timers/promises';
import { isAbortError, type ValueProducer, type ValueSink } from './types';

export interface SineWaveProducerOptions {
    channels: number;       // Values per write
    size?: number;          // Steps per slowest period (default: 100)
    periodMs?: number;      // Pause between steps (default: 2)
}

/**
 * Synthetic source: channel c (0-based) runs at (c + 1) times the base frequency.
 */
export class SineWaveProducer implements ValueProducer {
    public readonly kind = 'sine';

    private readonly channels: number;
    private readonly size: number;
    private readonly periodMs: number;
    private step = 0;

    constructor(options: SineWaveProducerOptions) {
        this.channels = Math.max(1, Math.floor(options.channels));
        this.size = Math.max(1, Math.floor(options.size ?? 100));
        this.periodMs = Math.max(0, options.periodMs ?? 2);
    }

    /** Values at the given step, without advancing. */
    valuesAt(step: number): number[] {
        const phase = (step % this.size) / this.size;
        const values = new Array<number>(this.channels);
        for (let c = 0; c < this.channels; c++) {
            values[c] = Math.sin((c + 1) * 2 * Math.PI * phase);
        }
        return values;
    }

    async run(sink: ValueSink, signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            this.step++;
            sink.set(this.valuesAt(this.step));

            try {
                await delay(this.periodMs, undefined, { signal });
            } catch (error) {
                if (isAbortError(error)) {
                    return;
                }
                throw error;
            }
        }
    }
}
