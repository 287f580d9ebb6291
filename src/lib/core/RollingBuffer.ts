/**
 * RollingBuffer - fixed-capacity sliding window of samples.
 *
 * Stored as a ring (Float64Array + head index) so append is O(1); contents()
 * hands out the logical view, oldest sample first. The length never changes:
 * a fresh buffer is pre-filled, so a renderer always gets exactly `capacity`
 * points.
 */
import { InvalidConfigurationError } from './errors';

export type Axis = 'x' | 'y';

/**
 * Anything that holds one RollingBuffer per axis key.
 * Series bindings expose `y`, the phase panel exposes `x` and `y`.
 */
export type RollTarget<A extends Axis> = {
    readonly [K in A]: RollingBuffer;
};

export class RollingBuffer {
    public readonly capacity: number;

    private readonly data: Float64Array;
    // Slot that receives the next append (= oldest sample)
    private head = 0;

    constructor(capacity: number, fill = 0) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new InvalidConfigurationError(`Buffer size must be an integer >= 1, got ${capacity}`);
        }

        this.capacity = capacity;
        this.data = new Float64Array(capacity);
        this.data.fill(fill);
    }

    get length(): number {
        return this.capacity;
    }

    /** Newest sample. */
    get latest(): number {
        return this.data[(this.head + this.capacity - 1) % this.capacity];
    }

    /**
     * Drops the oldest sample and stores `value` as the newest.
     */
    append(value: number): void {
        this.data[this.head] = value;
        this.head = (this.head + 1) % this.capacity;
    }

    /** i = 0 is the oldest sample. */
    at(index: number): number | undefined {
        if (!Number.isInteger(index) || index < 0 || index >= this.capacity) {
            return undefined;
        }
        return this.data[(this.head + index) % this.capacity];
    }

    contents(): number[] {
        const out = new Array<number>(this.capacity);
        for (let i = 0; i < this.capacity; i++) {
            out[i] = this.data[(this.head + i) % this.capacity];
        }
        return out;
    }
}

/**
 * Shift-and-append on whichever axis buffer of `target` is named.
 */
export function roll<A extends Axis>(target: RollTarget<NoInfer<A>>, axis: A, value: number): void {
    target[axis].append(value);
}
