/**
 * CurrentValuesSlot - the "latest values" holder shared by producer and renderer
 *
 * WHY a SharedArrayBuffer?
 * - The producer runs in a worker thread and must never wait for the renderer
 * - With postMessage every frame would be a copy plus a queued event
 * - Shared memory: the worker writes, the render loop reads whatever is newest
 *
 * HOW does it stay consistent?
 * - Sequence lock: the writer bumps the sequence to an odd number, writes,
 *   then bumps it back to even. The writer never blocks.
 * - The reader copies the values and accepts the copy only if the sequence
 *   was even and unchanged. After a few failed attempts it returns the last
 *   copy anyway (last writer wins).
 * - Samples written between two frames are simply overwritten: the slot is
 *   visual sampling, not an audit trail.
 *
 * The sequence is an Int32 and wraps around after 2^31 bumps. Readers only
 * compare it for equality and parity; whether anything was written at all
 * lives in its own flag.
 *
 * Memory Layout:
 * [0-3 Bytes]    = sequence (Int32, odd while a write is in progress)
 * [4-7 Bytes]    = number of values in the last write (Int32)
 * [8-11 Bytes]   = 1 once the first write has completed (Int32)
 * [12-15 Bytes]  = padding (Float64 alignment)
 * [16-End]       = Float64 values
 */
import type { ValueSink } from '../sources/types';

const HEADER_BYTES = 16;
const SEQUENCE_INDEX = 0;
const LENGTH_INDEX = 1;
const WRITTEN_INDEX = 2;

export class CurrentValuesSlot implements ValueSink {
    private static readonly MAX_READ_ATTEMPTS = 4;

    public readonly buffer: SharedArrayBuffer;
    public readonly capacity: number;

    private readonly header: Int32Array;
    private readonly values: Float64Array;

    constructor(capacityOrBuffer: number | SharedArrayBuffer) {
        if (typeof capacityOrBuffer === 'number') {
            if (!Number.isInteger(capacityOrBuffer) || capacityOrBuffer < 1) {
                throw new RangeError(`Slot capacity must be an integer >= 1, got ${capacityOrBuffer}`);
            }
            this.buffer = new SharedArrayBuffer(HEADER_BYTES + capacityOrBuffer * 8);
        } else {
            // Worker side: attach to the buffer the main thread created
            this.buffer = capacityOrBuffer;
        }

        this.header = new Int32Array(this.buffer, 0, 3);
        this.values = new Float64Array(this.buffer, HEADER_BYTES);
        this.capacity = this.values.length;
    }

    /**
     * Number of completed writes so far, modulo 2^31.
     */
    get sequence(): number {
        return (Atomics.load(this.header, SEQUENCE_INDEX) >>> 0) >>> 1;
    }

    set(values: ArrayLike<number>): void {
        if (values.length > this.capacity) {
            throw new RangeError(`Slot holds ${this.capacity} values, got ${values.length}`);
        }

        Atomics.add(this.header, SEQUENCE_INDEX, 1);
        for (let i = 0; i < values.length; i++) {
            this.values[i] = values[i];
        }
        Atomics.store(this.header, LENGTH_INDEX, values.length);
        Atomics.add(this.header, SEQUENCE_INDEX, 1);
        Atomics.store(this.header, WRITTEN_INDEX, 1);
    }

    /**
     * Latest snapshot, or null while nothing has been written yet.
     */
    get(): number[] | null {
        if (Atomics.load(this.header, WRITTEN_INDEX) === 0) {
            return null;
        }

        let copy: number[] = [];

        for (let attempt = 0; attempt < CurrentValuesSlot.MAX_READ_ATTEMPTS; attempt++) {
            const before = Atomics.load(this.header, SEQUENCE_INDEX);

            const length = Math.min(Atomics.load(this.header, LENGTH_INDEX), this.capacity);
            copy = Array.from(this.values.subarray(0, length));

            const after = Atomics.load(this.header, SEQUENCE_INDEX);
            if (before === after && (before & 1) === 0) {
                return copy;
            }
        }

        return copy;
    }
}
