export interface DownsampleResult {
    /** Per-column minimum, `columnCount` entries are valid. */
    min: Float64Array;
    /** Per-column maximum, `columnCount` entries are valid. */
    max: Float64Array;
    /** Columns actually filled (= sample count when not downsampled) */
    columnCount: number;
    /** Whether several samples were folded into one column */
    isDownsampled: boolean;
}

/**
 * Folds a window of samples into at most `columns` min/max buckets.
 * Output arrays are reused between calls; copy them if they must outlive the next process().
 */
export class Downsampler {
    private minBuffer: Float64Array;
    private maxBuffer: Float64Array;
    private outputCapacity: number;

    constructor(initialColumns: number = 80) {
        this.outputCapacity = Math.max(1, initialColumns);
        this.minBuffer = new Float64Array(this.outputCapacity);
        this.maxBuffer = new Float64Array(this.outputCapacity);
    }

    public process(values: ArrayLike<number>, columns: number): DownsampleResult {
        const safeColumns = Math.max(1, Math.floor(columns));

        if (values.length <= safeColumns) {
            return this.copyExact(values);
        }

        return this.downsample(values, safeColumns);
    }

    public onResize(columns: number): void {
        this.ensureCapacity(columns);
    }

    private copyExact(values: ArrayLike<number>): DownsampleResult {
        this.ensureCapacity(values.length);

        for (let i = 0; i < values.length; i++) {
            this.minBuffer[i] = values[i];
            this.maxBuffer[i] = values[i];
        }

        return {
            min: this.minBuffer,
            max: this.maxBuffer,
            columnCount: values.length,
            isDownsampled: false,
        };
    }

    private downsample(values: ArrayLike<number>, columns: number): DownsampleResult {
        this.ensureCapacity(columns);

        const samplesPerColumn = values.length / columns;

        for (let column = 0; column < columns; column++) {
            const bucketStart = Math.floor(column * samplesPerColumn);
            const bucketEnd = Math.floor((column + 1) * samplesPerColumn);

            let bucketMin = NaN;
            let bucketMax = NaN;
            let seen = false;

            for (let i = bucketStart; i < bucketEnd; i++) {
                const val = values[i];
                if (Number.isNaN(val)) continue;

                if (!seen) {
                    bucketMin = val;
                    bucketMax = val;
                    seen = true;
                    continue;
                }
                if (val < bucketMin) bucketMin = val;
                if (val > bucketMax) bucketMax = val;
            }

            this.minBuffer[column] = bucketMin;
            this.maxBuffer[column] = bucketMax;
        }

        return {
            min: this.minBuffer,
            max: this.maxBuffer,
            columnCount: columns,
            isDownsampled: true,
        };
    }

    private ensureCapacity(columns: number): void {
        if (columns > this.outputCapacity) {
            this.outputCapacity = columns;
            this.minBuffer = new Float64Array(this.outputCapacity);
            this.maxBuffer = new Float64Array(this.outputCapacity);
        }
    }
}
