import { RollingBuffer, roll, type RollTarget } from '../core/RollingBuffer';
import type { SeriesStyle } from './styles';

/**
 * One plotted line: a style tag, a legend label (may be empty) and the buffer it owns.
 */
export class SeriesBinding implements RollTarget<'y'> {
    public readonly y: RollingBuffer;

    constructor(
        public readonly style: SeriesStyle,
        public readonly label: string,
        size: number
    ) {
        this.y = new RollingBuffer(size);
    }

    append(value: number): void {
        roll(this, 'y', value);
    }

    contents(): number[] {
        return this.y.contents();
    }
}
