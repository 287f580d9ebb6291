import { RollingBuffer, roll, type RollTarget } from '../core/RollingBuffer';
import type { AxisRange } from './AxisRow';
import type { SeriesStyle } from './styles';

export interface PhasePanelConfig {
    xRange: AxisRange;
    yRange: AxisRange;
    size: number;
    style: SeriesStyle;
}

/**
 * PhasePanel - two channels plotted against each other instead of against time.
 *
 * Both buffers roll together, so position i of x and position i of y always
 * form one point of the cloud.
 */
export class PhasePanel implements RollTarget<'x' | 'y'> {
    public readonly x: RollingBuffer;
    public readonly y: RollingBuffer;
    public readonly xRange: AxisRange;
    public readonly yRange: AxisRange;
    public readonly style: SeriesStyle;

    constructor(config: PhasePanelConfig) {
        this.x = new RollingBuffer(config.size);
        this.y = new RollingBuffer(config.size);
        this.xRange = config.xRange;
        this.yRange = config.yRange;
        this.style = config.style;
    }

    get size(): number {
        return this.x.capacity;
    }

    update(x: number, y: number): void {
        roll(this, 'x', x);
        roll(this, 'y', y);
    }

    points(): Array<readonly [number, number]> {
        const xs = this.x.contents();
        const ys = this.y.contents();
        return xs.map((x, i) => [x, ys[i]] as const);
    }
}
