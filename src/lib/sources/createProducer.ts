import { MeasurementStreamProducer } from './MeasurementStreamProducer';
import { SineWaveProducer } from './SineWaveProducer';
import type { ValueProducer } from './types';

/**
 * Producer description that survives postMessage (plain data, no instances).
 */
export type ProducerConfig =
    | { kind: 'sine'; channels: number; size?: number; periodMs?: number }
    | { kind: 'grpc'; baseUrl?: string };

export function createProducer(config: ProducerConfig): ValueProducer {
    switch (config.kind) {
        case 'sine':
            return new SineWaveProducer(config);
        case 'grpc':
            return new MeasurementStreamProducer({ baseUrl: config.baseUrl });
    }
}
