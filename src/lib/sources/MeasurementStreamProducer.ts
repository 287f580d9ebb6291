/**
 * Streams value frames from a Connect RPC server into the sink.
 *
 * WHY server streaming?
 * - One request, then the server pushes frames as fast as it measures
 * - No polling round trips between producer and instrument
 */
import { createPromiseClient, type Transport } from '@connectrpc/connect';
import { createConnectTransport } from '@connectrpc/connect-node';
import { MeasurementService } from './measurementService';
import type { ValueProducer, ValueSink } from './types';

export interface MeasurementStreamProducerOptions {
    baseUrl?: string;       // Server URL (default: 'http://localhost:50051')
    transport?: Transport;  // Replaces the HTTP transport (e.g. an in-process router)
}

function readValues(frame: Record<string, unknown>): number[] | null {
    const values = frame.values;
    if (!Array.isArray(values) || !values.every((v): v is number => typeof v === 'number')) {
        return null;
    }
    return values;
}

export class MeasurementStreamProducer implements ValueProducer {
    public readonly kind = 'grpc';

    private readonly transport: Transport;
    private received = 0;

    constructor(options: MeasurementStreamProducerOptions = {}) {
        this.transport = options.transport ?? createConnectTransport({
            baseUrl: options.baseUrl ?? 'http://localhost:50051',
            httpVersion: '1.1',
            useBinaryFormat: true,  // Protocol Buffers on the wire
        });
    }

    get receivedFrames(): number {
        return this.received;
    }

    async run(sink: ValueSink, signal: AbortSignal): Promise<void> {
        const client = createPromiseClient(MeasurementService, this.transport);

        try {
            for await (const frame of client.streamValues({}, { signal })) {
                const values = readValues(frame);
                if (values === null) {
                    continue;
                }

                this.received++;
                sink.set(values);
            }
            console.log(`MeasurementStreamProducer: stream ended after ${this.received} frames.`);
        } catch (error) {
            if (signal.aborted) {
                return;
            }
            console.error('MeasurementStreamProducer: stream failed:', error);
            throw error;
        }
    }
}
