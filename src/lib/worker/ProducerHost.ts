import { CurrentValuesSlot } from '../core/CurrentValuesSlot';
import { createProducer } from '../sources/createProducer';
import type { ProducerWorkerEvent, ProducerWorkerRequest } from '../sources/ProducerThread';

/**
 * Worker-side state: the attached slot and the running producer.
 * Kept apart from the parentPort wiring so it can run on any thread.
 */
export class ProducerHost {
    private slot: CurrentValuesSlot | null = null;
    private controller: AbortController | null = null;
    private task: Promise<void> | null = null;

    constructor(private readonly emit: (event: ProducerWorkerEvent) => void) { }

    get isProducing(): boolean {
        return this.controller !== null;
    }

    handle(request: ProducerWorkerRequest): void {
        // Phase 1: setup - attach to the slot the main thread allocated
        if (request.type === 'setup') {
            this.slot = new CurrentValuesSlot(request.buffer);
            console.log(`Worker: setup complete - ${this.slot.capacity} value slot`);
            return;
        }

        if (request.type === 'stop') {
            this.controller?.abort();
            this.controller = null;
            return;
        }

        // Phase 2: start producing
        if (!this.slot) {
            this.emit({ type: 'error', message: 'start received before setup' });
            return;
        }
        if (this.controller) {
            return;
        }

        const controller = new AbortController();
        this.controller = controller;
        this.task = createProducer(request.config)
            .run(this.slot, controller.signal)
            .then(() => this.emit({ type: 'ended' }))
            .catch((error: unknown) => {
                this.emit({ type: 'error', message: error instanceof Error ? error.message : String(error) });
            })
            .finally(() => {
                if (this.controller === controller) {
                    this.controller = null;
                }
            });
    }

    /** Settles once the current producer has returned and reported. */
    async settled(): Promise<void> {
        await this.task;
    }
}
