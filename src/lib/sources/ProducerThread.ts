/**
 * ProducerThread - runs a producer in a worker thread
 *
 * Main thread -> Worker: postMessage({ type: 'setup', buffer }), then { type: 'start', config }
 * Worker -> shared memory: writes straight into the CurrentValuesSlot
 * Shared memory -> render loop: slot.get() on every frame, no messages involved
 *
 * The worker module is TypeScript. Loaders given with --import stay on the main
 * thread, so the worker starts from a small bootstrap that registers tsx first.
 */
import { createRequire } from 'node:module';
import { Worker } from 'node:worker_threads';
import type { CurrentValuesSlot } from '../core/CurrentValuesSlot';
import type { ProducerConfig } from './createProducer';

export type ProducerWorkerRequest =
    | { type: 'setup'; buffer: SharedArrayBuffer }
    | { type: 'start'; config: ProducerConfig }
    | { type: 'stop' };

export type ProducerWorkerEvent =
    | { type: 'ended' }
    | { type: 'error'; message: string };

const localRequire = createRequire(import.meta.url);

function bootstrapSource(workerUrl: URL): string {
    const tsxApi = localRequire.resolve('tsx/esm/api');
    return [
        `require(${JSON.stringify(tsxApi)}).register();`,
        `import(${JSON.stringify(workerUrl.href)});`,
    ].join('\n');
}

export class ProducerThread {
    private worker: Worker | null = null;
    private stopping = false;
    private failed = false;
    private readonly failureListeners: Array<(error: Error) => void> = [];

    constructor(
        private readonly slot: CurrentValuesSlot,
        private readonly workerUrl: URL = new URL('../worker/producer.worker.ts', import.meta.url)
    ) { }

    get isRunning(): boolean {
        return this.worker !== null;
    }

    /**
     * Called once, with the first failure: worker crash, producer error or an
     * unexpected exit.
     */
    onFailure(listener: (error: Error) => void): void {
        this.failureListeners.push(listener);
    }

    start(config: ProducerConfig): void {
        if (this.worker) {
            console.warn('ProducerThread: already running!');
            return;
        }

        this.stopping = false;
        this.failed = false;

        const worker = new Worker(bootstrapSource(this.workerUrl), { eval: true });
        worker.on('message', (event: ProducerWorkerEvent) => {
            if (event.type === 'error') {
                this.fail(new Error(`ProducerThread: producer failed: ${event.message}`));
            } else {
                console.log('ProducerThread: producer finished.');
            }
        });
        worker.on('error', (error) => {
            this.fail(error);
        });
        worker.on('exit', (code) => {
            if (!this.stopping && code !== 0) {
                this.fail(new Error(`ProducerThread: worker exited with code ${code}`));
            }
        });

        this.post(worker, { type: 'setup', buffer: this.slot.buffer });
        this.post(worker, { type: 'start', config });
        this.worker = worker;

        console.log(`ProducerThread: started ${config.kind} producer.`);
    }

    async stop(): Promise<void> {
        const worker = this.worker;
        if (!worker) {
            return;
        }

        this.worker = null;
        this.stopping = true;
        this.post(worker, { type: 'stop' });
        await worker.terminate();
        console.log('ProducerThread: stopped.');
    }

    private fail(error: Error): void {
        if (this.failed) {
            return;
        }
        this.failed = true;

        console.error('ProducerThread: worker failed:', error);
        for (const listener of this.failureListeners) {
            listener(error);
        }
    }

    private post(worker: Worker, request: ProducerWorkerRequest): void {
        worker.postMessage(request);
    }
}
