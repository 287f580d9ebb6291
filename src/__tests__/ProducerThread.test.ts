import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CurrentValuesSlot } from '../lib/core/CurrentValuesSlot';
import { ProducerThread, type ProducerWorkerEvent } from '../lib/sources/ProducerThread';
import { ProducerHost } from '../lib/worker/ProducerHost';

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => { });
    vi.spyOn(console, 'error').mockImplementation(() => { });
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('ProducerHost', () => {
    it('fills the attached slot until stopped', async () => {
        const slot = new CurrentValuesSlot(2);
        const events: ProducerWorkerEvent[] = [];
        const host = new ProducerHost((event) => events.push(event));

        host.handle({ type: 'setup', buffer: slot.buffer });
        host.handle({ type: 'start', config: { kind: 'sine', channels: 2, size: 8, periodMs: 1 } });
        expect(host.isProducing).toBe(true);

        await vi.waitFor(() => expect(slot.get()).toHaveLength(2));

        host.handle({ type: 'stop' });
        await host.settled();

        expect(host.isProducing).toBe(false);
        expect(events).toEqual([{ type: 'ended' }]);
    });

    it('reports a start without setup', () => {
        const events: ProducerWorkerEvent[] = [];
        const host = new ProducerHost((event) => events.push(event));

        host.handle({ type: 'start', config: { kind: 'sine', channels: 1 } });

        expect(events).toEqual([{ type: 'error', message: 'start received before setup' }]);
        expect(host.isProducing).toBe(false);
    });
});

describe('ProducerThread', () => {
    it('fills the slot from a worker thread', async () => {
        const slot = new CurrentValuesSlot(3);
        const thread = new ProducerThread(slot);
        const failures: Error[] = [];
        thread.onFailure((error) => failures.push(error));

        thread.start({ kind: 'sine', channels: 3, size: 10 });
        try {
            await vi.waitFor(() => expect(slot.get()).toHaveLength(3), { timeout: 15000, interval: 25 });
        } finally {
            await thread.stop();
        }

        expect(failures).toEqual([]);
        expect(thread.isRunning).toBe(false);
        expect(slot.sequence).toBeGreaterThan(0);
    }, 20000);

    it('reports a worker that cannot load', async () => {
        const thread = new ProducerThread(new CurrentValuesSlot(1), new URL('./missing.worker.ts', import.meta.url));
        const failures: Error[] = [];
        thread.onFailure((error) => failures.push(error));

        thread.start({ kind: 'sine', channels: 1 });
        try {
            await vi.waitFor(() => expect(failures).toHaveLength(1), { timeout: 15000, interval: 25 });
        } finally {
            await thread.stop();
        }

        expect(typeof failures[0].message).toBe('string');
    }, 20000);
});
