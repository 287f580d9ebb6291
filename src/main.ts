/**
 * Demo app for Rollplot
 *
 *   npm run demo                                   # synthetic sine waves
 *   ROLLPLOT_SOURCE=stdin node --import tsx src/main.ts < values.txt
 *   ROLLPLOT_SOURCE=grpc ROLLPLOT_GRPC_URL=http://localhost:50051 npm run demo
 *
 * Channel order: phase x, phase y, row 0, row 1 (two overlaid series).
 */
import { StripChart } from './lib/charts/StripChart';
import { CurrentValuesSlot } from './lib/core/CurrentValuesSlot';
import { TerminalRenderer } from './lib/renderer/TerminalRenderer';
import { LineInputProducer } from './lib/sources/LineInputProducer';
import { ProducerThread } from './lib/sources/ProducerThread';

type DemoSource = 'sine' | 'stdin' | 'grpc';

interface DemoConfig {
    source: DemoSource;
    grpcUrl: string;
    intervalMs: number;
}

const CHANNELS = 5;
const WINDOW_SIZE = 100;

function readConfig(env: NodeJS.ProcessEnv): DemoConfig {
    const source = env.ROLLPLOT_SOURCE ?? 'sine';
    if (source !== 'sine' && source !== 'stdin' && source !== 'grpc') {
        throw new Error(`ROLLPLOT_SOURCE must be sine, stdin or grpc, got "${source}"`);
    }

    const intervalMs = Number(env.ROLLPLOT_INTERVAL_MS ?? 50);
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
        throw new Error(`ROLLPLOT_INTERVAL_MS must be a positive number, got "${env.ROLLPLOT_INTERVAL_MS}"`);
    }

    return {
        source,
        grpcUrl: env.ROLLPLOT_GRPC_URL ?? 'http://localhost:50051',
        intervalMs,
    };
}

async function main(): Promise<void> {
    const config = readConfig(process.env);
    const slot = new CurrentValuesSlot(CHANNELS);

    const chart = new StripChart({
        yRanges: [[-1, 1], [-1, 1]],
        size: WINDOW_SIZE,
        phaseRanges: { x: [-1, 1], y: [-1, 1] },
        windowTitle: 'Sinewave demo (Ctrl+C to close)',
        styles: ['r--', ['b-', 'g.']],
        yLabels: ['Slow', 'Fast'],
        yTicks: [[-1, 0, 1], [-1, 0, 1]],
        legends: ['3x', ['4x', '5x']],
        showReadouts: true,
        intervalMs: config.intervalMs,
        values: () => slot.get(),
    });
    chart.showBaseline(1, 0.5);

    // ========== PRODUCER ==========
    const thread = new ProducerThread(slot);
    const stdinAbort = new AbortController();
    thread.onFailure((error) => chart.fail(error));

    let stdinTask: Promise<void> | null = null;

    if (config.source === 'stdin') {
        // I/O bound: the event loop interleaves it with the render loop
        stdinTask = chart.supervise(
            new LineInputProducer(process.stdin, { expectedCount: CHANNELS }).run(slot, stdinAbort.signal)
        );
    } else if (config.source === 'grpc') {
        thread.start({ kind: 'grpc', baseUrl: config.grpcUrl });
    } else {
        thread.start({ kind: 'sine', channels: CHANNELS, size: WINDOW_SIZE });
    }

    // ========== RENDER LOOP ==========
    try {
        await chart.start(new TerminalRenderer());
    } finally {
        stdinAbort.abort();
        await thread.stop();
        await stdinTask;
    }

    console.log(`Demo: closed after ${chart.getStats().frames} frames.`);
}

main().catch((error: unknown) => {
    console.error('Demo failed:', error);
    process.exitCode = 1;
});
