/**
 * Worker thread for data acquisition
 *
 * WHY a worker?
 * - The render loop must tick on time
 * - A busy producer (tight sampling loop, decoding a stream) would delay it
 * - Worker produces, main thread renders, the slot connects them
 */
import { parentPort } from 'node:worker_threads';
import type { ProducerWorkerRequest } from '../sources/ProducerThread';
import { ProducerHost } from './ProducerHost';

const host = new ProducerHost((event) => parentPort?.postMessage(event));

parentPort?.on('message', (request: ProducerWorkerRequest) => host.handle(request));
