import { parentPort, workerData } from 'node:worker_threads';
import { z } from 'zod';
import { createWorldConfig } from '../config';
import { createOverpassJsonSource } from '../ingest/sources';
import { runLoader } from './loader';
import { DONE_MESSAGE, getTransferables, type LoaderMessage, statusMessage } from './loader-messages';

/*
 * Worker thread entry of startLoaderWorker. Loads an Overpass JSON file and posts every loader message
 * to the parent, transferring chunk buffers.
 */

const workerDataSchema = z.object({
    path: z.string().min(1),
    options: z.unknown(),
});

const run = async (): Promise<void> => {
    const port = parentPort;
    if (!port) return;

    const post = (message: LoaderMessage) => port.postMessage(message, getTransferables(message));

    try {
        const data = workerDataSchema.parse(workerData);
        const config = createWorldConfig(data.options);
        await runLoader(createOverpassJsonSource(data.path), config, post);
    } catch (error) {
        post(statusMessage(`Error: ${error instanceof Error ? error.message : String(error)}`));
        post(DONE_MESSAGE);
    }
};

run().catch((error: unknown) => {
    console.error('loader worker failed', error);
    process.exitCode = 1;
});
