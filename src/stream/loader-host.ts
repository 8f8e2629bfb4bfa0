import { Worker } from 'node:worker_threads';
import { getWorldOptions, type WorldConfig, type WorldOptions } from '../config';
import type { MapSource } from '../ingest/sources';
import { DONE_MESSAGE, type LoaderMessage, statusMessage } from './loader-messages';
import { type LoaderOptions, type LoaderResult, runLoader } from './loader';
import { createMessageQueue, type MessageQueue, pushMessage } from './message-queue';

/** A running load, seen from the consumer */
export type LoaderHandle = {
    /** messages from the producer, drained by the consumer once per tick */
    queue: MessageQueue<LoaderMessage>;

    /** settles when the producer has emitted its last message */
    finished: Promise<LoaderResult | undefined>;
};

/** A load running on a worker thread */
export type WorkerLoaderHandle = LoaderHandle & {
    /** terminates the worker. messages already queued stay queued */
    terminate: () => Promise<void>;
};

/**
 * Runs the loader on this thread's event loop. The loader yields between slices of work,
 * so a consumer polling the queue from a timer keeps running.
 */
export const startLoader = (source: MapSource, config: WorldConfig, options: LoaderOptions = {}): LoaderHandle => {
    const queue = createMessageQueue<LoaderMessage>();

    const finished = runLoader(source, config, (message) => pushMessage(queue, message), options);

    return { queue, finished };
};

export type LoaderWorkerData = {
    path: string;
    options: WorldOptions;
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

export const isLoaderMessage = (value: unknown): value is LoaderMessage => {
    if (!isRecord(value)) return false;
    switch (value.type) {
        case 'status':
            return typeof value.text === 'string';
        case 'progress':
            return typeof value.progress === 'number';
        case 'batch':
            return Array.isArray(value.chunks);
        case 'done':
            return true;
        default:
            return false;
    }
};

export type WorkerEvent =
    | { type: 'message'; data: unknown }
    | { type: 'error'; error: Error }
    | { type: 'exit'; code: number };

/** Consumer side bookkeeping of a worker load */
export type WorkerLoadState = {
    done: boolean;
    failed: boolean;
};

export const createWorkerLoadState = (): WorkerLoadState => ({ done: false, failed: false });

const fail = (state: WorkerLoadState, queue: MessageQueue<LoaderMessage>, text: string): void => {
    state.failed = true;
    if (state.done) return;
    pushMessage(queue, statusMessage(`Error: ${text}`));
    pushMessage(queue, DONE_MESSAGE);
    state.done = true;
};

/**
 * Forwards a worker event onto the message queue. A worker that errors or exits before sending done
 * is reported with an error status followed by done, so the consumer always finishes loading.
 */
export const handleWorkerEvent = (state: WorkerLoadState, queue: MessageQueue<LoaderMessage>, event: WorkerEvent): void => {
    switch (event.type) {
        case 'message': {
            if (state.done) return;
            if (!isLoaderMessage(event.data)) {
                fail(state, queue, 'loader worker sent a malformed message');
                return;
            }
            pushMessage(queue, event.data);
            if (event.data.type === 'done') state.done = true;
            return;
        }
        case 'error':
            fail(state, queue, event.error.message);
            return;
        case 'exit':
            if (!state.done) fail(state, queue, `loader worker exited with code ${event.code}`);
            return;
    }
};

export type LoaderWorkerOptions = {
    /** worker entry module, defaults to the loader-worker module next to this one */
    workerUrl?: URL;
};

/**
 * Runs the loader for an Overpass JSON file on a worker thread.
 * Chunk buffers are transferred to this thread, not copied.
 */
export const startLoaderWorker = (path: string, config: WorldConfig, options: LoaderWorkerOptions = {}): WorkerLoaderHandle => {
    const queue = createMessageQueue<LoaderMessage>();
    const state = createWorkerLoadState();

    const workerData: LoaderWorkerData = { path, options: getWorldOptions(config) };
    const worker = new Worker(options.workerUrl ?? new URL('./loader-worker.ts', import.meta.url), { workerData });

    const finished = new Promise<LoaderResult | undefined>((resolve) => {
        worker.on('message', (data: unknown) => handleWorkerEvent(state, queue, { type: 'message', data }));
        worker.on('error', (error: Error) => handleWorkerEvent(state, queue, { type: 'error', error }));
        worker.on('exit', (code: number) => {
            handleWorkerEvent(state, queue, { type: 'exit', code });
            resolve(undefined);
        });
    });

    return {
        queue,
        finished,
        terminate: async () => {
            await worker.terminate();
        },
    };
};
