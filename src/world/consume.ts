import type { LoaderMessage } from '../stream/loader-messages';
import { drainMessages, type MessageQueue, queueSize } from '../stream/message-queue';
import { type ChunkUploader, insertChunk, type World } from './world';

/** Consumer side view of a load, what a loading screen displays */
export type LoadingState = {
    /** latest status text */
    status: string;

    /** latest progress, in [0, 1] */
    progress: number;

    /** set once done has been processed. the world is then fully initialized, possibly empty */
    done: boolean;

    /** batches processed */
    batches: number;

    /** chunks ingested, including chunks that replaced a resident chunk */
    chunksIngested: number;

    /** chunks received without geometry, which are not registered */
    chunksSkipped: number;

    /** messages that arrived after done */
    ignoredAfterDone: number;
};

export const createLoadingState = (): LoadingState => ({
    status: '',
    progress: 0,
    done: false,
    batches: 0,
    chunksIngested: 0,
    chunksSkipped: 0,
    ignoredAfterDone: 0,
});

export type ConsumeOptions = {
    /** stop after the batch that brings the chunks ingested in this call to at least this many */
    maxChunksPerDrain?: number;

    /** called with each status text as it is processed */
    onStatus?: (text: string) => void;
};

/**
 * Applies loader messages to the world, in order. Every chunk of a batch is ingested before the
 * next message is looked at. Messages after done are counted and otherwise ignored.
 * @returns the number of messages consumed, the rest are left for a later call
 */
export const consumeLoaderMessages = <H>(
    world: World<H>,
    state: LoadingState,
    messages: readonly LoaderMessage[],
    uploader: ChunkUploader<H>,
    options: ConsumeOptions = {},
): number => {
    const maxChunks = options.maxChunksPerDrain ?? Number.POSITIVE_INFINITY;
    let ingested = 0;
    let consumed = 0;

    for (const message of messages) {
        if (ingested >= maxChunks) break;
        consumed++;

        if (state.done) {
            state.ignoredAfterDone++;
            continue;
        }

        switch (message.type) {
            case 'status':
                state.status = message.text;
                options.onStatus?.(message.text);
                break;
            case 'progress':
                state.progress = Math.max(state.progress, message.progress);
                break;
            case 'batch':
                for (const data of message.chunks) {
                    if (insertChunk(world, data, uploader)) {
                        state.chunksIngested++;
                    } else {
                        state.chunksSkipped++;
                    }
                    ingested++;
                }
                state.batches++;
                break;
            case 'done':
                state.done = true;
                break;
        }
    }

    return consumed;
};

/**
 * Drains the messages currently buffered in a loader queue and applies them. Never waits on the producer.
 * With `maxChunksPerDrain`, the messages past the capping batch stay queued for the next drain.
 * @returns the number of messages consumed
 */
export const drainLoader = <H>(
    world: World<H>,
    state: LoadingState,
    queue: MessageQueue<LoaderMessage>,
    uploader: ChunkUploader<H>,
    options: ConsumeOptions = {},
): number => {
    if (options.maxChunksPerDrain === undefined) {
        return consumeLoaderMessages(world, state, drainMessages(queue), uploader, options);
    }

    // take messages one at a time so nothing past the cap leaves the queue
    let consumed = 0;
    let remaining = options.maxChunksPerDrain;
    while (remaining > 0 && queueSize(queue) > 0) {
        const before = state.chunksIngested + state.chunksSkipped;
        consumed += consumeLoaderMessages(world, state, drainMessages(queue, 1), uploader, options);
        remaining -= state.chunksIngested + state.chunksSkipped - before;
    }

    return consumed;
};
