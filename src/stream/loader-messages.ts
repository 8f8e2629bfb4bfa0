import type { ChunkData } from '../generate/chunk-mesh';

export type StatusMessage = { type: 'status'; text: string };

/** Approximate completion in [0, 1], non-decreasing over a load */
export type ProgressMessage = { type: 'progress'; progress: number };

/** Ownership of the chunks moves to the consumer */
export type BatchMessage = { type: 'batch'; chunks: ChunkData[] };

/** Terminal message, nothing follows it */
export type DoneMessage = { type: 'done' };

/** Messages from the loader (producer) to the world (consumer), delivered in order */
export type LoaderMessage = StatusMessage | ProgressMessage | BatchMessage | DoneMessage;

export const statusMessage = (text: string): StatusMessage => ({ type: 'status', text });

export const progressMessage = (progress: number): ProgressMessage => ({
    type: 'progress',
    progress: Math.min(1, Math.max(0, progress)),
});

export const batchMessage = (chunks: ChunkData[]): BatchMessage => ({ type: 'batch', chunks });

export const DONE_MESSAGE: DoneMessage = Object.freeze({ type: 'done' });

/**
 * The buffers that move with a message when it crosses a thread boundary.
 * After posting, the producer's views of these buffers are detached.
 */
export const getTransferables = (message: LoaderMessage): ArrayBuffer[] => {
    if (message.type !== 'batch') return [];

    const buffers: ArrayBuffer[] = [];
    for (const chunk of message.chunks) {
        for (const buffer of [chunk.vertices.buffer, chunk.indices.buffer]) {
            if (buffer instanceof ArrayBuffer && !buffers.includes(buffer)) buffers.push(buffer);
        }
    }
    return buffers;
};
