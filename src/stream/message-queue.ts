/**
 * Unbounded single producer, single consumer FIFO queue.
 * The producer never waits on the consumer; the consumer drains whatever is buffered.
 */
export type MessageQueue<T> = {
    items: T[];

    /** index of the oldest undrained item */
    head: number;
};

export const createMessageQueue = <T>(): MessageQueue<T> => ({
    items: [],
    head: 0,
});

export const pushMessage = <T>(queue: MessageQueue<T>, message: T): void => {
    queue.items.push(message);
};

export const queueSize = <T>(queue: MessageQueue<T>): number => queue.items.length - queue.head;

/**
 * Takes up to `max` buffered messages, oldest first
 */
export const drainMessages = <T>(queue: MessageQueue<T>, max = Number.POSITIVE_INFINITY): T[] => {
    const available = queueSize(queue);
    const n = Math.min(available, max);
    const drained = queue.items.slice(queue.head, queue.head + n);
    queue.head += n;

    // compact once the drained prefix dominates the backing array
    if (queue.head === queue.items.length) {
        queue.items.length = 0;
        queue.head = 0;
    } else if (queue.head > 1024 && queue.head * 2 > queue.items.length) {
        queue.items = queue.items.slice(queue.head);
        queue.head = 0;
    }

    return drained;
};

/** Takes the oldest buffered message, if any */
export const shiftMessage = <T>(queue: MessageQueue<T>): T | undefined => {
    if (queueSize(queue) === 0) return undefined;
    return drainMessages(queue, 1)[0];
};
