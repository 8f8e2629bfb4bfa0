import type { Vec2 } from 'mathcat';

/**
 * Projected nodes stored column-wise in typed arrays.
 * Nodes are appended while reading, then sorted by id once, after which lookups are binary searches.
 */
export type NodeStore = {
    ids: Float64Array;
    xs: Float64Array;
    zs: Float64Array;

    /** number of stored nodes */
    count: number;

    /** whether ids are sorted and unique, required by findNode */
    sorted: boolean;
};

export const createNodeStore = (capacity = 1024): NodeStore => {
    const initial = Math.max(1, capacity);
    return {
        ids: new Float64Array(initial),
        xs: new Float64Array(initial),
        zs: new Float64Array(initial),
        count: 0,
        sorted: true,
    };
};

const grow = (store: NodeStore, minCapacity: number): void => {
    let capacity = store.ids.length;
    while (capacity < minCapacity) capacity *= 2;

    const ids = new Float64Array(capacity);
    const xs = new Float64Array(capacity);
    const zs = new Float64Array(capacity);
    ids.set(store.ids.subarray(0, store.count));
    xs.set(store.xs.subarray(0, store.count));
    zs.set(store.zs.subarray(0, store.count));

    store.ids = ids;
    store.xs = xs;
    store.zs = zs;
};

export const addNode = (store: NodeStore, id: number, x: number, z: number): void => {
    if (store.count === store.ids.length) {
        grow(store, store.count + 1);
    }

    const i = store.count++;
    if (i > 0 && store.sorted && store.ids[i - 1] >= id) {
        store.sorted = false;
    }

    store.ids[i] = id;
    store.xs[i] = x;
    store.zs[i] = z;
};

/**
 * Sorts the store by id. When an id was added more than once, the last added node wins.
 */
export const sortNodeStore = (store: NodeStore): void => {
    if (store.sorted) return;

    const n = store.count;
    const order = new Uint32Array(n);
    for (let i = 0; i < n; i++) order[i] = i;

    const { ids } = store;
    // ties keep insertion order, so the last of equal ids is the latest added
    order.sort((a, b) => ids[a] - ids[b] || a - b);

    const sortedIds = new Float64Array(n);
    const sortedXs = new Float64Array(n);
    const sortedZs = new Float64Array(n);

    let count = 0;
    for (let k = 0; k < n; k++) {
        const src = order[k];
        const id = ids[src];
        if (count > 0 && sortedIds[count - 1] === id) {
            count--;
        }
        sortedIds[count] = id;
        sortedXs[count] = store.xs[src];
        sortedZs[count] = store.zs[src];
        count++;
    }

    store.ids = sortedIds;
    store.xs = sortedXs;
    store.zs = sortedZs;
    store.count = count;
    store.sorted = true;
};

/**
 * Finds the index of a node by id.
 * @returns the index, or -1 if the node is not in the store
 */
export const findNodeIndex = (store: NodeStore, id: number): number => {
    if (!store.sorted) sortNodeStore(store);

    const { ids } = store;
    let lo = 0;
    let hi = store.count - 1;
    while (lo <= hi) {
        const mid = (lo + hi) >>> 1;
        const midId = ids[mid];
        if (midId < id) lo = mid + 1;
        else if (midId > id) hi = mid - 1;
        else return mid;
    }
    return -1;
};

/**
 * Looks up a projected node by id
 * @param out output [x, z]
 * @returns whether the node was found
 */
export const findNode = (store: NodeStore, id: number, out: Vec2): boolean => {
    const index = findNodeIndex(store, id);
    if (index === -1) return false;

    out[0] = store.xs[index];
    out[1] = store.zs[index];
    return true;
};
