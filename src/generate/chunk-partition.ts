import type { Vec2 } from 'mathcat';
import type { BuildContextState } from '../build-context';
import type { WorldConfig } from '../config';
import { centroid } from '../geometry';
import type { Footprint } from '../ingest/footprint';
import { buildChunkData, type ChunkCoord, type ChunkData, type ChunkMeshConfig } from './chunk-mesh';

export type ChunkGridConfig = Pick<WorldConfig, 'worldSize' | 'chunkSize' | 'chunksPerAxis'>;

/**
 * Chunk coordinate containing a world space point. The coordinate may lie outside the world grid.
 */
export const getChunkCoord = (out: ChunkCoord, x: number, z: number, config: Pick<WorldConfig, 'worldSize' | 'chunkSize'>): ChunkCoord => {
    const half = config.worldSize / 2;
    out[0] = Math.floor((x + half) / config.chunkSize);
    out[1] = Math.floor((z + half) / config.chunkSize);
    return out;
};

export const isChunkInWorld = (cx: number, cz: number, config: Pick<WorldConfig, 'chunksPerAxis'>): boolean =>
    cx >= 0 && cx < config.chunksPerAxis && cz >= 0 && cz < config.chunksPerAxis;

/** Key of a chunk coordinate in chunk maps */
export const chunkKey = (cx: number, cz: number): string => `${cx},${cz}`;

/** Row major index of an in-world chunk coordinate */
export const chunkIndex = (cx: number, cz: number, config: Pick<WorldConfig, 'chunksPerAxis'>): number => cz * config.chunksPerAxis + cx;

const _centroid: Vec2 = [0, 0];

/**
 * The chunk a footprint belongs to, picked by its vertex centroid.
 * @returns the chunk coordinate, or undefined if the centroid lies outside the world
 */
export const getFootprintChunk = (out: ChunkCoord, footprint: Footprint, config: ChunkGridConfig): ChunkCoord | undefined => {
    centroid(_centroid, footprint.points);
    getChunkCoord(out, _centroid[0], _centroid[1], config);
    return isChunkInWorld(out[0], out[1], config) ? out : undefined;
};

/**
 * Footprints bucketed per chunk. Each bucket is built into its own chunk, so chunks never share geometry.
 */
export type ChunkPartition = {
    config: ChunkGridConfig;

    /** row major buckets, chunksPerAxis * chunksPerAxis */
    buckets: Footprint[][];

    /** number of footprints added */
    count: number;

    /** number of footprints dropped for lying outside the world */
    dropped: number;
};

export const createChunkPartition = (config: ChunkGridConfig): ChunkPartition => {
    const buckets: Footprint[][] = [];
    for (let i = 0; i < config.chunksPerAxis * config.chunksPerAxis; i++) {
        buckets.push([]);
    }
    return { config, buckets, count: 0, dropped: 0 };
};

/**
 * Adds a footprint to the bucket of its chunk.
 * @returns the chunk coordinate, or undefined if the footprint was dropped
 */
export const addToPartition = (partition: ChunkPartition, footprint: Footprint): ChunkCoord | undefined => {
    const coord = getFootprintChunk([0, 0], footprint, partition.config);
    if (!coord) {
        partition.dropped++;
        return undefined;
    }

    partition.buckets[chunkIndex(coord[0], coord[1], partition.config)].push(footprint);
    partition.count++;
    return coord;
};

/** Number of chunks with at least one footprint */
export const countOccupiedChunks = (partition: ChunkPartition): number => {
    let n = 0;
    for (const bucket of partition.buckets) {
        if (bucket.length > 0) n++;
    }
    return n;
};

/**
 * Builds the occupied chunks one at a time, in row major order. Buckets are released once built.
 */
export function* buildPartitionedChunks(
    ctx: BuildContextState,
    partition: ChunkPartition,
    config: ChunkMeshConfig,
): Generator<ChunkData> {
    const axis = partition.config.chunksPerAxis;

    for (let index = 0; index < partition.buckets.length; index++) {
        const footprints = partition.buckets[index];
        if (footprints.length === 0) continue;

        const coord: ChunkCoord = [index % axis, Math.floor(index / axis)];
        partition.buckets[index] = [];

        yield buildChunkData(ctx, coord, footprints, config);
    }
}
