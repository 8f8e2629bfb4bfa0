import type { Vec2 } from 'mathcat';
import type { WorldConfig } from '../config';
import { type ChunkCoord, type ChunkData, getChunkOrigin } from '../generate/chunk-mesh';
import { chunkKey, getChunkCoord } from '../generate/chunk-partition';
import type { WallCollider } from '../generate/wall-collider';
import { createLocalCollisionGrid, type LocalCollisionGrid, wallsNear, wallsNearClamped } from './collision-grid';

/**
 * Hands a chunk's geometry to the renderer.
 * @returns the renderer's handle for the uploaded geometry
 */
export type ChunkUploader<H> = (data: ChunkData) => H;

/** A resident chunk, as seen by physics and culling */
export type Chunk<H> = {
    coord: ChunkCoord;

    /** renderer handle returned by the uploader */
    geometry: H;

    indexCount: number;

    collision: LocalCollisionGrid;

    /** world space [x, z] bounds of the chunk */
    min: Vec2;
    max: Vec2;
};

export type World<H> = {
    config: WorldConfig;

    /** resident chunks by chunkKey */
    chunks: Map<string, Chunk<H>>;
};

export const createWorld = <H>(config: WorldConfig): World<H> => ({
    config,
    chunks: new Map(),
});

/**
 * Makes a chunk resident: builds its collision grid, uploads its geometry and registers its bounds.
 * The chunk only becomes visible to queries once all three are done. A chunk without indices
 * is not registered. A chunk at an already resident coordinate replaces it.
 * @returns the registered chunk, or undefined if it was skipped
 */
export const insertChunk = <H>(world: World<H>, data: ChunkData, uploader: ChunkUploader<H>): Chunk<H> | undefined => {
    if (data.indices.length === 0) return undefined;

    const { config } = world;
    const min = getChunkOrigin([0, 0], data.coord, config);
    const max: Vec2 = [min[0] + config.chunkSize, min[1] + config.chunkSize];

    const collision = createLocalCollisionGrid(data.walls, min, config);
    const geometry = uploader(data);

    const chunk: Chunk<H> = {
        coord: [data.coord[0], data.coord[1]],
        geometry,
        indexCount: data.indices.length,
        collision,
        min,
        max,
    };

    world.chunks.set(chunkKey(data.coord[0], data.coord[1]), chunk);

    return chunk;
};

export const getChunk = <H>(world: World<H>, cx: number, cz: number): Chunk<H> | undefined => world.chunks.get(chunkKey(cx, cz));

const _coord: ChunkCoord = [0, 0];

/**
 * Collects the walls that may touch a point: the bucket of the point's cell in its own chunk, and the
 * nearest border buckets of the eight chunks around it. Walls are appended to `out`, which is cleared first.
 * A wall may appear more than once when it overhangs a chunk edge.
 */
export const getNeighbourhoodWalls = <H>(out: WallCollider[], world: World<H>, x: number, z: number): WallCollider[] => {
    out.length = 0;

    const [cx, cz] = getChunkCoord(_coord, x, z, world.config);

    for (let dz = -1; dz <= 1; dz++) {
        for (let dx = -1; dx <= 1; dx++) {
            const chunk = getChunk(world, cx + dx, cz + dz);
            if (!chunk) continue;

            // the own chunk misses only through rounding at its edge
            const bucket =
                dx === 0 && dz === 0
                    ? (wallsNear(chunk.collision, x, z) ?? wallsNearClamped(chunk.collision, x, z))
                    : wallsNearClamped(chunk.collision, x, z);

            for (const wall of bucket) out.push(wall);
        }
    }

    return out;
};

/** Number of resident chunks */
export const getChunkCount = <H>(world: World<H>): number => world.chunks.size;
