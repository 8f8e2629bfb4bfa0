import type { Vec2, Vec3 } from 'mathcat';
import { BuildContext, type BuildContextState } from '../build-context';
import type { WorldConfig } from '../config';
import { triangulateRing } from '../geometry';
import type { Footprint } from '../ingest/footprint';
import { createWallCollider, type WallCollider } from './wall-collider';

/** Floats per vertex: position (3), normal (3), color (3) */
export const VERTEX_STRIDE = 9;

export const VERTEX_POSITION_OFFSET = 0;
export const VERTEX_NORMAL_OFFSET = 3;
export const VERTEX_COLOR_OFFSET = 6;

export const GROUND_Y = -0.1;
export const GROUND_COLOR: Vec3 = [0.05, 0.05, 0.05];

const UP: Vec3 = [0, 1, 0];

/** Integer chunk coordinate [cx, cz] */
export type ChunkCoord = [cx: number, cz: number];

/**
 * Geometry and colliders of one chunk. The unit of streaming: built by the loader and handed
 * to the consumer in one piece.
 */
export type ChunkData = {
    coord: ChunkCoord;

    /** interleaved vertices, see VERTEX_STRIDE */
    vertices: Float32Array;

    /** triangle list indices into this chunk's vertices */
    indices: Uint32Array;

    walls: WallCollider[];
};

export type ChunkMeshConfig = Pick<WorldConfig, 'worldSize' | 'chunkSize' | 'wallThickness' | 'minEdgeLength' | 'maxRoofDeviation'>;

/** Accumulates the geometry of one chunk */
export type ChunkMeshBuilder = {
    coord: ChunkCoord;
    config: ChunkMeshConfig;
    vertices: Float32Array;
    vertexCount: number;
    indices: Uint32Array;
    indexCount: number;
    walls: WallCollider[];
};

export const createChunkMeshBuilder = (coord: ChunkCoord, config: ChunkMeshConfig, vertexCapacity = 256): ChunkMeshBuilder => {
    const capacity = Math.max(4, vertexCapacity);
    return {
        coord: [coord[0], coord[1]],
        config,
        vertices: new Float32Array(capacity * VERTEX_STRIDE),
        vertexCount: 0,
        indices: new Uint32Array(capacity * 2),
        indexCount: 0,
        walls: [],
    };
};

const reserveVertices = (builder: ChunkMeshBuilder, count: number): void => {
    const needed = (builder.vertexCount + count) * VERTEX_STRIDE;
    if (needed <= builder.vertices.length) return;

    let capacity = builder.vertices.length;
    while (capacity < needed) capacity *= 2;

    const vertices = new Float32Array(capacity);
    vertices.set(builder.vertices.subarray(0, builder.vertexCount * VERTEX_STRIDE));
    builder.vertices = vertices;
};

const reserveIndices = (builder: ChunkMeshBuilder, count: number): void => {
    const needed = builder.indexCount + count;
    if (needed <= builder.indices.length) return;

    let capacity = builder.indices.length;
    while (capacity < needed) capacity *= 2;

    const indices = new Uint32Array(capacity);
    indices.set(builder.indices.subarray(0, builder.indexCount));
    builder.indices = indices;
};

/**
 * Appends a vertex
 * @returns the index of the vertex within the chunk
 */
export const pushVertex = (builder: ChunkMeshBuilder, x: number, y: number, z: number, normal: Vec3, color: Vec3): number => {
    reserveVertices(builder, 1);

    const o = builder.vertexCount * VERTEX_STRIDE;
    const v = builder.vertices;
    v[o] = x;
    v[o + 1] = y;
    v[o + 2] = z;
    v[o + 3] = normal[0];
    v[o + 4] = normal[1];
    v[o + 5] = normal[2];
    v[o + 6] = color[0];
    v[o + 7] = color[1];
    v[o + 8] = color[2];

    return builder.vertexCount++;
};

export const pushTriangle = (builder: ChunkMeshBuilder, a: number, b: number, c: number): void => {
    reserveIndices(builder, 3);

    const i = builder.indexCount;
    builder.indices[i] = a;
    builder.indices[i + 1] = b;
    builder.indices[i + 2] = c;
    builder.indexCount += 3;
};

/** World space [x, z] of a chunk's minimum corner */
export const getChunkOrigin = (out: Vec2, coord: ChunkCoord, config: Pick<WorldConfig, 'worldSize' | 'chunkSize'>): Vec2 => {
    out[0] = coord[0] * config.chunkSize - config.worldSize / 2;
    out[1] = coord[1] * config.chunkSize - config.worldSize / 2;
    return out;
};

/**
 * Adds a flat ground quad covering the whole chunk, just below y = 0
 */
export const addGroundQuad = (builder: ChunkMeshBuilder): void => {
    const [cx, cz] = getChunkOrigin([0, 0], builder.coord, builder.config);
    const s = builder.config.chunkSize;

    const base = pushVertex(builder, cx, GROUND_Y, cz, UP, GROUND_COLOR);
    pushVertex(builder, cx + s, GROUND_Y, cz, UP, GROUND_COLOR);
    pushVertex(builder, cx + s, GROUND_Y, cz + s, UP, GROUND_COLOR);
    pushVertex(builder, cx, GROUND_Y, cz + s, UP, GROUND_COLOR);

    pushTriangle(builder, base, base + 1, base + 2);
    pushTriangle(builder, base, base + 2, base + 3);
};

/**
 * Adds the flat roof of a footprint.
 * @returns whether the roof could be triangulated
 */
export const addRoof = (builder: ChunkMeshBuilder, footprint: Footprint): boolean => {
    const triangles = triangulateRing(footprint.points, builder.config.maxRoofDeviation);
    if (!triangles) return false;

    const base = builder.vertexCount;
    for (const p of footprint.points) {
        pushVertex(builder, p[0], footprint.height, p[1], UP, footprint.color);
    }

    for (let i = 0; i < triangles.length; i += 3) {
        pushTriangle(builder, base + triangles[i], base + triangles[i + 1], base + triangles[i + 2]);
    }

    return true;
};

const _wallNormal: Vec3 = [0, 0, 0];

/**
 * Adds one wall quad from p1 to p2, and its collider.
 * @returns whether the wall was added, degenerate edges are skipped
 */
export const addWall = (builder: ChunkMeshBuilder, p1: Vec2, p2: Vec2, height: number, color: Vec3): boolean => {
    const { minEdgeLength, wallThickness } = builder.config;

    const dx = p2[0] - p1[0];
    const dz = p2[1] - p1[1];
    if (Math.abs(dx) < minEdgeLength && Math.abs(dz) < minEdgeLength) return false;

    // perpendicular of the edge in the ground plane, outward for counter-clockwise rings
    const length = Math.sqrt(dx * dx + dz * dz);
    const normal = _wallNormal;
    normal[0] = dz / length;
    normal[1] = 0;
    normal[2] = -dx / length;

    const base = pushVertex(builder, p1[0], 0, p1[1], normal, color);
    pushVertex(builder, p2[0], 0, p2[1], normal, color);
    pushVertex(builder, p2[0], height, p2[1], normal, color);
    pushVertex(builder, p1[0], height, p1[1], normal, color);

    pushTriangle(builder, base, base + 1, base + 2);
    pushTriangle(builder, base, base + 2, base + 3);

    builder.walls.push(createWallCollider(p1, p2, height, wallThickness));

    return true;
};

/**
 * Adds a building: its roof, one wall per edge and one collider per wall.
 * A roof that can't be triangulated is left out, the walls are still added.
 */
export const addFootprint = (ctx: BuildContextState, builder: ChunkMeshBuilder, footprint: Footprint): void => {
    if (!addRoof(builder, footprint)) {
        BuildContext.warn(ctx, `addFootprint: could not triangulate roof of way ${footprint.id} (${footprint.points.length} points).`);
    }

    const { points } = footprint;
    const n = points.length;
    const nEdges = footprint.closed ? n : n - 1;

    for (let i = 0; i < nEdges; i++) {
        addWall(builder, points[i], points[(i + 1) % n], footprint.height, footprint.color);
    }
};

/**
 * Copies the accumulated geometry into exactly sized buffers
 */
export const finishChunkMesh = (builder: ChunkMeshBuilder): ChunkData => ({
    coord: [builder.coord[0], builder.coord[1]],
    vertices: builder.vertices.slice(0, builder.vertexCount * VERTEX_STRIDE),
    indices: builder.indices.slice(0, builder.indexCount),
    walls: builder.walls.slice(),
});

/**
 * Builds the data of one chunk from the footprints assigned to it
 */
export const buildChunkData = (
    ctx: BuildContextState,
    coord: ChunkCoord,
    footprints: readonly Footprint[],
    config: ChunkMeshConfig,
): ChunkData => {
    let pointCount = 0;
    for (const footprint of footprints) pointCount += footprint.points.length;

    // ground (4) + roof (n) + walls (4n) per footprint
    const builder = createChunkMeshBuilder(coord, config, 4 + pointCount * 5);

    addGroundQuad(builder);

    for (const footprint of footprints) {
        addFootprint(ctx, builder, footprint);
    }

    return finishChunkMesh(builder);
};

export const getChunkVertexCount = (data: ChunkData): number => data.vertices.length / VERTEX_STRIDE;
