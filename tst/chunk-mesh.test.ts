import type { Vec2, Vec3 } from 'mathcat';
import { describe, expect, test } from 'vitest';
import { BuildContext } from '../src/build-context';
import { createWorldConfig } from '../src/config';
import {
    addFootprint,
    addWall,
    buildChunkData,
    createChunkMeshBuilder,
    finishChunkMesh,
    GROUND_Y,
    getChunkOrigin,
    getChunkVertexCount,
    VERTEX_NORMAL_OFFSET,
    VERTEX_STRIDE,
} from '../src/generate/chunk-mesh';
import { createWallCollider, wallBoundsContain } from '../src/generate/wall-collider';
import { buildFootprint, type Footprint } from '../src/ingest/footprint';
import { addNode, createNodeStore, sortNodeStore } from '../src/ingest/node-store';

const config = createWorldConfig();
const GREY: Vec3 = [0.2, 0.2, 0.2];

const footprint = (points: Vec2[], closed = true, height = 30): Footprint => ({
    id: 1,
    points,
    closed,
    height,
    color: GREY,
});

describe('chunk mesh end to end', () => {
    // a 4 node square way tagged building=yes, height=30
    const store = createNodeStore();
    addNode(store, 1, 100, 100);
    addNode(store, 2, 110, 100);
    addNode(store, 3, 110, 110);
    addNode(store, 4, 100, 110);
    sortNodeStore(store);

    const ctx = BuildContext.create();
    const square = buildFootprint(
        ctx,
        store,
        { type: 'way', id: 5, nodes: [1, 2, 3, 4, 1], tags: { building: 'yes', height: '30' } },
        config,
    );

    test('square building yields ground, two roof triangles and four wall quads', () => {
        expect(square).toBeDefined();
        if (!square) return;

        const data = buildChunkData(ctx, [8, 8], [square], config);

        // ground 4 + roof 4 + walls 4 * 4
        expect(getChunkVertexCount(data)).toBe(24);
        // ground 6 + roof 6 + walls 4 * 6
        expect(data.indices.length).toBe(36);

        const roof = Array.from(data.indices.subarray(6, 12));
        expect(roof).toHaveLength(6);
        for (const index of roof) {
            expect(index).toBeGreaterThanOrEqual(4);
            expect(index).toBeLessThan(8);
        }

        const walls = Array.from(data.indices.subarray(12));
        expect(walls).toHaveLength(24);
        for (const index of walls) {
            expect(index).toBeGreaterThanOrEqual(8);
            expect(index).toBeLessThan(24);
        }

        expect(data.walls).toHaveLength(4);
        for (const wall of data.walls) {
            expect(wall.height).toBe(30);
        }

        expect(ctx.counts.warning).toBe(0);
    });

    test('roof vertices sit at the building height', () => {
        if (!square) return;
        const data = buildChunkData(BuildContext.create(), [8, 8], [square], config);

        for (let v = 4; v < 8; v++) {
            expect(data.vertices[v * VERTEX_STRIDE + 1]).toBe(30);
        }
    });

    test('first wall faces away from the building', () => {
        if (!square) return;
        const data = buildChunkData(BuildContext.create(), [8, 8], [square], config);

        // wall (100, 100) -> (110, 100), the building lies at +z
        const o = 8 * VERTEX_STRIDE + VERTEX_NORMAL_OFFSET;
        expect(Array.from(data.vertices.subarray(o, o + 3))).toEqual([0, 0, -1]);
    });
});

describe('chunk mesh ground', () => {
    test('ground quad covers the chunk just below zero', () => {
        const data = buildChunkData(BuildContext.create(), [8, 8], [], config);
        const origin = getChunkOrigin([0, 0], [8, 8], config);

        expect(origin).toEqual([0, 0]);
        expect(getChunkVertexCount(data)).toBe(4);
        expect(Array.from(data.indices)).toEqual([0, 1, 2, 0, 2, 3]);
        expect(data.vertices[1]).toBeCloseTo(GROUND_Y, 6);
        expect(data.vertices[2 * VERTEX_STRIDE]).toBe(625);
        expect(data.vertices[2 * VERTEX_STRIDE + 2]).toBe(625);
        expect(data.walls).toEqual([]);
    });

    test('chunk origin of the first chunk is the world corner', () => {
        expect(getChunkOrigin([0, 0], [0, 0], config)).toEqual([-5000, -5000]);
        expect(getChunkOrigin([0, 0], [15, 3], config)).toEqual([4375, -3125]);
    });
});

describe('chunk mesh walls', () => {
    test('open footprints do not wrap around', () => {
        const builder = createChunkMeshBuilder([8, 8], config);
        addFootprint(
            BuildContext.create(),
            builder,
            footprint(
                [
                    [0, 0],
                    [10, 0],
                    [10, 10],
                ],
                false,
            ),
        );

        expect(builder.walls).toHaveLength(2);
    });

    test('degenerate edges are skipped', () => {
        const builder = createChunkMeshBuilder([8, 8], config);

        expect(addWall(builder, [5, 5], [5.001, 5.005], 20, GREY)).toBe(false);
        expect(builder.vertexCount).toBe(0);
        expect(builder.walls).toHaveLength(0);

        expect(addWall(builder, [5, 5], [5.02, 5], 20, GREY)).toBe(true);
        expect(builder.walls).toHaveLength(1);
    });

    test('failed roof keeps the walls and warns', () => {
        const ctx = BuildContext.create();
        const builder = createChunkMeshBuilder([8, 8], config);
        addFootprint(
            ctx,
            builder,
            footprint([
                [0, 0],
                [10, 10],
                [10, 0],
                [0, 10],
            ]),
        );

        expect(ctx.counts.warning).toBe(1);
        expect(builder.walls).toHaveLength(4);
        expect(builder.indexCount).toBe(24);
    });

    test('buffers grow past their initial capacity', () => {
        const builder = createChunkMeshBuilder([8, 8], config, 4);
        const ring: Vec2[] = [];
        for (let i = 0; i < 64; i++) {
            const a = (i / 64) * Math.PI * 2;
            ring.push([50 + Math.cos(a) * 20, 50 + Math.sin(a) * 20]);
        }
        addFootprint(BuildContext.create(), builder, footprint(ring));

        const data = finishChunkMesh(builder);
        expect(getChunkVertexCount(data)).toBe(64 * 5);
        expect(data.indices.length).toBe(62 * 3 + 64 * 6);
        expect(data.walls).toHaveLength(64);
    });
});

describe('wall colliders', () => {
    test('padded bounds are ordered and contain the segment', () => {
        const segments: [Vec2, Vec2][] = [
            [
                [0, 0],
                [10, 0],
            ],
            [
                [10, 5],
                [-3, -8],
            ],
            [
                [4, 9],
                [4, 2],
            ],
        ];

        for (const [start, end] of segments) {
            const wall = createWallCollider(start, end, 20, 0.5);

            expect(wall.minX).toBeLessThanOrEqual(wall.maxX);
            expect(wall.minZ).toBeLessThanOrEqual(wall.maxZ);

            for (let t = 0; t <= 1; t += 0.25) {
                const x = start[0] + (end[0] - start[0]) * t;
                const z = start[1] + (end[1] - start[1]) * t;
                expect(wall.minX).toBeLessThan(x);
                expect(wall.maxX).toBeGreaterThan(x);
                expect(wall.minZ).toBeLessThan(z);
                expect(wall.maxZ).toBeGreaterThan(z);
                expect(wallBoundsContain(wall, x, z)).toBe(true);
            }
        }
    });

    test('collider copies its points', () => {
        const start: Vec2 = [1, 2];
        const wall = createWallCollider(start, [3, 4], 10, 0.5);
        start[0] = 100;

        expect(wall.start).toEqual([1, 2]);
        expect(wall).toMatchObject({ minX: 0.5, maxX: 3.5, minZ: 1.5, maxZ: 4.5, height: 10 });
    });
});
