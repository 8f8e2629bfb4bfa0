import { mat4, type Vec3 } from 'mathcat';
import { describe, expect, test } from 'vitest';
import { BuildContext } from '../src/build-context';
import { createWorldConfig } from '../src/config';
import { buildChunkData, type ChunkCoord } from '../src/generate/chunk-mesh';
import { chunkKey } from '../src/generate/chunk-partition';
import { createCamera, getForward, getViewProjection, MAX_PITCH, rotateCamera } from '../src/view/camera';
import { createFrustum, extractFrustumPlanes, intersectsAabb } from '../src/view/frustum';
import { cullChunks } from '../src/view/visibility';
import { type Chunk, createWorld, insertChunk, type World } from '../src/world/world';

const config = createWorldConfig();

const IDENTITY = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
const ZERO = new Array<number>(16).fill(0);

/** clip space scaled down by s: the frustum is the cube |x|, |y|, |z| <= 1 / s */
const scaled = (s: number) => [s, 0, 0, 0, 0, s, 0, 0, 0, 0, s, 0, 0, 0, 0, 1];

const worldOf = (coords: ChunkCoord[]): World<string> => {
    const world = createWorld<string>(config);
    for (const coord of coords) {
        insertChunk(world, buildChunkData(BuildContext.create(), coord, [], config), (data) => chunkKey(data.coord[0], data.coord[1]));
    }
    return world;
};

const keys = (chunks: Chunk<string>[]) => chunks.map((chunk) => chunk.geometry).sort();

describe('frustum', () => {
    test('identity matrix bounds the unit cube', () => {
        const frustum = extractFrustumPlanes(createFrustum(), IDENTITY);

        expect(frustum[0]).toEqual([1, 0, 0, 1]);
        expect(frustum[1]).toEqual([-1, 0, 0, 1]);
        expect(frustum[4]).toEqual([0, 0, 1, 1]);
        expect(frustum[5]).toEqual([0, 0, -1, 1]);
    });

    test('positive vertex test against the unit cube', () => {
        const frustum = extractFrustumPlanes(createFrustum(), IDENTITY);

        expect(intersectsAabb(frustum, [0, 0, 0], [0.5, 0.5, 0.5])).toBe(true);
        expect(intersectsAabb(frustum, [0.5, -3, 0.5], [3, 3, 3])).toBe(true);
        expect(intersectsAabb(frustum, [-10, -10, -10], [10, 10, 10])).toBe(true);
        expect(intersectsAabb(frustum, [2, 2, 2], [3, 3, 3])).toBe(false);
        expect(intersectsAabb(frustum, [-0.5, -0.5, -3], [0.5, 0.5, -1.5])).toBe(false);
    });

    test('planes are normalized', () => {
        const frustum = extractFrustumPlanes(createFrustum(), scaled(0.5));

        expect(frustum[0]).toEqual([1, 0, 0, 2]);
        expect(frustum[3]).toEqual([0, -1, 0, 2]);
    });

    test('all zero matrix rejects every box', () => {
        const frustum = extractFrustumPlanes(createFrustum(), ZERO);

        expect(intersectsAabb(frustum, [-1, -1, -1], [1, 1, 1])).toBe(false);
        expect(intersectsAabb(frustum, [0, -20, -625], [625, 450, 0])).toBe(false);
        expect(intersectsAabb(frustum, [-1e6, -1e6, -1e6], [1e6, 1e6, 1e6])).toBe(false);
    });
});

describe('camera', () => {
    test('starts above the origin looking along -z', () => {
        const camera = createCamera(16 / 9);
        const forward = getForward([0, 0, 0], camera);

        expect(camera.spawn).toEqual([0, 50, 0]);
        expect(forward[0]).toBeCloseTo(0, 10);
        expect(forward[1]).toBe(0);
        expect(forward[2]).toBeCloseTo(-1, 10);
    });

    test('pitch is clamped', () => {
        const camera = createCamera(1);

        rotateCamera(camera, 0, -10000);
        expect(camera.pitch).toBe(MAX_PITCH);

        rotateCamera(camera, 0, 20000);
        expect(camera.pitch).toBe(-MAX_PITCH);

        rotateCamera(camera, 100, 0, 0.01);
        expect(camera.yaw).toBeCloseTo(-Math.PI / 2 + 1, 10);
    });
});

describe('cullChunks', () => {
    test('chunks beyond draw distance are dropped', () => {
        // (8, 13) is 3452 away, inside 3500 + radius 442. (15, 15) is 6629 away
        const world = worldOf([
            [8, 8],
            [8, 13],
            [15, 15],
        ]);
        const eye: Vec3 = [0, 50, 0];

        const visible = cullChunks([], world, scaled(1e-6), eye, config);

        expect(keys(visible)).toEqual(['8,13', '8,8']);
    });

    test('draw distance is measured from the eye', () => {
        const world = worldOf([[15, 15]]);

        expect(cullChunks([], world, scaled(1e-6), [4000, 50, 4000], config)).toHaveLength(1);
    });

    test('chunks behind the camera are dropped', () => {
        const world = worldOf([
            [8, 4],
            [8, 11],
        ]);
        const camera = createCamera(16 / 9);
        const eye: Vec3 = [0, 50, 0];
        const viewProjection = getViewProjection(mat4.create(), camera, eye, config);

        const visible = cullChunks([], world, viewProjection, eye, config);

        expect(keys(visible)).toEqual(['8,4']);
    });

    test('degenerate view projection shows nothing', () => {
        const world = worldOf([[8, 8]]);

        expect(cullChunks([], world, ZERO, [0, 50, 0], config)).toEqual([]);
    });

    test('output list is cleared first', () => {
        const world = worldOf([[15, 15]]);
        const out: Chunk<string>[] = [...worldOf([[1, 1]]).chunks.values()];

        expect(cullChunks(out, world, scaled(1e-6), [0, 50, 0], config)).toEqual([]);
        expect(out).toHaveLength(0);
    });
});
