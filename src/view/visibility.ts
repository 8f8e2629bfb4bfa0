import type { Vec3 } from 'mathcat';
import { getChunkRadius, type WorldConfig } from '../config';
import type { Chunk, World } from '../world/world';
import { createFrustum, extractFrustumPlanes, intersectsAabb } from './frustum';

export type VisibilityConfig = Pick<WorldConfig, 'chunkSize' | 'drawDistance' | 'chunkMinY' | 'chunkMaxY'>;

const _frustum = createFrustum();
const _min: Vec3 = [0, 0, 0];
const _max: Vec3 = [0, 0, 0];

/**
 * Collects the resident chunks to draw this frame: those whose center lies within draw distance
 * (widened by the chunk radius) of the eye on the ground plane, and whose box meets the view frustum.
 * @returns `out`, cleared first
 */
export const cullChunks = <H>(
    out: Chunk<H>[],
    world: World<H>,
    viewProjection: ArrayLike<number>,
    eye: Vec3,
    config: VisibilityConfig,
): Chunk<H>[] => {
    out.length = 0;

    extractFrustumPlanes(_frustum, viewProjection);

    const maxDistance = config.drawDistance + getChunkRadius(config);
    const maxDistanceSqr = maxDistance * maxDistance;

    for (const chunk of world.chunks.values()) {
        const dx = (chunk.min[0] + chunk.max[0]) * 0.5 - eye[0];
        const dz = (chunk.min[1] + chunk.max[1]) * 0.5 - eye[2];
        if (dx * dx + dz * dz > maxDistanceSqr) continue;

        _min[0] = chunk.min[0];
        _min[1] = config.chunkMinY;
        _min[2] = chunk.min[1];
        _max[0] = chunk.max[0];
        _max[1] = config.chunkMaxY;
        _max[2] = chunk.max[1];

        if (intersectsAabb(_frustum, _min, _max)) out.push(chunk);
    }

    return out;
};
