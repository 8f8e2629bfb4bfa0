import type { Vec2 } from 'mathcat';

/**
 * One building wall for collision purposes: a vertical segment from the ground to `height`,
 * with a bounding box padded by the wall thickness.
 */
export type WallCollider = {
    start: Vec2;
    end: Vec2;
    height: number;
    minX: number;
    maxX: number;
    minZ: number;
    maxZ: number;
};

export const createWallCollider = (start: Vec2, end: Vec2, height: number, thickness: number): WallCollider => ({
    start: [start[0], start[1]],
    end: [end[0], end[1]],
    height,
    minX: Math.min(start[0], end[0]) - thickness,
    maxX: Math.max(start[0], end[0]) + thickness,
    minZ: Math.min(start[1], end[1]) - thickness,
    maxZ: Math.max(start[1], end[1]) + thickness,
});

/** Whether the point lies inside the collider's padded bounding box */
export const wallBoundsContain = (wall: WallCollider, x: number, z: number): boolean =>
    x >= wall.minX && x <= wall.maxX && z >= wall.minZ && z <= wall.maxZ;
