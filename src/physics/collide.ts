import type { Vec3 } from 'mathcat';
import type { WorldConfig } from '../config';
import { createDistancePtSegSqr2dResult, distancePtSegSqr2d } from '../geometry';
import type { WallCollider } from '../generate/wall-collider';
import { getNeighbourhoodWalls, type World } from '../world/world';

export type CollisionConfig = Pick<WorldConfig, 'playerRadius' | 'wallThickness' | 'collisionPasses' | 'collisionEpsilon'>;

/** Squared push lengths at or below this have no usable direction */
const MIN_PUSH_LENGTH_SQR = 1e-12;

export type Penetration = {
    found: boolean;

    /** the penetrated wall */
    wall: WallCollider | undefined;

    /** horizontal push out direction, y is always 0 */
    normal: Vec3;

    /** how far to push along the normal to just touch the wall */
    depth: number;

    /** distance from the point to the wall segment */
    distance: number;
};

export const createPenetration = (): Penetration => ({
    found: false,
    wall: undefined,
    normal: [0, 0, 0],
    depth: 0,
    distance: 0,
});

const _walls: WallCollider[] = [];
const _distance = createDistancePtSegSqr2dResult();

/**
 * Finds the wall closest to a point among those the point is within reach of, where reach is the
 * player radius plus the wall thickness. Walls lower than the point are ignored.
 * @returns whether a penetration was found, details are written to `out`
 */
export const findClosestPenetration = <H>(world: World<H>, position: Vec3, config: CollisionConfig, out: Penetration): boolean => {
    const [x, y, z] = position;
    const reach = config.playerRadius + config.wallThickness;
    const reachSqr = reach * reach;

    out.found = false;
    out.wall = undefined;

    let closestSqr = reachSqr;

    for (const wall of getNeighbourhoodWalls(_walls, world, x, z)) {
        if (y > wall.height) continue;

        distancePtSegSqr2d(_distance, x, z, wall.start, wall.end);
        if (_distance.distSqr >= closestSqr) continue;

        closestSqr = _distance.distSqr;
        out.found = true;
        out.wall = wall;

        const { t } = _distance;
        const pushX = x - (wall.start[0] + t * (wall.end[0] - wall.start[0]));
        const pushZ = z - (wall.start[1] + t * (wall.end[1] - wall.start[1]));

        if (_distance.distSqr <= MIN_PUSH_LENGTH_SQR) {
            // on the segment, no direction to push along
            out.normal[0] = 1;
            out.normal[1] = 0;
            out.normal[2] = 0;
            out.distance = 0;
            out.depth = reach;
        } else {
            const distance = Math.sqrt(_distance.distSqr);
            out.normal[0] = pushX / distance;
            out.normal[1] = 0;
            out.normal[2] = pushZ / distance;
            out.distance = distance;
            out.depth = reach - distance;
        }
    }

    return out.found;
};

const _penetration = createPenetration();

/**
 * Pushes a point out of nearby walls, one wall per pass, closest first, for at most `collisionPasses` passes.
 * The velocity component into each resolved wall is removed. Corners between several walls may keep a
 * small residual penetration once the passes run out.
 * @returns the number of walls resolved
 */
export const resolvePenetrations = <H>(world: World<H>, position: Vec3, velocity: Vec3, config: CollisionConfig): number => {
    const penetration = _penetration;

    for (let pass = 0; pass < config.collisionPasses; pass++) {
        if (!findClosestPenetration(world, position, config, penetration)) return pass;

        const { normal } = penetration;

        const dot = velocity[0] * normal[0] + velocity[2] * normal[2];
        if (dot < 0) {
            velocity[0] -= normal[0] * dot;
            velocity[2] -= normal[2] * dot;
        }

        const push = penetration.depth + config.collisionEpsilon;
        position[0] += normal[0] * push;
        position[2] += normal[2] * push;
    }

    return config.collisionPasses;
};
