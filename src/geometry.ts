import earcut from 'earcut';
import type { Vec2 } from 'mathcat';

/*
 * Planar geometry helpers. Points are [x, z] pairs on the ground plane.
 */

/**
 * Calculates the closest point on a line segment to a given point
 * @param out Output parameter for the closest point
 * @param pt The point
 * @param p First endpoint of the segment
 * @param q Second endpoint of the segment
 * @returns the segment parameter of the closest point, in [0, 1]
 */
export const closestPtSeg2d = (out: Vec2, pt: Vec2, p: Vec2, q: Vec2): number => {
    const pqx = q[0] - p[0];
    const pqz = q[1] - p[1];
    const dx = pt[0] - p[0];
    const dz = pt[1] - p[1];

    const d = pqx * pqx + pqz * pqz;
    let t = pqx * dx + pqz * dz;
    if (d > 0) t /= d;
    if (t < 0) t = 0;
    else if (t > 1) t = 1;

    out[0] = p[0] + t * pqx;
    out[1] = p[1] + t * pqz;

    return t;
};

export type DistancePtSegSqr2dResult = { distSqr: number; t: number };

export const createDistancePtSegSqr2dResult = (): DistancePtSegSqr2dResult => ({
    distSqr: 0,
    t: 0,
});

/**
 * Squared distance from a point (px, pz) to the segment p-q
 */
export const distancePtSegSqr2d = (
    out: DistancePtSegSqr2dResult,
    px: number,
    pz: number,
    p: Vec2,
    q: Vec2,
): DistancePtSegSqr2dResult => {
    const pqx = q[0] - p[0];
    const pqz = q[1] - p[1];
    const dx = px - p[0];
    const dz = pz - p[1];

    const d = pqx * pqx + pqz * pqz;
    let t = pqx * dx + pqz * dz;
    if (d > 0) t /= d;
    if (t < 0) t = 0;
    else if (t > 1) t = 1;

    const closeDx = p[0] + t * pqx - px;
    const closeDz = p[1] + t * pqz - pz;

    out.distSqr = closeDx * closeDx + closeDz * closeDz;
    out.t = t;
    return out;
};

/**
 * Shoelace style winding sum, Σ (x2 - x1) * (z2 + z1) over the closed ring.
 * Positive for clockwise rings, negative for counter-clockwise rings, zero for degenerate rings.
 */
export const windingSum = (points: readonly Vec2[]): number => {
    let sum = 0;
    const n = points.length;
    for (let i = 0; i < n; i++) {
        const p1 = points[i];
        const p2 = points[(i + 1) % n];
        sum += (p2[0] - p1[0]) * (p2[1] + p1[1]);
    }
    return sum;
};

/**
 * Reverses the ring in place if it winds clockwise, so that every normalized ring has a non-positive winding sum.
 * @returns whether the ring was reversed
 */
export const normalizeWinding = (points: Vec2[]): boolean => {
    if (windingSum(points) > 0) {
        points.reverse();
        return true;
    }
    return false;
};

/**
 * Vertex average of a ring
 */
export const centroid = (out: Vec2, points: readonly Vec2[]): Vec2 => {
    let cx = 0;
    let cz = 0;
    for (const p of points) {
        cx += p[0];
        cz += p[1];
    }
    const n = points.length;
    out[0] = n > 0 ? cx / n : 0;
    out[1] = n > 0 ? cz / n : 0;
    return out;
};

const NO_HOLES: number[] = [];

export const flattenPoints = (points: readonly Vec2[]): number[] => {
    const flat: number[] = new Array(points.length * 2);
    for (let i = 0; i < points.length; i++) {
        flat[i * 2] = points[i][0];
        flat[i * 2 + 1] = points[i][1];
    }
    return flat;
};

/**
 * Ear clipping triangulation of a simple ring.
 * @param points the ring, without a repeated closing point
 * @param maxDeviation the largest accepted relative difference between the ring area and the triangle area
 * @returns ring-local triangle indices, or null if the ring could not be triangulated
 */
export const triangulateRing = (points: readonly Vec2[], maxDeviation: number): number[] | null => {
    if (points.length < 3) return null;

    // no signed area, such as collinear points or a figure eight
    if (windingSum(points) === 0) return null;

    const flat = flattenPoints(points);
    const triangles = earcut(flat, NO_HOLES, 2);

    if (triangles.length === 0) return null;

    // self intersecting rings triangulate to an area that differs from the ring area
    const deviation = earcut.deviation(flat, NO_HOLES, 2, triangles);
    if (!(deviation <= maxDeviation)) return null;

    return triangles;
};
