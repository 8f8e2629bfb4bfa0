import type { Vec3 } from 'mathcat';

/** Plane [nx, ny, nz, d]. Points with n·p + d >= 0 are on the inside */
export type FrustumPlane = [nx: number, ny: number, nz: number, d: number];

/** left, right, bottom, top, near, far */
export type Frustum = [FrustumPlane, FrustumPlane, FrustumPlane, FrustumPlane, FrustumPlane, FrustumPlane];

export const createFrustum = (): Frustum => [
    [0, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
];

const setPlane = (plane: FrustumPlane, a: number, b: number, c: number, d: number): void => {
    const length = Math.sqrt(a * a + b * b + c * c);
    if (length === 0) {
        // degenerate, nothing is inside
        plane[0] = 0;
        plane[1] = 0;
        plane[2] = 0;
        plane[3] = Number.NEGATIVE_INFINITY;
        return;
    }
    plane[0] = a / length;
    plane[1] = b / length;
    plane[2] = c / length;
    plane[3] = d / length;
};

/**
 * Extracts the six clip planes of a column major view projection matrix, normalized.
 * Planes with a zero normal are degenerate and reject every box.
 */
export const extractFrustumPlanes = (out: Frustum, m: ArrayLike<number>): Frustum => {
    // row i is [m[i], m[4 + i], m[8 + i], m[12 + i]]
    const r0x = m[0], r0y = m[4], r0z = m[8], r0w = m[12];
    const r1x = m[1], r1y = m[5], r1z = m[9], r1w = m[13];
    const r2x = m[2], r2y = m[6], r2z = m[10], r2w = m[14];
    const r3x = m[3], r3y = m[7], r3z = m[11], r3w = m[15];

    setPlane(out[0], r3x + r0x, r3y + r0y, r3z + r0z, r3w + r0w);
    setPlane(out[1], r3x - r0x, r3y - r0y, r3z - r0z, r3w - r0w);
    setPlane(out[2], r3x + r1x, r3y + r1y, r3z + r1z, r3w + r1w);
    setPlane(out[3], r3x - r1x, r3y - r1y, r3z - r1z, r3w - r1w);
    setPlane(out[4], r3x + r2x, r3y + r2y, r3z + r2z, r3w + r2w);
    setPlane(out[5], r3x - r2x, r3y - r2y, r3z - r2z, r3w - r2w);

    return out;
};

/**
 * Positive vertex test of an axis aligned box against a frustum. Conservative: a box near a frustum
 * corner may be reported as intersecting when it is not.
 */
export const intersectsAabb = (frustum: Frustum, min: Vec3, max: Vec3): boolean => {
    for (const plane of frustum) {
        const [nx, ny, nz, d] = plane;

        // the box corner furthest along the plane normal
        const px = nx >= 0 ? max[0] : min[0];
        const py = ny >= 0 ? max[1] : min[1];
        const pz = nz >= 0 ? max[2] : min[2];

        if (nx * px + ny * py + nz * pz + d < 0) return false;
    }

    return true;
};
