import type { Vec2 } from 'mathcat';
import { describe, expect, test } from 'vitest';
import {
    centroid,
    closestPtSeg2d,
    createDistancePtSegSqr2dResult,
    distancePtSegSqr2d,
    normalizeWinding,
    triangulateRing,
    windingSum,
} from '../src/geometry';

const square = (): Vec2[] => [
    [0, 0],
    [10, 0],
    [10, 10],
    [0, 10],
];

describe('geometry.closestPtSeg2d', () => {
    test('projects onto the segment interior', () => {
        const out: Vec2 = [0, 0];
        const t = closestPtSeg2d(out, [5, 3], [0, 0], [10, 0]);

        expect(t).toBe(0.5);
        expect(out).toEqual([5, 0]);
    });

    test('clamps to the endpoints', () => {
        const out: Vec2 = [0, 0];

        expect(closestPtSeg2d(out, [-4, 1], [0, 0], [10, 0])).toBe(0);
        expect(out).toEqual([0, 0]);

        expect(closestPtSeg2d(out, [14, 1], [0, 0], [10, 0])).toBe(1);
        expect(out).toEqual([10, 0]);
    });
});

describe('geometry.distancePtSegSqr2d', () => {
    test('squared distance to the closest point', () => {
        const result = distancePtSegSqr2d(createDistancePtSegSqr2dResult(), 3, 4, [0, 0], [10, 0]);

        expect(result.distSqr).toBe(16);
        expect(result.t).toBe(0.3);
    });

    test('zero length segment measures to its point', () => {
        const result = distancePtSegSqr2d(createDistancePtSegSqr2dResult(), 3, 4, [0, 0], [0, 0]);

        expect(result.distSqr).toBe(25);
        expect(result.t).toBe(0);
    });
});

describe('geometry.normalizeWinding', () => {
    test('keeps a counter-clockwise ring', () => {
        const points = square();

        expect(windingSum(points)).toBe(-200);
        expect(normalizeWinding(points)).toBe(false);
        expect(points).toEqual(square());
    });

    test('reverses a clockwise ring', () => {
        const points = square().reverse();

        expect(windingSum(points)).toBe(200);
        expect(normalizeWinding(points)).toBe(true);
        expect(points).toEqual([
            [0, 0],
            [10, 0],
            [10, 10],
            [0, 10],
        ]);
    });

    test('is idempotent', () => {
        const rings: Vec2[][] = [
            square(),
            square().reverse(),
            [
                [3, 1],
                [-2, 4],
                [-5, -1],
                [0, -6],
                [4, -3],
            ],
            [
                [0, 0],
                [1, 1],
                [2, 2],
            ],
        ];

        for (const ring of rings) {
            normalizeWinding(ring);
            const once = ring.map((p): Vec2 => [p[0], p[1]]);
            normalizeWinding(ring);
            expect(ring).toEqual(once);
        }
    });
});

describe('geometry.centroid', () => {
    test('averages the ring vertices', () => {
        expect(centroid([0, 0], square())).toEqual([5, 5]);
    });

    test('empty ring is the origin', () => {
        expect(centroid([1, 1], [])).toEqual([0, 0]);
    });
});

describe('geometry.triangulateRing', () => {
    test('square becomes two triangles', () => {
        const triangles = triangulateRing(square(), 0.01);

        expect(triangles).not.toBeNull();
        expect(triangles).toHaveLength(6);
        for (const index of triangles ?? []) {
            expect(index).toBeGreaterThanOrEqual(0);
            expect(index).toBeLessThan(4);
        }
    });

    test('concave ring triangulates to n - 2 triangles', () => {
        const ring: Vec2[] = [
            [0, 0],
            [10, 0],
            [10, 10],
            [5, 4],
            [0, 10],
        ];

        expect(triangulateRing(ring, 0.01)).toHaveLength(9);
    });

    test('fewer than three points fail', () => {
        expect(
            triangulateRing(
                [
                    [0, 0],
                    [1, 0],
                ],
                0.01,
            ),
        ).toBeNull();
    });

    test('collinear ring fails', () => {
        expect(
            triangulateRing(
                [
                    [0, 0],
                    [1, 0],
                    [2, 0],
                ],
                0.01,
            ),
        ).toBeNull();
    });

    test('self intersecting ring fails', () => {
        const bowtie: Vec2[] = [
            [0, 0],
            [10, 10],
            [10, 0],
            [0, 10],
        ];

        expect(triangulateRing(bowtie, 0.01)).toBeNull();
    });
});
