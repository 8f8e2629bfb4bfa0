import type { Vec2 } from 'mathcat';
import type { WorldConfig } from '../config';
import type { WallCollider } from '../generate/wall-collider';

/**
 * Uniform grid of wall buckets covering one chunk. Immutable after construction.
 */
export type LocalCollisionGrid = {
    /** row major buckets, dim * dim */
    cells: WallCollider[][];

    cellSize: number;

    /** cells per axis */
    dim: number;

    /** side length of the covered chunk. the last row and column of cells may reach past it */
    size: number;

    /** world space [x, z] of the chunk's minimum corner */
    offset: Vec2;
};

export type CollisionGridConfig = Pick<WorldConfig, 'chunkSize' | 'collisionCellSize' | 'collisionGridDim' | 'playerRadius'>;

const clampCell = (v: number, dim: number) => (v < 0 ? 0 : v >= dim ? dim - 1 : v);

/**
 * Buckets a chunk's walls. Each wall goes into every cell its bounding box overlaps once grown by the
 * player radius, so a query from any point within reach of a wall finds it in that point's cell.
 * Cell ranges are clamped into the grid: walls hanging over the chunk edge land in the border cells.
 */
export const createLocalCollisionGrid = (
    walls: readonly WallCollider[],
    offset: Vec2,
    config: CollisionGridConfig,
): LocalCollisionGrid => {
    const cellSize = config.collisionCellSize;
    const dim = config.collisionGridDim;
    const reach = config.playerRadius;

    const cells: WallCollider[][] = [];
    for (let i = 0; i < dim * dim; i++) {
        cells.push([]);
    }

    for (const wall of walls) {
        const minGx = clampCell(Math.floor((wall.minX - reach - offset[0]) / cellSize), dim);
        const maxGx = clampCell(Math.floor((wall.maxX + reach - offset[0]) / cellSize), dim);
        const minGz = clampCell(Math.floor((wall.minZ - reach - offset[1]) / cellSize), dim);
        const maxGz = clampCell(Math.floor((wall.maxZ + reach - offset[1]) / cellSize), dim);

        for (let gz = minGz; gz <= maxGz; gz++) {
            for (let gx = minGx; gx <= maxGx; gx++) {
                cells[gz * dim + gx].push(wall);
            }
        }
    }

    return { cells, cellSize, dim, size: config.chunkSize, offset: [offset[0], offset[1]] };
};

/**
 * Cell coordinate of a world space point.
 * @returns the row major cell index, or -1 if the point lies outside the grid
 */
export const getCellIndex = (grid: LocalCollisionGrid, x: number, z: number): number => {
    const lx = x - grid.offset[0];
    const lz = z - grid.offset[1];
    if (lx < 0 || lz < 0 || lx >= grid.size || lz >= grid.size) return -1;

    const gx = Math.min(Math.floor(lx / grid.cellSize), grid.dim - 1);
    const gz = Math.min(Math.floor(lz / grid.cellSize), grid.dim - 1);

    return gz * grid.dim + gx;
};

/**
 * The walls near a world space point.
 * @returns the bucket of the point's cell, or undefined if the point lies outside the chunk
 */
export const wallsNear = (grid: LocalCollisionGrid, x: number, z: number): readonly WallCollider[] | undefined => {
    const index = getCellIndex(grid, x, z);
    return index === -1 ? undefined : grid.cells[index];
};

/**
 * The bucket of the cell nearest to a world space point. For points outside the chunk this is a border cell,
 * which holds the walls hanging over that edge.
 */
export const wallsNearClamped = (grid: LocalCollisionGrid, x: number, z: number): readonly WallCollider[] => {
    const gx = clampCell(Math.floor((x - grid.offset[0]) / grid.cellSize), grid.dim);
    const gz = clampCell(Math.floor((z - grid.offset[1]) / grid.cellSize), grid.dim);
    return grid.cells[gz * grid.dim + gx];
};

/** Number of wall references over all cells */
export const countGridEntries = (grid: LocalCollisionGrid): number => {
    let n = 0;
    for (const cell of grid.cells) n += cell.length;
    return n;
};
