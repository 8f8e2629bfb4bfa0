import type { Vec2, Vec3 } from 'mathcat';
import { BuildContext, type BuildContextState } from '../build-context';
import type { WorldConfig } from '../config';
import { normalizeWinding } from '../geometry';
import type { MapWay } from './elements';
import { findNode, type NodeStore } from './node-store';

/** The resolved, winding normalized outline of one building */
export type Footprint = {
    /** id of the way the footprint was built from */
    id: number;

    /** ring of [x, z] points, counter-clockwise, without a repeated closing point */
    points: Vec2[];

    /** whether the way explicitly closed its ring. walls wrap around only for closed footprints */
    closed: boolean;

    /** roof height in meters */
    height: number;

    /** rgb color, each channel in [0, 1] */
    color: Vec3;
};

export type FootprintHeightConfig = Pick<WorldConfig, 'levelHeight' | 'fallbackMinHeight' | 'fallbackMaxHeight'>;

/** Whether a way is tagged as a building. `building=no` marks a way that explicitly is not one */
export const isBuildingWay = (way: MapWay): boolean => way.tags.building !== undefined && way.tags.building !== 'no';

export type WayPoints = {
    points: Vec2[];
    closed: boolean;
};

/**
 * Resolves a way's node ids to projected points.
 * @returns the points, or undefined if any referenced node is missing
 */
export const resolveWayPoints = (store: NodeStore, way: MapWay): WayPoints | undefined => {
    const refs = way.nodes;
    const closed = refs.length > 1 && refs[0] === refs[refs.length - 1];
    const n = closed ? refs.length - 1 : refs.length;

    const points: Vec2[] = [];
    for (let i = 0; i < n; i++) {
        const point: Vec2 = [0, 0];
        if (!findNode(store, refs[i], point)) return undefined;
        points.push(point);
    }

    return { points, closed };
};

/**
 * Parses the numeric part of a tag value such as `12.5`, `30m` or `~40 m`.
 * @returns the value, or undefined if there is no positive number in the tag
 */
export const parseNumericTag = (value: string | undefined): number | undefined => {
    if (value === undefined) return undefined;

    const trimmed = value.replace(/^[^0-9.]+/, '').replace(/[^0-9.]+$/, '');
    const parsed = Number.parseFloat(trimmed);

    if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
    return parsed;
};

/**
 * Integer hash of a way id, stable across runs
 * @returns a value in [0, 1)
 */
export const hashWayId = (id: number): number => {
    const lo = id % 0x100000000 | 0;
    const hi = Math.floor(id / 0x100000000) | 0;

    let h = Math.imul(lo ^ 0x9e3779b9, 0x85ebca6b);
    h ^= Math.imul(hi, 0xc2b2ae35);
    h ^= h >>> 16;
    h = Math.imul(h, 0x7feb352d);
    h ^= h >>> 15;
    h = Math.imul(h, 0x846ca68b);
    h ^= h >>> 16;

    return (h >>> 0) / 0x100000000;
};

/**
 * Roof height of a building way: the height tag, else building:levels times the level height,
 * else a value derived from the way id.
 */
export const resolveHeight = (way: MapWay, config: FootprintHeightConfig): number => {
    const height = parseNumericTag(way.tags.height);
    if (height !== undefined) return height;

    const levels = parseNumericTag(way.tags['building:levels']);
    if (levels !== undefined) return levels * config.levelHeight;

    return config.fallbackMinHeight + hashWayId(way.id) * (config.fallbackMaxHeight - config.fallbackMinHeight);
};

/** Grey shade in [0.15, 0.35) picked by id mod 100 */
export const resolveColor = (id: number): Vec3 => {
    const seed = (((id % 100) + 100) % 100) / 100;
    const grey = 0.15 + seed * 0.2;
    return [grey, grey, grey];
};

/**
 * Builds the footprint of a building way.
 * @returns the footprint, or undefined if the way references a missing node or has fewer than 3 points
 */
export const buildFootprint = (
    ctx: BuildContextState,
    store: NodeStore,
    way: MapWay,
    config: FootprintHeightConfig,
): Footprint | undefined => {
    const resolved = resolveWayPoints(store, way);

    if (!resolved) {
        BuildContext.warn(ctx, `buildFootprint: way ${way.id} references a missing node.`);
        return undefined;
    }

    if (resolved.points.length < 3) {
        BuildContext.warn(ctx, `buildFootprint: way ${way.id} has ${resolved.points.length} points, at least 3 are needed.`);
        return undefined;
    }

    normalizeWinding(resolved.points);

    return {
        id: way.id,
        points: resolved.points,
        closed: resolved.closed,
        height: resolveHeight(way, config),
        color: resolveColor(way.id),
    };
};
