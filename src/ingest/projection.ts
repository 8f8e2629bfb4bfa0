import type { Vec2 } from 'mathcat';
import type { WorldConfig } from '../config';

/** meters per degree of latitude */
export const METERS_PER_DEGREE_LAT = 111132;

/** meters per degree of longitude at the equator */
export const METERS_PER_DEGREE_LON_EQUATOR = 111319.5;

/**
 * Equirectangular projection around a fixed origin.
 * x grows east, z grows south, so that north is -z.
 */
export type Projector = {
    originLat: number;
    originLon: number;
    metersPerDegreeLon: number;
    metersPerDegreeLat: number;
};

export const createProjector = (config: Pick<WorldConfig, 'originLat' | 'originLon'>): Projector => ({
    originLat: config.originLat,
    originLon: config.originLon,
    metersPerDegreeLon: METERS_PER_DEGREE_LON_EQUATOR * Math.cos((config.originLat * Math.PI) / 180),
    metersPerDegreeLat: METERS_PER_DEGREE_LAT,
});

/**
 * Projects a latitude / longitude pair to local planar [x, z] meters
 * @param out output [x, z]
 */
export const project = (projector: Projector, out: Vec2, lat: number, lon: number): Vec2 => {
    out[0] = (lon - projector.originLon) * projector.metersPerDegreeLon;
    out[1] = -(lat - projector.originLat) * projector.metersPerDegreeLat;
    return out;
};

/**
 * Inverse of {@link project}
 * @param out output [lat, lon]
 */
export const unproject = (projector: Projector, out: Vec2, x: number, z: number): Vec2 => {
    out[0] = projector.originLat - z / projector.metersPerDegreeLat;
    out[1] = projector.originLon + x / projector.metersPerDegreeLon;
    return out;
};
