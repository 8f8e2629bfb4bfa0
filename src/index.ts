/**
 * @module osm-roam
 */

export type { Mat4, Vec2, Vec3 } from 'mathcat';
export * from './build-context';
export * from './config';
export * as geometry from './geometry';
export * from './ingest/elements';
export * from './ingest/projection';
export * from './ingest/node-store';
export * from './ingest/footprint';
export * from './ingest/sources';
export * from './generate/wall-collider';
export * from './generate/chunk-mesh';
export * from './generate/chunk-partition';
export * from './stream/loader-messages';
export * from './stream/message-queue';
export * from './stream/loader';
export * from './stream/loader-host';
export * from './world/collision-grid';
export * from './world/world';
export * from './world/consume';
export * from './physics/collide';
export * from './physics/player';
export * from './view/camera';
export * from './view/frustum';
export * from './view/visibility';
