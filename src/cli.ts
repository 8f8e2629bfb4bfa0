#!/usr/bin/env tsx
import { setTimeout as sleep } from 'node:timers/promises';
import { parseArgs } from 'node:util';
import { mat4 } from 'mathcat';
import { ConfigError, createWorldConfig, loadWorldConfig } from './config';
import { getChunkVertexCount } from './generate/chunk-mesh';
import { createMovementInput, createPlayerState, stepPlayer } from './physics/player';
import { startLoaderWorker } from './stream/loader-host';
import { createCamera, getViewProjection } from './view/camera';
import { cullChunks } from './view/visibility';
import { createLoadingState, drainLoader } from './world/consume';
import { type Chunk, type ChunkUploader, createWorld, getChunkCount } from './world/world';

/*
 * Headless run: streams a map into a world on a worker thread, then walks the player forward.
 *
 *   osm-roam --map map.json [--config world.json] [--ticks 300] [--yaw -90]
 */

const USAGE = 'usage: osm-roam --map <overpass.json> [--config <options.json>] [--ticks <n>] [--yaw <degrees>]';

const TICK_SECONDS = 1 / 60;
const POLL_MS = 16;

/** What a headless renderer keeps of an uploaded chunk */
type GeometryStats = { vertexCount: number; indexCount: number };

const uploadStats: ChunkUploader<GeometryStats> = (data) => ({
    vertexCount: getChunkVertexCount(data),
    indexCount: data.indices.length,
});

const parseNumberOption = (name: string, value: string | undefined, fallback: number): number => {
    if (value === undefined) return fallback;
    const n = Number(value);
    if (!Number.isFinite(n)) throw new ConfigError('Invalid command line', [`--${name}: expected a number, got "${value}"`]);
    return n;
};

const main = async (): Promise<void> => {
    const { values } = parseArgs({
        options: {
            map: { type: 'string' },
            config: { type: 'string' },
            ticks: { type: 'string' },
            yaw: { type: 'string' },
            help: { type: 'boolean', short: 'h' },
        },
    });

    if (values.help || values.map === undefined) {
        console.log(USAGE);
        if (!values.help) process.exitCode = 1;
        return;
    }

    const config = values.config !== undefined ? await loadWorldConfig(values.config) : createWorldConfig();
    const ticks = Math.max(0, Math.floor(parseNumberOption('ticks', values.ticks, 300)));

    /* 1. stream the map in */

    const world = createWorld<GeometryStats>(config);
    const loading = createLoadingState();
    const handle = startLoaderWorker(values.map, config);

    let lastReported = -1;
    while (!loading.done) {
        drainLoader(world, loading, handle.queue, uploadStats, { onStatus: (text) => console.log(text) });

        const percent = Math.floor(loading.progress * 10) * 10;
        if (percent > lastReported) {
            console.log(`${percent}%`);
            lastReported = percent;
        }

        if (!loading.done) await sleep(POLL_MS);
    }
    await handle.finished;

    let triangles = 0;
    for (const chunk of world.chunks.values()) triangles += chunk.geometry.indexCount / 3;
    console.log(`world: ${getChunkCount(world)} chunks, ${triangles} triangles`);

    /* 2. walk */

    const camera = createCamera(16 / 9);
    if (values.yaw !== undefined) camera.yaw = (parseNumberOption('yaw', values.yaw, -90) * Math.PI) / 180;

    const player = createPlayerState(camera.spawn);
    const input = createMovementInput({ forward: true });

    for (let i = 0; i < ticks; i++) {
        stepPlayer(world, player, input, camera.yaw, TICK_SECONDS, config);
    }

    const [x, y, z] = player.position;
    console.log(`player: (${x.toFixed(2)}, ${y.toFixed(2)}, ${z.toFixed(2)}) ${player.onGround ? 'on ground' : 'airborne'}`);

    /* 3. cull */

    const viewProjection = getViewProjection(mat4.create(), camera, player.position, config);
    const visible: Chunk<GeometryStats>[] = [];
    cullChunks(visible, world, viewProjection, player.position, config);
    console.log(`visible: ${visible.length} of ${getChunkCount(world)} chunks`);
};

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
