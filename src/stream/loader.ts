import type { Vec2 } from 'mathcat';
import { BuildContext, type BuildContextState } from '../build-context';
import type { WorldConfig } from '../config';
import { buildChunkData, type ChunkCoord, type ChunkData } from '../generate/chunk-mesh';
import {
    addToPartition,
    buildPartitionedChunks,
    countOccupiedChunks,
    createChunkPartition,
    getChunkCoord,
    isChunkInWorld,
} from '../generate/chunk-partition';
import { isMapNode, isMapWay } from '../ingest/elements';
import { buildFootprint, isBuildingWay } from '../ingest/footprint';
import { addNode, createNodeStore, sortNodeStore } from '../ingest/node-store';
import { createProjector, project } from '../ingest/projection';
import type { MapSource } from '../ingest/sources';
import { batchMessage, DONE_MESSAGE, type LoaderMessage, progressMessage, statusMessage } from './loader-messages';

/*
 * Progress bands of the load phases. The two passes over the source are weighted by element count,
 * sorting and meshing get fixed bands.
 */
const NODES_PROGRESS_END = 0.5;
const SORT_PROGRESS = 0.52;
const WAYS_PROGRESS_START = 0.55;
const WAYS_PROGRESS_END = 0.95;

export type LoaderEmit = (message: LoaderMessage) => void;

export type LoaderOptions = {
    /** receives warnings for skipped ways and roofs, and the phase timings */
    ctx?: BuildContextState;

    /** lets other work run between slices of the load, defaults to a setImmediate turn */
    yieldToEventLoop?: () => Promise<void>;
};

export type LoaderResult = {
    /** whether the source could be read */
    ok: boolean;

    /** chunks emitted, including a fallback chunk */
    chunks: number;

    /** buildings placed into chunks */
    buildings: number;

    /** building ways that could not be resolved to a footprint */
    discarded: number;

    /** footprints whose centroid lies outside the world */
    dropped: number;

    /** elements the source skipped as malformed */
    skipped: number;
};

const defaultYield = () => new Promise<void>((resolve) => setImmediate(resolve));

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Builds a world from a map source, emitting status, progress and chunk batches as it goes, then done.
 *
 * The load never throws. If the source can't be read, an error status is emitted followed by a single
 * ground chunk at the origin, so the consumer still reaches a usable state.
 */
export const runLoader = async (
    source: MapSource,
    config: WorldConfig,
    emit: LoaderEmit,
    options: LoaderOptions = {},
): Promise<LoaderResult> => {
    const ctx = options.ctx ?? BuildContext.create();
    const yieldToEventLoop = options.yieldToEventLoop ?? defaultYield;

    const result: LoaderResult = { ok: true, chunks: 0, buildings: 0, discarded: 0, dropped: 0, skipped: 0 };

    let lastProgress = 0;
    const reportProgress = (progress: number) => {
        lastProgress = Math.max(lastProgress, Math.min(1, progress));
        emit(progressMessage(lastProgress));
    };

    const emitChunks = (chunks: ChunkData[]) => {
        result.chunks += chunks.length;
        emit(batchMessage(chunks));
    };

    try {
        /* 1. read and project nodes */

        emit(statusMessage(`Reading Nodes... (${source.name})`));
        reportProgress(0);
        BuildContext.start(ctx, 'nodes');

        const total = Math.max(1, await source.count());
        const projector = createProjector(config);
        const store = createNodeStore(total);
        const point: Vec2 = [0, 0];

        let i = 0;
        for await (const element of source.elements()) {
            i++;
            if (isMapNode(element)) {
                project(projector, point, element.lat, element.lon);
                addNode(store, element.id, point[0], point[1]);
            }
            if (i % config.progressInterval === 0) reportProgress((i / total) * NODES_PROGRESS_END);
            if (i % config.yieldInterval === 0) await yieldToEventLoop();
        }

        BuildContext.end(ctx, 'nodes');

        /* 2. sort nodes by id for lookups */

        emit(statusMessage('Sorting...'));
        reportProgress(SORT_PROGRESS);
        BuildContext.start(ctx, 'sort');
        sortNodeStore(store);
        BuildContext.end(ctx, 'sort');
        await yieldToEventLoop();

        /* 3. resolve building ways to footprints, bucketed by chunk */

        emit(statusMessage('Parsing Ways...'));
        reportProgress(WAYS_PROGRESS_START);
        BuildContext.start(ctx, 'ways');

        const partition = createChunkPartition(config);

        i = 0;
        for await (const element of source.elements()) {
            i++;
            if (isMapWay(element) && isBuildingWay(element)) {
                const footprint = buildFootprint(ctx, store, element, config);
                if (footprint) {
                    addToPartition(partition, footprint);
                } else {
                    result.discarded++;
                }
            }
            if (i % config.progressInterval === 0) {
                reportProgress(WAYS_PROGRESS_START + (i / total) * (WAYS_PROGRESS_END - WAYS_PROGRESS_START));
            }
            if (i % config.yieldInterval === 0) await yieldToEventLoop();
        }

        result.buildings = partition.count;
        result.dropped = partition.dropped;
        result.skipped = source.skipped?.() ?? 0;
        BuildContext.end(ctx, 'ways');

        /* 4. mesh and stream chunks in batches */

        emit(statusMessage('Meshing...'));
        reportProgress(WAYS_PROGRESS_END);
        BuildContext.start(ctx, 'meshing');

        const totalChunks = countOccupiedChunks(partition);
        let built = 0;
        let batch: ChunkData[] = [];

        if (totalChunks > 0) emit(statusMessage('Streaming...'));

        for (const chunk of buildPartitionedChunks(ctx, partition, config)) {
            built++;
            batch.push(chunk);

            if (batch.length >= config.batchSize) {
                emitChunks(batch);
                batch = [];
                reportProgress(WAYS_PROGRESS_END + (built / totalChunks) * (1 - WAYS_PROGRESS_END));
                await yieldToEventLoop();
            }
        }

        if (batch.length > 0) emitChunks(batch);

        BuildContext.end(ctx, 'meshing');
        BuildContext.info(
            ctx,
            `runLoader: ${result.chunks} chunks, ${result.buildings} buildings from ${source.name} (${BuildContext.formatTimes(ctx)}).`,
        );

        reportProgress(1);
        emit(
            statusMessage(
                `Loaded ${result.chunks} chunks, ${result.buildings} buildings` +
                    ` (${result.discarded} ways discarded, ${result.dropped} outside the world, ${result.skipped} malformed elements)`,
            ),
        );
    } catch (error) {
        result.ok = false;
        BuildContext.error(ctx, `runLoader: ${errorMessage(error)}`);
        emit(statusMessage(`Error: ${errorMessage(error)}`));

        if (result.chunks === 0) {
            emitChunks([buildFallbackChunk(config)]);
        }

        reportProgress(1);
    }

    emit(DONE_MESSAGE);

    return result;
};

/**
 * A chunk holding only ground, at the chunk containing the world origin
 */
export const buildFallbackChunk = (config: WorldConfig): ChunkData => {
    const coord: ChunkCoord = getChunkCoord([0, 0], 0, 0, config);
    if (!isChunkInWorld(coord[0], coord[1], config)) {
        coord[0] = 0;
        coord[1] = 0;
    }
    return buildChunkData(BuildContext.create(), coord, [], config);
};
