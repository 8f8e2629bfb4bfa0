import { readFile } from 'node:fs/promises';
import { z } from 'zod';

const positive = () => z.number().finite().positive();

/**
 * Schema for user supplied world options. Every field is optional, missing fields take the
 * values from {@link DEFAULT_WORLD_OPTIONS}.
 */
export const worldOptionsSchema = z
    .object({
        /* map */
        originLat: z.number().finite().min(-89).max(89),
        originLon: z.number().finite().min(-180).max(180),

        /* world grid */
        worldSize: positive(),
        chunksPerAxis: z.number().int().positive(),
        collisionCellSize: positive(),

        /* buildings */
        levelHeight: positive(),
        fallbackMinHeight: positive(),
        fallbackMaxHeight: positive(),
        wallThickness: positive(),
        minEdgeLength: positive(),
        maxRoofDeviation: positive(),

        /* player */
        playerRadius: positive(),
        eyeHeight: positive(),
        moveSpeed: positive(),
        gravity: positive(),
        jumpForce: positive(),
        terminalVelocity: z.number().finite().negative(),

        /* integrator */
        physicsStepSize: positive(),
        maxSubSteps: z.number().int().positive(),
        collisionPasses: z.number().int().positive(),
        collisionEpsilon: positive(),
        minFrameTime: positive(),
        maxFrameTime: positive(),

        /* view */
        fovY: positive(),
        zNear: positive(),
        zFar: positive(),
        drawDistance: positive(),
        fogStart: z.number().finite().nonnegative(),
        fogEnd: positive(),
        chunkMinY: z.number().finite(),
        chunkMaxY: z.number().finite(),

        /* streaming */
        batchSize: z.number().int().positive(),
        progressInterval: z.number().int().positive(),
        yieldInterval: z.number().int().positive(),
    })
    .strict();

export type WorldOptions = z.infer<typeof worldOptionsSchema>;

export type WorldConfig = Readonly<
    WorldOptions & {
        /** side length of one chunk, worldSize / chunksPerAxis */
        chunkSize: number;

        /** number of collision cells along each axis of a chunk */
        collisionGridDim: number;
    }
>;

export const DEFAULT_WORLD_OPTIONS: WorldOptions = {
    originLat: 40.77122,
    originLon: -73.979577,

    worldSize: 10000,
    chunksPerAxis: 16,
    collisionCellSize: 50,

    levelHeight: 3,
    fallbackMinHeight: 10,
    fallbackMaxHeight: 40,
    wallThickness: 0.5,
    minEdgeLength: 0.01,
    maxRoofDeviation: 0.01,

    playerRadius: 0.3,
    eyeHeight: 1.8,
    moveSpeed: 15,
    gravity: 35,
    jumpForce: 12,
    terminalVelocity: -50,

    physicsStepSize: 0.01,
    maxSubSteps: 10,
    collisionPasses: 5,
    collisionEpsilon: 0.0001,
    minFrameTime: 0.0001,
    maxFrameTime: 0.1,

    fovY: 45,
    zNear: 0.1,
    zFar: 10000,
    drawDistance: 3500,
    fogStart: 1000,
    fogEnd: 2500,
    chunkMinY: -20,
    chunkMaxY: 450,

    batchSize: 4,
    progressInterval: 5000,
    yieldInterval: 20000,
};

export class ConfigError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[]) {
        super(`${message}: ${issues.join('; ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

const formatIssues = (error: z.ZodError): string[] =>
    error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);

/**
 * Creates an immutable world config from optional overrides.
 * @throws ConfigError when an override is out of range or the combined values contradict each other
 */
export const createWorldConfig = (overrides: unknown = {}): WorldConfig => {
    const parsed = worldOptionsSchema.partial().safeParse(overrides);
    if (!parsed.success) {
        throw new ConfigError('Invalid world options', formatIssues(parsed.error));
    }

    const options: WorldOptions = { ...DEFAULT_WORLD_OPTIONS, ...parsed.data };

    const issues: string[] = [];
    if (options.fallbackMaxHeight <= options.fallbackMinHeight) {
        issues.push('fallbackMaxHeight: must be greater than fallbackMinHeight');
    }
    if (options.maxFrameTime < options.minFrameTime) {
        issues.push('maxFrameTime: must not be less than minFrameTime');
    }
    if (options.fogEnd <= options.fogStart) {
        issues.push('fogEnd: must be greater than fogStart');
    }
    if (options.chunkMaxY <= options.chunkMinY) {
        issues.push('chunkMaxY: must be greater than chunkMinY');
    }
    if (options.zFar <= options.zNear) {
        issues.push('zFar: must be greater than zNear');
    }
    if (issues.length > 0) {
        throw new ConfigError('Invalid world options', issues);
    }

    const chunkSize = options.worldSize / options.chunksPerAxis;

    return Object.freeze({
        ...options,
        chunkSize,
        collisionGridDim: Math.ceil(chunkSize / options.collisionCellSize),
    });
};

/**
 * Reads a JSON file of world option overrides.
 * @throws ConfigError when the file can't be read, isn't JSON, or holds invalid options
 */
export const loadWorldConfig = async (path: string): Promise<WorldConfig> => {
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (error) {
        throw new ConfigError(`Could not read config file ${path}`, [error instanceof Error ? error.message : String(error)]);
    }

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        throw new ConfigError(`Config file ${path} is not valid JSON`, [error instanceof Error ? error.message : String(error)]);
    }

    return createWorldConfig(json);
};

/** The user facing options of a config, without the derived fields */
export const getWorldOptions = (config: WorldConfig): WorldOptions => {
    const { chunkSize: _chunkSize, collisionGridDim: _collisionGridDim, ...options } = config;
    return options;
};

/** The radius of the circle enclosing one chunk */
export const getChunkRadius = (config: Pick<WorldConfig, 'chunkSize'>): number => Math.sqrt(config.chunkSize * config.chunkSize * 2) * 0.5;

/** Fog distances handed to the renderer, [start, end] */
export const getFogRange = (config: WorldConfig): [start: number, end: number] => [config.fogStart, config.fogEnd];
