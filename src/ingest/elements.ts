import { z } from 'zod';

export type MapNode = {
    type: 'node';
    id: number;
    lat: number;
    lon: number;
};

export type MapWay = {
    type: 'way';
    id: number;
    /** ordered node ids, closed rings repeat the first id at the end */
    nodes: number[];
    tags: Record<string, string>;
};

/** A raw map element as produced by a map source */
export type RawElement = MapNode | MapWay;

export const mapNodeSchema = z.object({
    type: z.literal('node'),
    id: z.number().int(),
    lat: z.number().finite().min(-90).max(90),
    lon: z.number().finite().min(-180).max(180),
});

export const mapWaySchema = z.object({
    type: z.literal('way'),
    id: z.number().int(),
    nodes: z.array(z.number().int()),
    tags: z.record(z.string()).default({}),
});

export const rawElementSchema = z.discriminatedUnion('type', [mapNodeSchema, mapWaySchema]);

export const isMapNode = (element: RawElement): element is MapNode => element.type === 'node';

export const isMapWay = (element: RawElement): element is MapWay => element.type === 'way';
