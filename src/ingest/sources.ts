import { readFile } from 'node:fs/promises';
import { type RawElement, rawElementSchema } from './elements';

/**
 * A source of raw map elements. The loader reads it twice, once for nodes and once for ways.
 */
export type MapSource = {
    /** name shown in status messages, usually the file path */
    name: string;

    /** total number of elements, used for progress */
    count: () => Promise<number>;

    /** iterates every element in source order */
    elements: () => AsyncIterable<RawElement> | Iterable<RawElement>;

    /** number of elements that were skipped because they were malformed */
    skipped?: () => number;
};

/** A map source that could not be read */
export class MapSourceError extends Error {
    readonly source: string;

    constructor(source: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MapSourceError';
        this.source = source;
    }
}

export const createArraySource = (elements: readonly RawElement[], name = 'memory'): MapSource => ({
    name,
    count: async () => elements.length,
    elements: () => elements,
});

type ParsedDocument = {
    elements: RawElement[];
    skipped: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parses an Overpass / OSM JSON document, `{ "elements": [...] }`.
 * Nodes and ways are validated, other element types such as relations are ignored,
 * malformed nodes and ways are skipped and counted.
 * @throws MapSourceError if the document has no elements array
 */
export const parseOverpassJson = (json: unknown, name: string): ParsedDocument => {
    if (!isRecord(json) || !Array.isArray(json.elements)) {
        throw new MapSourceError(name, `${name} has no "elements" array`);
    }

    const elements: RawElement[] = [];
    let skipped = 0;

    for (const item of json.elements) {
        if (isRecord(item) && item.type !== 'node' && item.type !== 'way') continue;

        const parsed = rawElementSchema.safeParse(item);
        if (parsed.success) {
            elements.push(parsed.data);
        } else {
            skipped++;
        }
    }

    return { elements, skipped };
};

/**
 * A map source reading an Overpass / OSM JSON file. The file is read on first use and kept in memory.
 */
export const createOverpassJsonSource = (path: string): MapSource => {
    let document: Promise<ParsedDocument> | undefined;
    let skipped = 0;

    const load = (): Promise<ParsedDocument> => {
        if (!document) {
            document = (async () => {
                let text: string;
                try {
                    text = await readFile(path, 'utf8');
                } catch (error) {
                    const reason = error instanceof Error && 'code' in error && error.code === 'ENOENT' ? 'File Not Found' : 'File Unreadable';
                    throw new MapSourceError(path, `${reason} (${path})`, { cause: error });
                }

                let json: unknown;
                try {
                    json = JSON.parse(text);
                } catch (error) {
                    throw new MapSourceError(path, `Malformed JSON (${path})`, { cause: error });
                }

                const parsed = parseOverpassJson(json, path);
                skipped = parsed.skipped;
                return parsed;
            })();
        }
        return document;
    };

    return {
        name: path,
        count: async () => (await load()).elements.length,
        elements: async function* () {
            const { elements } = await load();
            yield* elements;
        },
        skipped: () => skipped,
    };
};
