import { describe, expect, test } from 'vitest';
import { BuildContext, type BuildContextLog } from '../src/build-context';

describe('BuildContext', () => {
    test('collects typed entries in order', () => {
        const ctx = BuildContext.create();
        BuildContext.info(ctx, 'a');
        BuildContext.warn(ctx, 'b');
        BuildContext.error(ctx, 'c');

        expect(ctx.logs).toEqual([
            { type: 'info', message: 'a' },
            { type: 'warning', message: 'b' },
            { type: 'error', message: 'c' },
        ]);
        expect(ctx.counts).toEqual({ info: 1, warning: 1, error: 1 });
    });

    test('keeps counting past maxLogs', () => {
        const ctx = BuildContext.create({ maxLogs: 2 });
        for (let i = 0; i < 5; i++) BuildContext.warn(ctx, `way ${i}`);

        expect(ctx.logs.map((log) => log.message)).toEqual(['way 0', 'way 1']);
        expect(ctx.counts.warning).toBe(5);
    });

    test('forwards every entry to the sink', () => {
        const seen: BuildContextLog[] = [];
        const ctx = BuildContext.create({ maxLogs: 0, onLog: (log) => seen.push(log) });
        BuildContext.warn(ctx, 'x');

        expect(ctx.logs).toEqual([]);
        expect(seen).toEqual([{ type: 'warning', message: 'x' }]);
    });

    test('timers accumulate and ignore unmatched ends', () => {
        const ctx = BuildContext.create();
        BuildContext.end(ctx, 'never started');
        BuildContext.start(ctx, 'sort');
        BuildContext.end(ctx, 'sort');
        BuildContext.start(ctx, 'sort');
        BuildContext.end(ctx, 'sort');

        expect(Object.keys(ctx.times)).toEqual(['sort']);
        expect(ctx.times.sort).toBeGreaterThanOrEqual(0);
        expect(ctx.startTimes).toEqual({});
        expect(BuildContext.formatTimes(ctx)).toMatch(/^sort \d+\.\dms$/);
    });
});
