export type BuildContextLogType = 'info' | 'warning' | 'error';

export type BuildContextLog = {
    type: BuildContextLogType;
    message: string;
};

export type BuildContextState = {
    /** collected log entries, oldest first */
    logs: BuildContextLog[];

    /** number of entries of each type, including entries dropped past maxLogs */
    counts: Record<BuildContextLogType, number>;

    /** entries past this count are counted but not stored */
    maxLogs: number;

    /** accumulated durations of named timers, in milliseconds */
    times: Record<string, number>;

    /** start timestamps of running timers */
    startTimes: Record<string, number>;

    /** optional sink receiving every entry as it is logged */
    onLog?: (log: BuildContextLog) => void;
};

const now = () => performance.now();

const create = (options: { maxLogs?: number; onLog?: (log: BuildContextLog) => void } = {}): BuildContextState => ({
    logs: [],
    counts: { info: 0, warning: 0, error: 0 },
    maxLogs: options.maxLogs ?? 1000,
    times: {},
    startTimes: {},
    onLog: options.onLog,
});

const log = (ctx: BuildContextState, type: BuildContextLogType, message: string): void => {
    const entry: BuildContextLog = { type, message };

    ctx.counts[type]++;
    if (ctx.logs.length < ctx.maxLogs) {
        ctx.logs.push(entry);
    }

    ctx.onLog?.(entry);
};

const info = (ctx: BuildContextState, message: string): void => log(ctx, 'info', message);

const warn = (ctx: BuildContextState, message: string): void => log(ctx, 'warning', message);

const error = (ctx: BuildContextState, message: string): void => log(ctx, 'error', message);

const start = (ctx: BuildContextState, name: string): void => {
    ctx.startTimes[name] = now();
};

const end = (ctx: BuildContextState, name: string): void => {
    const startTime = ctx.startTimes[name];
    if (startTime === undefined) return;

    ctx.times[name] = (ctx.times[name] ?? 0) + (now() - startTime);
    delete ctx.startTimes[name];
};

/** Formats the timers as `name 12.3ms, other 4.0ms` */
const formatTimes = (ctx: BuildContextState): string =>
    Object.entries(ctx.times)
        .map(([name, ms]) => `${name} ${ms.toFixed(1)}ms`)
        .join(', ');

export const BuildContext = {
    create,
    log,
    info,
    warn,
    error,
    start,
    end,
    formatTimes,
};
