/**
 * Scoped console logger. Messages carry a `[mindmap:<scope>]` prefix and
 * are filtered by one process-wide level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

type LogMethod = (message: string, ...details: unknown[]) => void;

export interface Logger {
    debug: LogMethod;
    info: LogMethod;
    warn: LogMethod;
    error: LogMethod;
}

/** Where formatted records end up. Defaults to the console. */
export type LogSink = (level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]) => void;

const consoleSink: LogSink = (level, message, details) => {
    console[level](message, ...details);
};

let currentLevel: LogLevel = 'warn';
let currentSink: LogSink = consoleSink;

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

/** Redirect output; pass nothing to restore the console. */
export function setLogSink(sink: LogSink = consoleSink): void {
    currentSink = sink;
}

export function createLogger(scope: string): Logger {
    const prefix = `[mindmap:${scope}]`;
    const emit =
        (level: Exclude<LogLevel, 'silent'>): LogMethod =>
        (message, ...details) => {
            if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
            currentSink(level, `${prefix} ${message}`, details);
        };

    return {
        debug: emit('debug'),
        info: emit('info'),
        warn: emit('warn'),
        error: emit('error'),
    };
}

const envLevel = process.env.MINDMAP_LOG_LEVEL;
if (envLevel !== undefined && isLogLevel(envLevel)) {
    currentLevel = envLevel;
}
