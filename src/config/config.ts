import { ConfigError } from '../engine/errors';

export type MindMapConfig = {
    /** Record undo checkpoints for structural edits. */
    allowUndo: boolean;
    /** Max undo checkpoints kept; the oldest is evicted first. */
    maxHistorySize: number;
    minScale: number;
    maxScale: number;
    enableKeyboardShortcuts: boolean;
    enableDragDrop: boolean;
    /** Reject edits; selection, focus and expand/collapse still work. */
    readOnly: boolean;
};

export const DEFAULT_CONFIG: Readonly<MindMapConfig> = Object.freeze({
    allowUndo: true,
    maxHistorySize: 50,
    minScale: 0.1,
    maxScale: 5,
    enableKeyboardShortcuts: true,
    enableDragDrop: true,
    readOnly: false,
});

const isPositiveFinite = (value: number): boolean => Number.isFinite(value) && value > 0;

/**
 * Merge overrides onto the defaults and validate the result.
 * Out-of-range values are rejected with `ConfigError`, never clamped.
 */
export const resolveConfig = (overrides: Partial<MindMapConfig> = {}): Readonly<MindMapConfig> => {
    const config: MindMapConfig = { ...DEFAULT_CONFIG, ...overrides };

    if (!Number.isInteger(config.maxHistorySize) || config.maxHistorySize < 1) {
        throw new ConfigError('maxHistorySize', 'must be a positive integer');
    }
    if (!isPositiveFinite(config.minScale)) {
        throw new ConfigError('minScale', 'must be a positive number');
    }
    if (!isPositiveFinite(config.maxScale)) {
        throw new ConfigError('maxScale', 'must be a positive number');
    }
    if (config.minScale >= config.maxScale) {
        throw new ConfigError('minScale', 'must be less than maxScale');
    }

    return Object.freeze(config);
};

const parseBool = (raw: string | undefined, fallback: boolean): boolean => {
    if (raw === undefined) {
        return fallback;
    }
    return raw.toLowerCase() === 'true';
};

const parseNumber = (name: string, raw: string | undefined, fallback: number): number => {
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (Number.isNaN(value)) {
        throw new ConfigError(name, `"${raw}" is not a number`);
    }
    return value;
};

type Env = Readonly<Record<string, string | undefined>>;

/** Overrides read from `MINDMAP_*` environment variables. */
export const configFromEnv = (env: Env = process.env): Readonly<MindMapConfig> =>
    resolveConfig({
        allowUndo: parseBool(env.MINDMAP_ALLOW_UNDO, DEFAULT_CONFIG.allowUndo),
        maxHistorySize: parseNumber('maxHistorySize', env.MINDMAP_MAX_HISTORY, DEFAULT_CONFIG.maxHistorySize),
        minScale: parseNumber('minScale', env.MINDMAP_MIN_SCALE, DEFAULT_CONFIG.minScale),
        maxScale: parseNumber('maxScale', env.MINDMAP_MAX_SCALE, DEFAULT_CONFIG.maxScale),
        enableKeyboardShortcuts: parseBool(
            env.MINDMAP_KEYBOARD_SHORTCUTS,
            DEFAULT_CONFIG.enableKeyboardShortcuts,
        ),
        enableDragDrop: parseBool(env.MINDMAP_DRAG_DROP, DEFAULT_CONFIG.enableDragDrop),
        readOnly: parseBool(env.MINDMAP_READ_ONLY, DEFAULT_CONFIG.readOnly),
    });
