/**
 * Bounded undo/redo history.
 *
 * Each entry pairs the state right before an edit with the state right
 * after it, so undo and redo restore exactly what the user saw then,
 * whatever non-recorded changes happened in between.
 */
import { createLogger } from '../utils/logger';

const log = createLogger('history');

export interface HistoryEntry<T> {
    readonly label: string;
    readonly before: T;
    readonly after: T;
}

export interface HistoryOptions {
    /** When false nothing is recorded and undo/redo stay unavailable. */
    enabled: boolean;
    maxEntries: number;
}

export interface History<T> {
    /** Push a checkpoint, evicting the oldest at capacity and dropping redo entries. */
    record: (label: string, before: T, after: T) => void;
    /** State before the newest entry, or null when there is nothing to undo. */
    undo: () => T | null;
    /** State after the next undone entry, or null when there is nothing to redo. */
    redo: () => T | null;
    clear: () => void;
    canUndo: () => boolean;
    canRedo: () => boolean;
    /** Labels of the undo stack, oldest first. */
    labels: () => string[];
}

export function createHistory<T>(options: HistoryOptions): History<T> {
    const past: HistoryEntry<T>[] = [];
    const future: HistoryEntry<T>[] = [];

    return {
        record(label, before, after) {
            if (!options.enabled) return;
            past.push({ label, before, after });
            if (past.length > options.maxEntries) {
                const evicted = past.shift();
                log.debug(`evicted oldest entry "${evicted?.label ?? ''}"`);
            }
            future.length = 0;
        },

        undo() {
            const entry = past.pop();
            if (!entry) return null;
            future.push(entry);
            return entry.before;
        },

        redo() {
            const entry = future.pop();
            if (!entry) return null;
            past.push(entry);
            return entry.after;
        },

        clear() {
            past.length = 0;
            future.length = 0;
        },

        canUndo() {
            return past.length > 0;
        },

        canRedo() {
            return future.length > 0;
        },

        labels() {
            return past.map((entry) => entry.label);
        },
    };
}
