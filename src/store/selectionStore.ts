/**
 * Selection/focus channel. Subscribers hear about selection changes only;
 * reducers that return their input unchanged publish nothing.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import { EMPTY_SELECTION } from '../engine/selection';
import type { SelectionState } from '../types/mindmap';

export type SelectionReducer = (state: SelectionState) => SelectionState;

export interface SelectionStoreState {
    selection: SelectionState;
    /** Run a reducer; returns true when the selection changed. */
    apply: (reducer: SelectionReducer) => boolean;
    /** Install a checkpointed selection (undo/redo, reload). */
    restore: (selection: SelectionState) => boolean;
}

export type SelectionStore = StoreApi<SelectionStoreState>;

export function createSelectionStore(initial: SelectionState = EMPTY_SELECTION): SelectionStore {
    return createStore<SelectionStoreState>((set, get) => ({
        selection: initial,

        apply(reducer) {
            const current = get().selection;
            const next = reducer(current);
            if (next === current) return false;
            set({ selection: next });
            return true;
        },

        restore(selection) {
            if (get().selection === selection) return false;
            set({ selection });
            return true;
        },
    }));
}
