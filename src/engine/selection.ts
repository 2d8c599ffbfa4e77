/**
 * Selection and focus as pure reducers.
 *
 * Each reducer returns the input object itself when nothing changed, so
 * callers detect no-ops by reference and skip notifications.
 */
import type { SelectionState } from '../types/mindmap';

export const EMPTY_SELECTION: SelectionState = Object.freeze({
    selectedNodeIds: [],
    selectedArrowId: null,
    selectedSummaryId: null,
    focusedNodeId: null,
});

function sameIds(a: readonly string[], b: readonly string[]): boolean {
    return a.length === b.length && a.every((id, i) => id === b[i]);
}

/** Node selection replaces any arrow or summary selection. */
function withNodes(state: SelectionState, selectedNodeIds: readonly string[]): SelectionState {
    if (
        sameIds(state.selectedNodeIds, selectedNodeIds) &&
        state.selectedArrowId === null &&
        state.selectedSummaryId === null
    ) {
        return state;
    }
    return { ...state, selectedNodeIds, selectedArrowId: null, selectedSummaryId: null };
}

export function selectNode(state: SelectionState, nodeId: string): SelectionState {
    return withNodes(state, [nodeId]);
}

export function addToSelection(state: SelectionState, nodeId: string): SelectionState {
    if (state.selectedNodeIds.includes(nodeId)) return state;
    return withNodes(state, [...state.selectedNodeIds, nodeId]);
}

export function toggleSelection(state: SelectionState, nodeId: string): SelectionState {
    return state.selectedNodeIds.includes(nodeId)
        ? removeFromSelection(state, nodeId)
        : addToSelection(state, nodeId);
}

export function removeFromSelection(state: SelectionState, nodeId: string): SelectionState {
    if (!state.selectedNodeIds.includes(nodeId)) return state;
    return { ...state, selectedNodeIds: state.selectedNodeIds.filter((id) => id !== nodeId) };
}

/** Replace the node selection wholesale; duplicates keep their first position. */
export function selectNodes(state: SelectionState, nodeIds: readonly string[]): SelectionState {
    return withNodes(state, [...new Set(nodeIds)]);
}

export function clearSelection(state: SelectionState): SelectionState {
    if (
        state.selectedNodeIds.length === 0 &&
        state.selectedArrowId === null &&
        state.selectedSummaryId === null
    ) {
        return state;
    }
    return { ...state, selectedNodeIds: [], selectedArrowId: null, selectedSummaryId: null };
}

export function selectArrow(state: SelectionState, arrowId: string | null): SelectionState {
    if (arrowId === null) {
        return state.selectedArrowId === null ? state : { ...state, selectedArrowId: null };
    }
    if (state.selectedArrowId === arrowId && state.selectedNodeIds.length === 0 && state.selectedSummaryId === null) {
        return state;
    }
    return { ...state, selectedNodeIds: [], selectedArrowId: arrowId, selectedSummaryId: null };
}

export function selectSummary(state: SelectionState, summaryId: string | null): SelectionState {
    if (summaryId === null) {
        return state.selectedSummaryId === null ? state : { ...state, selectedSummaryId: null };
    }
    if (state.selectedSummaryId === summaryId && state.selectedNodeIds.length === 0 && state.selectedArrowId === null) {
        return state;
    }
    return { ...state, selectedNodeIds: [], selectedArrowId: null, selectedSummaryId: summaryId };
}

/** Enter focus mode on `nodeId`; node selection is cleared. */
export function focus(state: SelectionState, nodeId: string): SelectionState {
    if (state.focusedNodeId === nodeId && state.selectedNodeIds.length === 0) return state;
    return { ...state, selectedNodeIds: [], focusedNodeId: nodeId };
}

export function exitFocus(state: SelectionState): SelectionState {
    if (state.focusedNodeId === null) return state;
    return { ...state, focusedNodeId: null };
}

/**
 * Drop references to things that no longer exist. Focus is left when the
 * focused node is gone.
 */
export function pruneSelection(
    state: SelectionState,
    exists: {
        node: (id: string) => boolean;
        arrow: (id: string) => boolean;
        summary: (id: string) => boolean;
    },
): SelectionState {
    const selectedNodeIds = state.selectedNodeIds.filter(exists.node);
    const selectedArrowId =
        state.selectedArrowId !== null && exists.arrow(state.selectedArrowId) ? state.selectedArrowId : null;
    const selectedSummaryId =
        state.selectedSummaryId !== null && exists.summary(state.selectedSummaryId)
            ? state.selectedSummaryId
            : null;
    const focusedNodeId =
        state.focusedNodeId !== null && exists.node(state.focusedNodeId) ? state.focusedNodeId : null;

    if (
        selectedNodeIds.length === state.selectedNodeIds.length &&
        selectedArrowId === state.selectedArrowId &&
        selectedSummaryId === state.selectedSummaryId &&
        focusedNodeId === state.focusedNodeId
    ) {
        return state;
    }
    return { selectedNodeIds, selectedArrowId, selectedSummaryId, focusedNodeId };
}
