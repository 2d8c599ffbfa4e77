/**
 * Zustand store — single source of truth for the mind map document.
 *
 * All edits go through this store. It threads the document and the
 * selection through the pure engines, records undo checkpoints and
 * publishes one event per completed operation. Selection, drag and
 * viewport live in their own stores so their subscribers never hear
 * about document edits.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import { resolveConfig, type MindMapConfig } from '../config/config';
import {
    addArrow,
    addSummary,
    findArrow,
    findCommonParentRange,
    findSummary,
    removeArrow,
    removeSummary,
    setArrowControlPoints,
    updateArrow,
    updateSummary,
    type ArrowOptions,
    type ArrowPatch,
    type SummaryOptions,
} from '../engine/annotations';
import { ClipboardEmptyError, RootNodeError } from '../engine/errors';
import { nodeBounds, rectCenter, toCanvasRect, type ViewTransform } from '../engine/geometry';
import { createIdFactory, type IdFactory } from '../engine/ids';
import { calculateLayout, DEFAULT_THEME_METRICS, layoutBounds, type ThemeMetrics } from '../engine/layout';
import * as mutations from '../engine/mutations';
import {
    addToSelection,
    clearSelection,
    EMPTY_SELECTION,
    exitFocus,
    focus,
    pruneSelection,
    removeFromSelection,
    selectArrow,
    selectNode,
    selectNodes,
    selectSummary,
    toggleSelection,
} from '../engine/selection';
import {
    assertValidDocument,
    exportToJson,
    importFromJson,
    serializeDocument,
    type SerializedSnapshot,
} from '../engine/serialization';
import { findNode, getEntry, indexTree, nodeIds } from '../engine/treeIndex';
import { hitTest, nodesInRect, type HitResult } from '../interaction/hitTest';
import { getMindmapShortcutAction, type MindmapShortcutAction, type ShortcutPolicyInput } from '../interaction/shortcutPolicy';
import type {
    BranchSide,
    LayoutDirection,
    LayoutMap,
    MindmapDocument,
    MindmapNode,
    NodeStyle,
    NodeTag,
    Rect,
    SelectionState,
    Size,
    SummaryStyle,
    Vector,
} from '../types/mindmap';
import { createLogger } from '../utils/logger';
import { createDragStore, type DragStore } from './dragStore';
import { createEventChannel, type EventChannel, type NodeField } from './events';
import { createHistory } from './history';
import { createSelectionStore, type SelectionReducer, type SelectionStore } from './selectionStore';
import { createViewportStore, type ViewportStore } from './viewportStore';

const log = createLogger('store');

/** Zoom step for the keyboard zoom shortcuts. */
const KEYBOARD_ZOOM_FACTOR = 1.2;

/* ------------------------------------------------------------------ */
/*  Store shape                                                       */
/* ------------------------------------------------------------------ */

export interface MindmapState {
    document: MindmapDocument;
    canUndo: boolean;
    canRedo: boolean;
    config: Readonly<MindMapConfig>;
    /** Node whose topic is being edited, if any. */
    editingNodeId: string | null;
    /** Last copied subtree. */
    clipboard: MindmapNode | null;
}

export interface TapOptions {
    /** Shift/Ctrl-click: toggle the node in the selection instead of replacing it. */
    additive?: boolean;
    metrics?: ThemeMetrics;
}

export type ShortcutInput = Pick<ShortcutPolicyInput, 'key' | 'hasModifier' | 'hasShift' | 'isEditableTarget'>;

export interface MindmapActions {
    /**
     * Replace the whole document (load). Clears history and selection.
     * An inconsistent document is rejected with `SnapshotFormatError`.
     */
    refresh: (document: MindmapDocument) => void;

    /** Returns the new node id, or null in read-only mode. */
    addChild: (parentId: string, topic?: string) => string | null;
    addSibling: (referenceId: string, topic?: string) => string | null;
    insertParent: (nodeId: string, topic?: string) => string | null;
    removeNode: (nodeId: string) => boolean;
    /** Remove several subtrees as one undo step. */
    removeNodes: (nodeIds: readonly string[]) => boolean;
    /** Remove the selected arrow, summary, or nodes (the root is skipped). */
    deleteSelection: () => boolean;
    moveNode: (nodeId: string, newParentId: string, index?: number) => boolean;

    updateTopic: (nodeId: string, topic: string) => boolean;
    beginEdit: (nodeId: string) => boolean;
    /** Finish the running edit with the final text. */
    commitTopicEdit: (topic: string) => boolean;
    cancelEdit: () => void;

    toggleExpanded: (nodeId: string) => boolean;
    expandNode: (nodeId: string) => boolean;
    collapseNode: (nodeId: string) => boolean;

    setNodeStyle: (nodeId: string, style: NodeStyle | undefined) => boolean;
    setNodeHyperlink: (nodeId: string, hyperlink: string | undefined) => boolean;
    setNodeNote: (nodeId: string, note: string | undefined) => boolean;
    setNodeBranchColor: (nodeId: string, color: string | undefined) => boolean;
    setNodeDirection: (nodeId: string, direction: BranchSide | undefined) => boolean;
    addNodeTag: (nodeId: string, tag: NodeTag) => boolean;
    removeNodeTag: (nodeId: string, text: string) => boolean;
    addNodeIcon: (nodeId: string, icon: string) => boolean;
    removeNodeIcon: (nodeId: string, icon: string) => boolean;
    setDirection: (direction: LayoutDirection) => boolean;

    addArrow: (fromNodeId: string, toNodeId: string, options?: ArrowOptions) => string | null;
    removeArrow: (arrowId: string) => boolean;
    updateArrow: (arrowId: string, patch: ArrowPatch) => boolean;
    setArrowControlPoints: (arrowId: string, offset1: Vector, offset2: Vector) => boolean;

    addSummary: (parentNodeId: string, startIndex: number, endIndex: number, options?: SummaryOptions) => string | null;
    /** Summarize the selected nodes under their nearest common parent. */
    createSummaryFromSelection: (options?: SummaryOptions) => string | null;
    removeSummary: (summaryId: string) => boolean;
    updateSummary: (summaryId: string, patch: { label?: string; style?: SummaryStyle }) => boolean;

    selectNode: (nodeId: string) => boolean;
    addToSelection: (nodeId: string) => boolean;
    toggleSelection: (nodeId: string) => boolean;
    removeFromSelection: (nodeId: string) => boolean;
    selectNodes: (nodeIds: readonly string[]) => boolean;
    clearSelection: () => boolean;
    selectArrow: (arrowId: string | null) => boolean;
    selectSummary: (summaryId: string | null) => boolean;
    /** Rectangular selection; the rectangle is in screen space. */
    selectInRect: (screenRect: Rect, additive?: boolean, metrics?: ThemeMetrics) => boolean;

    focusNode: (nodeId: string) => boolean;
    exitFocus: () => boolean;

    copyNode: (nodeId?: string) => boolean;
    /** Paste under `parentId`, the last selected node, or the root. */
    pasteNode: (parentId?: string) => string | null;

    startDrag: (nodeId: string, pointer: Vector) => boolean;
    updateDrag: (pointer: Vector, metrics?: ThemeMetrics) => void;
    /** Finish the drag and move the node to where it was dropped. */
    dropDrag: () => boolean;
    cancelDrag: () => void;

    handleTap: (screenPoint: Vector, options?: TapOptions) => HitResult;
    /** Resolve and run a keyboard shortcut; returns the action that ran. */
    handleShortcut: (input: ShortcutInput, viewport?: Size) => MindmapShortcutAction;
    activateHyperlink: (nodeId: string) => string | null;
    /** Center the view on the root (or the focused node). */
    centerView: (viewport: Size, metrics?: ThemeMetrics) => void;
    fitView: (viewport: Size, metrics?: ThemeMetrics) => void;

    undo: () => boolean;
    redo: () => boolean;

    /** Layout of the visible tree, rooted at the focused node in focus mode. */
    getLayout: (metrics?: ThemeMetrics) => LayoutMap;
    exportSnapshot: () => SerializedSnapshot;
    exportJson: () => string;
    importJson: (json: string) => void;
}

export type MindmapStore = MindmapState & MindmapActions;

export interface MindmapStoreOptions {
    document?: MindmapDocument;
    config?: Partial<MindMapConfig>;
    /** Raw id source; collisions are retried. Defaults to nanoid. */
    generateId?: () => string;
    /** Default theme metrics for layout queries. */
    metrics?: ThemeMetrics;
}

export type MindmapStoreApi = StoreApi<MindmapStore> & {
    selection: SelectionStore;
    drag: DragStore;
    viewport: ViewportStore;
    events: EventChannel;
    ids: IdFactory;
};

interface Checkpoint {
    document: MindmapDocument;
    selection: SelectionState;
}

/* ------------------------------------------------------------------ */
/*  Helpers                                                           */
/* ------------------------------------------------------------------ */

function sameIds(a: readonly string[], b: readonly string[]): boolean {
    return a.length === b.length && a.every((id, i) => id === b[i]);
}

function existsIn(document: MindmapDocument) {
    const tree = indexTree(document.root);
    return {
        node: (id: string) => tree.entries.has(id),
        arrow: (id: string) => findArrow(document, id) !== undefined,
        summary: (id: string) => findSummary(document, id) !== undefined,
    };
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/* ------------------------------------------------------------------ */
/*  Store definition                                                  */
/* ------------------------------------------------------------------ */

export function createMindmapStore(options: MindmapStoreOptions = {}): MindmapStoreApi {
    const config = resolveConfig(options.config);
    const ids = createIdFactory(options.generateId);
    const context = { generateId: ids.next };
    const defaultMetrics = options.metrics ?? DEFAULT_THEME_METRICS;

    const selection = createSelectionStore(EMPTY_SELECTION);
    const drag = createDragStore();
    const viewport = createViewportStore(config);
    const events = createEventChannel();
    const history = createHistory<Checkpoint>({
        enabled: config.allowUndo,
        maxEntries: config.maxHistorySize,
    });

    if (options.document) assertValidDocument(options.document);
    const initial = options.document ?? mutations.createDocument(ids.next());
    ids.register(nodeIds(initial.root));
    ids.register(initial.arrows.map((arrow) => arrow.id));
    ids.register(initial.summaries.map((summary) => summary.id));

    let layoutCache: {
        root: MindmapNode;
        direction: LayoutDirection;
        metrics: ThemeMetrics;
        layout: LayoutMap;
    } | null = null;

    const store = createStore<MindmapStore>((set, get) => {
        const currentSelection = (): SelectionState => selection.getState().selection;

        /** Announce what differs between two selection states. */
        const publishSelection = (previous: SelectionState, next: SelectionState): void => {
            if (!sameIds(previous.selectedNodeIds, next.selectedNodeIds)) {
                events.emit({ type: 'selectionChanged', nodeIds: next.selectedNodeIds });
            }
            if (previous.focusedNodeId !== next.focusedNodeId) {
                events.emit({ type: 'focusChanged', nodeId: next.focusedNodeId });
            }
        };

        const applySelection = (reducer: SelectionReducer): boolean => {
            const previous = currentSelection();
            if (!selection.getState().apply(reducer)) return false;
            publishSelection(previous, currentSelection());
            return true;
        };

        const installSelection = (next: SelectionState): void => {
            const previous = currentSelection();
            if (selection.getState().restore(next)) publishSelection(previous, next);
        };

        const historyFlags = () => ({ canUndo: history.canUndo(), canRedo: history.canRedo() });

        /** Drop a running drag whose node or target the edit removed or moved under the dragged node. */
        const reconcileDrag = (document: MindmapDocument): void => {
            const { draggedNodeId, dropTargetId } = drag.getState();
            if (draggedNodeId === null) return;
            const tree = indexTree(document.root);
            const stale =
                !tree.entries.has(draggedNodeId) ||
                (dropTargetId !== null &&
                    (!tree.entries.has(dropTargetId) ||
                        mutations.wouldCreateCycle(tree, draggedNodeId, dropTargetId)));
            if (stale) drag.getState().cancelDrag();
        };

        /**
         * Install an edited document as one undo step. References to
         * removed nodes, arrows and summaries drop out of the selection.
         */
        const commit = (label: string, document: MindmapDocument, reducer?: SelectionReducer): void => {
            const before: Checkpoint = { document: get().document, selection: currentSelection() };
            const exists = existsIn(document);
            const pruned = pruneSelection(before.selection, exists);
            const nextSelection = reducer ? reducer(pruned) : pruned;

            history.record(label, before, { document, selection: nextSelection });
            reconcileDrag(document);
            set({ document, ...historyFlags() });
            installSelection(nextSelection);
            log.debug(`${label} committed`);
        };

        /** Run an engine call; rejected edits are logged and rethrown untouched. */
        const attempt = <T>(label: string, operation: () => T): T => {
            try {
                return operation();
            } catch (error) {
                log.debug(`${label} rejected: ${errorMessage(error)}`);
                throw error;
            }
        };

        const isReadOnly = (label: string): boolean => {
            if (!config.readOnly) return false;
            log.debug(`${label} ignored in read-only mode`);
            return true;
        };

        const restoreCheckpoint = (checkpoint: Checkpoint): void => {
            drag.getState().cancelDrag();
            set({ document: checkpoint.document, editingNodeId: null, ...historyFlags() });
            installSelection(checkpoint.selection);
        };

        const lastSelectedNodeId = (): string | null => {
            const { selectedNodeIds } = currentSelection();
            return selectedNodeIds.length > 0 ? selectedNodeIds[selectedNodeIds.length - 1] : null;
        };

        const insert = (
            kind: 'addChild' | 'addSibling' | 'insertParent',
            operation: () => mutations.InsertResult,
        ): string | null => {
            if (isReadOnly(kind)) return null;
            const { document, nodeId } = attempt(kind, operation);
            commit(kind, document, (state) => selectNode(state, nodeId));
            const parentId = getEntry(indexTree(document.root), nodeId).parentId ?? nodeId;
            events.emit({ type: 'nodeAdded', kind, nodeId, parentId });
            return nodeId;
        };

        const updateField = (
            field: NodeField,
            nodeId: string,
            operation: (document: MindmapDocument) => mutations.UpdateResult,
        ): boolean => {
            const label = `update ${field}`;
            if (isReadOnly(label)) return false;
            const result = attempt(label, () => operation(get().document));
            if (!result.changed) return false;
            commit(label, result.document);
            events.emit({ type: 'nodeUpdated', nodeId, field });
            return true;
        };

        const changeExpanded = (nodeId: string, expanded: (node: MindmapNode) => boolean): boolean => {
            const { document } = get();
            const node = attempt('expand', () => getEntry(indexTree(document.root), nodeId).node);
            const next = expanded(node);
            const result = mutations.setExpanded(document, nodeId, next);
            if (result.changed) commit(next ? 'expand' : 'collapse', result.document);
            events.emit({ type: 'expandChanged', nodeId, expanded: next });
            return result.changed;
        };

        const layoutFor = (metrics: ThemeMetrics): LayoutMap => {
            const { document } = get();
            const { focusedNodeId } = currentSelection();
            const focused = focusedNodeId === null ? undefined : findNode(document.root, focusedNodeId);
            const root = focused ?? document.root;
            if (
                layoutCache &&
                layoutCache.root === root &&
                layoutCache.direction === document.direction &&
                layoutCache.metrics === metrics
            ) {
                return layoutCache.layout;
            }
            const layout = calculateLayout(root, metrics, document.direction);
            layoutCache = { root, direction: document.direction, metrics, layout };
            return layout;
        };

        const transform = (): ViewTransform => viewport.getState().transform;

        const removeMany = (label: string, targets: readonly string[]): boolean => {
            if (isReadOnly(label)) return false;
            let { document } = get();
            const tree = indexTree(document.root);
            attempt(label, () => {
                for (const nodeId of targets) {
                    if (getEntry(tree, nodeId).parentId === null) throw new RootNodeError('remove');
                }
            });

            const results: mutations.RemoveResult[] = [];
            for (const nodeId of targets) {
                // Already gone with an ancestor removed earlier in this batch.
                if (!indexTree(document.root).entries.has(nodeId)) continue;
                const result = attempt(label, () => mutations.removeNode(document, nodeId));
                document = result.document;
                results.push(result);
            }
            if (results.length === 0) return false;

            const editing = get().editingNodeId;
            if (editing !== null && !existsIn(document).node(editing)) set({ editingNodeId: null });

            commit(label, document);
            for (const result of results) {
                const [nodeId] = result.removedIds;
                events.emit({ type: 'nodeRemoved', nodeId, parentId: result.parentId, removedIds: result.removedIds });
            }
            return true;
        };

        const move = (nodeId: string, newParentId: string, index?: number): boolean => {
            if (isReadOnly('move')) return false;
            const result = attempt('move', () => mutations.moveNode(get().document, nodeId, newParentId, index));
            if (!result.changed) return false;
            commit(result.isReorder ? 'reorder' : 'move', result.document);
            events.emit({
                type: 'nodeMoved',
                nodeId,
                oldParentId: result.oldParentId,
                newParentId: result.newParentId,
                isReorder: result.isReorder,
                index: result.newIndex,
            });
            return true;
        };

        return {
            document: initial,
            canUndo: false,
            canRedo: false,
            config,
            editingNodeId: null,
            clipboard: null,

            /* ---- document ------------------------------------------ */

            refresh(document) {
                attempt('load', () => assertValidDocument(document));
                ids.register(nodeIds(document.root));
                ids.register(document.arrows.map((arrow) => arrow.id));
                ids.register(document.summaries.map((summary) => summary.id));
                history.clear();
                drag.getState().cancelDrag();
                set({ document, editingNodeId: null, ...historyFlags() });
                installSelection(EMPTY_SELECTION);
                log.info(`document replaced (${indexTree(document.root).entries.size} nodes)`);
                events.emit({ type: 'documentReplaced' });
            },

            /* ---- structure ----------------------------------------- */

            addChild(parentId, topic = '') {
                return insert('addChild', () => mutations.addChild(get().document, parentId, topic, context));
            },

            addSibling(referenceId, topic = '') {
                return insert('addSibling', () => mutations.addSibling(get().document, referenceId, topic, context));
            },

            insertParent(nodeId, topic = '') {
                return insert('insertParent', () => mutations.insertParent(get().document, nodeId, topic, context));
            },

            removeNode(nodeId) {
                return removeMany('remove', [nodeId]);
            },

            removeNodes(targets) {
                return removeMany('remove', targets);
            },

            deleteSelection() {
                const current = currentSelection();
                if (current.selectedArrowId !== null) return get().removeArrow(current.selectedArrowId);
                if (current.selectedSummaryId !== null) return get().removeSummary(current.selectedSummaryId);
                const { rootId } = indexTree(get().document.root);
                const targets = current.selectedNodeIds.filter((id) => id !== rootId);
                if (targets.length === 0) return false;
                return removeMany('delete selection', targets);
            },

            moveNode(nodeId, newParentId, index) {
                return move(nodeId, newParentId, index);
            },

            /* ---- topic editing ------------------------------------- */

            updateTopic(nodeId, topic) {
                return updateField('topic', nodeId, (document) => mutations.updateTopic(document, nodeId, topic));
            },

            beginEdit(nodeId) {
                if (isReadOnly('edit')) return false;
                attempt('edit', () => getEntry(indexTree(get().document.root), nodeId));
                if (get().editingNodeId === nodeId) return false;
                set({ editingNodeId: nodeId });
                events.emit({ type: 'beginEdit', nodeId });
                return true;
            },

            commitTopicEdit(topic) {
                const nodeId = get().editingNodeId;
                if (nodeId === null) return false;
                set({ editingNodeId: null });
                if (!existsIn(get().document).node(nodeId)) return false;
                const changed = get().updateTopic(nodeId, topic);
                events.emit({ type: 'finishEdit', nodeId, topic });
                return changed;
            },

            cancelEdit() {
                if (get().editingNodeId === null) return;
                set({ editingNodeId: null });
            },

            /* ---- expand / collapse --------------------------------- */

            toggleExpanded(nodeId) {
                return changeExpanded(nodeId, (node) => !node.expanded);
            },

            expandNode(nodeId) {
                return changeExpanded(nodeId, () => true);
            },

            collapseNode(nodeId) {
                return changeExpanded(nodeId, () => false);
            },

            /* ---- node payload -------------------------------------- */

            setNodeStyle(nodeId, style) {
                return updateField('style', nodeId, (document) => mutations.setNodeStyle(document, nodeId, style));
            },

            setNodeHyperlink(nodeId, hyperlink) {
                return updateField('hyperlink', nodeId, (document) =>
                    mutations.setNodeHyperlink(document, nodeId, hyperlink),
                );
            },

            setNodeNote(nodeId, note) {
                return updateField('note', nodeId, (document) => mutations.setNodeNote(document, nodeId, note));
            },

            setNodeBranchColor(nodeId, color) {
                return updateField('branchColor', nodeId, (document) =>
                    mutations.setNodeBranchColor(document, nodeId, color),
                );
            },

            setNodeDirection(nodeId, direction) {
                return updateField('direction', nodeId, (document) =>
                    mutations.setNodeDirection(document, nodeId, direction),
                );
            },

            addNodeTag(nodeId, tag) {
                return updateField('tags', nodeId, (document) => mutations.addNodeTag(document, nodeId, tag));
            },

            removeNodeTag(nodeId, text) {
                return updateField('tags', nodeId, (document) => mutations.removeNodeTag(document, nodeId, text));
            },

            addNodeIcon(nodeId, icon) {
                return updateField('icons', nodeId, (document) => mutations.addNodeIcon(document, nodeId, icon));
            },

            removeNodeIcon(nodeId, icon) {
                return updateField('icons', nodeId, (document) => mutations.removeNodeIcon(document, nodeId, icon));
            },

            setDirection(direction) {
                if (isReadOnly('direction')) return false;
                const result = mutations.setDirection(get().document, direction);
                if (!result.changed) return false;
                commit('direction', result.document);
                events.emit({ type: 'directionChanged', direction });
                return true;
            },

            /* ---- arrows -------------------------------------------- */

            addArrow(fromNodeId, toNodeId, arrowOptions) {
                if (isReadOnly('add arrow')) return null;
                const result = attempt('add arrow', () =>
                    addArrow(get().document, fromNodeId, toNodeId, context, arrowOptions),
                );
                commit('add arrow', result.document, (state) => selectArrow(state, result.arrowId));
                events.emit({ type: 'arrowCreated', arrowId: result.arrowId, fromNodeId, toNodeId });
                return result.arrowId;
            },

            removeArrow(arrowId) {
                if (isReadOnly('remove arrow')) return false;
                const document = attempt('remove arrow', () => removeArrow(get().document, arrowId));
                commit('remove arrow', document);
                events.emit({ type: 'arrowRemoved', arrowId });
                return true;
            },

            updateArrow(arrowId, patch) {
                if (isReadOnly('update arrow')) return false;
                const { document } = get();
                const next = attempt('update arrow', () => updateArrow(document, arrowId, patch));
                if (next === document) return false;
                commit('update arrow', next);
                events.emit({ type: 'arrowUpdated', arrowId });
                return true;
            },

            setArrowControlPoints(arrowId, offset1, offset2) {
                if (isReadOnly('move control points')) return false;
                const { document } = get();
                const next = attempt('move control points', () =>
                    setArrowControlPoints(document, arrowId, offset1, offset2),
                );
                if (next === document) return false;
                commit('move control points', next);
                events.emit({ type: 'arrowUpdated', arrowId });
                return true;
            },

            /* ---- summaries ----------------------------------------- */

            addSummary(parentNodeId, startIndex, endIndex, summaryOptions) {
                if (isReadOnly('add summary')) return null;
                const result = attempt('add summary', () =>
                    addSummary(get().document, parentNodeId, startIndex, endIndex, context, summaryOptions),
                );
                commit('add summary', result.document, (state) => selectSummary(state, result.summaryId));
                events.emit({ type: 'summaryCreated', summaryId: result.summaryId, parentNodeId });
                return result.summaryId;
            },

            createSummaryFromSelection(summaryOptions) {
                if (isReadOnly('add summary')) return null;
                const range = attempt('add summary', () =>
                    findCommonParentRange(get().document, currentSelection().selectedNodeIds),
                );
                return get().addSummary(range.parentNodeId, range.startIndex, range.endIndex, summaryOptions);
            },

            removeSummary(summaryId) {
                if (isReadOnly('remove summary')) return false;
                const document = attempt('remove summary', () => removeSummary(get().document, summaryId));
                commit('remove summary', document);
                events.emit({ type: 'summaryRemoved', summaryId });
                return true;
            },

            updateSummary(summaryId, patch) {
                if (isReadOnly('update summary')) return false;
                const { document } = get();
                const next = attempt('update summary', () => updateSummary(document, summaryId, patch));
                if (next === document) return false;
                commit('update summary', next);
                events.emit({ type: 'summaryUpdated', summaryId });
                return true;
            },

            /* ---- selection ----------------------------------------- */

            selectNode(nodeId) {
                attempt('select', () => getEntry(indexTree(get().document.root), nodeId));
                return applySelection((state) => selectNode(state, nodeId));
            },

            addToSelection(nodeId) {
                attempt('select', () => getEntry(indexTree(get().document.root), nodeId));
                return applySelection((state) => addToSelection(state, nodeId));
            },

            toggleSelection(nodeId) {
                attempt('select', () => getEntry(indexTree(get().document.root), nodeId));
                return applySelection((state) => toggleSelection(state, nodeId));
            },

            removeFromSelection(nodeId) {
                return applySelection((state) => removeFromSelection(state, nodeId));
            },

            selectNodes(targets) {
                const tree = indexTree(get().document.root);
                attempt('select', () => targets.forEach((nodeId) => getEntry(tree, nodeId)));
                return applySelection((state) => selectNodes(state, targets));
            },

            clearSelection() {
                return applySelection(clearSelection);
            },

            selectArrow(arrowId) {
                return applySelection((state) => selectArrow(state, arrowId));
            },

            selectSummary(summaryId) {
                return applySelection((state) => selectSummary(state, summaryId));
            },

            selectInRect(screenRect, additive = false, metrics = defaultMetrics) {
                const hits = nodesInRect(layoutFor(metrics), toCanvasRect(screenRect, transform()));
                return applySelection((state) =>
                    selectNodes(state, additive ? [...state.selectedNodeIds, ...hits] : hits),
                );
            },

            /* ---- focus --------------------------------------------- */

            focusNode(nodeId) {
                attempt('focus', () => getEntry(indexTree(get().document.root), nodeId));
                return applySelection((state) => focus(state, nodeId));
            },

            exitFocus() {
                return applySelection(exitFocus);
            },

            /* ---- clipboard ----------------------------------------- */

            copyNode(nodeId) {
                const target = nodeId ?? lastSelectedNodeId();
                if (target === null) return false;
                const node = attempt('copy', () => getEntry(indexTree(get().document.root), target).node);
                set({ clipboard: node });
                return true;
            },

            pasteNode(parentId) {
                if (isReadOnly('paste')) return null;
                const { clipboard, document } = get();
                if (clipboard === null) throw new ClipboardEmptyError();
                const target = parentId ?? lastSelectedNodeId() ?? document.root.id;
                const result = attempt('paste', () => mutations.pasteSubtree(document, target, clipboard, context));
                commit('paste', result.document, (state) => selectNode(state, result.nodeId));
                events.emit({ type: 'nodeAdded', kind: 'paste', nodeId: result.nodeId, parentId: target });
                return result.nodeId;
            },

            /* ---- drag ---------------------------------------------- */

            startDrag(nodeId, pointer) {
                if (!config.enableDragDrop || isReadOnly('drag')) return false;
                const entry = attempt('drag', () => getEntry(indexTree(get().document.root), nodeId));
                if (entry.parentId === null) return false;
                drag.getState().startDrag(nodeId, pointer);
                return true;
            },

            updateDrag(pointer, metrics = defaultMetrics) {
                if (drag.getState().draggedNodeId === null) return;
                drag.getState().updateDrag(pointer, layoutFor(metrics), transform(), get().document.root);
            },

            dropDrag() {
                const { draggedNodeId, dropPosition } = drag.getState();
                const targetId = drag.getState().endDrag();
                if (draggedNodeId === null || targetId === null || dropPosition === null) return false;

                // The target was resolved against an earlier tree; it may be gone or inside the dragged subtree now.
                const tree = indexTree(get().document.root);
                const target = tree.entries.get(targetId);
                if (!target || !tree.entries.has(draggedNodeId)) return false;
                const parentId = dropPosition === 'inside' || target.parentId === null ? targetId : target.parentId;
                if (mutations.wouldCreateCycle(tree, draggedNodeId, parentId)) return false;

                if (parentId === targetId) return move(draggedNodeId, targetId);
                // moveNode takes the index as counted before the dragged node is detached.
                const index = dropPosition === 'before' ? target.index : target.index + 1;
                return move(draggedNodeId, parentId, index);
            },

            cancelDrag() {
                drag.getState().cancelDrag();
            },

            /* ---- pointer / keyboard -------------------------------- */

            handleTap(screenPoint, tapOptions = {}) {
                const { document } = get();
                const hit = hitTest(screenPoint, {
                    document,
                    layout: layoutFor(tapOptions.metrics ?? defaultMetrics),
                    transform: transform(),
                    selectedArrowId: currentSelection().selectedArrowId,
                });

                switch (hit.kind) {
                    case 'hyperlink':
                        get().activateHyperlink(hit.nodeId);
                        break;
                    case 'expandIndicator':
                        get().toggleExpanded(hit.nodeId);
                        break;
                    case 'node':
                        if (tapOptions.additive) get().toggleSelection(hit.nodeId);
                        else get().selectNode(hit.nodeId);
                        break;
                    case 'summary':
                        get().selectSummary(hit.summaryId);
                        break;
                    case 'arrow':
                        get().selectArrow(hit.arrowId);
                        break;
                    case 'empty':
                        if (!tapOptions.additive) get().clearSelection();
                        break;
                    case 'controlPoint':
                        break;
                }
                return hit;
            },

            handleShortcut(input, viewportSize) {
                if (!config.enableKeyboardShortcuts) return null;
                const current = currentSelection();
                const action = getMindmapShortcutAction({
                    ...input,
                    hasSelection:
                        current.selectedNodeIds.length > 0 ||
                        current.selectedArrowId !== null ||
                        current.selectedSummaryId !== null,
                    isEditing: get().editingNodeId !== null,
                    isFocused: current.focusedNodeId !== null,
                });
                if (action === null) return null;

                const { rootId } = indexTree(get().document.root);
                const selected = lastSelectedNodeId();
                const center = viewportSize ? { x: viewportSize.width / 2, y: viewportSize.height / 2 } : undefined;

                switch (action) {
                    case 'addChild':
                        if (selected === null) return null;
                        get().addChild(selected);
                        break;
                    case 'addSibling':
                        // The root has no siblings; Enter does nothing there.
                        if (selected === null || selected === rootId) return null;
                        get().addSibling(selected);
                        break;
                    case 'deleteSelection':
                        get().deleteSelection();
                        break;
                    case 'toggleCollapse':
                        if (selected === null) return null;
                        get().toggleExpanded(selected);
                        break;
                    case 'deselect':
                        get().clearSelection();
                        break;
                    case 'exitFocus':
                        get().exitFocus();
                        break;
                    case 'startEdit':
                        if (selected === null) return null;
                        get().beginEdit(selected);
                        break;
                    case 'centerView':
                        if (!viewportSize) return null;
                        get().centerView(viewportSize);
                        break;
                    case 'undo':
                        get().undo();
                        break;
                    case 'redo':
                        get().redo();
                        break;
                    case 'copy':
                        if (!get().copyNode()) return null;
                        break;
                    case 'paste':
                        if (get().clipboard === null) return null;
                        get().pasteNode();
                        break;
                    case 'zoomIn':
                        viewport.getState().zoomBy(KEYBOARD_ZOOM_FACTOR, center);
                        break;
                    case 'zoomOut':
                        viewport.getState().zoomBy(1 / KEYBOARD_ZOOM_FACTOR, center);
                        break;
                }
                return action;
            },

            activateHyperlink(nodeId) {
                const node = attempt('hyperlink', () => getEntry(indexTree(get().document.root), nodeId).node);
                if (!node.hyperlink) return null;
                events.emit({ type: 'hyperlinkActivated', nodeId, url: node.hyperlink });
                return node.hyperlink;
            },

            centerView(viewportSize, metrics = defaultMetrics) {
                const layout = layoutFor(metrics);
                const { focusedNodeId } = currentSelection();
                const anchorId = focusedNodeId ?? get().document.root.id;
                const geometry = layout.get(anchorId);
                if (!geometry) return;
                viewport.getState().centerOn(rectCenter(nodeBounds(geometry)), viewportSize);
            },

            fitView(viewportSize, metrics = defaultMetrics) {
                const bounds = layoutBounds(layoutFor(metrics));
                if (bounds) viewport.getState().fitToBounds(bounds, viewportSize);
            },

            /* ---- history ------------------------------------------- */

            undo() {
                const checkpoint = history.undo();
                if (!checkpoint) return false;
                restoreCheckpoint(checkpoint);
                events.emit({ type: 'historyChanged', action: 'undo' });
                return true;
            },

            redo() {
                const checkpoint = history.redo();
                if (!checkpoint) return false;
                restoreCheckpoint(checkpoint);
                events.emit({ type: 'historyChanged', action: 'redo' });
                return true;
            },

            /* ---- layout / snapshots -------------------------------- */

            getLayout(metrics = defaultMetrics) {
                return layoutFor(metrics);
            },

            exportSnapshot() {
                return serializeDocument(get().document);
            },

            exportJson() {
                return exportToJson(get().document);
            },

            importJson(json) {
                const document = attempt('import', () => importFromJson(json));
                get().refresh(document);
            },
        };
    });

    return Object.assign(store, { selection, drag, viewport, events, ids });
}
