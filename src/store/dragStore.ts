/**
 * Drag gesture tracking.
 *
 * The store only follows the pointer and resolves where a drop would
 * land. It never edits the tree: the caller takes the target returned by
 * `endDrag()` (plus `dropPosition`) and runs the move itself.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import { nodeBounds, toCanvasPoint, type ViewTransform } from '../engine/geometry';
import { wouldCreateCycle } from '../engine/mutations';
import { indexTree } from '../engine/treeIndex';
import type { LayoutMap, MindmapNode, Vector } from '../types/mindmap';

/** How far above/below a node the pointer still counts as "next to" it. */
export const DROP_THRESHOLD = 12;

/** Where the dragged node lands relative to the target. */
export type DropPosition = 'before' | 'after' | 'inside';

export interface DropTarget {
    nodeId: string;
    position: DropPosition;
}

/**
 * Find the drop target under a canvas point. The pointer must be within
 * a node's horizontal extent; vertically it may sit up to
 * `DROP_THRESHOLD` outside for a before/after drop. Nodes that would
 * create a cycle are skipped. The nearest candidate wins.
 */
export function resolveDropTarget(
    point: Vector,
    layout: LayoutMap,
    root: MindmapNode,
    draggedNodeId: string,
): DropTarget | null {
    const tree = indexTree(root);
    if (!tree.entries.has(draggedNodeId)) return null;

    let best: DropTarget | null = null;
    let bestDistance = Infinity;

    for (const [nodeId, geometry] of layout) {
        if (!tree.entries.has(nodeId) || wouldCreateCycle(tree, draggedNodeId, nodeId)) continue;

        const bounds = nodeBounds(geometry);
        const top = bounds.y;
        const bottom = bounds.y + bounds.height;
        if (point.x < bounds.x || point.x > bounds.x + bounds.width) continue;
        if (point.y < top - DROP_THRESHOLD || point.y > bottom + DROP_THRESHOLD) continue;

        let position: DropPosition = 'inside';
        let distance = 0;
        if (point.y < top) {
            position = 'before';
            distance = top - point.y;
        } else if (point.y > bottom) {
            position = 'after';
            distance = point.y - bottom;
        }
        // The layout root (the focused node in focus mode) has no siblings on screen.
        if (geometry.side === 'root') position = 'inside';

        if (distance < bestDistance) {
            bestDistance = distance;
            best = { nodeId, position };
        }
    }

    return best;
}

export interface DragState {
    draggedNodeId: string | null;
    /** Last pointer position, screen space. */
    pointer: Vector | null;
    dropTargetId: string | null;
    dropPosition: DropPosition | null;
}

export interface DragActions {
    startDrag: (nodeId: string, pointer: Vector) => void;
    updateDrag: (pointer: Vector, layout: LayoutMap, transform: ViewTransform, root: MindmapNode) => void;
    /** Finish the gesture; returns the drop target id, or null without a valid target. */
    endDrag: () => string | null;
    cancelDrag: () => void;
}

export type DragStore = StoreApi<DragState & DragActions>;

const IDLE: DragState = {
    draggedNodeId: null,
    pointer: null,
    dropTargetId: null,
    dropPosition: null,
};

export function createDragStore(): DragStore {
    return createStore<DragState & DragActions>((set, get) => ({
        ...IDLE,

        startDrag(nodeId, pointer) {
            set({ draggedNodeId: nodeId, pointer, dropTargetId: null, dropPosition: null });
        },

        updateDrag(pointer, layout, transform, root) {
            const state = get();
            if (state.draggedNodeId === null) return;

            const target = resolveDropTarget(
                toCanvasPoint(pointer, transform),
                layout,
                root,
                state.draggedNodeId,
            );
            const dropTargetId = target?.nodeId ?? null;
            const dropPosition = target?.position ?? null;
            const pointerMoved =
                state.pointer === null || state.pointer.x !== pointer.x || state.pointer.y !== pointer.y;
            const targetChanged =
                dropTargetId !== state.dropTargetId || dropPosition !== state.dropPosition;

            if (targetChanged) {
                set({ pointer, dropTargetId, dropPosition });
            } else if (pointerMoved) {
                set({ pointer });
            }
        },

        endDrag() {
            const { draggedNodeId, dropTargetId } = get();
            if (draggedNodeId === null) return null;
            set(IDLE);
            return dropTargetId;
        },

        cancelDrag() {
            if (get().draggedNodeId === null) return;
            set(IDLE);
        },
    }));
}
