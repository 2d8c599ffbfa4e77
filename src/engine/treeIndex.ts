/**
 * Flat id → entry index over one tree snapshot.
 *
 * Built once per root object with an explicit stack and cached in a
 * WeakMap, so structural queries (parent lookup, ancestor walk, depth)
 * never recurse and never rebuild for the same snapshot.
 */
import type { MindmapNode } from '../types/mindmap';
import { NodeNotFoundError } from './errors';

export interface TreeEntry {
    readonly node: MindmapNode;
    readonly parentId: string | null;
    /** Position among the parent's children; 0 for the root. */
    readonly index: number;
    readonly depth: number;
}

export interface TreeIndex {
    readonly rootId: string;
    readonly entries: ReadonlyMap<string, TreeEntry>;
}

const indexCache = new WeakMap<MindmapNode, TreeIndex>();

export function indexTree(root: MindmapNode): TreeIndex {
    const cached = indexCache.get(root);
    if (cached) return cached;

    const entries = new Map<string, TreeEntry>();
    const stack: TreeEntry[] = [{ node: root, parentId: null, index: 0, depth: 0 }];

    while (stack.length > 0) {
        const entry = stack.pop();
        if (!entry) break;
        entries.set(entry.node.id, entry);
        const { children } = entry.node;
        for (let i = children.length - 1; i >= 0; i--) {
            stack.push({
                node: children[i],
                parentId: entry.node.id,
                index: i,
                depth: entry.depth + 1,
            });
        }
    }

    const index: TreeIndex = { rootId: root.id, entries };
    indexCache.set(root, index);
    return index;
}

export function findNode(root: MindmapNode, nodeId: string): MindmapNode | undefined {
    return indexTree(root).entries.get(nodeId)?.node;
}

/** Entry lookup that throws `NodeNotFoundError` for unknown ids. */
export function getEntry(index: TreeIndex, nodeId: string): TreeEntry {
    const entry = index.entries.get(nodeId);
    if (!entry) throw new NodeNotFoundError(nodeId);
    return entry;
}

/** Ancestor ids from the parent up to the root (nearest first). */
export function ancestorIds(index: TreeIndex, nodeId: string): string[] {
    const result: string[] = [];
    let parentId = getEntry(index, nodeId).parentId;
    while (parentId !== null) {
        result.push(parentId);
        parentId = getEntry(index, parentId).parentId;
    }
    return result;
}

/** True when `ancestorId` is `nodeId` or lies on its path to the root. O(depth). */
export function isAncestorOrSelf(index: TreeIndex, ancestorId: string, nodeId: string): boolean {
    let currentId: string | null = nodeId;
    while (currentId !== null) {
        if (currentId === ancestorId) return true;
        currentId = getEntry(index, currentId).parentId;
    }
    return false;
}

/** Collect a node and all its descendants, pre-order. */
export function collectSubtreeIds(node: MindmapNode): string[] {
    const result: string[] = [];
    const stack: MindmapNode[] = [node];

    while (stack.length > 0) {
        const current = stack.pop();
        if (!current) break;
        result.push(current.id);
        for (let i = current.children.length - 1; i >= 0; i--) {
            stack.push(current.children[i]);
        }
    }

    return result;
}

export function nodeIds(root: MindmapNode): string[] {
    return [...indexTree(root).entries.keys()];
}
