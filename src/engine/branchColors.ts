import type { MindmapNode } from '../types/mindmap';
import { getEntry, indexTree } from './treeIndex';

export const BRANCH_PALETTE = [
    '#e03131',
    '#1c7ed6',
    '#2f9e44',
    '#f08c00',
    '#9c36b5',
    '#0c8599',
    '#e8590c',
    '#5c940d',
    '#c2255c',
    '#3b5bdb',
] as const;

/**
 * Colour for a node about to be inserted under `parentId`.
 * Children of the root take the next palette slot; deeper nodes inherit
 * the nearest coloured ancestor.
 */
export function resolveBranchColor(root: MindmapNode, parentId: string): string | undefined {
    if (parentId === root.id) {
        return BRANCH_PALETTE[root.children.length % BRANCH_PALETTE.length];
    }

    const index = indexTree(root);
    let currentId: string | null = parentId;
    while (currentId !== null && currentId !== root.id) {
        const entry = getEntry(index, currentId);
        if (entry.node.branchColor) return entry.node.branchColor;
        currentId = entry.parentId;
    }
    return undefined;
}
