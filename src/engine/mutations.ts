/**
 * Structural edits over a document snapshot.
 *
 * Every function is pure: it returns a new document and never touches
 * a node reachable from its input. Unchanged subtrees are shared; the
 * path from the edited node up to the root is copied.
 */
import type {
    BranchSide,
    LayoutDirection,
    MindmapDocument,
    MindmapNode,
    NodeStyle,
    NodeTag,
} from '../types/mindmap';
import { reconcileAfterDetach, reconcileAfterInsert, type IdContext } from './annotations';
import { resolveBranchColor } from './branchColors';
import { CycleError, RootNodeError } from './errors';
import {
    collectSubtreeIds,
    getEntry,
    indexTree,
    isAncestorOrSelf,
    type TreeIndex,
} from './treeIndex';

export type MutationContext = IdContext;

export interface InsertResult {
    document: MindmapDocument;
    nodeId: string;
}

export interface UpdateResult {
    document: MindmapDocument;
    changed: boolean;
}

export interface RemoveResult {
    document: MindmapDocument;
    /** The removed node followed by its descendants, pre-order. */
    removedIds: string[];
    parentId: string;
    index: number;
}

export interface MoveResult {
    document: MindmapDocument;
    changed: boolean;
    isReorder: boolean;
    oldParentId: string;
    newParentId: string;
    oldIndex: number;
    newIndex: number;
    /** The target was collapsed and got expanded to reveal the node. */
    expandedTarget: boolean;
}

/* ------------------------------------------------------------------ */
/*  Helpers                                                           */
/* ------------------------------------------------------------------ */

export function createNode(
    id: string,
    topic: string,
    extra: Partial<Omit<MindmapNode, 'id' | 'topic'>> = {},
): MindmapNode {
    return {
        id,
        topic,
        children: [],
        expanded: true,
        tags: [],
        icons: [],
        ...extra,
    };
}

export function createDocument(
    rootId: string,
    topic = 'Central Topic',
    direction: LayoutDirection = 'side',
): MindmapDocument {
    return {
        root: createNode(rootId, topic),
        arrows: [],
        summaries: [],
        direction,
        theme: 'light',
    };
}

/** Replace one node and copy its ancestor path. Returns `root` when nothing changed. */
function replaceNode(
    root: MindmapNode,
    nodeId: string,
    update: (node: MindmapNode) => MindmapNode,
): MindmapNode {
    const index = indexTree(root);
    let entry = getEntry(index, nodeId);
    let replacement = update(entry.node);
    if (replacement === entry.node) return root;

    while (entry.parentId !== null) {
        const parent = getEntry(index, entry.parentId);
        const children = [...parent.node.children];
        children[entry.index] = replacement;
        replacement = { ...parent.node, children };
        entry = parent;
    }
    return replacement;
}

function insertChild(node: MindmapNode, child: MindmapNode, at: number): MindmapNode {
    const children = [...node.children];
    children.splice(at, 0, child);
    return { ...node, children, expanded: true };
}

/**
 * True when attaching `nodeId` under `newParentId` would make the tree
 * cyclic: a self-move, or a target inside the node's own subtree.
 * Walks from the target up to the root, so it is O(depth).
 */
export function wouldCreateCycle(index: TreeIndex, nodeId: string, newParentId: string): boolean {
    if (nodeId === newParentId) return true;
    return isAncestorOrSelf(index, nodeId, newParentId);
}

/* ------------------------------------------------------------------ */
/*  Insertion                                                         */
/* ------------------------------------------------------------------ */

function insertNew(
    document: MindmapDocument,
    parentId: string,
    at: number,
    node: MindmapNode,
): MindmapDocument {
    const root = replaceNode(document.root, parentId, (parent) => insertChild(parent, node, at));
    return reconcileAfterInsert({ ...document, root }, parentId, at);
}

/** Append a new child; a collapsed parent is expanded. */
export function addChild(
    document: MindmapDocument,
    parentId: string,
    topic: string,
    context: MutationContext,
): InsertResult {
    const parent = getEntry(indexTree(document.root), parentId).node;
    const branchColor = resolveBranchColor(document.root, parentId);
    const node = createNode(context.generateId(), topic, branchColor ? { branchColor } : {});
    return {
        document: insertNew(document, parentId, parent.children.length, node),
        nodeId: node.id,
    };
}

/** Insert a new node right after `referenceId` among its siblings. */
export function addSibling(
    document: MindmapDocument,
    referenceId: string,
    topic: string,
    context: MutationContext,
): InsertResult {
    const reference = getEntry(indexTree(document.root), referenceId);
    if (reference.parentId === null) throw new RootNodeError('add a sibling to');

    const branchColor = resolveBranchColor(document.root, reference.parentId);
    const node = createNode(context.generateId(), topic, branchColor ? { branchColor } : {});
    return {
        document: insertNew(document, reference.parentId, reference.index + 1, node),
        nodeId: node.id,
    };
}

/** Wrap `nodeId` in a new parent that takes its place among the siblings. */
export function insertParent(
    document: MindmapDocument,
    nodeId: string,
    topic: string,
    context: MutationContext,
): InsertResult {
    const entry = getEntry(indexTree(document.root), nodeId);
    const { parentId } = entry;
    if (parentId === null) throw new RootNodeError('insert a parent above');

    const branchColor = entry.node.branchColor ?? resolveBranchColor(document.root, parentId);
    // A side hint only applies to root children, so it moves up to the wrapper.
    const { direction, ...unhinted } = entry.node;
    const wrapper = createNode(context.generateId(), topic, {
        children: [direction === undefined ? entry.node : unhinted],
        ...(branchColor ? { branchColor } : {}),
        ...(direction !== undefined ? { direction } : {}),
    });
    const root = replaceNode(document.root, parentId, (parent) => {
        const children = [...parent.children];
        children[entry.index] = wrapper;
        return { ...parent, children };
    });
    return { document: { ...document, root }, nodeId: wrapper.id };
}

/* ------------------------------------------------------------------ */
/*  Removal                                                           */
/* ------------------------------------------------------------------ */

/** Remove a node and its whole subtree, dropping annotations that pointed into it. */
export function removeNode(document: MindmapDocument, nodeId: string): RemoveResult {
    const entry = getEntry(indexTree(document.root), nodeId);
    const { parentId } = entry;
    if (parentId === null) throw new RootNodeError('remove');

    const removedIds = collectSubtreeIds(entry.node);
    const root = replaceNode(document.root, parentId, (parent) => ({
        ...parent,
        children: parent.children.filter((child) => child.id !== nodeId),
    }));
    return {
        document: reconcileAfterDetach({ ...document, root }, new Set(removedIds), parentId, entry.index),
        removedIds,
        parentId,
        index: entry.index,
    };
}

/* ------------------------------------------------------------------ */
/*  Move / reorder                                                    */
/* ------------------------------------------------------------------ */

/**
 * Detach `nodeId` (with its subtree) and attach it under `newParentId`.
 *
 * `index` addresses the target's current children: the node lands in
 * front of the child now at that index, or at the end when omitted.
 * Landing on the node's own slot is a no-op, not an error.
 */
export function moveNode(
    document: MindmapDocument,
    nodeId: string,
    newParentId: string,
    index?: number,
): MoveResult {
    const tree = indexTree(document.root);
    const entry = getEntry(tree, nodeId);
    const target = getEntry(tree, newParentId);
    if (nodeId === newParentId) throw new CycleError(nodeId, newParentId);
    const oldParentId = entry.parentId;
    if (oldParentId === null) throw new RootNodeError('move');
    if (wouldCreateCycle(tree, nodeId, newParentId)) throw new CycleError(nodeId, newParentId);

    const isReorder = oldParentId === newParentId;
    const oldIndex = entry.index;
    const remaining = target.node.children.length - (isReorder ? 1 : 0);
    let newIndex = index ?? target.node.children.length;
    if (isReorder && newIndex > oldIndex) newIndex -= 1;
    newIndex = Math.max(0, Math.min(remaining, Math.trunc(newIndex)));

    const base = { isReorder, oldParentId, newParentId, oldIndex, newIndex };
    if (isReorder && newIndex === oldIndex) {
        return { ...base, document, changed: false, expandedTarget: false };
    }

    const detachedRoot = replaceNode(document.root, oldParentId, (parent) => ({
        ...parent,
        children: parent.children.filter((child) => child.id !== nodeId),
    }));
    const root = replaceNode(detachedRoot, newParentId, (parent) =>
        insertChild(parent, entry.node, newIndex),
    );

    const detached = reconcileAfterDetach({ ...document, root }, new Set(), oldParentId, oldIndex);
    return {
        ...base,
        document: reconcileAfterInsert(detached, newParentId, newIndex),
        changed: true,
        expandedTarget: !target.node.expanded,
    };
}

/* ------------------------------------------------------------------ */
/*  Field setters                                                     */
/* ------------------------------------------------------------------ */

/** Apply `update` to one node. `changed` is false when it returned the node unchanged. */
export function updateNode(
    document: MindmapDocument,
    nodeId: string,
    update: (node: MindmapNode) => MindmapNode,
): UpdateResult {
    const root = replaceNode(document.root, nodeId, update);
    if (root === document.root) return { document, changed: false };
    return { document: { ...document, root }, changed: true };
}

export function updateTopic(document: MindmapDocument, nodeId: string, topic: string): UpdateResult {
    return updateNode(document, nodeId, (node) => (node.topic === topic ? node : { ...node, topic }));
}

export function setExpanded(
    document: MindmapDocument,
    nodeId: string,
    expanded: boolean,
): UpdateResult {
    return updateNode(document, nodeId, (node) =>
        node.expanded === expanded ? node : { ...node, expanded },
    );
}

export function setNodeStyle(
    document: MindmapDocument,
    nodeId: string,
    style: NodeStyle | undefined,
): UpdateResult {
    return updateNode(document, nodeId, (current) => {
        if (current.style === style) return current;
        const { style: _previous, ...node } = current;
        return style ? { ...node, style } : node;
    });
}

export function setNodeHyperlink(
    document: MindmapDocument,
    nodeId: string,
    hyperlink: string | undefined,
): UpdateResult {
    return updateNode(document, nodeId, (current) => {
        if (current.hyperlink === hyperlink) return current;
        const { hyperlink: _previous, ...node } = current;
        return hyperlink ? { ...node, hyperlink } : node;
    });
}

export function setNodeNote(
    document: MindmapDocument,
    nodeId: string,
    note: string | undefined,
): UpdateResult {
    return updateNode(document, nodeId, (current) => {
        if (current.note === note) return current;
        const { note: _previous, ...node } = current;
        return note ? { ...node, note } : node;
    });
}

export function setNodeBranchColor(
    document: MindmapDocument,
    nodeId: string,
    branchColor: string | undefined,
): UpdateResult {
    return updateNode(document, nodeId, (current) => {
        if (current.branchColor === branchColor) return current;
        const { branchColor: _previous, ...node } = current;
        return branchColor ? { ...node, branchColor } : node;
    });
}

/** Pin a root child to one side in two-sided layouts; `undefined` clears the hint. */
export function setNodeDirection(
    document: MindmapDocument,
    nodeId: string,
    direction: BranchSide | undefined,
): UpdateResult {
    return updateNode(document, nodeId, (current) => {
        if (current.direction === direction) return current;
        const { direction: _previous, ...node } = current;
        return direction ? { ...node, direction } : node;
    });
}

export function addNodeTag(document: MindmapDocument, nodeId: string, tag: NodeTag): UpdateResult {
    return updateNode(document, nodeId, (node) =>
        node.tags.some((existing) => existing.text === tag.text)
            ? node
            : { ...node, tags: [...node.tags, tag] },
    );
}

export function removeNodeTag(document: MindmapDocument, nodeId: string, text: string): UpdateResult {
    return updateNode(document, nodeId, (node) =>
        node.tags.some((tag) => tag.text === text)
            ? { ...node, tags: node.tags.filter((tag) => tag.text !== text) }
            : node,
    );
}

export function addNodeIcon(document: MindmapDocument, nodeId: string, icon: string): UpdateResult {
    return updateNode(document, nodeId, (node) =>
        node.icons.includes(icon) ? node : { ...node, icons: [...node.icons, icon] },
    );
}

export function removeNodeIcon(document: MindmapDocument, nodeId: string, icon: string): UpdateResult {
    return updateNode(document, nodeId, (node) =>
        node.icons.includes(icon)
            ? { ...node, icons: node.icons.filter((existing) => existing !== icon) }
            : node,
    );
}

export function setDirection(document: MindmapDocument, direction: LayoutDirection): UpdateResult {
    if (document.direction === direction) return { document, changed: false };
    return { document: { ...document, direction }, changed: true };
}

/* ------------------------------------------------------------------ */
/*  Copy / paste                                                      */
/* ------------------------------------------------------------------ */

/**
 * Deep copy with fresh ids, issued in pre-order. When `branchColor` is
 * given every copied node takes it.
 */
export function cloneSubtree(
    node: MindmapNode,
    generateId: () => string,
    branchColor?: string,
): MindmapNode {
    const order: MindmapNode[] = [];
    const stack: MindmapNode[] = [node];
    while (stack.length > 0) {
        const current = stack.pop();
        if (!current) break;
        order.push(current);
        for (let i = current.children.length - 1; i >= 0; i--) {
            stack.push(current.children[i]);
        }
    }

    const freshIds = new Map(order.map((source) => [source.id, generateId()]));
    const clones = new Map<string, MindmapNode>();
    for (let i = order.length - 1; i >= 0; i--) {
        const source = order[i];
        const children: MindmapNode[] = [];
        for (const child of source.children) {
            const clone = clones.get(child.id);
            if (clone) children.push(clone);
        }
        clones.set(source.id, {
            ...source,
            id: freshIds.get(source.id) ?? generateId(),
            children,
            ...(branchColor ? { branchColor } : {}),
        });
    }

    return clones.get(node.id) ?? node;
}

/** Append a fresh copy of `node` under `parentId`. */
export function pasteSubtree(
    document: MindmapDocument,
    parentId: string,
    node: MindmapNode,
    context: MutationContext,
): InsertResult {
    const parent = getEntry(indexTree(document.root), parentId).node;
    const branchColor = resolveBranchColor(document.root, parentId);
    const copy = cloneSubtree(node, context.generateId, branchColor);
    return {
        document: insertNew(document, parentId, parent.children.length, copy),
        nodeId: copy.id,
    };
}
