/**
 * Arrows and summaries: the annotations layered over the tree.
 *
 * Both reference nodes by id. Structural edits keep them consistent:
 * arrows whose endpoint disappears are dropped, and summary ranges are
 * re-fitted whenever their parent gains or loses a child.
 */
import type {
    ArrowStyle,
    MindmapArrow,
    MindmapDocument,
    MindmapSummary,
    SummaryStyle,
    Vector,
} from '../types/mindmap';
import {
    ArrowNotFoundError,
    InvalidParentError,
    InvalidRangeError,
    SummaryNotFoundError,
} from './errors';
import { getEntry, indexTree, type TreeIndex } from './treeIndex';

export interface IdContext {
    generateId: () => string;
}

/* ------------------------------------------------------------------ */
/*  Arrows                                                            */
/* ------------------------------------------------------------------ */

export interface ArrowOptions {
    label?: string;
    bidirectional?: boolean;
    /** Zero offsets (the default) resolve to computed defaults at layout time. */
    controlPointOffset1?: Vector;
    controlPointOffset2?: Vector;
    style?: ArrowStyle;
}

export function addArrow(
    document: MindmapDocument,
    fromNodeId: string,
    toNodeId: string,
    context: IdContext,
    options: ArrowOptions = {},
): { document: MindmapDocument; arrowId: string } {
    const index = indexTree(document.root);
    getEntry(index, fromNodeId);
    getEntry(index, toNodeId);

    const arrow: MindmapArrow = {
        id: context.generateId(),
        fromNodeId,
        toNodeId,
        bidirectional: options.bidirectional ?? false,
        controlPointOffset1: options.controlPointOffset1 ?? { x: 0, y: 0 },
        controlPointOffset2: options.controlPointOffset2 ?? { x: 0, y: 0 },
        ...(options.label !== undefined ? { label: options.label } : {}),
        ...(options.style !== undefined ? { style: options.style } : {}),
    };

    return {
        document: { ...document, arrows: [...document.arrows, arrow] },
        arrowId: arrow.id,
    };
}

export function findArrow(document: MindmapDocument, arrowId: string): MindmapArrow | undefined {
    return document.arrows.find((arrow) => arrow.id === arrowId);
}

export function removeArrow(document: MindmapDocument, arrowId: string): MindmapDocument {
    if (!findArrow(document, arrowId)) throw new ArrowNotFoundError(arrowId);
    return { ...document, arrows: document.arrows.filter((arrow) => arrow.id !== arrowId) };
}

export type ArrowPatch = Pick<ArrowOptions, 'label' | 'bidirectional' | 'style'>;

export function updateArrow(
    document: MindmapDocument,
    arrowId: string,
    patch: ArrowPatch,
): MindmapDocument {
    const current = findArrow(document, arrowId);
    if (!current) throw new ArrowNotFoundError(arrowId);
    if (
        (patch.label === undefined || patch.label === current.label) &&
        (patch.bidirectional === undefined || patch.bidirectional === current.bidirectional) &&
        (patch.style === undefined || patch.style === current.style)
    ) {
        return document;
    }
    const next: MindmapArrow = {
        ...current,
        ...(patch.label !== undefined ? { label: patch.label } : {}),
        ...(patch.bidirectional !== undefined ? { bidirectional: patch.bidirectional } : {}),
        ...(patch.style !== undefined ? { style: patch.style } : {}),
    };
    return {
        ...document,
        arrows: document.arrows.map((arrow) => (arrow.id === arrowId ? next : arrow)),
    };
}

function sameVector(a: Vector, b: Vector): boolean {
    return a.x === b.x && a.y === b.y;
}

export function setArrowControlPoints(
    document: MindmapDocument,
    arrowId: string,
    controlPointOffset1: Vector,
    controlPointOffset2: Vector,
): MindmapDocument {
    const current = findArrow(document, arrowId);
    if (!current) throw new ArrowNotFoundError(arrowId);
    if (
        sameVector(current.controlPointOffset1, controlPointOffset1) &&
        sameVector(current.controlPointOffset2, controlPointOffset2)
    ) {
        return document;
    }
    const next: MindmapArrow = { ...current, controlPointOffset1, controlPointOffset2 };
    return {
        ...document,
        arrows: document.arrows.map((arrow) => (arrow.id === arrowId ? next : arrow)),
    };
}

/* ------------------------------------------------------------------ */
/*  Summaries                                                         */
/* ------------------------------------------------------------------ */

export interface SummaryOptions {
    label?: string;
    style?: SummaryStyle;
}

export function validateSummaryRange(
    document: MindmapDocument,
    parentNodeId: string,
    startIndex: number,
    endIndex: number,
): void {
    const parent = getEntry(indexTree(document.root), parentNodeId).node;
    const count = parent.children.length;
    if (
        !Number.isInteger(startIndex) ||
        !Number.isInteger(endIndex) ||
        startIndex < 0 ||
        endIndex >= count ||
        startIndex > endIndex
    ) {
        throw new InvalidRangeError(startIndex, endIndex, count);
    }
}

export function addSummary(
    document: MindmapDocument,
    parentNodeId: string,
    startIndex: number,
    endIndex: number,
    context: IdContext,
    options: SummaryOptions = {},
): { document: MindmapDocument; summaryId: string } {
    validateSummaryRange(document, parentNodeId, startIndex, endIndex);

    const summary: MindmapSummary = {
        id: context.generateId(),
        parentNodeId,
        startIndex,
        endIndex,
        label: options.label ?? 'Summary',
        ...(options.style !== undefined ? { style: options.style } : {}),
    };

    return {
        document: { ...document, summaries: [...document.summaries, summary] },
        summaryId: summary.id,
    };
}

export function findSummary(
    document: MindmapDocument,
    summaryId: string,
): MindmapSummary | undefined {
    return document.summaries.find((summary) => summary.id === summaryId);
}

export function removeSummary(document: MindmapDocument, summaryId: string): MindmapDocument {
    if (!findSummary(document, summaryId)) throw new SummaryNotFoundError(summaryId);
    return {
        ...document,
        summaries: document.summaries.filter((summary) => summary.id !== summaryId),
    };
}

export function updateSummary(
    document: MindmapDocument,
    summaryId: string,
    patch: SummaryOptions,
): MindmapDocument {
    const current = findSummary(document, summaryId);
    if (!current) throw new SummaryNotFoundError(summaryId);
    if (
        (patch.label === undefined || patch.label === current.label) &&
        (patch.style === undefined || patch.style === current.style)
    ) {
        return document;
    }
    const next: MindmapSummary = {
        ...current,
        ...(patch.label !== undefined ? { label: patch.label } : {}),
        ...(patch.style !== undefined ? { style: patch.style } : {}),
    };
    return {
        ...document,
        summaries: document.summaries.map((summary) => (summary.id === summaryId ? next : summary)),
    };
}

interface ChainLink {
    readonly parentId: string;
    readonly index: number;
}

/** (parent, child index) pairs on the path from the root down to `nodeId`. */
function parentChain(index: TreeIndex, nodeId: string): ChainLink[] {
    const chain: ChainLink[] = [];
    let entry = getEntry(index, nodeId);
    while (entry.parentId !== null) {
        chain.push({ parentId: entry.parentId, index: entry.index });
        entry = getEntry(index, entry.parentId);
    }
    return chain.reverse();
}

/**
 * Nearest common ancestor of the given nodes and the range of its
 * children whose branches contain them. Used to build a summary from a
 * selection that may span several tree levels.
 */
export function findCommonParentRange(
    document: MindmapDocument,
    nodeIds: readonly string[],
): { parentNodeId: string; startIndex: number; endIndex: number } {
    if (nodeIds.length === 0) throw new InvalidParentError('No nodes selected');

    const index = indexTree(document.root);
    const chains = nodeIds.map((nodeId) => parentChain(index, nodeId));
    if (chains.some((chain) => chain.length === 0)) {
        throw new InvalidParentError('The root node cannot be summarized');
    }

    const [first, ...rest] = chains;
    let depth = 1;
    while (
        depth < first.length &&
        rest.every((chain) => chain.length > depth && chain[depth].parentId === first[depth].parentId)
    ) {
        depth++;
    }

    const indices = chains.map((chain) => chain[depth - 1].index);
    return {
        parentNodeId: first[depth - 1].parentId,
        startIndex: Math.min(...indices),
        endIndex: Math.max(...indices),
    };
}

/* ------------------------------------------------------------------ */
/*  Reconciliation after structural edits                             */
/* ------------------------------------------------------------------ */

/** Re-fit summaries on `parentId` after its child at `index` was detached. */
function fitSummaryAfterDetach(
    summary: MindmapSummary,
    parentId: string,
    index: number,
): MindmapSummary | null {
    if (summary.parentNodeId !== parentId || index > summary.endIndex) return summary;
    if (index < summary.startIndex) {
        return { ...summary, startIndex: summary.startIndex - 1, endIndex: summary.endIndex - 1 };
    }
    if (summary.startIndex === summary.endIndex) return null;
    return { ...summary, endIndex: summary.endIndex - 1 };
}

/** Re-fit summaries on `parentId` after a child was inserted at `index`. */
function fitSummaryAfterInsert(
    summary: MindmapSummary,
    parentId: string,
    index: number,
): MindmapSummary {
    if (summary.parentNodeId !== parentId || index > summary.endIndex) return summary;
    if (index <= summary.startIndex) {
        return { ...summary, startIndex: summary.startIndex + 1, endIndex: summary.endIndex + 1 };
    }
    return { ...summary, endIndex: summary.endIndex + 1 };
}

/**
 * Drop annotations that reference removed nodes and re-fit summaries on
 * the parent that lost the child at `index`.
 */
export function reconcileAfterDetach(
    document: MindmapDocument,
    removedIds: ReadonlySet<string>,
    parentId: string,
    index: number,
): MindmapDocument {
    const arrows = document.arrows.filter(
        (arrow) => !removedIds.has(arrow.fromNodeId) && !removedIds.has(arrow.toNodeId),
    );
    const summaries: MindmapSummary[] = [];
    for (const summary of document.summaries) {
        if (removedIds.has(summary.parentNodeId)) continue;
        const fitted = fitSummaryAfterDetach(summary, parentId, index);
        if (fitted) summaries.push(fitted);
    }
    return { ...document, arrows, summaries };
}

export function reconcileAfterInsert(
    document: MindmapDocument,
    parentId: string,
    index: number,
): MindmapDocument {
    if (!document.summaries.some((summary) => summary.parentNodeId === parentId)) return document;
    return {
        ...document,
        summaries: document.summaries.map((summary) =>
            fitSummaryAfterInsert(summary, parentId, index),
        ),
    };
}
