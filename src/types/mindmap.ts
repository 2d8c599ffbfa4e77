/**
 * Core semantic types for the mind map document model.
 *
 * Design: the document is an immutable snapshot. Every edit produces a
 * new snapshot that shares untouched subtrees with the previous one.
 * Presentation payload (style, tags, icons, hyperlink, branch colour)
 * travels with the nodes but is never interpreted by the core.
 */

/** How root children are distributed around the root. */
export type LayoutDirection = 'side' | 'left' | 'right';

/** Per-node side hint used by two-sided layouts. */
export type BranchSide = 'left' | 'right';

export interface Vector {
    readonly x: number;
    readonly y: number;
}

export interface Size {
    readonly width: number;
    readonly height: number;
}

/** Opaque visual overrides. Only `width` and `fontSize` feed into sizing. */
export interface NodeStyle {
    readonly width?: number;
    readonly fontSize?: number;
    readonly fontWeight?: 'normal' | 'bold';
    readonly color?: string;
    readonly background?: string;
}

export interface NodeTag {
    readonly text: string;
    readonly color?: string;
}

/** A single node in the mind map tree. Children are owned exclusively. */
export interface MindmapNode {
    readonly id: string;
    readonly topic: string;
    readonly children: readonly MindmapNode[];
    readonly expanded: boolean;
    readonly direction?: BranchSide;
    readonly style?: NodeStyle;
    readonly tags: readonly NodeTag[];
    readonly icons: readonly string[];
    readonly hyperlink?: string;
    readonly branchColor?: string;
    readonly note?: string;
}

export interface ArrowStyle {
    readonly color?: string;
    readonly width?: number;
    readonly dashed?: boolean;
}

/**
 * Cross-tree connector. Control point offsets are relative to the
 * centre of the endpoint node they belong to.
 */
export interface MindmapArrow {
    readonly id: string;
    readonly fromNodeId: string;
    readonly toNodeId: string;
    readonly label?: string;
    readonly bidirectional: boolean;
    readonly controlPointOffset1: Vector;
    readonly controlPointOffset2: Vector;
    readonly style?: ArrowStyle;
}

export interface SummaryStyle {
    readonly color?: string;
}

/** Labeled bracket over `children[startIndex..endIndex]` (inclusive) of one parent. */
export interface MindmapSummary {
    readonly id: string;
    readonly parentNodeId: string;
    readonly startIndex: number;
    readonly endIndex: number;
    readonly label: string;
    readonly style?: SummaryStyle;
}

/** The document at one instant. Unit of history checkpoints. */
export interface MindmapDocument {
    readonly root: MindmapNode;
    readonly arrows: readonly MindmapArrow[];
    readonly summaries: readonly MindmapSummary[];
    readonly direction: LayoutDirection;
    readonly theme: string;
}

/** What the user is looking at. Checkpointed alongside the document. */
export interface SelectionState {
    /** Insertion order is significant: the last entry is the most recent. */
    readonly selectedNodeIds: readonly string[];
    readonly selectedArrowId: string | null;
    readonly selectedSummaryId: string | null;
    /** Root of the focused subtree, if focus mode is active. */
    readonly focusedNodeId: string | null;
}

/** Which side of its parent a laid-out node sits on. */
export type LayoutSide = 'root' | 'left' | 'right';

/** Derived geometry for one visible node. Never persisted. */
export interface NodeGeometry {
    readonly position: Vector;
    readonly size: Size;
    readonly depth: number;
    readonly side: LayoutSide;
}

export type LayoutMap = ReadonlyMap<string, NodeGeometry>;

export interface Rect {
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
}
