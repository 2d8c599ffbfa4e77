/**
 * Layout engine.
 *
 * Turns a tree (plus direction and collapse state) into absolute boxes
 * for every visible node. The root sits at the origin; root children go
 * left and/or right, and every deeper level inherits its branch side.
 *
 * Siblings are stacked by subtree height, so sibling subtrees never
 * overlap. Text measurement is injected through `ThemeMetrics`; the
 * engine itself only adds padding, icons and tag rows.
 *
 * Both passes walk an explicit stack, so deep trees cannot overflow the
 * call stack.
 */
import type {
    LayoutDirection,
    LayoutMap,
    MindmapArrow,
    MindmapNode,
    MindmapSummary,
    NodeGeometry,
    Rect,
    Size,
    Vector,
} from '../types/mindmap';
import { arrowCurve, nodeBounds, rectCenter, unionRects } from './geometry';

/* ------------------------------------------------------------------ */
/*  Metrics                                                           */
/* ------------------------------------------------------------------ */

export interface TextMeasureRequest {
    text: string;
    fontSize: number;
    fontWeight: 'normal' | 'bold';
    /** Wrap width; `Infinity` for a single unwrapped line. */
    maxWidth: number;
}

export interface TextMetrics {
    width: number;
    height: number;
    lastLineWidth: number;
    lastLineHeight: number;
}

export type MeasureText = (request: TextMeasureRequest) => TextMetrics;

export interface ThemeMetrics {
    /** Horizontal gap between the layout root and its children. */
    mainGapX: number;
    /** Vertical gap between root children subtrees. */
    mainGapY: number;
    nodeGapX: number;
    nodeGapY: number;
    /** Padding on each side of nodes below the first level. */
    topicPadding: number;
    measureText: MeasureText;
}

const AVG_CHAR_WIDTH_RATIO = 0.6;
const LINE_HEIGHT_RATIO = 1.2;

/** Rough monospace estimate; hosts with real font metrics inject their own. */
export function estimateTextMetrics(request: TextMeasureRequest): TextMetrics {
    const charWidth = request.fontSize * AVG_CHAR_WIDTH_RATIO;
    const lineHeight = request.fontSize * LINE_HEIGHT_RATIO;
    const perLine =
        Number.isFinite(request.maxWidth) && request.maxWidth > 0
            ? Math.max(1, Math.floor(request.maxWidth / charWidth))
            : Infinity;

    const lineWidths: number[] = [];
    for (const paragraph of request.text.split('\n')) {
        let remaining = paragraph.length;
        do {
            const chars = Math.min(remaining, perLine);
            lineWidths.push(chars * charWidth);
            remaining -= chars;
        } while (remaining > 0);
    }

    return {
        width: Math.max(...lineWidths),
        height: lineWidths.length * lineHeight,
        lastLineWidth: lineWidths[lineWidths.length - 1],
        lastLineHeight: lineHeight,
    };
}

export const DEFAULT_THEME_METRICS: ThemeMetrics = {
    mainGapX: 65,
    mainGapY: 45,
    nodeGapX: 30,
    nodeGapY: 10,
    topicPadding: 3,
    measureText: estimateTextMetrics,
};

/* ------------------------------------------------------------------ */
/*  Node sizing                                                       */
/* ------------------------------------------------------------------ */

/** Max box width in ems of the node's font size. */
const MAX_WIDTH_EM = 35;
const ICON_MARGIN = 5;
const TAG_FONT_SIZE = 12;
const TAG_PADDING_X = 8;
const TAG_MARGIN_RIGHT = 4;
const TAG_LINE_HEIGHT = TAG_FONT_SIZE * 1.3 + 4;
const TAG_MARGIN_TOP = 2;
/** Extra vertical spacing between siblings below the first level. */
const NESTED_PARENT_PADDING_Y = 12;

interface Padding {
    x: number;
    y: number;
}

function paddingForDepth(depth: number, metrics: ThemeMetrics): Padding {
    if (depth === 0) return { x: 30, y: 10 };
    if (depth === 1) return { x: 25, y: 8 };
    return { x: metrics.topicPadding, y: metrics.topicPadding };
}

export function measureNodeSize(node: MindmapNode, depth: number, metrics: ThemeMetrics): Size {
    const padding = paddingForDepth(depth, metrics);
    const fontSize = node.style?.fontSize ?? (depth === 0 ? 25 : depth === 1 ? 16 : 14);
    const fontWeight = node.style?.fontWeight ?? (depth === 0 ? 'bold' : 'normal');
    const maxBoxWidth = fontSize * MAX_WIDTH_EM;
    const maxContentWidth = Math.max(0, maxBoxWidth - padding.x * 2);

    const text = metrics.measureText({ text: node.topic, fontSize, fontWeight, maxWidth: maxContentWidth });

    let inlineWidth = text.width;
    let iconsWrapped = false;
    if (node.icons.length > 0) {
        const iconsWidth =
            ICON_MARGIN +
            metrics.measureText({ text: node.icons.join(''), fontSize, fontWeight, maxWidth: Infinity }).width;
        if (text.lastLineWidth + iconsWidth <= maxContentWidth) {
            inlineWidth = Math.max(text.width, text.lastLineWidth + iconsWidth);
        } else {
            inlineWidth = Math.max(text.width, Math.min(iconsWidth, maxContentWidth));
            iconsWrapped = true;
        }
    }

    // Tags flow as inline blocks that wrap at the content width.
    let tagsWidth = 0;
    let tagLines = 0;
    let lineWidth = 0;
    for (const tag of node.tags) {
        const measured = metrics.measureText({
            text: tag.text,
            fontSize: TAG_FONT_SIZE,
            fontWeight: 'normal',
            maxWidth: Infinity,
        });
        const tagWidth = measured.width + TAG_PADDING_X + TAG_MARGIN_RIGHT;
        if (lineWidth > 0 && lineWidth + tagWidth > maxContentWidth) {
            tagsWidth = Math.max(tagsWidth, lineWidth - TAG_MARGIN_RIGHT);
            lineWidth = 0;
            tagLines++;
        }
        lineWidth += tagWidth;
    }
    if (lineWidth > 0) {
        tagsWidth = Math.max(tagsWidth, lineWidth - TAG_MARGIN_RIGHT);
        tagLines++;
    }

    const contentWidth = Math.min(maxContentWidth, Math.max(inlineWidth, tagsWidth));
    let width = Math.min(contentWidth + padding.x * 2, maxBoxWidth);
    if (node.style?.width !== undefined) {
        width = Math.min(node.style.width, maxBoxWidth);
    }

    const contentHeight =
        text.height +
        (iconsWrapped ? text.lastLineHeight : 0) +
        tagLines * (TAG_LINE_HEIGHT + TAG_MARGIN_TOP);

    return { width, height: contentHeight + padding.y * 2 };
}

/* ------------------------------------------------------------------ */
/*  Layout computation                                                */
/* ------------------------------------------------------------------ */

interface VisibleNode {
    node: MindmapNode;
    depth: number;
    size: Size;
}

function gapsFor(parentDepth: number, metrics: ThemeMetrics): { x: number; y: number } {
    return parentDepth === 0
        ? { x: metrics.mainGapX, y: metrics.mainGapY }
        : { x: metrics.nodeGapX * 2, y: metrics.nodeGapY + NESTED_PARENT_PADDING_Y };
}

function visibleChildren(node: MindmapNode): readonly MindmapNode[] {
    return node.expanded ? node.children : [];
}

/** Split the layout root's children between the two sides. */
function distributeRootChildren(
    children: readonly MindmapNode[],
    direction: LayoutDirection,
): { left: MindmapNode[]; right: MindmapNode[] } {
    if (direction === 'left') return { left: [...children], right: [] };
    if (direction === 'right') return { left: [], right: [...children] };

    const left: MindmapNode[] = [];
    const right: MindmapNode[] = [];
    for (const child of children) {
        if (child.direction === 'left') {
            left.push(child);
        } else if (child.direction === 'right') {
            right.push(child);
        } else if (right.length <= left.length) {
            right.push(child);
        } else {
            left.push(child);
        }
    }
    return { left, right };
}

/**
 * Compute geometry for every visible node under `root`.
 *
 * Algorithm:
 * 1. Measure visible nodes in pre-order.
 * 2. Walk that order backwards to get subtree heights
 *    (max of the node's own height and its stacked children).
 * 3. Place children beside their parent, each centred in its subtree
 *    band, with the band stack centred on the parent.
 *
 * Collapsed nodes keep their own box but hide all descendants.
 * Pass the focused node as `root` for a focus-mode layout.
 */
export function calculateLayout(
    root: MindmapNode,
    metrics: ThemeMetrics,
    direction: LayoutDirection,
): LayoutMap {
    const visible = new Map<string, VisibleNode>();
    const order: VisibleNode[] = [];
    const stack: Array<{ node: MindmapNode; depth: number }> = [{ node: root, depth: 0 }];

    while (stack.length > 0) {
        const item = stack.pop();
        if (!item) break;
        const entry: VisibleNode = { ...item, size: measureNodeSize(item.node, item.depth, metrics) };
        visible.set(item.node.id, entry);
        order.push(entry);
        const children = visibleChildren(item.node);
        for (let i = children.length - 1; i >= 0; i--) {
            stack.push({ node: children[i], depth: item.depth + 1 });
        }
    }

    const subtreeHeights = new Map<string, number>();
    for (let i = order.length - 1; i >= 0; i--) {
        const { node, depth, size } = order[i];
        const children = visibleChildren(node);
        let height = size.height;
        if (children.length > 0) {
            let total = gapsFor(depth, metrics).y * (children.length - 1);
            for (const child of children) total += subtreeHeights.get(child.id) ?? 0;
            height = Math.max(height, total);
        }
        subtreeHeights.set(node.id, height);
    }

    const layout = new Map<string, NodeGeometry>();
    const rootGeometry: NodeGeometry = {
        position: { x: 0, y: 0 },
        size: visible.get(root.id)?.size ?? measureNodeSize(root, 0, metrics),
        depth: 0,
        side: 'root',
    };
    layout.set(root.id, rootGeometry);

    const pending: Array<{ node: MindmapNode; geometry: NodeGeometry }> = [
        { node: root, geometry: rootGeometry },
    ];

    while (pending.length > 0) {
        const item = pending.pop();
        if (!item) break;
        const { node, geometry: parent } = item;
        const children = visibleChildren(node);
        if (children.length === 0) continue;

        const groups: Array<{ side: 'left' | 'right'; members: MindmapNode[] }> = [];
        if (parent.side === 'root') {
            const { left, right } = distributeRootChildren(children, direction);
            groups.push({ side: 'left', members: left }, { side: 'right', members: right });
        } else {
            groups.push({ side: parent.side, members: [...children] });
        }

        const gap = gapsFor(parent.depth, metrics);
        const placed: Array<{ node: MindmapNode; geometry: NodeGeometry }> = [];

        for (const { side, members } of groups) {
            if (members.length === 0) continue;

            let totalHeight = gap.y * (members.length - 1);
            for (const member of members) totalHeight += subtreeHeights.get(member.id) ?? 0;

            let currentY = parent.position.y + parent.size.height / 2 - totalHeight / 2;
            for (const member of members) {
                const info = visible.get(member.id);
                if (!info) continue;
                const bandHeight = subtreeHeights.get(member.id) ?? info.size.height;
                const x =
                    side === 'left'
                        ? parent.position.x - gap.x - info.size.width
                        : parent.position.x + parent.size.width + gap.x;
                const geometry: NodeGeometry = {
                    position: { x, y: currentY + (bandHeight - info.size.height) / 2 },
                    size: info.size,
                    depth: info.depth,
                    side,
                };
                layout.set(member.id, geometry);
                placed.push({ node: member, geometry });
                currentY += bandHeight + gap.y;
            }
        }

        for (let i = placed.length - 1; i >= 0; i--) pending.push(placed[i]);
    }

    return layout;
}

/** Bounding box of everything laid out. */
export function layoutBounds(layout: LayoutMap): Rect | null {
    return unionRects([...layout.values()].map(nodeBounds));
}

/* ------------------------------------------------------------------ */
/*  Auxiliary geometry                                                */
/* ------------------------------------------------------------------ */

export const EXPAND_INDICATOR_SIZE = 18;
export const EXPAND_INDICATOR_GAP = 8;
export const HYPERLINK_INDICATOR_SIZE = 14;
const HYPERLINK_INDICATOR_INSET = 18;
export const CONTROL_POINT_HANDLE_SIZE = 12;

/**
 * Expand/collapse toggle just outside the trailing edge, vertically
 * centred. Only nodes with children get one; the layout root never does.
 */
export function expandIndicatorBounds(node: MindmapNode, geometry: NodeGeometry): Rect | null {
    if (node.children.length === 0 || geometry.side === 'root') return null;

    const half = EXPAND_INDICATOR_SIZE / 2;
    const centerY = geometry.position.y + geometry.size.height / 2;
    const centerX =
        geometry.side === 'left'
            ? geometry.position.x - EXPAND_INDICATOR_GAP - half
            : geometry.position.x + geometry.size.width + EXPAND_INDICATOR_GAP + half;
    return {
        x: centerX - half,
        y: centerY - half,
        width: EXPAND_INDICATOR_SIZE,
        height: EXPAND_INDICATOR_SIZE,
    };
}

export function hyperlinkIndicatorBounds(node: MindmapNode, geometry: NodeGeometry): Rect | null {
    if (!node.hyperlink) return null;
    return {
        x: geometry.position.x + geometry.size.width - HYPERLINK_INDICATOR_INSET,
        y: geometry.position.y + geometry.size.height - HYPERLINK_INDICATOR_INSET,
        width: HYPERLINK_INDICATOR_SIZE,
        height: HYPERLINK_INDICATOR_SIZE,
    };
}

/** Both control points in canvas space, or null unless both endpoints are laid out. */
export function arrowControlPoints(arrow: MindmapArrow, layout: LayoutMap): [Vector, Vector] | null {
    const from = layout.get(arrow.fromNodeId);
    const to = layout.get(arrow.toNodeId);
    if (!from || !to) return null;
    const curve = arrowCurve(arrow, nodeBounds(from), nodeBounds(to));
    return [curve.control1, curve.control2];
}

export function arrowControlPointBounds(arrow: MindmapArrow, layout: LayoutMap): [Rect, Rect] | null {
    const points = arrowControlPoints(arrow, layout);
    if (!points) return null;
    const half = CONTROL_POINT_HANDLE_SIZE / 2;
    const toHandle = (point: Vector): Rect => ({
        x: point.x - half,
        y: point.y - half,
        width: CONTROL_POINT_HANDLE_SIZE,
        height: CONTROL_POINT_HANDLE_SIZE,
    });
    return [toHandle(points[0]), toHandle(points[1])];
}

const SUMMARY_BRACKET_PADDING = 10;
const SUMMARY_BRACKET_WIDTH = 10;

export interface SummaryBracket {
    /** Union of the visible subtrees the summary covers. */
    readonly covered: Rect;
    /** Bracket area beside `covered`, on the side facing away from the parent. */
    readonly bracket: Rect;
    readonly side: 'left' | 'right';
}

function visibleSubtreeRects(node: MindmapNode, layout: LayoutMap): Rect[] | null {
    const own = layout.get(node.id);
    if (!own) return null;
    const rects: Rect[] = [];
    const stack: MindmapNode[] = [node];
    while (stack.length > 0) {
        const current = stack.pop();
        if (!current) break;
        const geometry = layout.get(current.id);
        if (!geometry) continue;
        rects.push(nodeBounds(geometry));
        stack.push(...visibleChildren(current));
    }
    return rects;
}

/**
 * Bracket geometry for a summary. Null when its parent is not laid out,
 * the range does not fit the parent's children, or a covered child is hidden.
 */
export function summaryBracketBounds(
    summary: MindmapSummary,
    parent: MindmapNode,
    layout: LayoutMap,
): SummaryBracket | null {
    const parentGeometry = layout.get(parent.id);
    if (!parentGeometry) return null;
    if (
        summary.startIndex < 0 ||
        summary.endIndex >= parent.children.length ||
        summary.startIndex > summary.endIndex
    ) {
        return null;
    }

    const rects: Rect[] = [];
    for (let i = summary.startIndex; i <= summary.endIndex; i++) {
        const childRects = visibleSubtreeRects(parent.children[i], layout);
        if (!childRects) return null;
        rects.push(...childRects);
    }
    const covered = unionRects(rects);
    if (!covered) return null;

    const side: 'left' | 'right' =
        rectCenter(covered).x > rectCenter(nodeBounds(parentGeometry)).x ? 'right' : 'left';
    const bracket: Rect = {
        x:
            side === 'right'
                ? covered.x + covered.width + SUMMARY_BRACKET_PADDING
                : covered.x - SUMMARY_BRACKET_PADDING - SUMMARY_BRACKET_WIDTH,
        y: covered.y,
        width: SUMMARY_BRACKET_WIDTH,
        height: covered.height,
    };
    return { covered, bracket, side };
}
