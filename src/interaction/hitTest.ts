/**
 * Pointer hit-testing against computed layout.
 *
 * Precedence for one tap: selected-arrow control point, hyperlink
 * indicator, expand indicator, node body, summary bracket, arrow curve,
 * then empty space (where rectangular selection starts). A node body
 * always wins over an arrow curve passing behind it.
 */
import { arrowCurve, distanceToCurve, nodeBounds, rectContains, rectsOverlap, toCanvasPoint, type ViewTransform } from '../engine/geometry';
import {
    arrowControlPointBounds,
    expandIndicatorBounds,
    hyperlinkIndicatorBounds,
    summaryBracketBounds,
} from '../engine/layout';
import { indexTree } from '../engine/treeIndex';
import type { LayoutMap, MindmapDocument, Rect, Vector } from '../types/mindmap';

export type HitResult =
    | { kind: 'controlPoint'; arrowId: string; index: 0 | 1 }
    | { kind: 'hyperlink'; nodeId: string; url: string }
    | { kind: 'expandIndicator'; nodeId: string }
    | { kind: 'node'; nodeId: string }
    | { kind: 'summary'; summaryId: string }
    | { kind: 'arrow'; arrowId: string }
    | { kind: 'empty'; point: Vector };

export interface HitTestContext {
    document: MindmapDocument;
    layout: LayoutMap;
    transform: ViewTransform;
    /** Control points are only grabbable on the selected arrow. */
    selectedArrowId?: string | null;
}

const DEFAULT_ARROW_STROKE = 2;

/** Arrow hit tolerance in screen pixels, grown with the stroke width. */
function arrowScreenTolerance(strokeWidth: number): number {
    return Math.min(20, Math.max(10, strokeWidth * 1.8 + 8));
}

export function hitTest(screenPoint: Vector, context: HitTestContext): HitResult {
    const { document, layout, transform } = context;
    const point = toCanvasPoint(screenPoint, transform);
    const tree = indexTree(document.root);

    if (context.selectedArrowId) {
        const arrow = document.arrows.find((candidate) => candidate.id === context.selectedArrowId);
        const handles = arrow ? arrowControlPointBounds(arrow, layout) : null;
        if (arrow && handles) {
            if (rectContains(handles[0], point)) return { kind: 'controlPoint', arrowId: arrow.id, index: 0 };
            if (rectContains(handles[1], point)) return { kind: 'controlPoint', arrowId: arrow.id, index: 1 };
        }
    }

    // Later entries paint on top, so walk the layout backwards.
    const laidOut = [...layout].reverse();

    for (const [nodeId, geometry] of laidOut) {
        const node = tree.entries.get(nodeId)?.node;
        if (!node?.hyperlink) continue;
        const bounds = hyperlinkIndicatorBounds(node, geometry);
        if (bounds && rectContains(bounds, point)) return { kind: 'hyperlink', nodeId, url: node.hyperlink };
    }

    for (const [nodeId, geometry] of laidOut) {
        const node = tree.entries.get(nodeId)?.node;
        if (!node) continue;
        const bounds = expandIndicatorBounds(node, geometry);
        if (bounds && rectContains(bounds, point)) return { kind: 'expandIndicator', nodeId };
    }

    for (const [nodeId, geometry] of laidOut) {
        if (rectContains(nodeBounds(geometry), point)) return { kind: 'node', nodeId };
    }

    for (const summary of document.summaries) {
        const parent = tree.entries.get(summary.parentNodeId)?.node;
        const bracket = parent ? summaryBracketBounds(summary, parent, layout) : null;
        if (bracket && rectContains(bracket.bracket, point)) return { kind: 'summary', summaryId: summary.id };
    }

    let nearestArrow: string | null = null;
    let nearestDistance = Infinity;
    for (const arrow of document.arrows) {
        const from = layout.get(arrow.fromNodeId);
        const to = layout.get(arrow.toNodeId);
        if (!from || !to) continue;
        const tolerance = arrowScreenTolerance(arrow.style?.width ?? DEFAULT_ARROW_STROKE) / transform.scale;
        const distance = distanceToCurve(arrowCurve(arrow, nodeBounds(from), nodeBounds(to)), point);
        if (distance <= tolerance && distance < nearestDistance) {
            nearestDistance = distance;
            nearestArrow = arrow.id;
        }
    }
    if (nearestArrow !== null) return { kind: 'arrow', arrowId: nearestArrow };

    return { kind: 'empty', point };
}

/** Ids of laid-out nodes overlapping a canvas-space rectangle, in layout order. */
export function nodesInRect(layout: LayoutMap, rect: Rect): string[] {
    const result: string[] = [];
    for (const [nodeId, geometry] of layout) {
        if (rectsOverlap(nodeBounds(geometry), rect)) result.push(nodeId);
    }
    return result;
}
