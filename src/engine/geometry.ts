/**
 * Plane geometry shared by layout, hit-testing and the viewport:
 * rectangles, the screen ↔ canvas transform, and cubic Bézier arrows.
 */
import type { MindmapArrow, NodeGeometry, Rect, Vector } from '../types/mindmap';

/* ------------------------------------------------------------------ */
/*  Rectangles                                                        */
/* ------------------------------------------------------------------ */

export function nodeBounds(geometry: NodeGeometry): Rect {
    return {
        x: geometry.position.x,
        y: geometry.position.y,
        width: geometry.size.width,
        height: geometry.size.height,
    };
}

export function rectCenter(rect: Rect): Vector {
    return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

export function rectContains(rect: Rect, point: Vector): boolean {
    return (
        point.x >= rect.x &&
        point.x <= rect.x + rect.width &&
        point.y >= rect.y &&
        point.y <= rect.y + rect.height
    );
}

export function rectsOverlap(a: Rect, b: Rect): boolean {
    return (
        a.x <= b.x + b.width &&
        b.x <= a.x + a.width &&
        a.y <= b.y + b.height &&
        b.y <= a.y + a.height
    );
}

export function unionRects(rects: readonly Rect[]): Rect | null {
    if (rects.length === 0) return null;
    let left = Infinity;
    let top = Infinity;
    let right = -Infinity;
    let bottom = -Infinity;
    for (const rect of rects) {
        left = Math.min(left, rect.x);
        top = Math.min(top, rect.y);
        right = Math.max(right, rect.x + rect.width);
        bottom = Math.max(bottom, rect.y + rect.height);
    }
    return { x: left, y: top, width: right - left, height: bottom - top };
}

/** Normalised rectangle spanned by two corner points, in any order. */
export function rectFromPoints(a: Vector, b: Vector): Rect {
    return {
        x: Math.min(a.x, b.x),
        y: Math.min(a.y, b.y),
        width: Math.abs(a.x - b.x),
        height: Math.abs(a.y - b.y),
    };
}

export function distance(a: Vector, b: Vector): number {
    return Math.hypot(a.x - b.x, a.y - b.y);
}

/* ------------------------------------------------------------------ */
/*  View transform                                                    */
/* ------------------------------------------------------------------ */

/** screen = canvas * scale + (x, y) */
export interface ViewTransform {
    readonly scale: number;
    readonly x: number;
    readonly y: number;
}

export const IDENTITY_TRANSFORM: ViewTransform = { scale: 1, x: 0, y: 0 };

export function toCanvasPoint(screen: Vector, transform: ViewTransform): Vector {
    return {
        x: (screen.x - transform.x) / transform.scale,
        y: (screen.y - transform.y) / transform.scale,
    };
}

export function toScreenPoint(canvas: Vector, transform: ViewTransform): Vector {
    return {
        x: canvas.x * transform.scale + transform.x,
        y: canvas.y * transform.scale + transform.y,
    };
}

export function toCanvasRect(screen: Rect, transform: ViewTransform): Rect {
    const topLeft = toCanvasPoint(screen, transform);
    return {
        x: topLeft.x,
        y: topLeft.y,
        width: screen.width / transform.scale,
        height: screen.height / transform.scale,
    };
}

/* ------------------------------------------------------------------ */
/*  Arrows                                                            */
/* ------------------------------------------------------------------ */

export interface ArrowCurve {
    readonly start: Vector;
    readonly control1: Vector;
    readonly control2: Vector;
    readonly end: Vector;
}

export function bezierPoint(curve: ArrowCurve, t: number): Vector {
    const u = 1 - t;
    const a = u * u * u;
    const b = 3 * u * u * t;
    const c = 3 * u * t * t;
    const d = t * t * t;
    return {
        x: a * curve.start.x + b * curve.control1.x + c * curve.control2.x + d * curve.end.x,
        y: a * curve.start.y + b * curve.control1.y + c * curve.control2.y + d * curve.end.y,
    };
}

/** Smallest sampled distance from `point` to the curve. */
export function distanceToCurve(curve: ArrowCurve, point: Vector): number {
    const polyline =
        distance(curve.start, curve.control1) +
        distance(curve.control1, curve.control2) +
        distance(curve.control2, curve.end);
    const samples = Math.min(180, Math.max(32, Math.round(polyline / 10)));

    let best = Infinity;
    for (let i = 0; i <= samples; i++) {
        best = Math.min(best, distance(bezierPoint(curve, i / samples), point));
    }
    return best;
}

/**
 * Offsets for a fresh arrow between two laid-out nodes. Close nodes get a
 * C-shaped curve; otherwise the handles leave from the facing edges.
 */
export function defaultArrowOffsets(from: Rect, to: Rect): [Vector, Vector] {
    const fromCenter = rectCenter(from);
    const toCenter = rectCenter(to);
    const dx = toCenter.x - fromCenter.x;
    const dy = toCenter.y - fromCenter.y;
    const length = Math.hypot(dx, dy);
    const baseOffset = Math.max(50, Math.min(200, length * 0.3));
    const absDx = Math.abs(dx);
    const absDy = Math.abs(dy);

    if (length < 150) {
        const xMul = dx >= 0 ? 1 : -1;
        return [
            { x: 200 * xMul, y: 0 },
            { x: 200 * xMul, y: 0 },
        ];
    }

    if (absDx > absDy * 1.5) {
        const sign = dx > 0 ? 1 : -1;
        return [
            { x: sign * (from.width / 2 + baseOffset), y: 0 },
            { x: -sign * (to.width / 2 + baseOffset), y: 0 },
        ];
    }

    if (absDy > absDx * 1.5) {
        const sign = dy > 0 ? 1 : -1;
        return [
            { x: 0, y: sign * (from.height / 2 + baseOffset) },
            { x: 0, y: -sign * (to.height / 2 + baseOffset) },
        ];
    }

    const angle = Math.atan2(dy, dx);
    const offsetX = baseOffset * 0.7 * (dx > 0 ? 1 : -1);
    const offsetY = baseOffset * 0.7 * (dy > 0 ? 1 : -1);
    return [
        {
            x: (from.width / 2) * Math.cos(angle) + offsetX,
            y: (from.height / 2) * Math.sin(angle) + offsetY,
        },
        {
            x: -(to.width / 2) * Math.cos(angle) - offsetX,
            y: -(to.height / 2) * Math.sin(angle) - offsetY,
        },
    ];
}

function isZero(vector: Vector): boolean {
    return vector.x === 0 && vector.y === 0;
}

/** Stored offsets, or computed defaults when both are still zero. */
export function resolveArrowOffsets(arrow: MindmapArrow, from: Rect, to: Rect): [Vector, Vector] {
    if (isZero(arrow.controlPointOffset1) && isZero(arrow.controlPointOffset2)) {
        return defaultArrowOffsets(from, to);
    }
    return [arrow.controlPointOffset1, arrow.controlPointOffset2];
}

export function arrowCurve(arrow: MindmapArrow, from: Rect, to: Rect): ArrowCurve {
    const [offset1, offset2] = resolveArrowOffsets(arrow, from, to);
    const start = rectCenter(from);
    const end = rectCenter(to);
    return {
        start,
        control1: { x: start.x + offset1.x, y: start.y + offset1.y },
        control2: { x: end.x + offset2.x, y: end.y + offset2.y },
        end,
    };
}
