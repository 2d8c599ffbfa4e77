/**
 * Zoom/pan state. `transform` maps canvas to screen:
 * screen = canvas * scale + (x, y). Scale stays within the configured bounds.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import { IDENTITY_TRANSFORM, rectCenter, toCanvasPoint, type ViewTransform } from '../engine/geometry';
import type { Rect, Size, Vector } from '../types/mindmap';

/** Wheel delta (px) that changes the scale by 100%. */
const WHEEL_ZOOM_DIVISOR = 500;
const FIT_PADDING = 40;

export interface ViewportState {
    transform: ViewTransform;
}

export interface ViewportActions {
    pan: (delta: Vector) => void;
    /** Set the scale; with a focal point, that screen point stays put. */
    setZoom: (scale: number, focal?: Vector) => void;
    /** Multiply the scale by `factor` around `focal`. */
    zoomBy: (factor: number, focal?: Vector) => void;
    /** Mouse wheel: scrolling up (negative delta) zooms in. */
    zoomByWheel: (deltaY: number, pointer: Vector) => void;
    /** Put a canvas point at the middle of the viewport, keeping the scale. */
    centerOn: (point: Vector, viewport: Size) => void;
    /** Scale and pan so `bounds` fits the viewport with some padding. */
    fitToBounds: (bounds: Rect, viewport: Size) => void;
    reset: () => void;
}

export type ViewportStore = StoreApi<ViewportState & ViewportActions>;

export interface ViewportBounds {
    minScale: number;
    maxScale: number;
}

export function createViewportStore(bounds: ViewportBounds): ViewportStore {
    const clampScale = (scale: number): number =>
        Math.min(bounds.maxScale, Math.max(bounds.minScale, scale));

    return createStore<ViewportState & ViewportActions>((set, get) => {
        const update = (transform: ViewTransform): void => {
            const current = get().transform;
            if (current.scale === transform.scale && current.x === transform.x && current.y === transform.y) {
                return;
            }
            set({ transform });
        };

        const zoomAt = (targetScale: number, focal: Vector | undefined): void => {
            const current = get().transform;
            const scale = clampScale(targetScale);
            if (scale === current.scale) return;
            if (!focal) {
                update({ ...current, scale });
                return;
            }
            const anchor = toCanvasPoint(focal, current);
            update({ scale, x: focal.x - anchor.x * scale, y: focal.y - anchor.y * scale });
        };

        return {
            transform: IDENTITY_TRANSFORM,

            pan(delta) {
                if (delta.x === 0 && delta.y === 0) return;
                const current = get().transform;
                update({ ...current, x: current.x + delta.x, y: current.y + delta.y });
            },

            setZoom(scale, focal) {
                zoomAt(scale, focal);
            },

            zoomBy(factor, focal) {
                zoomAt(get().transform.scale * factor, focal);
            },

            zoomByWheel(deltaY, pointer) {
                const zoomDelta = -deltaY / WHEEL_ZOOM_DIVISOR;
                zoomAt(get().transform.scale * (1 + zoomDelta), pointer);
            },

            centerOn(point, viewport) {
                const { scale } = get().transform;
                update({
                    scale,
                    x: viewport.width / 2 - point.x * scale,
                    y: viewport.height / 2 - point.y * scale,
                });
            },

            fitToBounds(rect, viewport) {
                const availableWidth = Math.max(1, viewport.width - FIT_PADDING * 2);
                const availableHeight = Math.max(1, viewport.height - FIT_PADDING * 2);
                const scale = clampScale(
                    Math.min(
                        rect.width > 0 ? availableWidth / rect.width : bounds.maxScale,
                        rect.height > 0 ? availableHeight / rect.height : bounds.maxScale,
                    ),
                );
                const center = rectCenter(rect);
                update({
                    scale,
                    x: viewport.width / 2 - center.x * scale,
                    y: viewport.height / 2 - center.y * scale,
                });
            },

            reset() {
                update(IDENTITY_TRANSFORM);
            },
        };
    });
}
