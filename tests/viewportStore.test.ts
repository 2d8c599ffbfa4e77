import assert from 'node:assert/strict';
import test from 'node:test';
import { createViewportStore } from '../src/store/viewportStore.ts';

const bounds = { minScale: 0.5, maxScale: 4 };

test('pan moves the translation', () => {
    const store = createViewportStore(bounds);
    store.getState().pan({ x: 10, y: -5 });
    assert.deepEqual(store.getState().transform, { scale: 1, x: 10, y: -5 });
});

test('zoom keeps the focal point fixed on screen', () => {
    const store = createViewportStore(bounds);
    store.getState().setZoom(2, { x: 100, y: 50 });
    // Canvas (100, 50) stays under screen (100, 50): 100 - 100 * 2 = -100.
    assert.deepEqual(store.getState().transform, { scale: 2, x: -100, y: -50 });
});

test('zoom is clamped to the configured bounds', () => {
    const store = createViewportStore(bounds);
    store.getState().setZoom(10);
    assert.equal(store.getState().transform.scale, 4);
    store.getState().zoomBy(0.01);
    assert.equal(store.getState().transform.scale, 0.5);
});

test('wheel scrolling up zooms in around the pointer', () => {
    const store = createViewportStore(bounds);
    store.getState().zoomByWheel(-250, { x: 0, y: 0 });
    assert.deepEqual(store.getState().transform, { scale: 1.5, x: 0, y: 0 });
});

test('centerOn puts a canvas point in the middle of the viewport', () => {
    const store = createViewportStore(bounds);
    store.getState().setZoom(2);
    store.getState().centerOn({ x: 50, y: 25 }, { width: 800, height: 600 });
    assert.deepEqual(store.getState().transform, { scale: 2, x: 300, y: 250 });
});

test('fitToBounds scales content into the padded viewport', () => {
    const store = createViewportStore(bounds);
    store.getState().fitToBounds({ x: 0, y: 0, width: 360, height: 100 }, { width: 800, height: 600 });
    // Available 720 x 520: scale = min(2, 5.2) = 2; centre (180, 50).
    assert.deepEqual(store.getState().transform, { scale: 2, x: 40, y: 200 });
});

test('no-op updates publish nothing', () => {
    const store = createViewportStore(bounds);
    let notifications = 0;
    store.subscribe(() => {
        notifications++;
    });
    store.getState().pan({ x: 0, y: 0 });
    store.getState().setZoom(1);
    store.getState().reset();
    assert.equal(notifications, 0);

    store.getState().pan({ x: 1, y: 0 });
    store.getState().reset();
    assert.equal(notifications, 2);
});
