import assert from 'node:assert/strict';
import test from 'node:test';
import { IDENTITY_TRANSFORM } from '../src/engine/geometry.ts';
import { calculateLayout } from '../src/engine/layout.ts';
import { createDragStore, resolveDropTarget } from '../src/store/dragStore.ts';
import { node, testMetrics } from './helpers.ts';

// Right-hand layout: root (0,0 100x40), a (150,-26 60x36) with c (240,-23 20x30), b (150,30 60x36).
const root = node('root', [node('a', [node('c')]), node('b')], { topic: 'Root' });
const layout = calculateLayout(root, testMetrics, 'right');

test('a pointer inside a node targets it', () => {
    assert.deepEqual(resolveDropTarget({ x: 180, y: 40 }, layout, root, 'c'), { nodeId: 'b', position: 'inside' });
});

test('just above or below a node means before or after', () => {
    assert.deepEqual(resolveDropTarget({ x: 180, y: 25 }, layout, root, 'c'), { nodeId: 'b', position: 'before' });
    assert.deepEqual(resolveDropTarget({ x: 180, y: 70 }, layout, root, 'c'), { nodeId: 'b', position: 'after' });
    assert.equal(resolveDropTarget({ x: 180, y: 80 }, layout, root, 'c'), null);
});

test('the nearest candidate wins between two nodes', () => {
    // 11 below a and 9 above b: b is closer.
    assert.deepEqual(resolveDropTarget({ x: 180, y: 21 }, layout, root, 'c'), { nodeId: 'b', position: 'before' });
    assert.deepEqual(resolveDropTarget({ x: 180, y: 19 }, layout, root, 'c'), { nodeId: 'a', position: 'after' });
});

test('the dragged node and its descendants are never targets', () => {
    assert.equal(resolveDropTarget({ x: 180, y: -10 }, layout, root, 'a'), null);
    assert.equal(resolveDropTarget({ x: 250, y: -10 }, layout, root, 'a'), null);
});

test('the root only accepts drops inside', () => {
    assert.deepEqual(resolveDropTarget({ x: 50, y: -5 }, layout, root, 'b'), { nodeId: 'root', position: 'inside' });
});

test('a focused subtree root only accepts drops inside', () => {
    const focused = calculateLayout(root.children[0], testMetrics, 'right');
    const a = focused.get('a');
    assert.ok(a);
    const above = { x: a.position.x + 1, y: a.position.y - 4 };
    assert.deepEqual(resolveDropTarget(above, focused, root, 'c'), { nodeId: 'a', position: 'inside' });
});

test('updateDrag publishes only when the pointer or target changes', () => {
    const store = createDragStore();
    store.getState().startDrag('c', { x: 0, y: 0 });
    let notifications = 0;
    store.subscribe(() => {
        notifications++;
    });

    store.getState().updateDrag({ x: 180, y: 40 }, layout, IDENTITY_TRANSFORM, root);
    assert.equal(store.getState().dropTargetId, 'b');
    assert.equal(store.getState().dropPosition, 'inside');
    store.getState().updateDrag({ x: 180, y: 40 }, layout, IDENTITY_TRANSFORM, root);
    assert.equal(notifications, 1);

    store.getState().updateDrag({ x: 181, y: 40 }, layout, IDENTITY_TRANSFORM, root);
    assert.equal(notifications, 2);
    assert.deepEqual(store.getState().pointer, { x: 181, y: 40 });
});

test('updateDrag maps the pointer through the view transform', () => {
    const store = createDragStore();
    store.getState().startDrag('c', { x: 0, y: 0 });
    // Screen (460, 180) at scale 2 is canvas (180, 40).
    store.getState().updateDrag({ x: 460, y: 180 }, layout, { scale: 2, x: 100, y: 100 }, root);
    assert.equal(store.getState().dropTargetId, 'b');
});

test('endDrag returns the target and resets; cancelDrag returns nothing', () => {
    const store = createDragStore();
    assert.equal(store.getState().endDrag(), null);

    store.getState().startDrag('c', { x: 0, y: 0 });
    store.getState().updateDrag({ x: 180, y: 40 }, layout, IDENTITY_TRANSFORM, root);
    assert.equal(store.getState().endDrag(), 'b');
    assert.equal(store.getState().draggedNodeId, null);
    assert.equal(store.getState().dropTargetId, null);

    store.getState().startDrag('c', { x: 0, y: 0 });
    store.getState().cancelDrag();
    assert.equal(store.getState().draggedNodeId, null);
});
