import assert from 'node:assert/strict';
import test from 'node:test';
import { IDENTITY_TRANSFORM } from '../src/engine/geometry.ts';
import { calculateLayout } from '../src/engine/layout.ts';
import { hitTest, nodesInRect } from '../src/interaction/hitTest.ts';
import type { MindmapArrow } from '../src/types/mindmap.ts';
import { doc, node, testMetrics } from './helpers.ts';

// Straight arrow from the root centre (50, 20) to c's centre (250, -8).
const arrow: MindmapArrow = {
    id: 'x',
    fromNodeId: 'root',
    toNodeId: 'c',
    bidirectional: false,
    controlPointOffset1: { x: 50, y: -7 },
    controlPointOffset2: { x: -50, y: 7 },
};

const document = doc(
    node('root', [node('a', [node('c')]), node('b', [], { hyperlink: 'https://example.test' })], { topic: 'Root' }),
    {
        arrows: [arrow],
        summaries: [{ id: 's', parentNodeId: 'a', startIndex: 0, endIndex: 0, label: 'Summary' }],
    },
);
// root (0,0 100x40), a (150,-26 60x36), b (150,30 60x36), c (240,-23 20x30)
const layout = calculateLayout(document.root, testMetrics, 'right');
const context = { document, layout, transform: IDENTITY_TRANSFORM };

test('a tap on a node body hits the node', () => {
    assert.deepEqual(hitTest({ x: 170, y: -10 }, context), { kind: 'node', nodeId: 'a' });
});

test('taps go through the view transform', () => {
    assert.deepEqual(hitTest({ x: 340, y: -20 }, { ...context, transform: { scale: 2, x: 0, y: 0 } }), {
        kind: 'node',
        nodeId: 'a',
    });
});

test('the hyperlink indicator wins over its node', () => {
    assert.deepEqual(hitTest({ x: 195, y: 50 }, context), {
        kind: 'hyperlink',
        nodeId: 'b',
        url: 'https://example.test',
    });
});

test('the expand indicator is hit beside its node', () => {
    assert.deepEqual(hitTest({ x: 227, y: -8 }, context), { kind: 'expandIndicator', nodeId: 'a' });
});

test('the summary bracket is hit beside the covered nodes', () => {
    assert.deepEqual(hitTest({ x: 275, y: 0 }, context), { kind: 'summary', summaryId: 's' });
});

test('an arrow is hit near its curve but a node body wins', () => {
    assert.deepEqual(hitTest({ x: 125, y: 12 }, context), { kind: 'arrow', arrowId: 'x' });
    assert.deepEqual(hitTest({ x: 60, y: 19 }, context), { kind: 'node', nodeId: 'root' });
});

test('control points are grabbable only on the selected arrow', () => {
    assert.deepEqual(hitTest({ x: 100, y: 13 }, context), { kind: 'node', nodeId: 'root' });
    assert.deepEqual(hitTest({ x: 100, y: 13 }, { ...context, selectedArrowId: 'x' }), {
        kind: 'controlPoint',
        arrowId: 'x',
        index: 0,
    });
});

test('empty space reports the canvas point', () => {
    assert.deepEqual(hitTest({ x: 125, y: 100 }, context), { kind: 'empty', point: { x: 125, y: 100 } });
});

test('nodesInRect lists overlapping nodes in layout order', () => {
    assert.deepEqual(nodesInRect(layout, { x: 140, y: -30, width: 80, height: 100 }), ['a', 'b']);
});
