import assert from 'node:assert/strict';
import test from 'node:test';
import {
    arrowControlPointBounds,
    calculateLayout,
    estimateTextMetrics,
    expandIndicatorBounds,
    hyperlinkIndicatorBounds,
    layoutBounds,
    measureNodeSize,
    summaryBracketBounds,
} from '../src/engine/layout.ts';
import type { MindmapArrow, MindmapNode, NodeGeometry } from '../src/types/mindmap.ts';
import { node, testMetrics } from './helpers.ts';

function sample(): MindmapNode {
    return node('root', [node('a', [node('c')]), node('b')], { topic: 'Root' });
}

function geometryOf(layout: ReadonlyMap<string, NodeGeometry>, id: string): NodeGeometry {
    const geometry = layout.get(id);
    assert.ok(geometry, `${id} should be laid out`);
    return geometry;
}

/* ------------------------------------------------------------------ */
/*  Sizing                                                            */
/* ------------------------------------------------------------------ */

test('node size is text plus depth-dependent padding', () => {
    assert.deepEqual(measureNodeSize(node('root', [], { topic: 'Root' }), 0, testMetrics), { width: 100, height: 40 });
    assert.deepEqual(measureNodeSize(node('a'), 1, testMetrics), { width: 60, height: 36 });
    assert.deepEqual(measureNodeSize(node('c'), 2, testMetrics), { width: 20, height: 30 });
});

test('icons sit after the last text line', () => {
    assert.deepEqual(measureNodeSize(node('a', [], { icons: ['*'] }), 1, testMetrics), { width: 75, height: 36 });
});

test('tags widen and heighten the node', () => {
    const size = measureNodeSize(node('a', [], { tags: [{ text: 'ab' }] }), 1, testMetrics);
    assert.equal(size.width, 78);
    assert.ok(Math.abs(size.height - 57.6) < 1e-9);
});

test('a fixed style width overrides the measured width', () => {
    assert.equal(measureNodeSize(node('a', [], { style: { width: 200 } }), 1, testMetrics).width, 200);
});

test('estimateTextMetrics wraps at the available width', () => {
    const metrics = estimateTextMetrics({ text: 'abcdefghij', fontSize: 10, fontWeight: 'normal', maxWidth: 36 });
    // 6px per char, 6 chars per line: 6 + 4 chars.
    assert.equal(metrics.width, 36);
    assert.equal(metrics.lastLineWidth, 24);
    assert.equal(metrics.height, 24);
});

/* ------------------------------------------------------------------ */
/*  Placement                                                         */
/* ------------------------------------------------------------------ */

test('one-sided layout stacks children to the right of the root', () => {
    const layout = calculateLayout(sample(), testMetrics, 'right');

    assert.deepEqual(geometryOf(layout, 'root'), {
        position: { x: 0, y: 0 },
        size: { width: 100, height: 40 },
        depth: 0,
        side: 'root',
    });
    assert.deepEqual(geometryOf(layout, 'a').position, { x: 150, y: -26 });
    assert.deepEqual(geometryOf(layout, 'b').position, { x: 150, y: 30 });
    assert.deepEqual(geometryOf(layout, 'c').position, { x: 240, y: -23 });
    assert.equal(geometryOf(layout, 'c').side, 'right');
});

test('two-sided layout alternates root children', () => {
    const layout = calculateLayout(sample(), testMetrics, 'side');
    assert.deepEqual(geometryOf(layout, 'a').position, { x: 150, y: 2 });
    assert.equal(geometryOf(layout, 'a').side, 'right');
    assert.deepEqual(geometryOf(layout, 'b').position, { x: -110, y: 2 });
    assert.equal(geometryOf(layout, 'b').side, 'left');
});

test('left layout mirrors the right one', () => {
    const layout = calculateLayout(sample(), testMetrics, 'left');
    assert.deepEqual(geometryOf(layout, 'a').position, { x: -110, y: -26 });
    assert.deepEqual(geometryOf(layout, 'c').position, { x: -160, y: -23 });
});

test('a direction hint pins a root child to its side', () => {
    const root = node('root', [node('a', [], { direction: 'left' }), node('b')], { topic: 'Root' });
    const layout = calculateLayout(root, testMetrics, 'side');
    assert.equal(geometryOf(layout, 'a').side, 'left');
    assert.equal(geometryOf(layout, 'b').side, 'right');
});

test('layout is deterministic', () => {
    assert.deepEqual(
        calculateLayout(sample(), testMetrics, 'side'),
        calculateLayout(sample(), testMetrics, 'side'),
    );
});

test('collapsing removes exactly the descendants', () => {
    const expanded = calculateLayout(sample(), testMetrics, 'right');
    const collapsedRoot = node('root', [node('a', [node('c')], { expanded: false }), node('b')], { topic: 'Root' });
    const collapsed = calculateLayout(collapsedRoot, testMetrics, 'right');

    assert.deepEqual([...collapsed.keys()], ['root', 'a', 'b']);
    for (const id of collapsed.keys()) {
        assert.deepEqual(collapsed.get(id), expanded.get(id));
    }
});

test('a focused subtree is laid out from its own root', () => {
    const focused = sample().children[0];
    const layout = calculateLayout(focused, testMetrics, 'right');
    assert.deepEqual([...layout.keys()], ['a', 'c']);
    assert.equal(geometryOf(layout, 'a').side, 'root');
    assert.deepEqual(geometryOf(layout, 'a').position, { x: 0, y: 0 });
});

test('layoutBounds encloses every box', () => {
    assert.deepEqual(layoutBounds(calculateLayout(sample(), testMetrics, 'right')), {
        x: 0,
        y: -26,
        width: 260,
        height: 92,
    });
});

/* ------------------------------------------------------------------ */
/*  Auxiliary geometry                                                */
/* ------------------------------------------------------------------ */

test('expand indicator sits outside the trailing edge of parents only', () => {
    const root = sample();
    const layout = calculateLayout(root, testMetrics, 'right');
    const a = root.children[0];

    assert.deepEqual(expandIndicatorBounds(a, geometryOf(layout, 'a')), { x: 218, y: -17, width: 18, height: 18 });
    assert.equal(expandIndicatorBounds(root.children[1], geometryOf(layout, 'b')), null);
    assert.equal(expandIndicatorBounds(root, geometryOf(layout, 'root')), null);
});

test('expand indicator of a left-side node sits on its left', () => {
    const root = sample();
    const layout = calculateLayout(root, testMetrics, 'left');
    // a at x -110, width 60: centre x = -110 - 8 - 9.
    assert.deepEqual(expandIndicatorBounds(root.children[0], geometryOf(layout, 'a')), {
        x: -136,
        y: -17,
        width: 18,
        height: 18,
    });
});

test('hyperlink indicator sits in the bottom-right corner', () => {
    const linked = node('a', [], { hyperlink: 'https://example.test' });
    const geometry: NodeGeometry = { position: { x: 150, y: -26 }, size: { width: 60, height: 36 }, depth: 1, side: 'right' };
    assert.deepEqual(hyperlinkIndicatorBounds(linked, geometry), { x: 192, y: -8, width: 14, height: 14 });
    assert.equal(hyperlinkIndicatorBounds(node('b'), geometry), null);
});

test('arrow control handles need both endpoints laid out', () => {
    const arrow: MindmapArrow = {
        id: 'x',
        fromNodeId: 'a',
        toNodeId: 'b',
        bidirectional: false,
        controlPointOffset1: { x: 40, y: 0 },
        controlPointOffset2: { x: 0, y: 10 },
    };
    const layout = calculateLayout(sample(), testMetrics, 'right');
    // Centres: a (180, -8), b (180, 48).
    assert.deepEqual(arrowControlPointBounds(arrow, layout), [
        { x: 214, y: -14, width: 12, height: 12 },
        { x: 174, y: 52, width: 12, height: 12 },
    ]);
    assert.equal(arrowControlPointBounds({ ...arrow, toNodeId: 'missing' }, layout), null);
});

test('summary bracket spans the covered subtrees on the far side', () => {
    const root = sample();
    const layout = calculateLayout(root, testMetrics, 'right');
    const bracket = summaryBracketBounds(
        { id: 's', parentNodeId: 'root', startIndex: 0, endIndex: 1, label: 'Summary' },
        root,
        layout,
    );
    assert.deepEqual(bracket, {
        covered: { x: 150, y: -26, width: 110, height: 92 },
        bracket: { x: 270, y: -26, width: 10, height: 92 },
        side: 'right',
    });
});

test('summary bracket is null for invalid ranges', () => {
    const root = sample();
    const layout = calculateLayout(root, testMetrics, 'right');
    assert.equal(
        summaryBracketBounds({ id: 's', parentNodeId: 'root', startIndex: 0, endIndex: 2, label: '' }, root, layout),
        null,
    );
});
