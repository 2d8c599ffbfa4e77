import assert from 'node:assert/strict';
import test from 'node:test';
import { NodeNotFoundError } from '../src/engine/errors.ts';
import {
    ancestorIds,
    collectSubtreeIds,
    findNode,
    getEntry,
    indexTree,
    isAncestorOrSelf,
    nodeIds,
} from '../src/engine/treeIndex.ts';
import { node } from './helpers.ts';

const root = node('root', [node('a', [node('c'), node('d', [node('e')])]), node('b')]);

test('indexTree records parent, index and depth for every node', () => {
    const index = indexTree(root);
    assert.equal(index.rootId, 'root');
    assert.deepEqual(getEntry(index, 'root'), { node: root, parentId: null, index: 0, depth: 0 });
    assert.equal(getEntry(index, 'b').parentId, 'root');
    assert.equal(getEntry(index, 'b').index, 1);
    assert.equal(getEntry(index, 'e').depth, 3);
    assert.equal(getEntry(index, 'd').index, 1);
});

test('indexTree is cached per root object', () => {
    assert.equal(indexTree(root), indexTree(root));
});

test('node ids come out in pre-order', () => {
    assert.deepEqual(nodeIds(root), ['root', 'a', 'c', 'd', 'e', 'b']);
    assert.deepEqual(collectSubtreeIds(root.children[0]), ['a', 'c', 'd', 'e']);
});

test('getEntry throws NodeNotFoundError for unknown ids', () => {
    assert.throws(() => getEntry(indexTree(root), 'missing'), NodeNotFoundError);
    assert.equal(findNode(root, 'missing'), undefined);
    assert.equal(findNode(root, 'e')?.id, 'e');
});

test('ancestorIds lists the nearest ancestor first', () => {
    const index = indexTree(root);
    assert.deepEqual(ancestorIds(index, 'e'), ['d', 'a', 'root']);
    assert.deepEqual(ancestorIds(index, 'root'), []);
});

test('isAncestorOrSelf walks up from the node', () => {
    const index = indexTree(root);
    assert.equal(isAncestorOrSelf(index, 'a', 'e'), true);
    assert.equal(isAncestorOrSelf(index, 'e', 'e'), true);
    assert.equal(isAncestorOrSelf(index, 'b', 'e'), false);
    assert.equal(isAncestorOrSelf(index, 'e', 'a'), false);
});

test('deep trees index without recursion limits', () => {
    let deepest = node('n5000');
    for (let i = 4999; i >= 0; i--) deepest = node(`n${i}`, [deepest]);
    const index = indexTree(deepest);
    assert.equal(index.entries.size, 5001);
    assert.equal(getEntry(index, 'n5000').depth, 5000);
    assert.equal(ancestorIds(index, 'n5000').length, 5000);
});
