import assert from 'node:assert/strict';
import test from 'node:test';
import { createHistory } from '../src/store/history.ts';

test('undo on an empty history returns null', () => {
    const history = createHistory<number>({ enabled: true, maxEntries: 10 });
    assert.equal(history.undo(), null);
    assert.equal(history.redo(), null);
    assert.equal(history.canUndo(), false);
});

test('undo returns the before state and redo the after state', () => {
    const history = createHistory<string>({ enabled: true, maxEntries: 10 });
    history.record('first', 'a', 'b');
    history.record('second', 'b', 'c');

    assert.equal(history.undo(), 'b');
    assert.equal(history.undo(), 'a');
    assert.equal(history.canUndo(), false);
    assert.equal(history.redo(), 'b');
    assert.equal(history.redo(), 'c');
    assert.equal(history.canRedo(), false);
});

test('recording after an undo drops the redo branch', () => {
    const history = createHistory<string>({ enabled: true, maxEntries: 10 });
    history.record('first', 'a', 'b');
    history.undo();
    history.record('other', 'a', 'x');
    assert.equal(history.canRedo(), false);
    assert.deepEqual(history.labels(), ['other']);
});

test('the oldest entry is evicted at capacity', () => {
    const history = createHistory<number>({ enabled: true, maxEntries: 2 });
    history.record('one', 0, 1);
    history.record('two', 1, 2);
    history.record('three', 2, 3);
    assert.deepEqual(history.labels(), ['two', 'three']);
    assert.equal(history.undo(), 2);
    assert.equal(history.undo(), 1);
    assert.equal(history.undo(), null);
});

test('a disabled history records nothing', () => {
    const history = createHistory<number>({ enabled: false, maxEntries: 10 });
    history.record('one', 0, 1);
    assert.equal(history.canUndo(), false);
    assert.equal(history.undo(), null);
});

test('clear empties both stacks', () => {
    const history = createHistory<number>({ enabled: true, maxEntries: 10 });
    history.record('one', 0, 1);
    history.record('two', 1, 2);
    history.undo();
    history.clear();
    assert.equal(history.canUndo(), false);
    assert.equal(history.canRedo(), false);
});
