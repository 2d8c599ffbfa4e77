import assert from 'node:assert/strict';
import test from 'node:test';
import { configFromEnv, DEFAULT_CONFIG, resolveConfig } from '../src/config/config.ts';
import { ConfigError } from '../src/engine/errors.ts';

test('resolveConfig fills defaults and freezes the result', () => {
    const config = resolveConfig({ maxHistorySize: 5 });
    assert.equal(config.maxHistorySize, 5);
    assert.equal(config.allowUndo, DEFAULT_CONFIG.allowUndo);
    assert.equal(Object.isFrozen(config), true);
});

test('out-of-range values are rejected, not clamped', () => {
    assert.throws(() => resolveConfig({ maxHistorySize: 0 }), ConfigError);
    assert.throws(() => resolveConfig({ maxHistorySize: 2.5 }), ConfigError);
    assert.throws(() => resolveConfig({ minScale: -1 }), ConfigError);
    assert.throws(() => resolveConfig({ maxScale: Infinity }), ConfigError);
    assert.throws(() => resolveConfig({ minScale: 2, maxScale: 2 }), (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.equal(error.field, 'minScale');
        return true;
    });
});

test('configFromEnv reads MINDMAP_* variables', () => {
    const config = configFromEnv({
        MINDMAP_ALLOW_UNDO: 'false',
        MINDMAP_MAX_HISTORY: '12',
        MINDMAP_MAX_SCALE: '3',
        MINDMAP_READ_ONLY: 'TRUE',
    });
    assert.equal(config.allowUndo, false);
    assert.equal(config.maxHistorySize, 12);
    assert.equal(config.maxScale, 3);
    assert.equal(config.minScale, DEFAULT_CONFIG.minScale);
    assert.equal(config.readOnly, true);
});

test('configFromEnv rejects non-numeric values', () => {
    assert.throws(() => configFromEnv({ MINDMAP_MIN_SCALE: 'tiny' }), ConfigError);
});
