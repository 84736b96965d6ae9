/**
 * ManagerRegistry / loadManagers tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  ManagerRegistry,
  loadManagers,
  ManagerLoadError,
  SeriesManager,
  IndexerManager,
} from '@keel/core';

describe('ManagerRegistry', () => {
  it('should list installed plugins by name', () => {
    const registry = new ManagerRegistry([new SeriesManager(), new IndexerManager()]);
    assert.deepStrictEqual(registry.names(), ['indexer', 'series']);
    assert.ok(registry.has('series'));
    assert.ok(registry.get('indexer') instanceof IndexerManager);
  });

  it('should reject a second manager for the same plugin', () => {
    const registry = new ManagerRegistry([new SeriesManager()]);
    assert.throws(
      () => registry.register(new SeriesManager()),
      (err: unknown) => err instanceof ManagerLoadError && err.code === 'ERR_PLUGIN_DUPLICATE'
    );
  });
});

describe('loadManagers', () => {
  const registry = new ManagerRegistry([new SeriesManager(), new IndexerManager()]);

  it('should load every installed plugin for an empty filter', () => {
    assert.deepStrictEqual([...loadManagers(registry, new Set()).keys()], ['indexer', 'series']);
  });

  it('should load only filtered plugins', () => {
    assert.deepStrictEqual([...loadManagers(registry, new Set(['series'])).keys()], ['series']);
  });

  it('should reject plugins that are not installed', () => {
    assert.throws(
      () => loadManagers(registry, new Set(['series', 'movies', 'music'])),
      (err: unknown) => {
        assert.ok(err instanceof ManagerLoadError);
        assert.strictEqual(err.code, 'ERR_PLUGIN_UNKNOWN');
        assert.strictEqual(err.message, 'Plugins not installed: movies, music');
        assert.strictEqual(err.suggestion, 'Installed plugins: indexer, series');
        return true;
      }
    );
  });
});
