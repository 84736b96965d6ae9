/**
 * Tests for buildDependencyGraph.
 *
 * - Nodes: every configured instance, in base order
 * - Edges: dependency -> dependent, through each manager's getDependencies
 * - Dangling references to inactive plugins and unknown instances
 * - Duplicate references collapse into one edge
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  buildDependencyGraph,
  toposort,
  DanglingDependencyError,
  ManagerLoadError,
  SeriesManager,
  IndexerManager,
} from '@keel/core';
import type {
  IInstanceManager,
  IndexerInstanceConfig,
  InstanceConfig,
  InstanceConfigMap,
  InstanceName,
  InstanceReference,
} from '@keel/core';

function config(dependsOn: InstanceReference[] = []): InstanceConfig {
  return { hostname: 'localhost', port: 8989, protocol: 'http', dependsOn };
}

function hubConfig(dependsOn: InstanceReference[] = [], syncTargets: InstanceReference[] = []): InstanceConfig {
  const hub: IndexerInstanceConfig = { ...config(dependsOn), port: 9696, syncTargets };
  return hub;
}

function configsOf(entries: Record<string, Record<InstanceName, InstanceConfig>>): InstanceConfigMap {
  return new Map(Object.entries(entries).map(([plugin, instances]) => [plugin, new Map(Object.entries(instances))]));
}

const managers = new Map<string, IInstanceManager>([
  ['series', new SeriesManager()],
  ['indexer', new IndexerManager()],
]);

describe('buildDependencyGraph', () => {
  it('should list every instance as a node in base order', () => {
    const graph = buildDependencyGraph(
      configsOf({ series: { main: config(), anime: config() }, indexer: { hub: hubConfig() } }),
      managers
    );

    assert.deepStrictEqual(graph.nodes, [
      { plugin: 'indexer', instance: 'hub' },
      { plugin: 'series', instance: 'anime' },
      { plugin: 'series', instance: 'main' },
    ]);
    assert.deepStrictEqual(graph.edges, []);
  });

  it('should add edge from dependency to dependent', () => {
    const graph = buildDependencyGraph(
      configsOf({ series: { A: config(), B: config([{ instance: 'A' }]) } }),
      managers
    );

    assert.deepStrictEqual(graph.edges, [
      { from: { plugin: 'series', instance: 'A' }, to: { plugin: 'series', instance: 'B' } },
    ]);
    assert.deepStrictEqual(toposort(graph), [
      { plugin: 'series', instance: 'A' },
      { plugin: 'series', instance: 'B' },
    ]);
  });

  it('should resolve cross-plugin references', () => {
    const graph = buildDependencyGraph(
      configsOf({
        series: { main: config() },
        indexer: { hub: hubConfig([{ plugin: 'series', instance: 'main' }]) },
      }),
      managers
    );

    assert.deepStrictEqual(graph.edges, [
      { from: { plugin: 'series', instance: 'main' }, to: { plugin: 'indexer', instance: 'hub' } },
    ]);
  });

  it('should include plugin-specific dependencies from the manager', () => {
    const graph = buildDependencyGraph(
      configsOf({ series: { main: config() }, indexer: { hub: hubConfig([], [{ plugin: 'series', instance: 'main' }]) } }),
      managers
    );

    assert.strictEqual(graph.edges.length, 1);
    assert.deepStrictEqual(graph.edges[0].from, { plugin: 'series', instance: 'main' });
  });

  it('should collapse repeated references into one edge', () => {
    const graph = buildDependencyGraph(
      configsOf({
        series: {
          A: config(),
          B: config([{ instance: 'A' }, { plugin: 'series', instance: 'A' }]),
        },
      }),
      managers
    );

    assert.strictEqual(graph.edges.length, 1);
  });

  it('should throw DanglingDependencyError for an unconfigured plugin', () => {
    assert.throws(
      () => buildDependencyGraph(
        configsOf({ series: { A: config([{ plugin: 'X', instance: 'Z' }]) } }),
        managers
      ),
      (err: unknown) => {
        assert.ok(err instanceof DanglingDependencyError);
        assert.deepStrictEqual(err.reference, { plugin: 'X', instance: 'Z' });
        assert.deepStrictEqual(err.source, { plugin: 'series', instance: 'A' });
        assert.strictEqual(err.code, 'ERR_DANGLING_DEPENDENCY');
        assert.strictEqual(
          err.message,
          "series.instances['A'] depends on X.instances['Z'], but plugin 'X' has no configured instances"
        );
        return true;
      }
    );
  });

  it('should throw DanglingDependencyError for an unknown instance name', () => {
    assert.throws(
      () => buildDependencyGraph(
        configsOf({ series: { A: config([{ instance: 'Z' }]) } }),
        managers
      ),
      (err: unknown) => {
        assert.ok(err instanceof DanglingDependencyError);
        assert.deepStrictEqual(err.reference, { plugin: 'series', instance: 'Z' });
        assert.strictEqual(
          err.message,
          "series.instances['A'] depends on series.instances['Z'], but no instance named 'Z' is configured for plugin 'series'"
        );
        assert.strictEqual(err.context.plugin, 'series');
        assert.strictEqual(err.context.instance, 'A');
        return true;
      }
    );
  });

  it('should throw ManagerLoadError when a plugin has no manager', () => {
    assert.throws(
      () => buildDependencyGraph(configsOf({ other: { A: config() } }), managers),
      (err: unknown) => err instanceof ManagerLoadError && err.code === 'ERR_PLUGIN_UNKNOWN'
    );
  });
});
