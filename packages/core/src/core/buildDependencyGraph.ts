/**
 * Build the instance dependency graph from references declared in instance configs.
 *
 * Nodes: every configured instance of every active plugin.
 * Edges: for each reference declared by instance X on instance Y, the edge Y -> X
 *   (Y must be processed before X).
 *
 * References are collected through each plugin's manager, so the builder
 * never looks at plugin-specific fields itself. An unqualified reference
 * points at the declaring instance's own plugin.
 *
 * Every reference must resolve to a configured instance: a reference to an
 * inactive plugin or to an unknown instance name throws DanglingDependencyError
 * and no graph is returned. Repeated references collapse into a single edge.
 *
 * Pure over its inputs. Complexity: O(N log N + R) for N instances, R references.
 */

import type {
  DependencyEdge,
  DependencyGraph,
  IInstanceManager,
  InstanceConfigMap,
  InstanceKey,
  PluginName,
} from '@keel/types';
import { DanglingDependencyError, ManagerLoadError } from '../errors/KeelError.js';
import { compareInstanceKeys, instanceKeyId, resolveReference } from './InstanceKey.js';

export function buildDependencyGraph(
  instanceConfigs: InstanceConfigMap,
  managers: ReadonlyMap<PluginName, IInstanceManager>
): DependencyGraph {
  // Step 1: collect nodes
  const nodes: InstanceKey[] = [];
  for (const [plugin, configs] of instanceConfigs) {
    for (const instance of configs.keys()) {
      nodes.push({ plugin, instance });
    }
  }
  nodes.sort(compareInstanceKeys);

  // Step 2: resolve every declared reference into an edge
  const edges: DependencyEdge[] = [];
  const seen = new Set<string>();

  for (const node of nodes) {
    const manager = managers.get(node.plugin);
    if (!manager) {
      throw new ManagerLoadError(
        `No manager loaded for plugin '${node.plugin}'`,
        'ERR_PLUGIN_UNKNOWN',
        { plugin: node.plugin }
      );
    }
    const config = instanceConfigs.get(node.plugin)?.get(node.instance);
    if (!config) continue;

    for (const reference of manager.getDependencies(config)) {
      const target = resolveReference(node.plugin, reference);
      const targetConfigs = instanceConfigs.get(target.plugin);

      if (!targetConfigs) {
        throw new DanglingDependencyError(
          node,
          target,
          `but plugin '${target.plugin}' has no configured instances`
        );
      }
      if (!targetConfigs.has(target.instance)) {
        throw new DanglingDependencyError(
          node,
          target,
          `but no instance named '${target.instance}' is configured for plugin '${target.plugin}'`
        );
      }

      const edgeId = `${instanceKeyId(target)}->${instanceKeyId(node)}`;
      if (seen.has(edgeId)) continue;
      seen.add(edgeId);
      edges.push({ from: target, to: node });
    }
  }

  edges.sort((a, b) => compareInstanceKeys(a.to, b.to) || compareInstanceKeys(a.from, b.from));

  return { nodes, edges };
}
