/**
 * Topological sort for the instance dependency graph.
 *
 * Depth-first traversal with three-state marking (unvisited, in-progress, done),
 * driven by an explicit stack of frames.
 * A node is emitted once all of its predecessors are emitted, so every edge
 * a -> b puts a before b.
 *
 * Nodes, and the predecessors of each node, are visited in base order
 * (plugin name, then instance name), which makes the result identical for
 * the same graph across runs and processes, whatever order the graph was
 * built in.
 *
 * Reaching an in-progress node means a cycle; the thrown CyclicDependencyError
 * carries the loop as a path of instances, each depending on the next, with
 * the first instance repeated at the end.
 *
 * Time complexity:  O(V log V + E log E)
 * Space complexity: O(V + E)
 */

import type { DependencyGraph, ExecutionOrder, InstanceKey } from '@keel/types';
import { CyclicDependencyError } from '../errors/KeelError.js';
import { compareInstanceKeys, formatInstanceKey, instanceKeyId } from './InstanceKey.js';

type Mark = 'in-progress' | 'done';

interface Frame {
  node: InstanceKey;
  predecessors: readonly InstanceKey[];
  /** Index of the next predecessor to visit */
  next: number;
}

/**
 * Topologically sort instances so that dependencies come first.
 *
 * @returns Every node exactly once, in execution order
 * @throws CyclicDependencyError if a dependency cycle exists
 */
export function toposort(graph: DependencyGraph): ExecutionOrder {
  const nodes = [...graph.nodes].sort(compareInstanceKeys);
  const knownIds = new Set(nodes.map(instanceKeyId));

  // predecessors: node -> nodes that must run before it
  const predecessors = new Map<string, InstanceKey[]>();
  for (const node of nodes) {
    predecessors.set(instanceKeyId(node), []);
  }
  for (const edge of graph.edges) {
    for (const endpoint of [edge.from, edge.to]) {
      if (!knownIds.has(instanceKeyId(endpoint))) {
        throw new Error(`Dependency edge references unknown instance ${formatInstanceKey(endpoint)}`);
      }
    }
    predecessors.get(instanceKeyId(edge.to))?.push(edge.from);
  }
  for (const list of predecessors.values()) {
    list.sort(compareInstanceKeys);
  }

  const marks = new Map<string, Mark>();
  const order: InstanceKey[] = [];

  // Explicit stack: long dependency chains must not exhaust the call stack.
  // The frames double as the current path for cycle reporting.
  const stack: Frame[] = [];

  const enter = (node: InstanceKey): void => {
    const id = instanceKeyId(node);
    marks.set(id, 'in-progress');
    stack.push({ node, predecessors: predecessors.get(id) ?? [], next: 0 });
  };

  for (const root of nodes) {
    if (marks.get(instanceKeyId(root)) === 'done') continue;
    enter(root);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.next < frame.predecessors.length) {
        const predecessor = frame.predecessors[frame.next];
        frame.next += 1;
        const id = instanceKeyId(predecessor);
        const mark = marks.get(id);
        if (mark === 'done') continue;

        if (mark === 'in-progress') {
          // Cycle: the loop is the tail of the current path
          const cycleStart = stack.findIndex(entry => instanceKeyId(entry.node) === id);
          throw new CyclicDependencyError([...stack.slice(cycleStart).map(entry => entry.node), predecessor]);
        }

        enter(predecessor);
        continue;
      }

      stack.pop();
      marks.set(instanceKeyId(frame.node), 'done');
      order.push(frame.node);
    }
  }

  return order;
}
