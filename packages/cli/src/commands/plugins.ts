/**
 * plugins command - list installed plugins
 */

import { Command } from 'commander';
import type { ManagerRegistry } from '@keel/core';
import { createBuiltinRegistry } from '../plugins/builtinPlugins.js';

/**
 * One line per installed plugin: name, default port and description.
 */
export function listPlugins(registry: ManagerRegistry): string[] {
  return registry.names().map((name) => {
    const manager = registry.get(name);
    if (!manager) return name;
    const { defaultPort, description } = manager.metadata;
    return description ? `${name} (port ${defaultPort}) - ${description}` : `${name} (port ${defaultPort})`;
  });
}

export const pluginsCommand = new Command('plugins')
  .description('List installed plugins')
  .option('-j, --json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    const registry = createBuiltinRegistry();
    if (options.json) {
      const plugins = registry.names().map((name) => registry.get(name)?.metadata ?? { name });
      console.log(JSON.stringify(plugins, null, 2));
      return;
    }
    for (const line of listPlugins(registry)) {
      console.log(line);
    }
  });
