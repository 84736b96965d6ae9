import type { IInstanceManager, PluginName } from '@keel/types';
import { ManagerLoadError } from '../errors/KeelError.js';
import { compareNames } from '../core/InstanceKey.js';

/**
 * Installed plugins of one process, keyed by plugin name.
 *
 * The registry only knows what is installed; which plugins take part in a
 * run is decided by loadManagers() from the plugin filter.
 */
export class ManagerRegistry {
  private managers = new Map<PluginName, IInstanceManager>();

  constructor(managers: Iterable<IInstanceManager> = []) {
    for (const manager of managers) {
      this.register(manager);
    }
  }

  register(manager: IInstanceManager): void {
    const name = manager.metadata.name;
    if (this.managers.has(name)) {
      throw new ManagerLoadError(
        `Plugin '${name}' is registered twice`,
        'ERR_PLUGIN_DUPLICATE',
        { plugin: name }
      );
    }
    this.managers.set(name, manager);
  }

  get(name: PluginName): IInstanceManager | undefined {
    return this.managers.get(name);
  }

  has(name: PluginName): boolean {
    return this.managers.has(name);
  }

  /** Installed plugin names in base order */
  names(): PluginName[] {
    return [...this.managers.keys()].sort(compareNames);
  }
}

/**
 * Select the managers taking part in a run.
 *
 * @param pluginFilter - Plugins to use; empty set means every installed plugin
 * @returns Managers keyed by plugin name, in base order
 * @throws ManagerLoadError if the filter names a plugin that isn't installed
 */
export function loadManagers(
  registry: ManagerRegistry,
  pluginFilter: ReadonlySet<PluginName>
): Map<PluginName, IInstanceManager> {
  const unknown = [...pluginFilter].filter(name => !registry.has(name)).sort(compareNames);
  if (unknown.length > 0) {
    throw new ManagerLoadError(
      `Plugin${unknown.length > 1 ? 's' : ''} not installed: ${unknown.join(', ')}`,
      'ERR_PLUGIN_UNKNOWN',
      { plugin: unknown[0] },
      `Installed plugins: ${registry.names().join(', ') || '(none)'}`
    );
  }

  const managers = new Map<PluginName, IInstanceManager>();
  for (const name of registry.names()) {
    if (pluginFilter.size > 0 && !pluginFilter.has(name)) continue;
    const manager = registry.get(name);
    if (manager) managers.set(name, manager);
  }
  return managers;
}
