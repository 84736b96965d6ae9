/**
 * InstanceConfigLoader - splits plugin sections into instances and validates
 * each instance through its plugin's manager.
 *
 * Section layout:
 *
 * ```yaml
 * series:
 *   port: 8989          # default for every instance below
 *   instances:
 *     main: {}          # port 8989
 *     backup:
 *       port: 8990      # overrides the default
 * ```
 *
 * Without an `instances` key the section itself is one instance named "default".
 * Plugins whose section configures no instance are left out of the result.
 */

import type {
  IInstanceManager,
  InstanceConfig,
  InstanceName,
  Logger,
  PluginName,
} from '@keel/types';
import type { KeelConfig } from './ConfigLoader.js';
import { deepMerge } from './ConfigLoader.js';
import { isRecord } from './fields.js';
import { InstanceConfigError, KeelError } from '../errors/KeelError.js';
import { compareNames, formatInstanceKey } from '../core/InstanceKey.js';
import { silentLogger } from '../logging/Logger.js';

/** Instance name used when a plugin section has no `instances` key */
export const DEFAULT_INSTANCE_NAME = 'default';

const INSTANCES_KEY = 'instances';

/**
 * Validate every instance of every selected plugin.
 *
 * @returns Instance configs keyed by plugin, then instance name, both in base order
 * @throws InstanceConfigError carrying plugin and instance of the first invalid instance
 */
export function loadInstanceConfigs(
  config: KeelConfig,
  managers: ReadonlyMap<PluginName, IInstanceManager>,
  logger: Logger = silentLogger
): Map<PluginName, Map<InstanceName, InstanceConfig>> {
  const result = new Map<PluginName, Map<InstanceName, InstanceConfig>>();

  for (const plugin of [...managers.keys()].sort(compareNames)) {
    const section = config.plugins.get(plugin);
    const manager = managers.get(plugin);
    if (!section || !manager) continue;

    const configs = new Map<InstanceName, InstanceConfig>();
    for (const [instance, raw] of splitInstances(plugin, section, config.path)) {
      configs.set(instance, parseInstance(manager, plugin, instance, raw));
    }

    if (configs.size === 0) {
      logger.debug('Plugin section configures no instances', { plugin });
      continue;
    }
    result.set(plugin, configs);
  }

  return result;
}

/**
 * Raw (defaults-merged) mapping of each instance in a plugin section.
 */
function splitInstances(
  plugin: PluginName,
  section: Record<string, unknown>,
  filePath: string
): Array<[InstanceName, Record<string, unknown>]> {
  if (!(INSTANCES_KEY in section)) {
    return [[DEFAULT_INSTANCE_NAME, section]];
  }

  const { [INSTANCES_KEY]: instances, ...defaults } = section;
  if (instances === null || instances === undefined) {
    return [];
  }
  if (!isRecord(instances)) {
    throw new InstanceConfigError(
      `${plugin}.${INSTANCES_KEY} must be a mapping of instance name to configuration`,
      { plugin, filePath, field: INSTANCES_KEY }
    );
  }

  return Object.keys(instances)
    .sort(compareNames)
    .map((instance): [InstanceName, Record<string, unknown>] => {
      const own = instances[instance];
      if (own === null || own === undefined) {
        return [instance, defaults];
      }
      if (!isRecord(own)) {
        throw new InstanceConfigError(
          `${formatInstanceKey({ plugin, instance })} must be a mapping`,
          { plugin, instance, filePath }
        );
      }
      return [instance, deepMerge(defaults, own)];
    });
}

function parseInstance(
  manager: IInstanceManager,
  plugin: PluginName,
  instance: InstanceName,
  raw: Record<string, unknown>
): InstanceConfig {
  try {
    return manager.parseInstanceConfig(raw);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    const key = formatInstanceKey({ plugin, instance });
    const context = error instanceof KeelError ? error.context : {};
    const suggestion = error instanceof KeelError ? error.suggestion : undefined;
    throw new InstanceConfigError(
      `Invalid configuration for ${key}: ${error.message}`,
      { ...context, plugin, instance },
      suggestion
    );
  }
}
