/**
 * renderMetadata - fills metadata references in instance configs from an
 * unpacked metadata directory.
 */

import type { InstanceConfig, InstanceKey, InstanceName, Logger, PluginName } from '@keel/types';
import type { RunState } from '../pipeline/RunState.js';
import { KeelError, RenderError } from '../errors/KeelError.js';
import { formatInstanceKey } from '../core/InstanceKey.js';
import { silentLogger, withContext } from '../logging/Logger.js';

/**
 * Render every instance that uses external metadata, in execution order.
 *
 * A new config map is built and committed to `state.instanceConfigs` only
 * after every instance rendered; on failure the state keeps its unrendered
 * configs.
 *
 * @returns Keys of the instances that were rendered
 * @throws RenderError carrying plugin and instance of the failing instance
 */
export async function renderMetadata(state: RunState, dir: string, logger: Logger = silentLogger): Promise<InstanceKey[]> {
  const current = state.instanceConfigs;
  const next = new Map<PluginName, Map<InstanceName, InstanceConfig>>();
  for (const [plugin, instances] of current) {
    next.set(plugin, new Map(instances));
  }

  const rendered: InstanceKey[] = [];
  for (const key of state.executionOrder) {
    const config = current.get(key.plugin)?.get(key.instance);
    const target = next.get(key.plugin);
    if (!config || !target) continue;

    const manager = state.managerFor(key.plugin);
    if (!manager.usesExternalMetadata(config)) continue;

    withContext(logger, { plugin: key.plugin, instance: key.instance }).debug('Rendering metadata');
    target.set(key.instance, await renderInstance(key, () => manager.renderExternalMetadata(config, dir)));
    rendered.push(key);
  }

  state.instanceConfigs = next;
  return rendered;
}

async function renderInstance(key: InstanceKey, render: () => Promise<InstanceConfig>): Promise<InstanceConfig> {
  try {
    return await render();
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    const context = error instanceof KeelError ? error.context : {};
    const suggestion = error instanceof KeelError ? error.suggestion : undefined;
    throw new RenderError(
      `Failed to render metadata for ${formatInstanceKey(key)}: ${error.message}`,
      { ...context, plugin: key.plugin, instance: key.instance },
      suggestion
    );
  }
}
