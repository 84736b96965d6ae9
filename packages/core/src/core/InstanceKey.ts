/**
 * InstanceKey helpers - formatting, ordering and map ids for (plugin, instance) pairs.
 */

import type { InstanceKey, InstanceReference, PluginName } from '@keel/types';

/**
 * Human-readable form used in logs and error messages.
 *
 * formatInstanceKey({ plugin: 'series', instance: 'main' }) → "series.instances['main']"
 */
export function formatInstanceKey(key: InstanceKey): string {
  return `${key.plugin}.instances['${key.instance}']`;
}

/**
 * Collision-free string id for use as a Map/Set key.
 * Plugin and instance names may contain any character, so no separator is safe.
 */
export function instanceKeyId(key: InstanceKey): string {
  return JSON.stringify([key.plugin, key.instance]);
}

/**
 * Compare strings by UTF-16 code unit. Unlike localeCompare, the result
 * doesn't depend on the host's locale settings.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Base order of instance keys: plugin name, then instance name.
 */
export function compareInstanceKeys(a: InstanceKey, b: InstanceKey): number {
  return compareNames(a.plugin, b.plugin) || compareNames(a.instance, b.instance);
}

/**
 * Qualify a declared reference against the plugin of the instance declaring it.
 */
export function resolveReference(declaringPlugin: PluginName, reference: InstanceReference): InstanceKey {
  return {
    plugin: reference.plugin ?? declaringPlugin,
    instance: reference.instance,
  };
}
