/**
 * IndexerManager - indexer hub instances.
 *
 * An indexer hub pushes its indexers to series servers, so every sync target
 * must be configured and processed before the hub itself:
 *
 * ```yaml
 * indexer:
 *   instances:
 *     hub:
 *       syncTargets:
 *         - { plugin: series, instance: main }
 * ```
 */

import type { InstanceConfig, InstanceReference, ManagerMetadata } from '@keel/types';
import { InstanceManager } from '../InstanceManager.js';
import { InstanceConfigError } from '../../errors/KeelError.js';
import { readReferences } from '../../config/fields.js';

export interface IndexerInstanceConfig extends InstanceConfig {
  readonly syncTargets: readonly InstanceReference[];
}

/** Plugins an indexer hub can push to */
export const SYNC_TARGET_PLUGINS: readonly string[] = ['series'];

export class IndexerManager extends InstanceManager<IndexerInstanceConfig> {
  get metadata(): ManagerMetadata {
    return {
      name: 'indexer',
      description: 'Indexer hubs',
      defaultPort: 9696,
    };
  }

  parseInstanceConfig(raw: Record<string, unknown>): IndexerInstanceConfig {
    this.rejectUnknownFields(raw, ['syncTargets']);
    const syncTargets = readReferences(raw, 'syncTargets', { requirePlugin: true });

    syncTargets.forEach((target, index) => {
      if (target.plugin !== undefined && !SYNC_TARGET_PLUGINS.includes(target.plugin)) {
        throw new InstanceConfigError(
          `syncTargets[${index}].plugin must be one of ${SYNC_TARGET_PLUGINS.join(', ')}, got '${target.plugin}'`,
          { field: `syncTargets[${index}].plugin` }
        );
      }
    });

    return {
      ...this.parseBaseFields(raw),
      syncTargets,
    };
  }

  getDependencies(config: IndexerInstanceConfig): InstanceReference[] {
    return [...super.getDependencies(config), ...config.syncTargets];
  }
}
