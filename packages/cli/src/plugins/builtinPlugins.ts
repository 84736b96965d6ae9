/**
 * Built-in plugin registry - maps plugin names to manager factories.
 *
 * Each entry creates a fresh manager. Plugin names are the top-level
 * section names of keel.yml.
 */

import type { IInstanceManager } from '@keel/types';
import { IndexerManager, ManagerRegistry, SeriesManager } from '@keel/core';

export const BUILTIN_MANAGERS: Record<string, () => IInstanceManager> = {
  series: () => new SeriesManager(),
  indexer: () => new IndexerManager(),
};

/**
 * Registry holding one fresh manager per built-in plugin.
 */
export function createBuiltinRegistry(): ManagerRegistry {
  return new ManagerRegistry(Object.values(BUILTIN_MANAGERS).map(create => create()));
}
