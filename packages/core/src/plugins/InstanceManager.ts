/**
 * Base InstanceManager class
 *
 * MANAGER CONTRACT:
 *
 * 1. Metadata - plugin name and defaults
 * 2. parseInstanceConfig - validate one instance's raw mapping
 * 3. getDependencies - references declared by an instance
 * 4. usesExternalMetadata / renderExternalMetadata - metadata enrichment capability
 */

import type {
  IInstanceManager,
  InstanceConfig,
  InstanceReference,
  ManagerMetadata,
} from '@keel/types';
import { InstanceConfigError } from '../errors/KeelError.js';
import { readEnum, readOptionalString, readPort, readReferences, readString } from '../config/fields.js';

export type { IInstanceManager, ManagerMetadata };

/** Fields every instance accepts */
export const BASE_FIELDS = ['hostname', 'port', 'protocol', 'apiKey', 'dependsOn'] as const;

const REDACTED = '********';

/**
 * Base InstanceManager class - extend this for every plugin
 */
export abstract class InstanceManager<TConfig extends InstanceConfig = InstanceConfig>
  implements IInstanceManager<TConfig> {
  abstract get metadata(): ManagerMetadata;

  abstract parseInstanceConfig(raw: Record<string, unknown>): TConfig;

  /**
   * Explicit `dependsOn` references. Plugins with fields that imply a
   * dependency (e.g. sync targets) add those on top.
   */
  getDependencies(config: TConfig): InstanceReference[] {
    return [...config.dependsOn];
  }

  usesExternalMetadata(_config: TConfig): boolean {
    return false;
  }

  async renderExternalMetadata(config: TConfig, _metadataDir: string): Promise<TConfig> {
    return config;
  }

  dumpInstanceConfig(config: TConfig): Record<string, unknown> {
    const dump: Record<string, unknown> = { ...config };
    if (config.apiKey !== undefined) {
      dump.apiKey = REDACTED;
    }
    return dump;
  }

  /**
   * Validate the fields shared by every plugin.
   * hostname defaults to the plugin name, port to metadata.defaultPort.
   */
  protected parseBaseFields(raw: Record<string, unknown>): InstanceConfig {
    return {
      hostname: readString(raw, 'hostname', this.metadata.name),
      port: readPort(raw, 'port', this.metadata.defaultPort),
      protocol: readEnum(raw, 'protocol', ['http', 'https'] as const, 'http'),
      apiKey: readOptionalString(raw, 'apiKey'),
      dependsOn: readReferences(raw, 'dependsOn'),
    };
  }

  /**
   * Reject keys that are neither base fields nor in `pluginFields`.
   * Typos in YAML would otherwise pass silently.
   */
  protected rejectUnknownFields(raw: Record<string, unknown>, pluginFields: readonly string[]): void {
    const known = new Set<string>([...BASE_FIELDS, ...pluginFields]);
    const unknown = Object.keys(raw).filter(key => !known.has(key)).sort();
    if (unknown.length > 0) {
      throw new InstanceConfigError(
        `Unknown field${unknown.length > 1 ? 's' : ''}: ${unknown.join(', ')}`,
        { field: unknown[0] },
        `Supported fields: ${[...known].sort().join(', ')}`
      );
    }
  }
}
