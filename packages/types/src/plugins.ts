/**
 * Plugin Types - logging contract and the capability interface every
 * plugin's instance manager implements.
 */

import type { InstanceConfig, InstanceReference, PluginName } from './instances.js';

// === LOG LEVEL ===
/**
 * Log level for controlling verbosity.
 * Levels are ordered by verbosity: silent < errors < warnings < info < debug
 */
export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

// === LOGGER INTERFACE ===
/**
 * Logger interface for structured logging.
 * Managers should log through the logger they are handed instead of console.
 */
export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

// === MANAGER METADATA ===
export interface ManagerMetadata {
  /** Plugin name, also the top-level config section it reads */
  name: PluginName;
  description?: string;
  /** Default port for instances that don't set one */
  defaultPort: number;
}

// === INSTANCE MANAGER ===
/**
 * Capability interface implemented once per plugin.
 *
 * The pipeline never inspects config types at runtime; every plugin-specific
 * question about an instance goes through its manager.
 */
export interface IInstanceManager<TConfig extends InstanceConfig = InstanceConfig> {
  readonly metadata: ManagerMetadata;

  /**
   * Validate the raw (defaults-merged) YAML mapping of one instance.
   * Throws on invalid input.
   */
  parseInstanceConfig(raw: Record<string, unknown>): TConfig;

  /** Dependency references declared by the instance */
  getDependencies(config: TConfig): InstanceReference[];

  /** Whether the instance pulls values from the external metadata bundle */
  usesExternalMetadata(config: TConfig): boolean;

  /**
   * Produce a new config with metadata references replaced by the values
   * found under `metadataDir`. Must not mutate `config`.
   */
  renderExternalMetadata(config: TConfig, metadataDir: string): Promise<TConfig>;

  /** Plain object form of the config, used for debug dumps */
  dumpInstanceConfig(config: TConfig): Record<string, unknown>;
}
