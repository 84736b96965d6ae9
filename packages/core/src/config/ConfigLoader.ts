import { readFileSync, existsSync, statSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { parse as parseYAML, stringify as stringifyYAML } from 'yaml';
import type { Logger, PluginName } from '@keel/types';
import { ConfigError } from '../errors/KeelError.js';
import { silentLogger } from '../logging/Logger.js';
import { KEEL_VERSION, getSchemaVersion } from '../version.js';
import { isRecord } from './fields.js';

/**
 * keel configuration file.
 *
 * Default location: keel.yml in the working directory.
 *
 * Example keel.yml:
 *
 * ```yaml
 * # Global settings
 * keel:
 *   version: "0.3.0"             # optional compatibility check
 *   includes:
 *     - secrets.yml              # relative to this file
 *   metadata:
 *     url: https://example.invalid/metadata.json
 *     timeout: 30                # seconds
 *
 * # One section per plugin
 * series:
 *   port: 8989                   # plugin-level default for every instance
 *   instances:
 *     main:
 *       hostname: series-main
 *     anime:
 *       hostname: series-anime
 *       dependsOn: [main]
 * ```
 *
 * A plugin section without `instances` configures a single instance named `default`.
 */
export interface KeelConfig {
  /** Absolute path of the top-level file */
  path: string;
  /** Every file read, top-level file last */
  files: string[];
  settings: KeelSettings;
  /**
   * Raw sections of the selected plugins, keyed by plugin name.
   * Validated per instance later, by each plugin's manager.
   */
  plugins: Map<PluginName, Record<string, unknown>>;
}

export interface KeelSettings {
  version?: string;
  metadata: MetadataSettings;
}

export interface MetadataSettings {
  /** URL of the metadata bundle. Required only when an instance uses metadata. */
  url?: string;
  /** Download timeout in seconds */
  timeout: number;
}

export const DEFAULT_METADATA_TIMEOUT = 30;

/** Largest timeout (seconds) a Node.js timer can hold: 2^31 - 1 ms */
export const MAX_METADATA_TIMEOUT = 2147483;

export const DEFAULT_SETTINGS: KeelSettings = {
  metadata: {
    timeout: DEFAULT_METADATA_TIMEOUT,
  },
};

/** Top-level section holding global settings */
export const SETTINGS_SECTION = 'keel';

/** Default config file name, looked up in the working directory */
export const DEFAULT_CONFIG_FILE = 'keel.yml';

export interface LoadConfigOptions {
  /** Plugins installed in this process; other top-level sections are rejected */
  installedPlugins: readonly PluginName[];
  logger?: Logger;
}

/**
 * Load, merge and validate a keel configuration file.
 *
 * - Parses YAML, follows `keel.includes` (included files first, the including
 *   file overrides them)
 * - Rejects sections that name no installed plugin
 * - Keeps only sections of plugins passing `pluginFilter` (empty = all)
 *
 * THROWS ConfigError on any problem; there is no fallback to defaults for a
 * file that exists but is broken.
 *
 * @param path - Config file path (relative paths resolve against cwd)
 * @param pluginFilter - Plugins to use; empty set means every installed plugin
 */
export function loadConfig(
  path: string,
  pluginFilter: ReadonlySet<PluginName>,
  options: LoadConfigOptions
): KeelConfig {
  const logger = options.logger ?? silentLogger;
  const absolutePath = resolve(path);
  const files: string[] = [];

  const document = loadDocument(absolutePath, [], files, logger);

  const settings = validateSettings(document[SETTINGS_SECTION], absolutePath);
  validateVersion(settings.version);

  const installed = new Set(options.installedPlugins);
  const plugins = new Map<PluginName, Record<string, unknown>>();

  for (const [section, value] of Object.entries(document)) {
    if (section === SETTINGS_SECTION) continue;

    if (!installed.has(section)) {
      throw new ConfigError(
        `Unknown configuration section '${section}': no plugin with this name is installed`,
        'ERR_CONFIG_INVALID',
        { filePath: absolutePath, section },
        `Installed plugins: ${[...installed].sort().join(', ') || '(none)'}`
      );
    }

    if (pluginFilter.size > 0 && !pluginFilter.has(section)) {
      logger.debug('Ignoring section of unselected plugin', { plugin: section });
      continue;
    }

    // An empty section (`series:` with nothing under it) is an empty mapping
    if (value === null || value === undefined) {
      plugins.set(section, {});
      continue;
    }

    if (!isRecord(value)) {
      throw new ConfigError(
        `Config error: section '${section}' must be a mapping, got ${describeType(value)}`,
        'ERR_CONFIG_INVALID',
        { filePath: absolutePath, plugin: section }
      );
    }
    plugins.set(section, value);
  }

  return { path: absolutePath, files, settings, plugins };
}

/**
 * Read one file and, recursively, the files it includes.
 * `stack` holds the include chain leading to this file (cycle detection).
 */
function loadDocument(
  filePath: string,
  stack: string[],
  files: string[],
  logger: Logger
): Record<string, unknown> {
  if (stack.includes(filePath)) {
    throw new ConfigError(
      `Config error: include cycle ${[...stack, filePath].join(' -> ')}`,
      'ERR_CONFIG_INCLUDE_CYCLE',
      { filePath }
    );
  }

  if (!existsSync(filePath) || !statSync(filePath).isFile()) {
    throw new ConfigError(
      `Configuration file not found: ${filePath}`,
      'ERR_CONFIG_NOT_FOUND',
      { filePath },
      stack.length === 0 ? `Create ${DEFAULT_CONFIG_FILE} or pass the path explicitly` : undefined
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(
      `Failed to parse ${filePath}: ${message}`,
      'ERR_CONFIG_PARSE',
      { filePath }
    );
  }

  // Empty file or comments only
  if (parsed === null || parsed === undefined) {
    parsed = {};
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(
      `Config error: top level of ${filePath} must be a mapping, got ${describeType(parsed)}`,
      'ERR_CONFIG_INVALID',
      { filePath }
    );
  }

  const includes = readIncludes(parsed[SETTINGS_SECTION], filePath);
  let merged: Record<string, unknown> = {};

  for (const include of includes) {
    const includePath = isAbsolute(include) ? include : resolve(dirname(filePath), include);
    logger.debug('Loading included configuration file', { file: includePath, from: filePath });
    merged = deepMerge(merged, loadDocument(includePath, [...stack, filePath], files, logger));
  }

  files.push(filePath);
  return deepMerge(merged, stripIncludes(parsed));
}

function readIncludes(settings: unknown, filePath: string): string[] {
  if (!isRecord(settings) || settings.includes === undefined || settings.includes === null) {
    return [];
  }
  const { includes } = settings;
  if (!Array.isArray(includes) || includes.some(entry => typeof entry !== 'string' || !entry.trim())) {
    throw new ConfigError(
      'Config error: keel.includes must be a list of file paths',
      'ERR_CONFIG_INVALID',
      { filePath }
    );
  }
  return includes.filter((entry): entry is string => typeof entry === 'string');
}

function stripIncludes(document: Record<string, unknown>): Record<string, unknown> {
  const settings = document[SETTINGS_SECTION];
  if (!isRecord(settings) || !('includes' in settings)) {
    return document;
  }
  const { includes: _includes, ...rest } = settings;
  return { ...document, [SETTINGS_SECTION]: rest };
}

/**
 * Deep merge: mappings merge key by key, anything else (lists included)
 * is replaced by the override.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

/**
 * Validate the `keel` settings section.
 * THROWS ConfigError on unknown keys or wrong types.
 */
export function validateSettings(raw: unknown, filePath: string): KeelSettings {
  if (raw === undefined || raw === null) {
    return { metadata: { ...DEFAULT_SETTINGS.metadata } };
  }
  if (!isRecord(raw)) {
    throw new ConfigError(
      `Config error: ${SETTINGS_SECTION} must be a mapping, got ${describeType(raw)}`,
      'ERR_CONFIG_INVALID',
      { filePath }
    );
  }

  for (const key of Object.keys(raw)) {
    if (key !== 'version' && key !== 'metadata') {
      throw new ConfigError(
        `Config error: unknown setting ${SETTINGS_SECTION}.${key}`,
        'ERR_CONFIG_INVALID',
        { filePath }
      );
    }
  }

  const settings: KeelSettings = { metadata: { ...DEFAULT_SETTINGS.metadata } };

  if (raw.version !== undefined && raw.version !== null) {
    if (typeof raw.version !== 'string') {
      throw new ConfigError(
        `Config error: ${SETTINGS_SECTION}.version must be a string, got ${describeType(raw.version)}`,
        'ERR_CONFIG_INVALID',
        { filePath }
      );
    }
    settings.version = raw.version;
  }

  const metadata = raw.metadata;
  if (metadata !== undefined && metadata !== null) {
    if (!isRecord(metadata)) {
      throw new ConfigError(
        `Config error: ${SETTINGS_SECTION}.metadata must be a mapping, got ${describeType(metadata)}`,
        'ERR_CONFIG_INVALID',
        { filePath }
      );
    }
    for (const key of Object.keys(metadata)) {
      if (key !== 'url' && key !== 'timeout') {
        throw new ConfigError(
          `Config error: unknown setting ${SETTINGS_SECTION}.metadata.${key}`,
          'ERR_CONFIG_INVALID',
          { filePath }
        );
      }
    }
    if (metadata.url !== undefined) {
      if (typeof metadata.url !== 'string' || !isHttpUrl(metadata.url)) {
        throw new ConfigError(
          `Config error: ${SETTINGS_SECTION}.metadata.url must be an http(s) URL`,
          'ERR_CONFIG_INVALID',
          { filePath }
        );
      }
      settings.metadata.url = metadata.url;
    }
    if (metadata.timeout !== undefined) {
      if (typeof metadata.timeout !== 'number' || !Number.isFinite(metadata.timeout) || metadata.timeout <= 0) {
        throw new ConfigError(
          `Config error: ${SETTINGS_SECTION}.metadata.timeout must be a positive number of seconds`,
          'ERR_CONFIG_INVALID',
          { filePath }
        );
      }
      if (metadata.timeout > MAX_METADATA_TIMEOUT) {
        throw new ConfigError(
          `Config error: ${SETTINGS_SECTION}.metadata.timeout must not exceed ${MAX_METADATA_TIMEOUT} seconds`,
          'ERR_CONFIG_INVALID',
          { filePath }
        );
      }
      settings.metadata.timeout = metadata.timeout;
    }
  }

  return settings;
}

/**
 * Validate config version compatibility with the running keel version.
 * Compares major.minor.patch (pre-release tags are stripped).
 * No version in the config = no check.
 *
 * @param configVersion - Version string from config file (may be undefined)
 * @param currentVersion - Override for testing (defaults to KEEL_VERSION)
 */
export function validateVersion(configVersion: string | undefined, currentVersion?: string): void {
  if (configVersion === undefined) {
    return;
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty', 'ERR_CONFIG_INVALID');
  }

  const current = currentVersion ?? KEEL_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with keel ${current}`,
      'ERR_CONFIG_INVALID',
      {},
      `Set ${SETTINGS_SECTION}.version to "${currentSchema}" or remove it`
    );
  }
}

/**
 * YAML rendering of the loaded configuration, for debug dumps.
 */
export function configToYAML(config: KeelConfig): string {
  const document: Record<string, unknown> = { [SETTINGS_SECTION]: config.settings };
  for (const [plugin, section] of config.plugins) {
    document[plugin] = section;
  }
  return stringifyYAML(document);
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}
