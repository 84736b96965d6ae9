/**
 * @keel/core - instance dependency resolution and configuration validation
 */

// Error types
export {
  KeelError,
  ConfigError,
  ManagerLoadError,
  InstanceConfigError,
  NoActiveConfigurationError,
  DanglingDependencyError,
  CyclicDependencyError,
  FetchError,
  RenderError,
  PipelineError,
} from './errors/KeelError.js';
export type { ErrorContext, ErrorSeverity, KeelErrorJSON } from './errors/KeelError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  ScopedLogger,
  createLogger,
  withContext,
  silentLogger,
  isLogLevel,
  formatMessage,
} from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Config
export {
  loadConfig,
  deepMerge,
  validateSettings,
  validateVersion,
  configToYAML,
  DEFAULT_CONFIG_FILE,
  DEFAULT_METADATA_TIMEOUT,
  MAX_METADATA_TIMEOUT,
  DEFAULT_SETTINGS,
  SETTINGS_SECTION,
} from './config/ConfigLoader.js';
export type { KeelConfig, KeelSettings, MetadataSettings, LoadConfigOptions } from './config/ConfigLoader.js';
export { loadInstanceConfigs, DEFAULT_INSTANCE_NAME } from './config/InstanceConfigLoader.js';
export {
  isRecord,
  readString,
  readOptionalString,
  readPort,
  readNumber,
  readEnum,
  readRecord,
  parseReference,
  readReferences,
} from './config/fields.js';

// Dependency resolution
export {
  formatInstanceKey,
  instanceKeyId,
  compareNames,
  compareInstanceKeys,
  resolveReference,
} from './core/InstanceKey.js';
export { buildDependencyGraph } from './core/buildDependencyGraph.js';
export { toposort } from './core/toposort.js';

// Plugins
export { InstanceManager, BASE_FIELDS } from './plugins/InstanceManager.js';
export { ManagerRegistry, loadManagers } from './plugins/ManagerRegistry.js';
export { SeriesManager, isGuideProfile, QUALITY_PROFILE_DIR } from './plugins/managers/SeriesManager.js';
export type { SeriesInstanceConfig, QualityProfile, GuideQualityProfile } from './plugins/managers/SeriesManager.js';
export { IndexerManager, SYNC_TARGET_PLUGINS } from './plugins/managers/IndexerManager.js';
export type { IndexerInstanceConfig } from './plugins/managers/IndexerManager.js';

// Metadata
export { fetchMetadata, parseBundle, classifyRequestError } from './metadata/fetchMetadata.js';
export type { MetadataBundle, FetchMetadataOptions, FetchMetadataResult } from './metadata/fetchMetadata.js';
export { renderMetadata } from './metadata/renderMetadata.js';

// Pipeline
export { RunState } from './pipeline/RunState.js';
export { StageRunner, stageResultToJSON } from './pipeline/StageRunner.js';
export type { Stage, StageGroup, PipelineStep, StageRunnerDeps } from './pipeline/StageRunner.js';
export {
  runValidationPipeline,
  anyInstanceUsesMetadata,
  STAGES,
  METADATA_NOT_REQUIRED,
} from './pipeline/ValidationPipeline.js';
export type { ValidationPipelineOptions, ValidationResult } from './pipeline/ValidationPipeline.js';

// Utils
export { withTempDir } from './utils/tempDir.js';
export type { TempDirOptions } from './utils/tempDir.js';

// Version
export { KEEL_VERSION, findKeelVersion, getSchemaVersion } from './version.js';

// Re-export types for consumers
export type {
  PluginName,
  InstanceName,
  InstanceKey,
  InstanceReference,
  InstanceConfig,
  InstanceConfigMap,
  PluginInstanceConfigs,
  DependencyEdge,
  DependencyGraph,
  ExecutionOrder,
  IInstanceManager,
  ManagerMetadata,
  StageOutcome,
  StageResult,
  StageResultJSON,
  StageStatus,
} from '@keel/types';
export { STAGE_STATUS, LOG_LEVELS } from '@keel/types';
