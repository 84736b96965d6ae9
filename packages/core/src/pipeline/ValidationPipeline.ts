/**
 * ValidationPipeline - the staged check behind `keel test-config`.
 *
 * Stages, in order:
 *
 *   1. Loading configuration            keel.yml (+ includes) parsed and checked
 *   2. Loading plugin managers          plugin filter resolved against installed plugins
 *   3. Loading instance configurations  every instance validated by its manager
 *   4. Checking configured plugins      at least one instance is configured
 *   5. Resolving instance dependencies  dependency graph built, execution order computed
 *   6. Fetching metadata                } only when an instance uses external metadata,
 *   7. Rendering metadata               } inside a temporary directory
 *
 * Each stage reads what earlier stages left in RunState and adds its own part.
 * The first failure aborts the run with PipelineError.
 */

import { stringify as stringifyYAML } from 'yaml';
import type { Dispatcher } from 'undici';
import type { ExecutionOrder, InstanceKey, Logger, PluginName, StageResult } from '@keel/types';
import { RunState } from './RunState.js';
import { StageRunner, type PipelineStep, type Stage } from './StageRunner.js';
import { configToYAML, loadConfig } from '../config/ConfigLoader.js';
import { loadInstanceConfigs } from '../config/InstanceConfigLoader.js';
import { loadManagers, type ManagerRegistry } from '../plugins/ManagerRegistry.js';
import { buildDependencyGraph } from '../core/buildDependencyGraph.js';
import { toposort } from '../core/toposort.js';
import { formatInstanceKey } from '../core/InstanceKey.js';
import { NoActiveConfigurationError } from '../errors/KeelError.js';
import { fetchMetadata } from '../metadata/fetchMetadata.js';
import { renderMetadata } from '../metadata/renderMetadata.js';
import { withTempDir, type TempDirOptions } from '../utils/tempDir.js';
import { silentLogger, withContext } from '../logging/Logger.js';

export const STAGES = {
  LOAD_CONFIG: 'Loading configuration',
  LOAD_MANAGERS: 'Loading plugin managers',
  LOAD_INSTANCES: 'Loading instance configurations',
  CHECK_PLUGINS: 'Checking configured plugins',
  RESOLVE_DEPENDENCIES: 'Resolving instance dependencies',
  FETCH_METADATA: 'Fetching metadata',
  RENDER_METADATA: 'Rendering metadata',
} as const;

/** Skip reason of the metadata stages when no instance needs metadata */
export const METADATA_NOT_REQUIRED = 'not required';

export interface ValidationPipelineOptions {
  configPath: string;
  /** Plugins to validate; empty means all installed */
  pluginFilter?: ReadonlySet<PluginName>;
  registry: ManagerRegistry;
  logger?: Logger;
  /** undici dispatcher for the metadata download */
  dispatcher?: Dispatcher;
  /** Where the metadata temp dir is created */
  tempDir?: TempDirOptions;
}

export interface ValidationResult {
  state: RunState;
  executionOrder: ExecutionOrder;
  report: StageResult[];
}

interface PipelineContext {
  state: RunState;
  logger: Logger;
  dispatcher?: Dispatcher;
  /** Set inside the metadata group only */
  metadataDir?: string;
  /** Instances rendered by the render stage */
  rendered: InstanceKey[];
}

/**
 * Validate a configuration file end to end.
 *
 * @throws PipelineError naming the failed stage; `cause` is the stage's own error
 */
export async function runValidationPipeline(options: ValidationPipelineOptions): Promise<ValidationResult> {
  const logger = options.logger ?? silentLogger;
  const state = new RunState(options.configPath, options.pluginFilter ?? new Set(), options.registry);
  const context: PipelineContext = { state, logger, dispatcher: options.dispatcher, rendered: [] };

  const runner = new StageRunner<PipelineContext>({ logger });
  const report = await runner.run(createStages(options.tempDir), context);

  return { state, executionOrder: state.executionOrder, report };
}

/**
 * Whether any loaded instance needs the metadata bundle. Stops at the first one.
 */
export function anyInstanceUsesMetadata(state: RunState): boolean {
  for (const [plugin, instances] of state.instanceConfigs) {
    const manager = state.managerFor(plugin);
    for (const config of instances.values()) {
      if (manager.usesExternalMetadata(config)) return true;
    }
  }
  return false;
}

function createStages(tempDir: TempDirOptions | undefined): PipelineStep<PipelineContext>[] {
  const loadConfiguration: Stage<PipelineContext> = {
    kind: 'stage',
    name: STAGES.LOAD_CONFIG,
    async run({ state, logger }) {
      state.config = loadConfig(state.configPath, state.pluginFilter, {
        installedPlugins: state.registry.names(),
        logger,
      });
    },
    describe({ state }, logger) {
      dumpLines(logger, 'Configuration:', configToYAML(state.config));
    },
  };

  const loadPluginManagers: Stage<PipelineContext> = {
    kind: 'stage',
    name: STAGES.LOAD_MANAGERS,
    async run({ state }) {
      state.managers = loadManagers(state.registry, state.pluginFilter);
    },
    describe({ state }, logger) {
      logger.debug('Managers loaded for the following plugins:');
      for (const plugin of state.managers.keys()) {
        logger.debug(`  - ${plugin}`);
      }
    },
  };

  const loadInstances: Stage<PipelineContext> = {
    kind: 'stage',
    name: STAGES.LOAD_INSTANCES,
    async run({ state, logger }) {
      state.instanceConfigs = loadInstanceConfigs(state.config, state.managers, logger);
    },
    describe({ state }, logger) {
      for (const [plugin, instances] of state.instanceConfigs) {
        const manager = state.managerFor(plugin);
        for (const [instance, config] of instances) {
          dumpLines(
            withContext(logger, { plugin, instance }),
            'Instance configuration:',
            stringifyYAML(manager.dumpInstanceConfig(config))
          );
        }
      }
    },
  };

  const checkPlugins: Stage<PipelineContext> = {
    kind: 'stage',
    name: STAGES.CHECK_PLUGINS,
    async run({ state }) {
      if (state.activePlugins.length === 0) {
        throw new NoActiveConfigurationError(undefined, { plugins: [...state.managers.keys()] });
      }
    },
    describe({ state }, logger) {
      logger.debug(`Running with plugins: ${state.activePlugins.join(', ')}`);
    },
  };

  const resolveDependencies: Stage<PipelineContext> = {
    kind: 'stage',
    name: STAGES.RESOLVE_DEPENDENCIES,
    async run({ state }) {
      const graph = buildDependencyGraph(state.instanceConfigs, state.managers);
      state.executionOrder = toposort(graph);
    },
    describe({ state }, logger) {
      logger.debug('Execution order:');
      state.executionOrder.forEach((key, index) => {
        logger.debug(`  ${index + 1}. ${formatInstanceKey(key)}`);
      });
    },
  };

  const fetchStage: Stage<PipelineContext> = {
    kind: 'stage',
    name: STAGES.FETCH_METADATA,
    async run({ state, logger, dispatcher, metadataDir }) {
      const result = await fetchMetadata(requireMetadataDir(metadataDir), state.config.settings.metadata, {
        dispatcher,
        logger,
      });
      logger.debug(`Fetched metadata version ${result.version} (${result.files.length} files)`);
    },
  };

  const renderStage: Stage<PipelineContext> = {
    kind: 'stage',
    name: STAGES.RENDER_METADATA,
    async run(context) {
      context.rendered = await renderMetadata(context.state, requireMetadataDir(context.metadataDir), context.logger);
    },
    describe({ state, rendered }, logger) {
      for (const key of rendered) {
        const config = state.instanceConfigs.get(key.plugin)?.get(key.instance);
        if (!config) continue;
        dumpLines(
          withContext(logger, { plugin: key.plugin, instance: key.instance }),
          'Rendered instance configuration:',
          stringifyYAML(state.managerFor(key.plugin).dumpInstanceConfig(config))
        );
      }
    },
  };

  return [
    loadConfiguration,
    loadPluginManagers,
    loadInstances,
    checkPlugins,
    resolveDependencies,
    {
      kind: 'group',
      name: 'Metadata',
      when({ state }) {
        state.usesExternalMetadata = anyInstanceUsesMetadata(state);
        return state.usesExternalMetadata;
      },
      skipReason: METADATA_NOT_REQUIRED,
      async scope(context, body) {
        context.logger.debug('Creating metadata directory');
        await withTempDir(async (dir) => {
          const scoped: PipelineContext = { ...context, metadataDir: dir };
          await body(scoped);
        }, tempDir);
      },
      stages: [fetchStage, renderStage],
    },
  ];
}

function requireMetadataDir(dir: string | undefined): string {
  if (dir === undefined) {
    throw new Error('Metadata stage ran outside the metadata directory scope');
  }
  return dir;
}

function dumpLines(logger: Logger, title: string, text: string): void {
  logger.debug(title);
  for (const line of text.trimEnd().split('\n')) {
    logger.debug(`  ${line}`);
  }
}
