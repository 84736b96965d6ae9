/**
 * test-config command - validate a keel configuration file
 *
 * Runs the validation pipeline and reports each stage. Exit code 0 when the
 * configuration is valid, 1 otherwise.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import type { Dispatcher } from 'undici';
import {
  DEFAULT_CONFIG_FILE,
  KEEL_VERSION,
  LOG_LEVELS,
  MultiLogger,
  PipelineError,
  createLogger,
  formatInstanceKey,
  isLogLevel,
  runValidationPipeline,
  stageResultToJSON,
  type Logger,
  type ManagerRegistry,
} from '@keel/core';
import { createBuiltinRegistry } from '../plugins/builtinPlugins.js';
import { formatError, printError } from '../utils/errorFormatter.js';

export const SUCCESS_MESSAGE = 'Configuration test successful.';

export interface TestConfigOptions {
  plugin?: string[];
  logLevel?: string;
  logFile?: string;
  json?: boolean;
}

/**
 * Collaborators of the action; tests replace them.
 */
export interface TestConfigIO {
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  registry?: ManagerRegistry;
  /** Used instead of a logger built from --log-level/--log-file */
  logger?: Logger;
  dispatcher?: Dispatcher;
}

/**
 * Validate `configPath` and report the outcome.
 *
 * @returns Process exit code
 */
export async function testConfigAction(
  configPath: string,
  options: TestConfigOptions,
  io: TestConfigIO = {}
): Promise<number> {
  const stdout = io.stdout ?? ((line: string) => console.log(line));
  const stderr = io.stderr ?? ((line: string) => console.error(line));

  const logLevel = options.logLevel ?? 'info';
  if (!isLogLevel(logLevel)) {
    printError(
      `Invalid log level: ${logLevel}`,
      [`Use one of: ${LOG_LEVELS.join(', ')}`],
      stderr
    );
    return 1;
  }

  let logger: Logger;
  try {
    logger = io.logger ?? createLogger(logLevel, options.logFile ? { logFile: options.logFile } : undefined);
  } catch (error) {
    const { title, nextSteps } = formatError(error);
    printError(title, nextSteps, stderr);
    return 1;
  }

  const registry = io.registry ?? createBuiltinRegistry();
  const pluginFilter = new Set(options.plugin ?? []);
  const absolutePath = resolve(configPath);

  logger.info(`keel version ${KEEL_VERSION} (log level: ${logLevel})`);
  logger.info(`Loaded plugins: ${registry.names().join(', ') || '(none)'}`);
  logger.info(`Testing configuration file: ${absolutePath}`);

  try {
    const result = await runValidationPipeline({
      configPath: absolutePath,
      pluginFilter,
      registry,
      logger,
      dispatcher: io.dispatcher,
    });

    if (options.json) {
      stdout(JSON.stringify({
        ok: true,
        executionOrder: result.executionOrder.map(formatInstanceKey),
        report: result.report.map(stageResultToJSON),
      }, null, 2));
    } else {
      logger.info(SUCCESS_MESSAGE);
      stdout(SUCCESS_MESSAGE);
    }
    return 0;
  } catch (error) {
    if (options.json && error instanceof PipelineError) {
      stdout(JSON.stringify({
        ok: false,
        error: error.toJSON(),
        report: error.report.map(stageResultToJSON),
      }, null, 2));
    } else {
      const { title, nextSteps } = formatError(error);
      printError(title, nextSteps, stderr);
    }
    return 1;
  } finally {
    if (logger instanceof MultiLogger) {
      await logger.close();
    }
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export const testConfigCommand = new Command('test-config')
  .description('Validate a keel configuration file')
  .argument('[config-path]', 'Configuration file to test', DEFAULT_CONFIG_FILE)
  .option('-p, --plugin <name>', 'Only validate this plugin (repeatable)', collect, [])
  .option('--log-level <level>', `Log level: ${LOG_LEVELS.join(', ')}`, 'info')
  .option('--log-file <path>', 'Also write debug logs to this file')
  .option('--json', 'Print the stage report and execution order as JSON')
  .addHelpText('after', `
Examples:
  keel test-config                         Test ./keel.yml
  keel test-config config/keel.yml         Test a specific file
  keel test-config -p series               Only validate the series plugin
  keel test-config --log-level debug       Dump each stage's result
  keel test-config --json                  Machine-readable report
`)
  .action(async (configPath: string, options: TestConfigOptions) => {
    process.exitCode = await testConfigAction(configPath, options);
  });
