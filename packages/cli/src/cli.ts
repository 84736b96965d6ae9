#!/usr/bin/env node
/**
 * @keel/cli - CLI for the keel configuration validator
 */

import { Command } from 'commander';
import { KEEL_VERSION } from '@keel/core';
import { testConfigCommand } from './commands/testConfig.js';
import { pluginsCommand } from './commands/plugins.js';
import { exitWithError, formatError } from './utils/errorFormatter.js';

const program = new Command();

program
  .name('keel')
  .description('Validate keel instance configurations')
  .version(KEEL_VERSION);

program.addCommand(testConfigCommand);
program.addCommand(pluginsCommand);

program.parseAsync().catch((error: unknown) => {
  const { title, nextSteps } = formatError(error);
  exitWithError(title, nextSteps);
});
