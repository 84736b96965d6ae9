/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { KeelError } from '@keel/core';

export interface FormattedError {
  title: string;
  nextSteps: string[];
}

/**
 * Title and next steps for any thrown value.
 */
export function formatError(error: unknown): FormattedError {
  if (error instanceof KeelError) {
    return {
      title: error.message,
      nextSteps: error.suggestion ? [error.suggestion] : [],
    };
  }
  return {
    title: error instanceof Error ? error.message : String(error),
    nextSteps: [],
  };
}

/**
 * Print a standardized error message.
 *
 * @param title - Main error message
 * @param nextSteps - Optional actionable suggestions
 * @param write - Line sink (default: console.error)
 *
 * @example
 * printError('Loading configuration: Config file not found: keel.yml', [
 *   'Create keel.yml or pass the path to an existing file',
 * ]);
 */
export function printError(
  title: string,
  nextSteps: string[] = [],
  write: (line: string) => void = (line) => console.error(line)
): void {
  write(`✗ ${title}`);

  if (nextSteps.length > 0) {
    write('');
    for (const step of nextSteps) {
      write(`→ ${step}`);
    }
  }
}

/**
 * Print a standardized error message and exit with code 1.
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  printError(title, nextSteps);
  process.exit(1);
}
