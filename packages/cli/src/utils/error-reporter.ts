/**
 * Error Reporting
 *
 * Prints command failures and maps them to exit codes:
 * - 0: success
 * - 1: publish action failed (resumable)
 * - 2: configuration, structural or checkpoint error (nothing was published)
 */

import { ConfigLoadError } from '@crateflow/config';
import { isCrateflowError } from '@crateflow/core';
import { logError } from '@crateflow/utils';
import chalk from 'chalk';

export const EXIT_SUCCESS = 0;
export const EXIT_PUBLISH_FAILED = 1;
export const EXIT_CONFIGURATION_ERROR = 2;

/**
 * Exit code for an error thrown by a command
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigLoadError) {
    return EXIT_CONFIGURATION_ERROR;
  }
  if (isCrateflowError(error)) {
    return error.kind === 'action' ? EXIT_PUBLISH_FAILED : EXIT_CONFIGURATION_ERROR;
  }
  return EXIT_PUBLISH_FAILED;
}

/**
 * Suggest a next step for errors that have an obvious one
 */
function hintFor(error: unknown): string | undefined {
  if (!isCrateflowError(error)) {
    return undefined;
  }
  switch (error.code) {
    case 'MISSING_WORKSPACE':
      return 'Run inside a Cargo workspace or pass --workspace-root <dir>';
    case 'CIRCULAR_DEPENDENCY':
      return 'Break the cycle (e.g. move shared code into a new crate) before publishing';
    case 'CHECKPOINT_CORRUPT':
    case 'CHECKPOINT_STALE':
      return 'Inspect it with "crateflow checkpoint show", or remove it with "crateflow checkpoint clear"';
    default:
      return undefined;
  }
}

/**
 * Print an error to stderr and return the exit code to use
 *
 * crateflow and config errors get a one-line message and a hint; anything
 * else goes through `logError` with its stack.
 *
 * @example
 * ```typescript
 * } catch (error) {
 *   process.exit(reportCommandError(error));
 * }
 * ```
 */
export function reportCommandError(error: unknown): number {
  if (!isCrateflowError(error) && !(error instanceof ConfigLoadError)) {
    // Anything else is unexpected: keep the stack trace
    logError('cli', 'Unexpected failure', error instanceof Error ? error : new Error(String(error)));
    return exitCodeFor(error);
  }

  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`❌ ${message}`));

  const hint = hintFor(error);
  if (hint !== undefined) {
    console.error(chalk.gray(`   ${hint}`));
  }

  return exitCodeFor(error);
}
