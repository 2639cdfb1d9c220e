/**
 * Error Reporting
 *
 * Maps library errors onto process exit codes:
 * - expected errors (typed results) exit with their errno-style code
 * - anything thrown (contract violations, spawn failures, bad config) exits 70
 */

import { describeGitError, toPosixError, type GitHandleError } from '@git-handle/git';
import { logDebug } from '@git-handle/utils';
import chalk from 'chalk';

/** EX_SOFTWARE from sysexits(3) */
export const EXIT_SOFTWARE = 70;

/**
 * Print an expected error and exit with its POSIX code
 */
export function exitWithError(error: GitHandleError): never {
  const posix = toPosixError(error);
  console.error(chalk.red(`❌ ${describeGitError(error)}`));
  logDebug('cli', `Exiting with code ${posix.code}`, { kind: error.kind });
  process.exit(posix.code);
}

/**
 * Print an unexpected error with its stack and exit 70
 */
export function exitWithFatal(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`❌ Fatal: ${message}`));
  if (error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }
  process.exit(EXIT_SOFTWARE);
}
