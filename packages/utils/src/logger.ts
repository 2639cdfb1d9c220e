/**
 * Structured logging for git-handle
 *
 * Debug and warning output only appears when GIT_HANDLE_DEBUG=1, so library
 * consumers see nothing unless they ask for it. Errors always print.
 * Everything goes to stderr; stdout is reserved for command results.
 */

export type LogCategory =
  | 'git'
  | 'resolve'
  | 'config'
  | 'cli';

export const DEBUG_ENV_VAR = 'GIT_HANDLE_DEBUG';

function isDebugEnabled(): boolean {
  return process.env[DEBUG_ENV_VAR] === '1';
}

function prefix(level: 'DEBUG' | 'WARN' | 'ERROR', category: LogCategory): string {
  return `[${new Date().toISOString()}] [${level}] [${category}]`;
}

function printError(error: Error): void {
  console.error(`Error: ${error.message}`);
  if (error.stack) {
    console.error(error.stack);
  }
}

/**
 * Log a debug message
 * Only outputs when GIT_HANDLE_DEBUG=1
 *
 * @example
 * ```typescript
 * logDebug('git', 'Executing git', { args, cwd });
 * ```
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (!isDebugEnabled()) {
    return;
  }
  console.error(`${prefix('DEBUG', category)} ${message}`);
  if (metadata) {
    console.error(JSON.stringify(metadata, null, 2));
  }
}

/**
 * Log a warning (non-critical error)
 * Only outputs when GIT_HANDLE_DEBUG=1
 */
export function logWarning(category: LogCategory, message: string, error?: Error): void {
  if (!isDebugEnabled()) {
    return;
  }
  console.error(`${prefix('WARN', category)} ${message}`);
  if (error) {
    printError(error);
  }
}

/**
 * Log an error (critical failure)
 * Always outputs, even without GIT_HANDLE_DEBUG
 */
export function logError(category: LogCategory, message: string, error?: Error): void {
  console.error(`${prefix('ERROR', category)} ${message}`);
  if (error) {
    printError(error);
  }
}
