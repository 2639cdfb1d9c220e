/**
 * @git-handle/utils
 *
 * Common utilities for git-handle packages.
 * This is the foundational package with NO dependencies on other git-handle packages.
 *
 * @package @git-handle/utils
 */

// Safe command execution (no shell, PATH resolved with `which`)
export {
  safeExecSync,
  safeExecResult,
  isToolAvailable,
  getToolVersion,
  CommandExecutionError,
  type SafeExecOptions,
  type SafeExecResult
} from './safe-exec.js';

// Canonical temp paths for test fixtures
export {
  normalizedTmpdir,
  mkdirSyncReal,
  makeTempDir
} from './path-helpers.js';

// Structured stderr logging
export {
  logDebug,
  logWarning,
  logError,
  DEBUG_ENV_VAR,
  type LogCategory
} from './logger.js';
