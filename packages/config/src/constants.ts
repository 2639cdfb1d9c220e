/**
 * Configuration Constants
 *
 * Single source of truth for default values. Used by the schema defaults and
 * by the CLI when no configuration file is found.
 *
 * @packageDocumentation
 */

/**
 * Default git-handle configuration values
 *
 * @example
 * ```typescript
 * import { GIT_HANDLE_DEFAULTS } from '@git-handle/config';
 *
 * const remote = options.remote ?? config.git.remote ?? GIT_HANDLE_DEFAULTS.REMOTE;
 * ```
 */
export const GIT_HANDLE_DEFAULTS = {
  /**
   * Git binary, resolved on PATH
   */
  BINARY: 'git' as const,

  /**
   * Remote used when a command names none
   * Common alternatives: 'upstream' (for forked repositories)
   */
  REMOTE: 'origin' as const,
} as const;

export type GitHandleDefaults = typeof GIT_HANDLE_DEFAULTS;

/**
 * Variables that locate the repository. Set per invocation from the resolved
 * context, so configuration may not override them.
 */
export const RESERVED_ENV_VARS = ['GIT_DIR', 'GIT_WORK_TREE'] as const;
