/**
 * Invocation building
 *
 * Turns a resolved context plus an argument list into a {@link GitInvocation}.
 */

import type { GitInvocation } from './git-executor.js';
import type { RepositoryContext } from './types.js';

export interface InvocationOptions {
  /** Run somewhere other than the work tree (e.g., a subdirectory) */
  cwd?: string;
  /** Content written to git's stdin */
  stdin?: string;
}

/**
 * Build the invocation for running git against a context
 *
 * - GIT_DIR is always the context's metadata directory
 * - normal contexts also get GIT_WORK_TREE, and run inside the work tree
 * - bare contexts run in the caller's working directory
 *
 * @example
 * ```typescript
 * buildInvocation(context, ['rev-parse', 'HEAD']);
 * // { args: ['rev-parse', 'HEAD'],
 * //   env: { GIT_DIR: '/src/app/.git', GIT_WORK_TREE: '/src/app' },
 * //   cwd: '/src/app' }
 * ```
 */
export function buildInvocation(
  context: RepositoryContext,
  args: readonly string[],
  options: InvocationOptions = {}
): GitInvocation {
  const invocation: GitInvocation =
    context.kind === 'normal'
      ? {
          args,
          env: { GIT_DIR: context.gitDir, GIT_WORK_TREE: context.workTree },
          cwd: context.workTree,
        }
      : {
          args,
          env: { GIT_DIR: context.gitDir },
        };

  if (options.cwd !== undefined) {
    invocation.cwd = options.cwd;
  }
  if (options.stdin !== undefined) {
    invocation.stdin = options.stdin;
  }
  return invocation;
}
