/**
 * Git Process Execution
 *
 * Every git invocation made by git-handle goes through a {@link GitExecutor}.
 * The production implementation spawns the git binary; tests substitute a
 * scripted executor that returns canned outcomes.
 *
 * Principles:
 * 1. spawnSync with array arguments (never string interpolation, never a shell)
 * 2. The repository location is passed through GIT_DIR / GIT_WORK_TREE only,
 *    never inherited from the calling process
 * 3. Output is captured in full as bytes; decoding is the caller's decision
 * 4. No timeout and no retry: a hung git blocks the caller
 *
 * @packageDocumentation
 */

import { logDebug, safeExecResult } from '@git-handle/utils';

import { GitSpawnError } from './errors.js';

/**
 * A fully built request to run git once
 */
export interface GitInvocation {
  /** Sub-command followed by its arguments, in order */
  args: readonly string[];
  /** Variables layered on top of the executor's base environment */
  env: Readonly<Record<string, string>>;
  /** Working directory (default: the caller's) */
  cwd?: string;
  /** Content written to git's stdin */
  stdin?: string;
}

/**
 * What a single git run produced
 */
export interface GitOutcome {
  /** Exit code; -1 when the process never ran or was killed by a signal */
  exitCode: number;
  stdout: Buffer;
  stderr: Buffer;
  /** Set only when the process could not be spawned */
  error?: Error;
}

/**
 * The capability to run git
 */
export interface GitExecutor {
  execute(invocation: GitInvocation): GitOutcome;
}

/**
 * Variables through which git locates a repository. They are removed from the
 * inherited environment so a wrapper running inside a git hook (where git
 * exports GIT_DIR and GIT_INDEX_FILE) still operates on its own context.
 */
export const REPOSITORY_ENV_VARS = [
  'GIT_DIR',
  'GIT_WORK_TREE',
  'GIT_INDEX_FILE',
  'GIT_COMMON_DIR',
  'GIT_OBJECT_DIRECTORY',
  'GIT_ALTERNATE_OBJECT_DIRECTORIES',
  'GIT_NAMESPACE',
] as const;

export interface ProcessGitExecutorOptions {
  /**
   * Command name or path of the git binary
   * @default 'git'
   */
  binary?: string;

  /** Extra variables set for every invocation */
  env?: Readonly<Record<string, string>>;
}

function toBuffer(value: Buffer | string): Buffer {
  return Buffer.isBuffer(value) ? value : Buffer.from(value);
}

/**
 * Executor that spawns the real git binary
 *
 * @example
 * ```typescript
 * const executor = new ProcessGitExecutor({ env: { GIT_TERMINAL_PROMPT: '0' } });
 * const outcome = executor.execute({ args: ['--version'], env: {} });
 * ```
 */
export class ProcessGitExecutor implements GitExecutor {
  private readonly binary: string;
  private readonly extraEnv: Readonly<Record<string, string>>;

  constructor(options: ProcessGitExecutorOptions = {}) {
    this.binary = options.binary ?? 'git';
    this.extraEnv = options.env ?? {};
  }

  execute(invocation: GitInvocation): GitOutcome {
    logDebug('git', `Executing ${this.binary} ${invocation.args.join(' ')}`, {
      cwd: invocation.cwd ?? process.cwd(),
      env: invocation.env,
    });

    const result = safeExecResult(this.binary, [...invocation.args], {
      env: this.buildEnv(invocation.env),
      cwd: invocation.cwd,
      input: invocation.stdin,
    });

    logDebug('git', `Exited with code ${result.status}`);

    return {
      exitCode: result.status,
      stdout: toBuffer(result.stdout),
      stderr: toBuffer(result.stderr),
      ...(result.error && { error: result.error }),
    };
  }

  private buildEnv(invocationEnv: Readonly<Record<string, string>>): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...process.env };
    for (const name of REPOSITORY_ENV_VARS) {
      delete env[name];
    }
    return { ...env, ...this.extraEnv, ...invocationEnv };
  }
}

/**
 * Execute an invocation, treating a failure to spawn as fatal
 *
 * @throws GitSpawnError if git could not be started
 */
export function runGit(executor: GitExecutor, invocation: GitInvocation): GitOutcome {
  const outcome = executor.execute(invocation);
  if (outcome.error) {
    throw new GitSpawnError(invocation.args, outcome.error);
  }
  return outcome;
}
