/**
 * Git Test Helpers
 *
 * Two kinds of support for tests:
 * - {@link ScriptedGitExecutor}: a {@link GitExecutor} that records every
 *   invocation and answers from a queue of canned outcomes, so classification
 *   logic can be tested without git installed
 * - real-repository helpers that set up fixtures with the git binary; all
 *   fixture git commands go through here
 */

import { writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { safeExecSync } from '@git-handle/utils';

import type { GitExecutor, GitInvocation, GitOutcome } from './git-executor.js';

/**
 * Build a canned outcome
 *
 * @example
 * outcome(0, 'abc123\n');
 * outcome(128, '', 'fatal: bad revision');
 */
export function outcome(exitCode: number, stdout: string | Buffer = '', stderr = ''): GitOutcome {
  return {
    exitCode,
    stdout: Buffer.isBuffer(stdout) ? stdout : Buffer.from(stdout),
    stderr: Buffer.from(stderr),
  };
}

/**
 * Outcome of a git binary that could not be started
 */
export function spawnFailure(message = 'spawn git ENOENT'): GitOutcome {
  return { exitCode: -1, stdout: Buffer.alloc(0), stderr: Buffer.alloc(0), error: new Error(message) };
}

/**
 * Executor answering from a queue
 *
 * Once the queue is empty every further invocation gets `fallback`
 * (exit 0, no output, unless overridden).
 *
 * @example
 * const executor = new ScriptedGitExecutor([outcome(0, 'true\n')]);
 * isBareGitDir(gitDir, executor); // true
 * executor.invocations[0].args;   // ['--git-dir', gitDir, 'rev-parse', '--is-bare-repository']
 */
export class ScriptedGitExecutor implements GitExecutor {
  public readonly invocations: GitInvocation[] = [];
  private readonly queue: GitOutcome[];
  private readonly fallback: GitOutcome;

  constructor(outcomes: GitOutcome[] = [], fallback: GitOutcome = outcome(0)) {
    this.queue = [...outcomes];
    this.fallback = fallback;
  }

  execute(invocation: GitInvocation): GitOutcome {
    this.invocations.push(invocation);
    return this.queue.shift() ?? this.fallback;
  }

  /** Argument lists of every invocation so far, in order */
  get argLists(): string[][] {
    return this.invocations.map((invocation) => [...invocation.args]);
  }
}

/**
 * Run git in a fixture directory and return trimmed stdout
 */
export function gitInTestDir(repoPath: string, args: string[]): string {
  return safeExecSync('git', args, { cwd: repoPath, encoding: 'utf8', stdio: 'pipe' })
    .toString()
    .trim();
}

/**
 * Initialize a git repository for testing, with a fixed default branch
 */
export function initTestRepo(repoPath: string, branch = 'main'): void {
  safeExecSync('git', ['init', '--quiet', '--initial-branch', branch], { cwd: repoPath, stdio: 'pipe' });
}

/**
 * Initialize a bare repository for testing
 */
export function initBareTestRepo(repoPath: string, branch = 'main'): void {
  safeExecSync('git', ['init', '--quiet', '--bare', '--initial-branch', branch], { cwd: repoPath, stdio: 'pipe' });
}

/**
 * Configure git user for test repository
 */
export function configTestUser(
  repoPath: string,
  email = 'test@example.com',
  name = 'Test User'
): void {
  safeExecSync('git', ['config', 'user.email', email], { cwd: repoPath, stdio: 'pipe' });
  safeExecSync('git', ['config', 'user.name', name], { cwd: repoPath, stdio: 'pipe' });
}

/**
 * Write a file, stage everything and commit
 *
 * @returns the new commit id
 *
 * @example
 * const first = commitTestFile(testDir, 'README.md', '# demo\n', 'Initial commit');
 */
export function commitTestFile(repoPath: string, file: string, content: string, message: string): string {
  writeFileSync(join(repoPath, file), content);
  safeExecSync('git', ['add', '--', file], { cwd: repoPath, stdio: 'pipe' });
  safeExecSync('git', ['commit', '--quiet', '-m', message], { cwd: repoPath, stdio: 'pipe' });
  return gitInTestDir(repoPath, ['rev-parse', 'HEAD']);
}

/**
 * Initialized repository with a configured user and one commit of `README.md`
 *
 * @returns the commit id
 */
export function setupTestRepoWithCommit(repoPath: string, branch = 'main'): string {
  initTestRepo(repoPath, branch);
  configTestUser(repoPath);
  return commitTestFile(repoPath, 'README.md', '# test\n', 'Initial commit');
}
