/**
 * Repository handle
 *
 * A {@link Repository} pairs a resolved, immutable {@link RepositoryContext}
 * with the {@link GitExecutor} used to run git against it. Every operation is
 * one (sometimes two) synchronous git runs followed by classification:
 *
 *   built → executed → success | expected failure (Result err) | contract violation (thrown)
 *
 * Nothing is retried and nothing is cached between calls. Handles may be shared
 * for reading, but mutating operations (stage, commit, reset, subtree) on the
 * same work tree must not run concurrently; git's index lock is the only guard.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { toAbsoluteDirPath } from './absolute-dir-path.js';
import {
  gitFailure,
  GitContractViolation,
  type CommitError,
  type ConfigReadError,
  type GitFailure,
  type InvalidCommitishError,
  type InvalidRefError,
  type ReadFileError,
  type RefSearchError,
  type ResolutionError,
  type StagingError,
  type SubtreeAddError,
  type SubtreePullError,
  type SubtreePushError,
  type SubtreeSplitError,
} from './errors.js';
import { ProcessGitExecutor, runGit, type GitExecutor, type GitOutcome } from './git-executor.js';
import { buildInvocation, type InvocationOptions } from './invocation.js';
import {
  decodeStrict,
  extractRefName,
  parseRefLine,
  parseRemotes,
  splitLines,
  trimOutput,
} from './output-parsing.js';
import { discover, gitDirFromWorkTree, makeContext, resolveContext, type ResolveOptions } from './resolver.js';
import type { AbsoluteDirPath, Remote, RemoteRefLine, RepositoryContext } from './types.js';

function stderrText(outcome: GitOutcome): string {
  return outcome.stderr.toString('utf8');
}

function failureOf(outcome: GitOutcome): GitFailure {
  return gitFailure(stderrText(outcome), outcome.exitCode);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class Repository {
  public readonly context: RepositoryContext;
  private readonly executor: GitExecutor;

  constructor(context: RepositoryContext, executor: GitExecutor = new ProcessGitExecutor()) {
    this.context = context;
    this.executor = executor;
  }

  // -------------------------------------------------------------------------
  // Constructors
  // -------------------------------------------------------------------------

  /**
   * Resolve a repository the way git does: GIT_DIR / GIT_WORK_TREE, then an
   * upward search from the working directory. Pass hints to override.
   */
  static open(options: ResolveOptions = {}): Result<Repository, ResolutionError> {
    const executor = options.executor ?? new ProcessGitExecutor();
    return resolveContext({ ...options, executor }).map((context) => new Repository(context, executor));
  }

  /**
   * Resolve from the three command-line style inputs (`-C`, `--git-dir`,
   * `--work-tree`). With all three absent this reads the environment.
   */
  static fromArgs(
    root: string | undefined,
    gitDir: string | undefined,
    workTree: string | undefined,
    executor?: GitExecutor
  ): Result<Repository, ResolutionError> {
    return Repository.open({ root, gitDir, workTree, executor });
  }

  /**
   * Search upwards from `path`
   */
  static discover(path: string, executor: GitExecutor = new ProcessGitExecutor()): Result<Repository, ResolutionError> {
    return discover(path, executor).map((context) => new Repository(context, executor));
  }

  /**
   * Run `git init` and return a handle on the new repository
   */
  static create(
    path: string,
    executor: GitExecutor = new ProcessGitExecutor()
  ): Result<Repository, GitFailure | ResolutionError> {
    const outcome = runGit(executor, { args: ['init', '--quiet', path], env: {} });
    if (outcome.exitCode !== 0) {
      return err(failureOf(outcome));
    }

    return toAbsoluteDirPath(path).andThen((workTree) =>
      gitDirFromWorkTree(workTree).map(
        (gitDir) => new Repository(makeContext(gitDir, workTree), executor)
      )
    );
  }

  /**
   * Run `git init --bare` and return a handle on the new repository
   */
  static createBare(
    path: string,
    executor: GitExecutor = new ProcessGitExecutor()
  ): Result<Repository, GitFailure | ResolutionError> {
    const outcome = runGit(executor, { args: ['init', '--quiet', '--bare', path], env: {} });
    if (outcome.exitCode !== 0) {
      return err(failureOf(outcome));
    }

    return toAbsoluteDirPath(path).map((gitDir) => new Repository(makeContext(gitDir, null), executor));
  }

  // -------------------------------------------------------------------------
  // Getters
  // -------------------------------------------------------------------------

  isBare(): boolean {
    return this.context.kind === 'bare';
  }

  gitDir(): AbsoluteDirPath {
    return this.context.gitDir;
  }

  workTree(): AbsoluteDirPath | null {
    return this.context.kind === 'normal' ? this.context.workTree : null;
  }

  /**
   * Whether sparse checkout has been initialised
   */
  isSparse(): boolean {
    return existsSync(join(this.context.gitDir, 'info', 'sparse-checkout'));
  }

  /**
   * Clean means: no unstaged changes to tracked files, and HEAD points at a
   * commit. A freshly initialised repository is therefore not clean.
   */
  isClean(): boolean {
    if (this.run(['diff', '--quiet']).exitCode !== 0) {
      return false;
    }
    return this.run(['rev-parse', 'HEAD']).exitCode === 0;
  }

  /**
   * Commit id of HEAD, or null when HEAD does not resolve (unborn branch)
   */
  head(): string | null {
    const outcome = this.run(['rev-parse', 'HEAD']);
    return outcome.exitCode === 0 ? trimOutput(outcome.stdout) : null;
  }

  shortRef(longRef: string): Result<string, InvalidRefError> {
    const outcome = this.run(['rev-parse', '--short', longRef]);
    if (outcome.exitCode !== 0) {
      return err({ kind: 'invalid-ref', ref: longRef });
    }
    return ok(trimOutput(outcome.stdout));
  }

  /**
   * Configured remotes keyed by name
   *
   * @throws GitContractViolation if a line of `git remote -v` cannot be parsed
   */
  remotes(): Result<Map<string, Remote>, GitFailure> {
    const args = ['remote', '-v'];
    const outcome = this.run(args);
    if (outcome.exitCode !== 0) {
      return err(failureOf(outcome));
    }

    const parsed = parseRemotes(outcome.stdout.toString('utf8'));
    if (parsed.isErr()) {
      throw new GitContractViolation(`Unparseable line "${parsed.error.line}"`, args, outcome.exitCode, stderrText(outcome));
    }
    return ok(parsed.value);
  }

  // -------------------------------------------------------------------------
  // Operations
  // -------------------------------------------------------------------------

  /**
   * Read a config value
   *
   * Documented exit codes of git-config(1) for reads are 0, 1 and 3.
   *
   * @throws GitContractViolation for any other exit code
   */
  config(key: string): Result<string, ConfigReadError> {
    const args = ['config', key];
    const outcome = this.run(args);

    switch (outcome.exitCode) {
      case 0:
        return ok(trimOutput(outcome.stdout));
      case 1:
        return err({ kind: 'invalid-section-or-key', key });
      case 3:
        return err({ kind: 'invalid-config-file', message: stderrText(outcome) });
      default:
        throw new GitContractViolation('Unexpected git-config exit code', args, outcome.exitCode, stderrText(outcome));
    }
  }

  /**
   * Read a file's bytes: from the work tree when there is one, otherwise
   * the staged version via `git show :<path>`
   */
  readFile(path: string): Result<Buffer, ReadFileError> {
    if (this.context.kind === 'normal') {
      const absolutePath = resolve(this.context.workTree, path);
      try {
        return ok(readFileSync(absolutePath));
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          return err({ kind: 'file-not-found', path });
        }
        return err({
          kind: 'io-error',
          path,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const outcome = this.run(['show', `:${path}`]);
    if (outcome.exitCode === 0) {
      return ok(outcome.stdout);
    }
    if (outcome.exitCode === 128) {
      return err({ kind: 'file-not-found', path });
    }
    return err(failureOf(outcome));
  }

  isAncestor(first: string, second: string): boolean {
    return this.run(['merge-base', '--is-ancestor', first, second]).exitCode === 0;
  }

  /**
   * Best common ancestor of the given commits
   *
   * @returns null when the commits share no history
   * @throws GitContractViolation for exit codes other than 0, 1 and 128
   */
  mergeBase(ids: readonly string[]): Result<string | null, InvalidCommitishError> {
    const args = ['merge-base', ...ids];
    const outcome = this.run(args);

    switch (outcome.exitCode) {
      case 0: {
        const base = trimOutput(outcome.stdout);
        return ok(base.length > 0 ? base : null);
      }
      case 1:
        return ok(null);
      case 128:
        return err({ kind: 'invalid-commitish', ids: [...ids] });
      default:
        throw new GitContractViolation('Unexpected git-merge-base exit code', args, outcome.exitCode, stderrText(outcome));
    }
  }

  /**
   * Object id a remote currently advertises for `gitRef`
   *
   * A remote that cannot be queried is a `failure`; a remote that answers
   * without the reference is `not-found`.
   */
  remoteRefToId(remote: string, gitRef: string): Result<string, RefSearchError> {
    return this.firstRemoteRef(['ls-remote', remote, gitRef], remote, gitRef).map((line) => line.id);
  }

  /**
   * Default branch of a remote, read from its symbolic HEAD
   *
   * @example
   * ```typescript
   * repo.resolveHead('origin'); // ok('main')
   * ```
   */
  resolveHead(remote: string): Result<string, RefSearchError> {
    const first = this.firstRemoteRef(['ls-remote', '--symref', remote, 'HEAD'], remote, 'HEAD');
    if (first.isErr()) {
      return err(first.error);
    }

    // "ref: refs/heads/main\tHEAD": the target sits in the id column
    const branch = extractRefName(first.value.id);
    if (branch === null) {
      return err({ kind: 'parsing-failure', line: `${first.value.id}\t${first.value.ref}` });
    }
    return ok(branch);
  }

  sparseCheckoutAdd(pattern: string): Result<void, GitFailure> {
    const outcome = this.run(['sparse-checkout', 'add', pattern]);
    return outcome.exitCode === 0 ? ok(undefined) : err(failureOf(outcome));
  }

  /**
   * Stage a single path
   *
   * Absolute paths are made relative to the work tree first; the work tree
   * itself is staged as `.`.
   */
  stage(path: string): Result<void, StagingError> {
    if (this.context.kind === 'bare') {
      return err({ kind: 'bare-repository' });
    }

    let file = path;
    if (isAbsolute(path)) {
      file = relative(this.context.workTree, path);
      if (file === '..' || file.startsWith(`..${sep}`) || isAbsolute(file)) {
        return err({ kind: 'outside-work-tree', path });
      }
      // The work tree itself
      if (file === '') {
        file = '.';
      }
    }

    const outcome = this.run(['add', '--', file]);
    if (outcome.exitCode === 0) {
      return ok(undefined);
    }
    if (outcome.exitCode === 128) {
      return err({ kind: 'file-does-not-exist', path: file });
    }
    const message = stderrText(outcome) || outcome.stdout.toString('utf8');
    return err(gitFailure(message, outcome.exitCode));
  }

  commit(message: string): Result<void, CommitError> {
    if (this.context.kind === 'bare') {
      return err({ kind: 'bare-repository' });
    }

    const outcome = this.run(['commit', '-m', message]);
    return outcome.exitCode === 0 ? ok(undefined) : err(failureOf(outcome));
  }

  /**
   * Hard-reset the work tree and index to `sha`
   */
  resetHard(sha: string): Result<void, GitFailure> {
    const outcome = this.run(['reset', '--hard', '--quiet', sha]);
    return outcome.exitCode === 0 ? ok(undefined) : err(failureOf(outcome));
  }

  // -------------------------------------------------------------------------
  // Subtrees
  // -------------------------------------------------------------------------

  subtreeAdd(url: string, prefix: string, revision: string, message: string): Result<void, SubtreeAddError> {
    if (this.context.kind === 'bare') {
      return err({ kind: 'bare-repository' });
    }
    if (!this.isClean()) {
      return err({ kind: 'work-tree-dirty' });
    }

    const outcome = this.run(['subtree', 'add', '-q', '-P', prefix, url, revision, '-m', message]);
    return outcome.exitCode === 0 ? ok(undefined) : err(failureOf(outcome));
  }

  subtreePull(remote: string, prefix: string, gitRef: string, message: string): Result<void, SubtreePullError> {
    if (this.context.kind === 'bare') {
      return err({ kind: 'bare-repository' });
    }
    if (!this.isClean()) {
      return err({ kind: 'work-tree-dirty' });
    }

    const outcome = this.run(['subtree', 'pull', '-q', '-P', prefix, remote, gitRef, '-m', message]);
    return outcome.exitCode === 0 ? ok(undefined) : err(failureOf(outcome));
  }

  /** Pushing does not touch the work tree, so it may be dirty */
  subtreePush(remote: string, prefix: string, gitRef: string): Result<void, SubtreePushError> {
    if (this.context.kind === 'bare') {
      return err({ kind: 'bare-repository' });
    }

    const outcome = this.run(['subtree', 'push', '-q', '-P', prefix, remote, gitRef]);
    return outcome.exitCode === 0 ? ok(undefined) : err(failureOf(outcome));
  }

  /**
   * Split `prefix` into its own history and rejoin it
   *
   * @returns id of the split commit
   */
  subtreeSplit(prefix: string): Result<string, SubtreeSplitError> {
    if (this.context.kind === 'bare') {
      return err({ kind: 'bare-repository' });
    }
    if (!this.isClean()) {
      return err({ kind: 'work-tree-dirty' });
    }

    const outcome = this.run(['subtree', 'split', '-P', prefix, '--rejoin', 'HEAD']);
    if (outcome.exitCode !== 0) {
      return err(failureOf(outcome));
    }
    const lines = splitLines(outcome.stdout.toString('utf8'));
    return ok(lines.at(-1) ?? '');
  }

  // -------------------------------------------------------------------------
  // Raw access
  // -------------------------------------------------------------------------

  /**
   * Run arbitrary git arguments against this repository
   *
   * The outcome is returned unclassified.
   */
  git(args: readonly string[], options: InvocationOptions = {}): GitOutcome {
    return this.run(args, options);
  }

  /**
   * Like {@link Repository.git} but from another directory, e.g. a
   * subdirectory of the work tree for pathspec-relative commands
   */
  gitInDir(dir: string, args: readonly string[]): GitOutcome {
    return this.run(args, { cwd: dir });
  }

  private run(args: readonly string[], options: InvocationOptions = {}): GitOutcome {
    return runGit(this.executor, buildInvocation(this.context, args, options));
  }

  private firstRemoteRef(args: string[], remote: string, gitRef: string): Result<RemoteRefLine, RefSearchError> {
    const outcome = this.run(args);
    if (outcome.exitCode !== 0) {
      return err(failureOf(outcome));
    }

    const text = decodeStrict(outcome.stdout);
    if (text.isErr()) {
      return err(text.error);
    }

    const [first] = splitLines(text.value);
    if (first === undefined) {
      return err({ kind: 'not-found', remote, ref: gitRef });
    }
    return parseRefLine(first);
  }
}
