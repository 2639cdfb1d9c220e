/**
 * Repository Context Resolution
 *
 * Works out which directory is the git metadata directory (GIT_DIR) and which,
 * if any, is the work tree, from whatever the caller knows:
 *
 * | root | gitDir | workTree | Strategy                                            |
 * |------|--------|----------|-----------------------------------------------------|
 * | -    | -      | -        | GIT_DIR / GIT_WORK_TREE from env, else search cwd   |
 * | any  | ✓      | -        | canonicalize gitDir, derive work tree unless bare   |
 * | any  | -      | ✓        | canonicalize workTree, gitDir = workTree/.git       |
 * | any  | ✓      | ✓        | canonicalize both, no cross-check                   |
 * | ✓    | -      | -        | search upwards from root                            |
 *
 * Relative hints are taken relative to `root` when one is given.
 *
 * @packageDocumentation
 */

import { realpathSync, statSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';

import { logDebug } from '@git-handle/utils';
import { err, ok, type Result } from 'neverthrow';

import { parentDir, toAbsoluteDirPath } from './absolute-dir-path.js';
import type { ResolutionError } from './errors.js';
import { ProcessGitExecutor, type GitExecutor } from './git-executor.js';
import type { AbsoluteDirPath, RepositoryContext } from './types.js';

export const GIT_DIR_ENV = 'GIT_DIR';
export const GIT_WORK_TREE_ENV = 'GIT_WORK_TREE';

/** Name of the metadata directory inside a work tree */
export const DOT_GIT = '.git';

/** A directory holding both of these is itself a metadata directory */
const METADATA_MARKER_FILE = 'HEAD';
const METADATA_MARKER_DIR = 'objects';

export interface ResolveOptions {
  /** Base directory for relative hints, or the search start when no hint is given */
  root?: string;
  /** Explicit metadata directory */
  gitDir?: string;
  /** Explicit work tree */
  workTree?: string;
  /** Environment to read GIT_DIR / GIT_WORK_TREE from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Working directory provider (default: process.cwd) */
  cwd?: () => string;
  /** Runs the bareness query (default: the git binary) */
  executor?: GitExecutor;
}

/**
 * Where a metadata directory came from, which decides how bareness is settled
 *
 * - `bare-directory`: the search start itself had HEAD + objects/; bare by definition
 * - `dot-git`: a `.git` directory found in the start or an ancestor
 * - `explicit`: named by a hint or GIT_DIR
 */
export interface GitDirMatch {
  gitDir: AbsoluteDirPath;
  layout: 'bare-directory' | 'dot-git' | 'explicit';
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * The directory itself followed by each ancestor, ending at the filesystem root
 */
export function* ancestorsOf(start: string): Generator<string, void, undefined> {
  let current = start;
  while (true) {
    yield current;
    const parent = dirname(current);
    if (parent === current) {
      return;
    }
    current = parent;
  }
}

/**
 * Search for a metadata directory starting at `start`
 *
 * The start directory is first checked for being a metadata directory itself
 * (the layout of a bare repository). Otherwise the nearest `.git` directory in
 * the start or one of its ancestors wins. A `.git` *file* (linked worktrees,
 * submodules) is not a match.
 */
export function searchGitDir(start: string): Result<GitDirMatch, ResolutionError> {
  let path: string;
  if (isAbsolute(start)) {
    path = resolve(start);
  } else {
    try {
      path = realpathSync(start);
    } catch {
      return err({ kind: 'invalid-directory', path: start });
    }
  }

  if (isFile(join(path, METADATA_MARKER_FILE)) && isDirectory(join(path, METADATA_MARKER_DIR))) {
    logDebug('resolve', `Start directory is a metadata directory: ${path}`);
    return toAbsoluteDirPath(path).map((gitDir) => ({ gitDir, layout: 'bare-directory' as const }));
  }

  for (const dir of ancestorsOf(path)) {
    const candidate = join(dir, DOT_GIT);
    if (isDirectory(candidate)) {
      logDebug('resolve', `Found ${DOT_GIT} directory: ${candidate}`, { start: path });
      return toAbsoluteDirPath(candidate).map((gitDir) => ({ gitDir, layout: 'dot-git' as const }));
    }
  }

  logDebug('resolve', `No ${DOT_GIT} directory above ${path}`);
  return err({ kind: 'git-dir-not-found' });
}

/**
 * Ask git whether a metadata directory belongs to a bare repository
 *
 * Only an exact `true` (one trailing line terminator allowed) counts. Any other
 * output, a non-zero exit, or git failing to start all mean "not bare".
 */
export function isBareGitDir(gitDir: AbsoluteDirPath, executor: GitExecutor): boolean {
  const outcome = executor.execute({
    args: ['--git-dir', gitDir, 'rev-parse', '--is-bare-repository'],
    env: { [GIT_DIR_ENV]: gitDir },
  });

  if (outcome.error !== undefined || outcome.exitCode !== 0) {
    logDebug('resolve', `Bareness query failed for ${gitDir}; assuming a work tree`, {
      exitCode: outcome.exitCode,
      error: outcome.error?.message,
    });
    return false;
  }

  const answer = outcome.stdout.toString('utf8').replace(/\r?\n$/, '');
  return answer === 'true';
}

/**
 * Work tree belonging to a metadata directory: its parent, unless the
 * repository is bare or the metadata directory is the filesystem root
 */
export function workTreeFromGitDir(gitDir: AbsoluteDirPath, executor: GitExecutor): AbsoluteDirPath | null {
  if (isBareGitDir(gitDir, executor)) {
    return null;
  }
  return parentDir(gitDir);
}

/**
 * Metadata directory of a work tree; constructed, not searched
 */
export function gitDirFromWorkTree(workTree: AbsoluteDirPath): Result<AbsoluteDirPath, ResolutionError> {
  return toAbsoluteDirPath(join(workTree, DOT_GIT));
}

/**
 * Assemble a frozen context
 */
export function makeContext(gitDir: AbsoluteDirPath, workTree: AbsoluteDirPath | null): RepositoryContext {
  const context: RepositoryContext =
    workTree === null ? { kind: 'bare', gitDir } : { kind: 'normal', gitDir, workTree };
  return Object.freeze(context);
}

function contextFromMatch(match: GitDirMatch, executor: GitExecutor): RepositoryContext {
  if (match.layout === 'bare-directory') {
    return makeContext(match.gitDir, null);
  }
  return makeContext(match.gitDir, workTreeFromGitDir(match.gitDir, executor));
}

function readCwd(cwd: () => string): Result<string, ResolutionError> {
  try {
    return ok(cwd());
  } catch {
    return err({ kind: 'cwd-inaccessible' });
  }
}

/** Environment paths are relative to the injected working directory */
function envPath(path: string, cwd: () => string): Result<AbsoluteDirPath, ResolutionError> {
  if (isAbsolute(path)) {
    return toAbsoluteDirPath(path);
  }
  return readCwd(cwd).andThen((dir) => toAbsoluteDirPath(path, dir));
}

function resolveFromEnvironment(
  env: NodeJS.ProcessEnv,
  cwd: () => string,
  executor: GitExecutor
): Result<RepositoryContext, ResolutionError> {
  const envGitDir = env[GIT_DIR_ENV];
  const envWorkTree = env[GIT_WORK_TREE_ENV];

  let match: Result<GitDirMatch, ResolutionError>;
  if (envGitDir === undefined) {
    match = readCwd(cwd).andThen(searchGitDir);
  } else {
    logDebug('resolve', `Using ${GIT_DIR_ENV} from environment: ${envGitDir}`);
    match = envPath(envGitDir, cwd).map((gitDir) => ({ gitDir, layout: 'explicit' as const }));
  }
  if (match.isErr()) {
    return err(match.error);
  }

  if (envWorkTree === undefined) {
    return ok(contextFromMatch(match.value, executor));
  }

  logDebug('resolve', `Using ${GIT_WORK_TREE_ENV} from environment: ${envWorkTree}`);
  const gitDir = match.value.gitDir;
  return envPath(envWorkTree, cwd).map((workTree) => makeContext(gitDir, workTree));
}

/**
 * Resolve a repository context
 *
 * @example
 * ```typescript
 * // Like git itself: environment first, then search from cwd
 * const context = resolveContext();
 *
 * // Like `git -C /src/app --git-dir=.git --work-tree=.`
 * const context = resolveContext({ root: '/src/app', gitDir: '.git', workTree: '.' });
 * ```
 */
export function resolveContext(options: ResolveOptions = {}): Result<RepositoryContext, ResolutionError> {
  const executor = options.executor ?? new ProcessGitExecutor();
  const { root, gitDir, workTree } = options;

  if (root === undefined && gitDir === undefined && workTree === undefined) {
    return resolveFromEnvironment(options.env ?? process.env, options.cwd ?? process.cwd, executor);
  }

  const under = (path: string): string =>
    root === undefined || isAbsolute(path) ? path : join(root, path);

  if (gitDir !== undefined && workTree !== undefined) {
    const resolvedGitDir = toAbsoluteDirPath(under(gitDir));
    if (resolvedGitDir.isErr()) {
      return err(resolvedGitDir.error);
    }
    return toAbsoluteDirPath(under(workTree)).map((resolvedWorkTree) =>
      makeContext(resolvedGitDir.value, resolvedWorkTree)
    );
  }

  if (gitDir !== undefined) {
    return toAbsoluteDirPath(under(gitDir)).map((resolvedGitDir) =>
      contextFromMatch({ gitDir: resolvedGitDir, layout: 'explicit' }, executor)
    );
  }

  if (workTree !== undefined) {
    return toAbsoluteDirPath(under(workTree)).andThen((resolvedWorkTree) =>
      gitDirFromWorkTree(resolvedWorkTree).map((resolvedGitDir) =>
        makeContext(resolvedGitDir, resolvedWorkTree)
      )
    );
  }

  return discover(root ?? '', executor);
}

/**
 * Search upwards from `start` and settle bareness
 */
export function discover(
  start: string,
  executor: GitExecutor = new ProcessGitExecutor()
): Result<RepositoryContext, ResolutionError> {
  return searchGitDir(start).map((match) => contextFromMatch(match, executor));
}
