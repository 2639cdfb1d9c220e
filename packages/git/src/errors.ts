/**
 * Error taxonomy
 *
 * Expected failures are plain tagged values (`kind` discriminator) returned
 * through neverthrow `Result`s, so callers branch on the tag and still have the
 * diagnostic text git printed. Each one maps onto a conventional errno code via
 * {@link toPosixError}.
 *
 * Broken contracts are different: an exit code git does not document for a
 * sub-command means the installed git no longer behaves the way this wrapper
 * assumes. Those are thrown ({@link GitContractViolation}, {@link GitSpawnError})
 * and nothing in this package catches them.
 *
 * @packageDocumentation
 */

import { constants } from 'node:os';

const { ENOENT, EINVAL, EACCES, EIO } = constants.errno;

// ---------------------------------------------------------------------------
// Shared variants
// ---------------------------------------------------------------------------

/** Git ran and exited non-zero; message and code are kept verbatim */
export interface GitFailure {
  kind: 'failure';
  message: string;
  exitCode: number;
}

export interface BareRepositoryError {
  kind: 'bare-repository';
}

export interface WorkTreeDirtyError {
  kind: 'work-tree-dirty';
}

// ---------------------------------------------------------------------------
// Per-operation unions
// ---------------------------------------------------------------------------

export type ResolutionError =
  | { kind: 'git-dir-not-found' }
  | { kind: 'invalid-directory'; path: string }
  | { kind: 'absolution-failed'; path: string }
  | { kind: 'cwd-inaccessible' };

export type ConfigReadError =
  | { kind: 'invalid-section-or-key'; key: string }
  | { kind: 'invalid-config-file'; message: string };

export type StagingError =
  | BareRepositoryError
  | GitFailure
  | { kind: 'file-does-not-exist'; path: string }
  | { kind: 'outside-work-tree'; path: string };

export type CommitError = BareRepositoryError | GitFailure;

export type SubtreeAddError = BareRepositoryError | WorkTreeDirtyError | GitFailure;
export type SubtreePullError = BareRepositoryError | WorkTreeDirtyError | GitFailure;
export type SubtreeSplitError = BareRepositoryError | WorkTreeDirtyError | GitFailure;
export type SubtreePushError = BareRepositoryError | GitFailure;

/**
 * Remote reference lookup
 *
 * `failure` (ls-remote exited non-zero, e.g. unreachable remote) and
 * `not-found` (ls-remote succeeded but printed no matching line) are distinct.
 */
export type RefSearchError =
  | GitFailure
  | { kind: 'not-found'; remote: string; ref: string }
  | { kind: 'parsing-failure'; line: string }
  | { kind: 'decode-failed'; message: string };

export interface InvalidCommitishError {
  kind: 'invalid-commitish';
  ids: string[];
}

export interface InvalidRefError {
  kind: 'invalid-ref';
  ref: string;
}

export type ReadFileError =
  | GitFailure
  | { kind: 'file-not-found'; path: string }
  | { kind: 'io-error'; path: string; message: string };

export type GitHandleError =
  | ResolutionError
  | ConfigReadError
  | StagingError
  | CommitError
  | SubtreeAddError
  | SubtreePullError
  | SubtreePushError
  | SubtreeSplitError
  | RefSearchError
  | InvalidCommitishError
  | InvalidRefError
  | ReadFileError;

export function gitFailure(stderr: string, exitCode: number): GitFailure {
  return { kind: 'failure', message: stderr, exitCode };
}

/**
 * Human-readable text for any expected error
 */
export function describeGitError(error: GitHandleError): string {
  switch (error.kind) {
    case 'git-dir-not-found':
      return 'Git directory not found';
    case 'invalid-directory':
      return `Invalid directory: ${error.path}`;
    case 'absolution-failed':
      return `Failed to canonicalize path: ${error.path}`;
    case 'cwd-inaccessible':
      return 'Failed to access current working directory';
    case 'invalid-section-or-key':
      return `Invalid config section or key: ${error.key}`;
    case 'invalid-config-file':
      return `Invalid config file: ${error.message.trim()}`;
    case 'bare-repository':
      return 'Operation requires a work tree, but the repository is bare';
    case 'work-tree-dirty':
      return 'Work tree has uncommitted changes';
    case 'failure': {
      const message = error.message.trim();
      return message.length > 0 ? message : `git exited with code ${error.exitCode}`;
    }
    case 'file-does-not-exist':
      return `File does not exist: ${error.path}`;
    case 'outside-work-tree':
      return `Path is outside the work tree: ${error.path}`;
    case 'not-found':
      return `Reference ${error.ref} not found on ${error.remote}`;
    case 'parsing-failure':
      return `Unexpected git ls-remote output: ${error.line}`;
    case 'decode-failed':
      return `Git output is not valid UTF-8: ${error.message}`;
    case 'invalid-commitish':
      return `One or more invalid references or commit ids: ${error.ids.join(', ')}`;
    case 'invalid-ref':
      return `Invalid reference or commit id: ${error.ref}`;
    case 'file-not-found':
      return `Failed to read file: ${error.path}`;
    case 'io-error':
      return `Failed to read ${error.path}: ${error.message}`;
  }
}

/**
 * An error carrying a conventional process exit code
 */
export class PosixError extends Error {
  public readonly code: number;

  constructor(code: number, message: string) {
    super(message);
    this.name = 'PosixError';
    this.code = code;
  }
}

function posixCode(error: GitHandleError): number {
  switch (error.kind) {
    case 'git-dir-not-found':
    case 'invalid-directory':
    case 'file-does-not-exist':
    case 'file-not-found':
    case 'not-found':
      return ENOENT;
    case 'absolution-failed':
    case 'invalid-section-or-key':
    case 'invalid-config-file':
    case 'outside-work-tree':
    case 'parsing-failure':
    case 'decode-failed':
    case 'invalid-commitish':
    case 'invalid-ref':
      return EINVAL;
    case 'cwd-inaccessible':
      return EACCES;
    case 'io-error':
      return EIO;
    case 'bare-repository':
    case 'work-tree-dirty':
      return 1;
    case 'failure':
      return error.exitCode > 0 ? error.exitCode : 1;
  }
}

/**
 * Convert an expected error into a {@link PosixError}
 *
 * @example
 * ```typescript
 * const result = repo.config('user.email');
 * if (result.isErr()) {
 *   const posix = toPosixError(result.error);
 *   process.exitCode = posix.code;
 * }
 * ```
 */
export function toPosixError(error: GitHandleError): PosixError {
  return new PosixError(posixCode(error), describeGitError(error));
}

// ---------------------------------------------------------------------------
// Fatal conditions (thrown)
// ---------------------------------------------------------------------------

/**
 * Git did something outside the documented contract of a sub-command:
 * an undocumented exit code, or output in a shape the operation cannot parse.
 */
export class GitContractViolation extends Error {
  public readonly args: readonly string[];
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(message: string, args: readonly string[], exitCode: number, stderr: string) {
    super(`${message}: git ${args.join(' ')} (exit code ${exitCode})\n${stderr}`.trimEnd());
    this.name = 'GitContractViolation';
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * The git binary could not be started at all
 */
export class GitSpawnError extends Error {
  public readonly args: readonly string[];

  constructor(args: readonly string[], cause: Error) {
    super(`Failed to execute git ${args.join(' ')}: ${cause.message}`, { cause });
    this.name = 'GitSpawnError';
    this.args = args;
  }
}
