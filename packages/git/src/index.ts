/**
 * @git-handle/git
 *
 * Repository handles for git: resolve where a repository lives the way git
 * itself does, then run git sub-commands against it with every outcome
 * classified into a typed result.
 *
 * @packageDocumentation
 */

// Branded paths and contexts (compile-time safety)
export type { AbsoluteDirPath, RepositoryContext, Remote, RemoteRefLine } from './types.js';

export { toAbsoluteDirPath, parentDir } from './absolute-dir-path.js';

// Repository resolution
export {
  resolveContext,
  discover,
  searchGitDir,
  isBareGitDir,
  workTreeFromGitDir,
  gitDirFromWorkTree,
  makeContext,
  ancestorsOf,
  GIT_DIR_ENV,
  GIT_WORK_TREE_ENV,
  DOT_GIT,
  type ResolveOptions,
  type GitDirMatch
} from './resolver.js';

// Repository handle (all classified operations)
export { Repository } from './repository.js';

// Low-level execution
export {
  ProcessGitExecutor,
  runGit,
  REPOSITORY_ENV_VARS,
  type GitExecutor,
  type GitInvocation,
  type GitOutcome,
  type ProcessGitExecutorOptions
} from './git-executor.js';

export { buildInvocation, type InvocationOptions } from './invocation.js';

// Output parsing
export {
  decodeStrict,
  trimOutput,
  splitLines,
  extractRefName,
  parseRefLine,
  parseRemotes,
  type ParsingFailure,
  type DecodeFailure
} from './output-parsing.js';

// Error taxonomy
export {
  describeGitError,
  toPosixError,
  gitFailure,
  PosixError,
  GitContractViolation,
  GitSpawnError,
  type GitFailure,
  type BareRepositoryError,
  type WorkTreeDirtyError,
  type ResolutionError,
  type ConfigReadError,
  type StagingError,
  type CommitError,
  type SubtreeAddError,
  type SubtreePullError,
  type SubtreePushError,
  type SubtreeSplitError,
  type RefSearchError,
  type InvalidCommitishError,
  type InvalidRefError,
  type ReadFileError,
  type GitHandleError
} from './errors.js';
