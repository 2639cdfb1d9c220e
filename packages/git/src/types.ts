/**
 * Core types for repository handles
 *
 * These types prevent incorrect usage at compile time: only paths that went
 * through {@link toAbsoluteDirPath} can be placed into a context.
 *
 * @example
 * // ✅ CORRECT - canonicalized by the resolver
 * const gitDir = toAbsoluteDirPath('.git');
 *
 * // ❌ WRONG - Compilation error
 * const context: RepositoryContext = { kind: 'bare', gitDir: '/srv/repo.git' };
 */

/**
 * Branded type for an absolute directory path
 *
 * Validated once, at construction, and never re-checked. Relative inputs had
 * to exist to be canonicalized; absolute inputs are trusted as given.
 */
export type AbsoluteDirPath = string & { readonly __brand: 'AbsoluteDirPath' };

/**
 * A resolved repository: where git keeps its metadata and, unless the
 * repository is bare, where the checked-out files live.
 *
 * Contexts are frozen. A different context means resolving again.
 */
export type RepositoryContext =
  | Readonly<{ kind: 'bare'; gitDir: AbsoluteDirPath }>
  | Readonly<{ kind: 'normal'; gitDir: AbsoluteDirPath; workTree: AbsoluteDirPath }>;

/**
 * A configured remote as reported by `git remote -v`
 */
export interface Remote {
  name: string;
  fetch: string | null;
  push: string | null;
}

/**
 * One `<id>\t<ref>` line of `git ls-remote` output
 */
export interface RemoteRefLine {
  /** Object id (or `ref: <target>` for --symref lines) */
  id: string;
  /** Full reference as printed, e.g. refs/heads/main */
  ref: string;
  /** Reference without its two leading segments, e.g. main; null when too short */
  name: string | null;
}
