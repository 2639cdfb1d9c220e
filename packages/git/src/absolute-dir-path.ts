/**
 * Path canonicalization
 *
 * The single construction point for {@link AbsoluteDirPath}.
 */

import { realpathSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import type { ResolutionError } from './errors.js';
import type { AbsoluteDirPath } from './types.js';

/**
 * Canonicalize a path
 *
 * Absolute paths are accepted as given, without touching the filesystem.
 * Relative paths are resolved against `base` (default: the process working
 * directory) with realpath, which fails unless every segment exists.
 *
 * @example
 * ```typescript
 * toAbsoluteDirPath('/srv/git/project.git'); // ok, even if it does not exist
 * toAbsoluteDirPath('missing/dir');          // err({ kind: 'absolution-failed', path: 'missing/dir' })
 * ```
 */
export function toAbsoluteDirPath(path: string, base?: string): Result<AbsoluteDirPath, ResolutionError> {
  if (isAbsolute(path)) {
    return ok(path as AbsoluteDirPath);
  }

  try {
    return ok(realpathSync(base === undefined ? path : resolve(base, path)) as AbsoluteDirPath);
  } catch {
    return err({ kind: 'absolution-failed', path });
  }
}

/**
 * Parent directory, or null at the filesystem root
 */
export function parentDir(path: AbsoluteDirPath): AbsoluteDirPath | null {
  const parent = dirname(path);
  return parent === path ? null : (parent as AbsoluteDirPath);
}
