/**
 * Path Helpers for Tests
 *
 * Resolution results are canonical (symlinks resolved), so fixtures must be
 * created under canonical paths too: on macOS the system temp directory is a
 * symlink (/var → /private/var) and on Windows it may carry 8.3 short names.
 *
 * @package @git-handle/utils
 */

import { mkdirSync, mkdtempSync, realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Get the canonical temp directory path
 *
 * @example
 * ```typescript
 * // ❌ WRONG - may differ from what realpath() later reports
 * const testDir = join(tmpdir(), 'test-dir');
 *
 * // ✅ RIGHT
 * const testDir = join(normalizedTmpdir(), 'test-dir');
 * ```
 */
export function normalizedTmpdir(): string {
  const temp = tmpdir();
  try {
    return realpathSync(temp);
  } catch {
    return temp;
  }
}

/**
 * Create directory and return its canonical path
 *
 * @example
 * ```typescript
 * const nested = mkdirSyncReal(join(root, 'a', 'b'), { recursive: true });
 * ```
 */
export function mkdirSyncReal(
  path: string,
  options?: Parameters<typeof mkdirSync>[1]
): string {
  mkdirSync(path, options);
  return realpathSync(path);
}

/**
 * Create a unique temporary directory and return its canonical path
 *
 * @param prefix - Directory name prefix (e.g., 'resolver-test-')
 */
export function makeTempDir(prefix: string): string {
  return realpathSync(mkdtempSync(join(normalizedTmpdir(), prefix)));
}
