/**
 * Configuration Loader
 *
 * Loads git-handle configuration for a CLI run, falling back to defaults
 * when no configuration file exists.
 */

import { findAndLoadConfig, validateConfig, type GitHandleConfig } from '@git-handle/config';

/**
 * Load configuration found at or above `cwd`
 *
 * @throws Error if a configuration file exists but is invalid
 */
export async function loadCliConfig(cwd: string = process.cwd()): Promise<GitHandleConfig> {
  const config = await findAndLoadConfig(cwd);
  return config ?? validateConfig({});
}
