/**
 * Configuration Loader
 *
 * Loads and validates git-handle configuration from YAML files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import { logDebug } from '@git-handle/utils';
import { parse as parseYaml } from 'yaml';

import { validateConfig, type GitHandleConfig } from './schema.js';

/**
 * Configuration file name
 *
 * Only YAML format is supported.
 */
export const CONFIG_FILE_NAME = 'git-handle.config.yaml';

/**
 * Load configuration from a file path
 *
 * An empty file yields the defaults.
 *
 * @param configPath - Path to config file (must be .yaml)
 * @returns Loaded and validated configuration
 * @throws Error if file cannot be read, is not YAML, or is invalid
 */
export async function loadConfigFromFile(configPath: string): Promise<GitHandleConfig> {
  const absolutePath = resolve(configPath);

  if (!absolutePath.endsWith('.yaml')) {
    throw new Error(
      `Unsupported config file format: ${absolutePath}\n` +
      `Only .yaml format is supported.\n` +
      `Please use ${CONFIG_FILE_NAME}`
    );
  }

  const content = readFileSync(absolutePath, 'utf-8');
  const raw: unknown = parseYaml(content) ?? {};

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Configuration must be an object: ${absolutePath}`);
  }

  logDebug('config', `Loaded configuration from ${absolutePath}`);
  return validateConfig(raw);
}

/**
 * Find the nearest configuration file at or above `cwd`
 *
 * @returns Absolute path, or null if none exists up to the filesystem root
 */
export function findConfigPath(cwd: string = process.cwd()): string | null {
  let current = resolve(cwd);

  while (true) {
    const candidate = join(current, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }

    const parent = dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Find and load configuration, searching upwards from `cwd`
 *
 * @param cwd - Directory to start searching from (default: process.cwd())
 * @returns Loaded configuration, or undefined if no config file exists
 * @throws Error if a config file exists but is invalid
 */
export async function findAndLoadConfig(
  cwd: string = process.cwd()
): Promise<GitHandleConfig | undefined> {
  const configPath = findConfigPath(cwd);

  if (configPath === null) {
    logDebug('config', `No ${CONFIG_FILE_NAME} found above ${cwd}`);
    return undefined;
  }

  return await loadConfigFromFile(configPath);
}
