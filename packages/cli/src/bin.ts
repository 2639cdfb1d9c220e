#!/usr/bin/env node
/**
 * git-handle CLI Entry Point
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { logWarning } from '@git-handle/utils';
import { Command } from 'commander';

import { configureProgram } from './program.js';
import { exitWithFatal } from './utils/error-reporter.js';

// Nearest package.json above this file (sources or build output)
const __filename = fileURLToPath(import.meta.url);

function findPackageJson(start: string): string | null {
  let dir = dirname(start);
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
  return join(dir, 'package.json');
}

function readVersion(): string {
  const packageJsonPath = findPackageJson(__filename);
  if (packageJsonPath === null) {
    return '0.0.0';
  }
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  } catch (error) {
    logWarning('cli', `Could not read ${packageJsonPath}`, error instanceof Error ? error : undefined);
  }
  return '0.0.0';
}

const program = configureProgram(new Command(), readVersion());

try {
  await program.parseAsync();
} catch (error) {
  exitWithFatal(error);
}
