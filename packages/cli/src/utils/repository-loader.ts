/**
 * Repository Loader
 *
 * Turns the global `-C` / `--git-dir` / `--work-tree` options plus the loaded
 * configuration into a {@link Repository}.
 */

import type { GitHandleConfig } from '@git-handle/config';
import { ProcessGitExecutor, Repository } from '@git-handle/git';
import type { Command } from 'commander';

import { loadCliConfig } from './config-loader.js';
import { exitWithError } from './error-reporter.js';

/**
 * Options accepted by every command
 */
export interface GlobalOptions {
  /** `-C <root>`: run as if started in this directory */
  C?: string;
  gitDir?: string;
  workTree?: string;
  yaml?: boolean;
}

export interface LoadedRepository {
  repo: Repository;
  config: GitHandleConfig;
  globals: GlobalOptions;
}

/**
 * Read global options from any (sub)command
 */
export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Resolve the repository a command operates on, exiting on resolution errors
 */
export async function loadRepository(command: Command): Promise<LoadedRepository> {
  const globals = globalOptions(command);
  const config = await loadCliConfig(globals.C);
  const executor = new ProcessGitExecutor({ binary: config.git.binary, env: config.git.env });

  const result = Repository.fromArgs(globals.C, globals.gitDir, globals.workTree, executor);
  if (result.isErr()) {
    exitWithError(result.error);
  }

  return { repo: result.value, config, globals };
}
