/**
 * Default Branch Command
 *
 * Read a remote's default branch from its symbolic HEAD.
 */

import type { Command } from 'commander';

import { exitWithError } from '../utils/error-reporter.js';
import { loadRepository } from '../utils/repository-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export function defaultBranchCommand(program: Command): void {
  program
    .command('default-branch')
    .description("Print a remote's default branch")
    .argument('[remote]', 'Remote name or URL (default: git.remote from config)')
    .action(async (remoteArg: string | undefined, _options: Record<string, never>, command: Command) => {
      const { repo, config, globals } = await loadRepository(command);
      const remote = remoteArg ?? config.git.remote;

      const result = repo.resolveHead(remote);
      if (result.isErr()) {
        exitWithError(result.error);
      }

      if (globals.yaml) {
        await outputYamlResult({ remote, branch: result.value });
        return;
      }
      console.log(result.value);
    });
}
