/**
 * Context Command
 *
 * Show where the repository's metadata and work tree are.
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { loadRepository } from '../utils/repository-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export function contextCommand(program: Command): void {
  program
    .command('context')
    .description('Show the resolved git directory and work tree')
    .action(async (_options: Record<string, never>, command: Command) => {
      const { repo, globals } = await loadRepository(command);

      const result = {
        bare: repo.isBare(),
        gitDir: repo.gitDir(),
        workTree: repo.workTree(),
        sparse: repo.isSparse(),
      };

      if (globals.yaml) {
        await outputYamlResult(result);
        return;
      }

      console.log(`${chalk.blue('Git dir:')}   ${result.gitDir}`);
      console.log(`${chalk.blue('Work tree:')} ${result.workTree ?? chalk.gray('(bare)')}`);
      if (result.sparse) {
        console.log(chalk.gray('Sparse checkout enabled'));
      }
    });
}
