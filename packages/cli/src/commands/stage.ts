/**
 * Stage Command
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { exitWithError } from '../utils/error-reporter.js';
import { loadRepository } from '../utils/repository-loader.js';

export function stageCommand(program: Command): void {
  program
    .command('stage')
    .description('Stage files for the next commit')
    .argument('<paths...>', 'Files to stage, relative to the work tree or absolute')
    .action(async (paths: string[], _options: Record<string, never>, command: Command) => {
      const { repo } = await loadRepository(command);

      // Stops at the first failure; earlier paths stay staged
      for (const path of paths) {
        const result = repo.stage(path);
        if (result.isErr()) {
          exitWithError(result.error);
        }
        console.log(chalk.gray(`staged ${path}`));
      }
    });
}
