/**
 * Merge Base Command
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { exitWithError } from '../utils/error-reporter.js';
import { loadRepository } from '../utils/repository-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export function mergeBaseCommand(program: Command): void {
  program
    .command('merge-base')
    .description('Print the best common ancestor of two or more commits')
    .argument('<commits...>', 'Commits, references or ids')
    .action(async (commits: string[], _options: Record<string, never>, command: Command) => {
      const { repo, globals } = await loadRepository(command);

      const result = repo.mergeBase(commits);
      if (result.isErr()) {
        exitWithError(result.error);
      }

      if (globals.yaml) {
        await outputYamlResult({ commits, mergeBase: result.value });
        return;
      }

      if (result.value === null) {
        console.error(chalk.yellow('⚠️  No common ancestor'));
        process.exit(1);
      }
      console.log(result.value);
    });
}
