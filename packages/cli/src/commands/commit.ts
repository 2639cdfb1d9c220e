/**
 * Commit Command
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { exitWithError } from '../utils/error-reporter.js';
import { loadRepository } from '../utils/repository-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export function commitCommand(program: Command): void {
  program
    .command('commit')
    .description('Commit staged changes')
    .requiredOption('-m, --message <message>', 'Commit message')
    .action(async (options: { message: string }, command: Command) => {
      const { repo, globals } = await loadRepository(command);

      const result = repo.commit(options.message);
      if (result.isErr()) {
        exitWithError(result.error);
      }

      const head = repo.head();
      if (globals.yaml) {
        await outputYamlResult({ committed: true, head });
        return;
      }
      console.log(chalk.green(`✅ Committed ${head ?? ''}`.trimEnd()));
    });
}
