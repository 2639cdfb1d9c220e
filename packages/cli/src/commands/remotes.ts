/**
 * Remotes Command
 *
 * List configured remotes with their fetch and push URLs.
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { exitWithError } from '../utils/error-reporter.js';
import { loadRepository } from '../utils/repository-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export function remotesCommand(program: Command): void {
  program
    .command('remotes')
    .description('List configured remotes')
    .action(async (_options: Record<string, never>, command: Command) => {
      const { repo, globals } = await loadRepository(command);

      const result = repo.remotes();
      if (result.isErr()) {
        exitWithError(result.error);
      }
      const remotes = [...result.value.values()];

      if (globals.yaml) {
        await outputYamlResult({ remotes });
        return;
      }

      if (remotes.length === 0) {
        console.log(chalk.gray('No remotes configured'));
        return;
      }
      for (const remote of remotes) {
        console.log(chalk.bold(remote.name));
        console.log(`  fetch: ${remote.fetch ?? chalk.gray('-')}`);
        console.log(`  push:  ${remote.push ?? chalk.gray('-')}`);
      }
    });
}
