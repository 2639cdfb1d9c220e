/**
 * Head Command
 *
 * Print the commit HEAD points at.
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { loadRepository } from '../utils/repository-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export function headCommand(program: Command): void {
  program
    .command('head')
    .description('Print the commit id of HEAD')
    .option('--short', 'Abbreviate the commit id')
    .action(async (options: { short?: boolean }, command: Command) => {
      const { repo, globals } = await loadRepository(command);

      const head = repo.head();
      if (head === null) {
        console.error(chalk.red('❌ HEAD does not point at a commit'));
        process.exit(1);
      }

      let id = head;
      if (options.short) {
        const short = repo.shortRef(head);
        id = short.isOk() ? short.value : head;
      }

      if (globals.yaml) {
        await outputYamlResult({ head: id });
        return;
      }
      console.log(id);
    });
}
