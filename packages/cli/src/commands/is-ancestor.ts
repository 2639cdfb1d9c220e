/**
 * Is-Ancestor Command
 *
 * Exit 0 when the first commit is an ancestor of the second, 1 otherwise.
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { loadRepository } from '../utils/repository-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export function isAncestorCommand(program: Command): void {
  program
    .command('is-ancestor')
    .description('Check whether one commit is an ancestor of another')
    .argument('<ancestor>', 'Possible ancestor')
    .argument('<descendant>', 'Possible descendant')
    .action(async (ancestor: string, descendant: string, _options: Record<string, never>, command: Command) => {
      const { repo, globals } = await loadRepository(command);

      const isAncestor = repo.isAncestor(ancestor, descendant);

      if (globals.yaml) {
        await outputYamlResult({ ancestor, descendant, isAncestor });
      } else if (isAncestor) {
        console.log(chalk.green(`✅ ${ancestor} is an ancestor of ${descendant}`));
      } else {
        console.log(chalk.yellow(`${ancestor} is not an ancestor of ${descendant}`));
      }

      if (!isAncestor) {
        process.exit(1);
      }
    });
}
