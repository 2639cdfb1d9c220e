/**
 * Config Command
 *
 * Read a value from the repository's git configuration.
 */

import type { Command } from 'commander';

import { exitWithError } from '../utils/error-reporter.js';
import { loadRepository } from '../utils/repository-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export function configCommand(program: Command): void {
  program
    .command('config')
    .description('Read a git configuration value')
    .argument('<key>', 'Configuration key, e.g. user.email')
    .action(async (key: string, _options: Record<string, never>, command: Command) => {
      const { repo, globals } = await loadRepository(command);

      const result = repo.config(key);
      if (result.isErr()) {
        exitWithError(result.error);
      }

      if (globals.yaml) {
        await outputYamlResult({ key, value: result.value });
        return;
      }
      console.log(result.value);
    });
}
