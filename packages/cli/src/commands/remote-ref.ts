/**
 * Remote Ref Command
 *
 * Ask a remote which object a reference points at.
 */

import type { Command } from 'commander';

import { exitWithError } from '../utils/error-reporter.js';
import { loadRepository } from '../utils/repository-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export function remoteRefCommand(program: Command): void {
  program
    .command('remote-ref')
    .description('Print the id a remote advertises for a reference')
    .argument('<remote>', 'Remote name or URL')
    .argument('<ref>', 'Reference, e.g. refs/heads/main')
    .action(async (remote: string, ref: string, _options: Record<string, never>, command: Command) => {
      const { repo, globals } = await loadRepository(command);

      const result = repo.remoteRefToId(remote, ref);
      if (result.isErr()) {
        exitWithError(result.error);
      }

      if (globals.yaml) {
        await outputYamlResult({ remote, ref, id: result.value });
        return;
      }
      console.log(result.value);
    });
}
