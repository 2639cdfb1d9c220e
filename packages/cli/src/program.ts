/**
 * Program Definition
 *
 * Global options and command registration, shared by the executable and
 * the tests.
 */

import type { Command } from 'commander';

import { commitCommand } from './commands/commit.js';
import { configCommand } from './commands/config.js';
import { contextCommand } from './commands/context.js';
import { defaultBranchCommand } from './commands/default-branch.js';
import { doctorCommand } from './commands/doctor.js';
import { headCommand } from './commands/head.js';
import { isAncestorCommand } from './commands/is-ancestor.js';
import { mergeBaseCommand } from './commands/merge-base.js';
import { remoteRefCommand } from './commands/remote-ref.js';
import { remotesCommand } from './commands/remotes.js';
import { stageCommand } from './commands/stage.js';

export function configureProgram(program: Command, version: string): Command {
  program
    .name('git-handle')
    .description('Resolve git repositories and run classified git operations')
    .version(version)
    .option('-C <root>', 'Run as if started in <root>')
    .option('--git-dir <dir>', 'Path to the repository metadata directory')
    .option('--work-tree <dir>', 'Path to the work tree')
    .option('--yaml', 'Output YAML only (no human-friendly display)');

  contextCommand(program);        // git-handle context
  headCommand(program);           // git-handle head
  configCommand(program);         // git-handle config <key>
  remotesCommand(program);        // git-handle remotes
  remoteRefCommand(program);      // git-handle remote-ref <remote> <ref>
  defaultBranchCommand(program);  // git-handle default-branch [remote]
  mergeBaseCommand(program);      // git-handle merge-base <commits...>
  isAncestorCommand(program);     // git-handle is-ancestor <a> <b>
  stageCommand(program);          // git-handle stage <paths...>
  commitCommand(program);         // git-handle commit -m <message>
  doctorCommand(program);         // git-handle doctor

  return program;
}
