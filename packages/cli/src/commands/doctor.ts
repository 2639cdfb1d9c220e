/**
 * Doctor Command
 *
 * Diagnoses common setup issues:
 * - Environment checks (Node.js version, git binary)
 * - Configuration validation
 * - Repository resolution and remotes
 *
 * @packageDocumentation
 */

import {
  CONFIG_FILE_NAME,
  findConfigPath,
  loadConfigFromFile,
  validateConfig,
  type GitHandleConfig,
} from '@git-handle/config';
import { describeGitError, ProcessGitExecutor, Repository } from '@git-handle/git';
import { getToolVersion } from '@git-handle/utils';
import chalk from 'chalk';
import type { Command } from 'commander';

import { globalOptions } from '../utils/repository-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

const MIN_NODE_MAJOR = 20;

/**
 * Result of a single doctor check
 */
export interface DoctorCheckResult {
  name: string;
  passed: boolean;
  message: string;
  /** How to fix a failed check */
  suggestion?: string;
}

export interface DoctorResult {
  allPassed: boolean;
  checks: DoctorCheckResult[];
  totalChecks: number;
  passedChecks: number;
}

export interface DoctorOptions {
  /** Directory to diagnose (default: process.cwd()) */
  root?: string;
  gitDir?: string;
  workTree?: string;
}

function checkNodeVersion(): DoctorCheckResult {
  const version = getToolVersion('node');
  if (!version) {
    return {
      name: 'Node.js version',
      passed: false,
      message: 'Failed to detect Node.js version',
      suggestion: 'Install Node.js: https://nodejs.org/',
    };
  }

  const majorVersion = Number.parseInt(version.replace('v', '').split('.')[0] ?? '', 10);
  if (Number.isNaN(majorVersion) || majorVersion < MIN_NODE_MAJOR) {
    return {
      name: 'Node.js version',
      passed: false,
      message: `${version} is too old. Node.js ${MIN_NODE_MAJOR}+ required.`,
      suggestion: 'Upgrade Node.js: https://nodejs.org/ or use nvm',
    };
  }

  return {
    name: 'Node.js version',
    passed: true,
    message: `${version} (meets requirement: >=${MIN_NODE_MAJOR}.0.0)`,
  };
}

async function checkConfig(cwd: string): Promise<{ check: DoctorCheckResult; config: GitHandleConfig }> {
  const defaults = validateConfig({});
  const configPath = findConfigPath(cwd);

  if (configPath === null) {
    return {
      check: { name: 'Configuration', passed: true, message: `No ${CONFIG_FILE_NAME} found, using defaults` },
      config: defaults,
    };
  }

  try {
    const config = await loadConfigFromFile(configPath);
    return {
      check: { name: 'Configuration', passed: true, message: `Loaded ${configPath}` },
      config,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return {
      check: {
        name: 'Configuration',
        passed: false,
        message: `Invalid ${configPath}: ${errorMessage}`,
        suggestion: `Fix ${CONFIG_FILE_NAME} or remove it to use defaults`,
      },
      config: defaults,
    };
  }
}

function checkGitInstalled(binary: string): DoctorCheckResult {
  const version = getToolVersion(binary);
  return version
    ? { name: 'Git installed', passed: true, message: version }
    : {
        name: 'Git installed',
        passed: false,
        message: `Cannot run ${binary}`,
        suggestion: 'Install Git: https://git-scm.com/ or set git.binary in the configuration',
      };
}

function checkRemote(repo: Repository, remoteName: string): DoctorCheckResult {
  const remotes = repo.remotes();
  if (remotes.isErr()) {
    return { name: 'Default remote', passed: false, message: describeGitError(remotes.error) };
  }

  const remote = remotes.value.get(remoteName);
  if (!remote) {
    return {
      name: 'Default remote',
      passed: false,
      message: `Remote '${remoteName}' is not configured`,
      suggestion: `Run: git remote add ${remoteName} <url>, or set git.remote in the configuration`,
    };
  }
  return { name: 'Default remote', passed: true, message: `${remoteName} → ${remote.fetch ?? remote.push ?? '?'}` };
}

/**
 * Run every check
 *
 * Repository checks are skipped when git itself cannot run.
 */
export async function runDoctor(options: DoctorOptions = {}): Promise<DoctorResult> {
  const cwd = options.root ?? process.cwd();
  const checks: DoctorCheckResult[] = [checkNodeVersion()];

  const { check: configCheck, config } = await checkConfig(cwd);
  checks.push(configCheck);

  const gitCheck = checkGitInstalled(config.git.binary);
  checks.push(gitCheck);

  if (gitCheck.passed) {
    const executor = new ProcessGitExecutor({ binary: config.git.binary, env: config.git.env });
    const resolved = Repository.fromArgs(options.root, options.gitDir, options.workTree, executor);

    if (resolved.isErr()) {
      checks.push({
        name: 'Git repository',
        passed: false,
        message: describeGitError(resolved.error),
        suggestion: 'Run: git init, or pass -C / --git-dir / --work-tree',
      });
    } else {
      const repo = resolved.value;
      const workTree = repo.workTree();
      checks.push({
        name: 'Git repository',
        passed: true,
        message: workTree === null ? `Bare repository at ${repo.gitDir()}` : `Work tree at ${workTree}`,
      });
      checks.push(checkRemote(repo, config.git.remote));
    }
  }

  const passedChecks = checks.filter(check => check.passed).length;
  return {
    allPassed: passedChecks === checks.length,
    checks,
    totalChecks: checks.length,
    passedChecks,
  };
}

function displayDoctorResults(result: DoctorResult): void {
  console.log('🩺 git-handle Doctor\n');

  for (const check of result.checks) {
    const icon = check.passed ? '✅' : '❌';
    console.log(`${icon} ${check.name}`);
    console.log(`   ${check.message}`);
    if (check.suggestion) {
      console.log(chalk.gray(`   💡 ${check.suggestion}`));
    }
  }

  console.log(`\n📊 Results: ${result.passedChecks}/${result.totalChecks} checks passed`);
}

export function doctorCommand(program: Command): void {
  program
    .command('doctor')
    .description('Diagnose git-handle setup and environment')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globals = globalOptions(command);
      const result = await runDoctor({ root: globals.C, gitDir: globals.gitDir, workTree: globals.workTree });

      if (globals.yaml) {
        await outputYamlResult(result);
      } else {
        displayDoctorResults(result);
      }

      if (!result.allPassed) {
        process.exit(1);
      }
    });
}
