import { spawnSync, type SpawnSyncOptions } from 'node:child_process';

import which from 'which';

/**
 * Options for safe command execution
 */
export interface SafeExecOptions {
  /** Character encoding for output (default: undefined = Buffer) */
  encoding?: BufferEncoding;
  /** Standard I/O configuration */
  stdio?: 'pipe' | 'ignore' | Array<'pipe' | 'ignore' | 'inherit'>;
  /** Complete environment for the child (default: inherit process.env) */
  env?: NodeJS.ProcessEnv;
  /** Working directory */
  cwd?: string;
  /** Data written to the child's stdin */
  input?: string | Buffer;
  /** Maximum output buffer size in bytes */
  maxBuffer?: number;
}

/**
 * Result of a safe command execution
 */
export interface SafeExecResult {
  /** Exit code (0 = success, -1 when the process never ran or was killed) */
  status: number;
  /** Standard output */
  stdout: Buffer | string;
  /** Standard error */
  stderr: Buffer | string;
  /** Error object if command failed to spawn */
  error?: Error;
}

/**
 * Error thrown when command execution fails
 */
export class CommandExecutionError extends Error {
  public readonly status: number;
  public readonly stdout: Buffer | string;
  public readonly stderr: Buffer | string;

  constructor(
    message: string,
    status: number,
    stdout: Buffer | string,
    stderr: Buffer | string,
  ) {
    super(message);
    this.name = 'CommandExecutionError';
    this.status = status;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/**
 * Output is captured in full. Git can print large diffs and object dumps,
 * so the default child_process limit (1MB) is far too small.
 */
const DEFAULT_MAX_BUFFER = 512 * 1024 * 1024;

function buildSpawnOptions(options: SafeExecOptions): SpawnSyncOptions {
  return {
    shell: false,
    stdio: options.stdio ?? 'pipe',
    env: options.env,
    cwd: options.cwd,
    input: options.input,
    maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
    encoding: options.encoding,
  };
}

/**
 * Safe command execution using spawnSync + which pattern
 *
 * - Resolves PATH once using pure Node.js (which package)
 * - Executes with absolute path and shell: false
 * - Supports a custom environment (e.g., GIT_DIR / GIT_WORK_TREE)
 *
 * @returns Buffer or string output
 * @throws Error if command not found, {@link CommandExecutionError} on non-zero exit
 *
 * @example
 * safeExecSync('git', ['init', '--bare'], { cwd: repoPath });
 *
 * @example
 * const version = safeExecSync('git', ['--version'], { encoding: 'utf8' });
 */
export function safeExecSync(
  command: string,
  args: string[] = [],
  options: SafeExecOptions = {},
): Buffer | string {
  const commandPath = which.sync(command);
  const result = spawnSync(commandPath, args, buildSpawnOptions(options));

  if (result.error) {
    throw result.error;
  }

  if (result.status !== 0) {
    throw new CommandExecutionError(
      `Command failed with exit code ${result.status ?? 'unknown'}: ${command} ${args.join(' ')}`,
      result.status ?? -1,
      result.stdout,
      result.stderr,
    );
  }

  return result.stdout;
}

/**
 * Safe command execution that returns detailed result (doesn't throw)
 *
 * A command that cannot be found or spawned comes back with `status: -1`
 * and `error` set, so callers can tell "never ran" apart from "ran and failed".
 *
 * @example
 * const result = safeExecResult('git', ['status']);
 * if (result.status === 0) {
 *   console.log(result.stdout.toString());
 * }
 */
export function safeExecResult(
  command: string,
  args: string[] = [],
  options: SafeExecOptions = {},
): SafeExecResult {
  try {
    const commandPath = which.sync(command);
    const result = spawnSync(commandPath, args, buildSpawnOptions(options));

    return {
      status: result.status ?? -1,
      stdout: result.stdout ?? Buffer.from(''),
      stderr: result.stderr ?? Buffer.from(''),
      error: result.error,
    };
  } catch (error) {
    // which.sync throws if command not found
    return {
      status: -1,
      stdout: Buffer.from(''),
      stderr: Buffer.from(''),
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

/**
 * Check if a command-line tool is available
 *
 * @example
 * describe.skipIf(!isToolAvailable('git'))('against a real repository', () => { ... });
 */
export function isToolAvailable(toolName: string): boolean {
  try {
    safeExecSync(toolName, ['--version'], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

/**
 * Get tool version if available
 *
 * @returns Version string or null if not available
 *
 * @example
 * getToolVersion('git'); // "git version 2.43.0"
 */
export function getToolVersion(
  toolName: string,
  versionArg: string = '--version',
): string | null {
  try {
    const version = safeExecSync(toolName, [versionArg], { encoding: 'utf8' });
    return version.toString().trim();
  } catch {
    return null;
  }
}
