import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { logDebug, logWarning, logError, DEBUG_ENV_VAR } from '../src/logger.js';

describe('logger', () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    delete process.env[DEBUG_ENV_VAR];
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env[DEBUG_ENV_VAR];
  });

  it('should stay silent for debug and warnings unless enabled', () => {
    logDebug('git', 'hidden');
    logWarning('resolve', 'hidden too');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should print debug messages with metadata when enabled', () => {
    process.env[DEBUG_ENV_VAR] = '1';

    logDebug('git', 'Executing git', { args: ['status'] });

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy.mock.calls[0][0]).toMatch(/^\[.+\] \[DEBUG\] \[git\] Executing git$/);
    expect(errorSpy.mock.calls[1][0]).toBe(JSON.stringify({ args: ['status'] }, null, 2));
  });

  it('should print warnings with the error message when enabled', () => {
    process.env[DEBUG_ENV_VAR] = '1';
    const error = new Error('boom');
    error.stack = 'stack-trace';

    logWarning('config', 'Config ignored', error);

    expect(errorSpy.mock.calls[0][0]).toMatch(/\[WARN\] \[config\] Config ignored$/);
    expect(errorSpy.mock.calls[1][0]).toBe('Error: boom');
    expect(errorSpy.mock.calls[2][0]).toBe('stack-trace');
  });

  it('should always print errors', () => {
    logError('cli', 'Command failed');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toMatch(/\[ERROR\] \[cli\] Command failed$/);
  });
});
