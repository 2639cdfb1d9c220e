/**
 * Tests for invocation building
 */

import { describe, it, expect } from 'vitest';

import { buildInvocation } from '../src/invocation.js';
import { makeContext } from '../src/resolver.js';
import type { AbsoluteDirPath } from '../src/types.js';

const gitDir = '/srv/demo/.git' as AbsoluteDirPath;
const workTree = '/srv/demo' as AbsoluteDirPath;

describe('buildInvocation', () => {
  it('should pass both locations and run inside the work tree for normal contexts', () => {
    const invocation = buildInvocation(makeContext(gitDir, workTree), ['rev-parse', 'HEAD']);

    expect(invocation).toEqual({
      args: ['rev-parse', 'HEAD'],
      env: { GIT_DIR: '/srv/demo/.git', GIT_WORK_TREE: '/srv/demo' },
      cwd: '/srv/demo',
    });
  });

  it('should pass only GIT_DIR for bare contexts', () => {
    const bareDir = '/srv/demo.git' as AbsoluteDirPath;
    const invocation = buildInvocation(makeContext(bareDir, null), ['show', ':README.md']);

    expect(invocation).toEqual({
      args: ['show', ':README.md'],
      env: { GIT_DIR: '/srv/demo.git' },
    });
  });

  it('should let the caller pick another directory', () => {
    const invocation = buildInvocation(makeContext(gitDir, workTree), ['status'], { cwd: '/srv/demo/src' });

    expect(invocation.cwd).toBe('/srv/demo/src');
    expect(invocation.env.GIT_WORK_TREE).toBe('/srv/demo');
  });

  it('should attach stdin content', () => {
    const invocation = buildInvocation(makeContext(gitDir, workTree), ['hash-object', '--stdin'], {
      stdin: 'hello\n',
    });

    expect(invocation.stdin).toBe('hello\n');
  });

  it('should keep arguments in order, unquoted', () => {
    const invocation = buildInvocation(makeContext(gitDir, workTree), ['commit', '-m', 'fix: a "quoted" $message']);

    expect(invocation.args).toEqual(['commit', '-m', 'fix: a "quoted" $message']);
  });
});
