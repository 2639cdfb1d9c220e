/**
 * Tests for the doctor command
 */

import { rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { gitInTestDir, setupTestRepoWithCommit } from '@git-handle/git/test-helpers';
import { isToolAvailable, makeTempDir } from '@git-handle/utils';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { runDoctor, type DoctorResult } from '../../src/commands/doctor.js';

function check(result: DoctorResult, name: string) {
  return result.checks.find(item => item.name === name);
}

describe('doctor', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = makeTempDir('git-handle-doctor-');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should report an invalid configuration file', async () => {
    writeFileSync(join(testDir, 'git-handle.config.yaml'), 'git:\n  env:\n    GIT_DIR: /elsewhere\n');

    const result = await runDoctor({ root: testDir });

    expect(check(result, 'Configuration')?.passed).toBe(false);
    expect(result.allPassed).toBe(false);
  });

  it('should report missing git binaries', async () => {
    writeFileSync(join(testDir, 'git-handle.config.yaml'), 'git:\n  binary: git-handle-no-such-git\n');

    const result = await runDoctor({ root: testDir });

    expect(check(result, 'Git installed')).toEqual({
      name: 'Git installed',
      passed: false,
      message: 'Cannot run git-handle-no-such-git',
      suggestion: 'Install Git: https://git-scm.com/ or set git.binary in the configuration',
    });
    expect(check(result, 'Git repository')).toBeUndefined();
  });

  it('should count passed checks', async () => {
    const result = await runDoctor({ root: testDir });

    expect(result.totalChecks).toBe(result.checks.length);
    expect(result.passedChecks).toBe(result.checks.filter(item => item.passed).length);
  });

  describe.skipIf(!isToolAvailable('git'))('with git', () => {
    it('should report a directory that is not a repository', async () => {
      const result = await runDoctor({ root: testDir });

      expect(check(result, 'Git repository')).toEqual({
        name: 'Git repository',
        passed: false,
        message: 'Git directory not found',
        suggestion: 'Run: git init, or pass -C / --git-dir / --work-tree',
      });
    });

    it('should flag a missing default remote', async () => {
      setupTestRepoWithCommit(testDir);

      const result = await runDoctor({ root: testDir });

      expect(check(result, 'Git repository')).toEqual({
        name: 'Git repository',
        passed: true,
        message: `Work tree at ${testDir}`,
      });
      expect(check(result, 'Default remote')?.passed).toBe(false);
    });

    it('should pass with the configured remote present', async () => {
      setupTestRepoWithCommit(testDir);
      gitInTestDir(testDir, ['remote', 'add', 'upstream', 'https://example.com/demo.git']);
      writeFileSync(join(testDir, 'git-handle.config.yaml'), 'git:\n  remote: upstream\n');

      const result = await runDoctor({ root: testDir });

      expect(check(result, 'Default remote')).toEqual({
        name: 'Default remote',
        passed: true,
        message: 'upstream → https://example.com/demo.git',
      });
    });
  });
});
