/**
 * Tests for repository context resolution
 *
 * Directory layouts are real (temp directories); bareness answers come from a
 * scripted executor so git is not needed.
 */

import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join, relative } from 'node:path';

import { makeTempDir } from '@git-handle/utils';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import {
  ancestorsOf,
  discover,
  gitDirFromWorkTree,
  isBareGitDir,
  makeContext,
  resolveContext,
  searchGitDir,
  workTreeFromGitDir,
} from '../src/resolver.js';
import { ScriptedGitExecutor, outcome, spawnFailure } from '../src/test-helpers.js';
import type { AbsoluteDirPath } from '../src/types.js';

/** Lay out the minimum that marks a directory as git metadata */
function makeMetadataDir(path: string): void {
  mkdirSync(join(path, 'objects'), { recursive: true });
  writeFileSync(join(path, 'HEAD'), 'ref: refs/heads/main\n');
}

describe('resolver - ancestorsOf', () => {
  it('should walk from the directory up to the root', () => {
    expect([...ancestorsOf('/srv/demo/src')]).toEqual(['/srv/demo/src', '/srv/demo', '/srv', '/']);
  });

  it('should yield the root once', () => {
    expect([...ancestorsOf('/')]).toEqual(['/']);
  });
});

describe('resolver - isBareGitDir', () => {
  const gitDir = '/srv/demo.git' as AbsoluteDirPath;

  it('should query git with the directory passed both ways', () => {
    const executor = new ScriptedGitExecutor([outcome(0, 'true\n')]);

    isBareGitDir(gitDir, executor);

    expect(executor.invocations).toEqual([
      {
        args: ['--git-dir', '/srv/demo.git', 'rev-parse', '--is-bare-repository'],
        env: { GIT_DIR: '/srv/demo.git' },
      },
    ]);
  });

  it.each([
    ['true\n', true],
    ['true\r\n', true],
    ['true', true],
    ['false\n', false],
    ['true\n\n', false],
    ['True\n', false],
    [' true\n', false],
    ['', false],
  ])('should read %j as %s', (stdout, expected) => {
    expect(isBareGitDir(gitDir, new ScriptedGitExecutor([outcome(0, stdout)]))).toBe(expected);
  });

  it('should treat a failed query as not bare', () => {
    expect(isBareGitDir(gitDir, new ScriptedGitExecutor([outcome(128, 'true\n')]))).toBe(false);
  });

  it('should treat a git that cannot start as not bare', () => {
    expect(isBareGitDir(gitDir, new ScriptedGitExecutor([spawnFailure()]))).toBe(false);
  });
});

describe('resolver - workTreeFromGitDir', () => {
  it('should use the parent of a non-bare metadata directory', () => {
    const executor = new ScriptedGitExecutor([outcome(0, 'false\n')]);

    expect(workTreeFromGitDir('/srv/demo/.git' as AbsoluteDirPath, executor)).toBe('/srv/demo');
  });

  it('should have no work tree for a bare repository', () => {
    const executor = new ScriptedGitExecutor([outcome(0, 'true\n')]);

    expect(workTreeFromGitDir('/srv/demo.git' as AbsoluteDirPath, executor)).toBeNull();
  });

  it('should have no work tree when the metadata directory is the root', () => {
    const executor = new ScriptedGitExecutor([outcome(0, 'false\n')]);

    expect(workTreeFromGitDir('/' as AbsoluteDirPath, executor)).toBeNull();
  });
});

describe('resolver - filesystem search', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = makeTempDir('git-handle-resolve-');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should find .git in an ancestor of the start directory', () => {
    makeMetadataDir(join(testDir, '.git'));
    mkdirSync(join(testDir, 'src', 'deep'), { recursive: true });

    const match = searchGitDir(join(testDir, 'src', 'deep'))._unsafeUnwrap();

    expect(match).toEqual({ gitDir: join(testDir, '.git'), layout: 'dot-git' });
  });

  it('should prefer the nearest .git', () => {
    makeMetadataDir(join(testDir, '.git'));
    makeMetadataDir(join(testDir, 'inner', '.git'));

    expect(searchGitDir(join(testDir, 'inner'))._unsafeUnwrap().gitDir).toBe(join(testDir, 'inner', '.git'));
  });

  it('should recognise a start directory that is itself metadata', () => {
    makeMetadataDir(testDir);

    expect(searchGitDir(testDir)._unsafeUnwrap()).toEqual({ gitDir: testDir, layout: 'bare-directory' });
  });

  it('should not treat HEAD without objects/ as metadata', () => {
    writeFileSync(join(testDir, 'HEAD'), 'ref: refs/heads/main\n');

    expect(searchGitDir(testDir)._unsafeUnwrapErr()).toEqual({ kind: 'git-dir-not-found' });
  });

  it('should ignore a .git file', () => {
    writeFileSync(join(testDir, '.git'), 'gitdir: /srv/elsewhere\n');

    expect(searchGitDir(testDir)._unsafeUnwrapErr()).toEqual({ kind: 'git-dir-not-found' });
  });

  it('should canonicalize a relative start directory', () => {
    makeMetadataDir(join(testDir, '.git'));
    mkdirSync(join(testDir, 'pkg'));

    const match = searchGitDir(relative(process.cwd(), join(testDir, 'pkg')))._unsafeUnwrap();

    expect(match.gitDir).toBe(join(testDir, '.git'));
  });

  it('should reject a relative start directory that does not exist', () => {
    expect(searchGitDir('no/such/start')._unsafeUnwrapErr()).toEqual({
      kind: 'invalid-directory',
      path: 'no/such/start',
    });
  });

  it('should settle bareness of a discovered .git with one query', () => {
    makeMetadataDir(join(testDir, '.git'));
    const executor = new ScriptedGitExecutor([outcome(0, 'false\n')]);

    const context = discover(testDir, executor)._unsafeUnwrap();

    expect(context).toEqual({ kind: 'normal', gitDir: join(testDir, '.git'), workTree: testDir });
    expect(executor.invocations).toHaveLength(1);
  });

  it('should not query git for a bare-layout start directory', () => {
    makeMetadataDir(testDir);
    const executor = new ScriptedGitExecutor();

    const context = discover(testDir, executor)._unsafeUnwrap();

    expect(context).toEqual({ kind: 'bare', gitDir: testDir });
    expect(executor.invocations).toHaveLength(0);
  });

  it('should return a frozen context', () => {
    makeMetadataDir(join(testDir, '.git'));

    const context = discover(testDir, new ScriptedGitExecutor([outcome(0, 'false\n')]))._unsafeUnwrap();

    expect(Object.isFrozen(context)).toBe(true);
  });
});

describe('resolver - resolveContext from the environment', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = makeTempDir('git-handle-env-');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should use GIT_DIR and GIT_WORK_TREE without querying git', () => {
    const executor = new ScriptedGitExecutor();

    const context = resolveContext({
      env: { GIT_DIR: '/srv/meta', GIT_WORK_TREE: '/srv/checkout' },
      cwd: () => testDir,
      executor,
    })._unsafeUnwrap();

    expect(context).toEqual({ kind: 'normal', gitDir: '/srv/meta', workTree: '/srv/checkout' });
    expect(executor.invocations).toHaveLength(0);
  });

  it('should derive the work tree from GIT_DIR alone', () => {
    const executor = new ScriptedGitExecutor([outcome(0, 'false\n')]);

    const context = resolveContext({ env: { GIT_DIR: '/srv/demo/.git' }, cwd: () => testDir, executor });

    expect(context._unsafeUnwrap()).toEqual({ kind: 'normal', gitDir: '/srv/demo/.git', workTree: '/srv/demo' });
  });

  it('should treat GIT_DIR as bare when git says so', () => {
    const executor = new ScriptedGitExecutor([outcome(0, 'true\n')]);

    const context = resolveContext({ env: { GIT_DIR: '/srv/demo.git' }, cwd: () => testDir, executor });

    expect(context._unsafeUnwrap()).toEqual({ kind: 'bare', gitDir: '/srv/demo.git' });
  });

  it('should fail on a relative GIT_DIR that does not exist', () => {
    const result = resolveContext({ env: { GIT_DIR: 'missing/.git' }, executor: new ScriptedGitExecutor() });

    expect(result._unsafeUnwrapErr()).toEqual({ kind: 'absolution-failed', path: 'missing/.git' });
  });

  it('should resolve relative GIT_DIR and GIT_WORK_TREE against the working directory', () => {
    mkdirSync(join(testDir, 'meta'));
    mkdirSync(join(testDir, 'checkout'));
    const executor = new ScriptedGitExecutor();

    const context = resolveContext({
      env: { GIT_DIR: 'meta', GIT_WORK_TREE: 'checkout' },
      cwd: () => testDir,
      executor,
    })._unsafeUnwrap();

    expect(context).toEqual({ kind: 'normal', gitDir: join(testDir, 'meta'), workTree: join(testDir, 'checkout') });
  });

  it('should report an inaccessible working directory for a relative GIT_DIR', () => {
    const result = resolveContext({
      env: { GIT_DIR: 'meta' },
      cwd: () => {
        throw new Error('ENOENT: uv_cwd');
      },
      executor: new ScriptedGitExecutor(),
    });

    expect(result._unsafeUnwrapErr()).toEqual({ kind: 'cwd-inaccessible' });
  });

  it('should search from the working directory without GIT_DIR', () => {
    makeMetadataDir(join(testDir, '.git'));
    mkdirSync(join(testDir, 'docs'));
    const executor = new ScriptedGitExecutor([outcome(0, 'false\n')]);

    const context = resolveContext({ env: {}, cwd: () => join(testDir, 'docs'), executor })._unsafeUnwrap();

    expect(context).toEqual({ kind: 'normal', gitDir: join(testDir, '.git'), workTree: testDir });
  });

  it('should pair a searched GIT_DIR with GIT_WORK_TREE', () => {
    makeMetadataDir(join(testDir, '.git'));
    const executor = new ScriptedGitExecutor();

    const context = resolveContext({ env: { GIT_WORK_TREE: '/srv/checkout' }, cwd: () => testDir, executor });

    expect(context._unsafeUnwrap()).toEqual({ kind: 'normal', gitDir: join(testDir, '.git'), workTree: '/srv/checkout' });
    expect(executor.invocations).toHaveLength(0);
  });

  it('should report an inaccessible working directory', () => {
    const result = resolveContext({
      env: {},
      cwd: () => {
        throw new Error('ENOENT: uv_cwd');
      },
      executor: new ScriptedGitExecutor(),
    });

    expect(result._unsafeUnwrapErr()).toEqual({ kind: 'cwd-inaccessible' });
  });

  it('should report a missing repository', () => {
    const result = resolveContext({ env: {}, cwd: () => testDir, executor: new ScriptedGitExecutor() });

    expect(result._unsafeUnwrapErr()).toEqual({ kind: 'git-dir-not-found' });
  });
});

describe('resolver - resolveContext from hints', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = makeTempDir('git-handle-hints-');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should ignore the environment once any hint is given', () => {
    makeMetadataDir(join(testDir, '.git'));
    const executor = new ScriptedGitExecutor([outcome(0, 'false\n')]);

    const context = resolveContext({ root: testDir, env: { GIT_DIR: '/srv/other' }, executor })._unsafeUnwrap();

    expect(context.gitDir).toBe(join(testDir, '.git'));
  });

  it('should take relative hints relative to root', () => {
    const executor = new ScriptedGitExecutor();

    const context = resolveContext({ root: testDir, gitDir: 'meta', workTree: 'checkout', executor })._unsafeUnwrap();

    expect(context).toEqual({ kind: 'normal', gitDir: join(testDir, 'meta'), workTree: join(testDir, 'checkout') });
    expect(executor.invocations).toHaveLength(0);
  });

  it('should not cross-check explicit git dir and work tree', () => {
    const context = resolveContext({
      gitDir: '/srv/one/.git',
      workTree: '/srv/two',
      executor: new ScriptedGitExecutor(),
    })._unsafeUnwrap();

    expect(context).toEqual({ kind: 'normal', gitDir: '/srv/one/.git', workTree: '/srv/two' });
  });

  it('should construct the git dir from a work tree hint without searching', () => {
    const executor = new ScriptedGitExecutor();

    const context = resolveContext({ workTree: '/srv/demo', executor })._unsafeUnwrap();

    expect(context).toEqual({ kind: 'normal', gitDir: '/srv/demo/.git', workTree: '/srv/demo' });
    expect(executor.invocations).toHaveLength(0);
  });

  it('should settle bareness of a git dir hint', () => {
    const bare = resolveContext({
      gitDir: '/srv/demo.git',
      executor: new ScriptedGitExecutor([outcome(0, 'true\n')]),
    })._unsafeUnwrap();
    const normal = resolveContext({
      gitDir: '/srv/demo/.git',
      executor: new ScriptedGitExecutor([outcome(0, 'false\n')]),
    })._unsafeUnwrap();

    expect(bare).toEqual({ kind: 'bare', gitDir: '/srv/demo.git' });
    expect(normal).toEqual({ kind: 'normal', gitDir: '/srv/demo/.git', workTree: '/srv/demo' });
  });

  it('should derive a work tree whose git dir is the original hint', () => {
    const hint = join(testDir, 'demo', '.git');

    const context = resolveContext({
      gitDir: hint,
      executor: new ScriptedGitExecutor([outcome(0, 'false\n')]),
    })._unsafeUnwrap();

    expect(context.kind).toBe('normal');
    if (context.kind === 'normal') {
      expect(gitDirFromWorkTree(context.workTree)._unsafeUnwrap()).toBe(hint);
    }
  });

  it('should fail on a relative hint that does not exist under root', () => {
    const result = resolveContext({ gitDir: 'nope/.git', executor: new ScriptedGitExecutor() });

    expect(result._unsafeUnwrapErr()).toEqual({ kind: 'absolution-failed', path: 'nope/.git' });
  });

  it('should search from root when it is the only hint', () => {
    makeMetadataDir(join(testDir, 'repo.git'));

    const context = resolveContext({ root: join(testDir, 'repo.git'), executor: new ScriptedGitExecutor() });

    expect(context._unsafeUnwrap()).toEqual({ kind: 'bare', gitDir: join(testDir, 'repo.git') });
  });
});

describe('resolver - makeContext', () => {
  it('should build a bare context without a work tree', () => {
    const context = makeContext('/srv/demo.git' as AbsoluteDirPath, null);

    expect(context).toEqual({ kind: 'bare', gitDir: '/srv/demo.git' });
    expect('workTree' in context).toBe(false);
  });
});
