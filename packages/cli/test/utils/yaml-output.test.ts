/**
 * Tests for YAML output
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { outputYamlResult } from '../../src/utils/yaml-output.js';

describe('outputYamlResult', () => {
  let written: string[];

  beforeEach(() => {
    written = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write one document between separators', async () => {
    await outputYamlResult({ bare: false, gitDir: '/srv/demo/.git', workTree: '/srv/demo' });

    expect(written.join('')).toBe('---\nbare: false\ngitDir: /srv/demo/.git\nworkTree: /srv/demo\n---\n');
  });

  it('should write null values explicitly', async () => {
    await outputYamlResult({ workTree: null });

    expect(written.join('')).toBe('---\nworkTree: null\n---\n');
  });
});
