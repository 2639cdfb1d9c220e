/**
 * YAML Output Utilities
 *
 * Structured output for `--yaml` mode: a single YAML document between `---`
 * separators on stdout, written only after stderr has been flushed.
 */

import { stringify as stringifyYaml } from 'yaml';

function waitForDrain(stream: NodeJS.WriteStream): Promise<void> {
  return new Promise<void>(resolve => {
    if (stream.write('')) {
      resolve();
    } else {
      stream.once('drain', resolve);
    }
  });
}

/**
 * Output a result as YAML to stdout
 *
 * @example
 * ```typescript
 * await outputYamlResult({ kind: 'normal', gitDir: '/srv/demo/.git', workTree: '/srv/demo' });
 * ```
 */
export async function outputYamlResult(result: unknown): Promise<void> {
  await waitForDrain(process.stderr);

  const yaml = stringifyYaml(result);
  process.stdout.write('---\n');
  process.stdout.write(yaml);
  if (!yaml.endsWith('\n')) {
    process.stdout.write('\n');
  }
  process.stdout.write('---\n');

  await waitForDrain(process.stdout);
}
