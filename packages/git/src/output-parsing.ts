/**
 * Parsers for git's textual output
 *
 * Pure functions over captured stdout; nothing here runs git.
 */

import { err, ok, type Result } from 'neverthrow';

import type { Remote, RemoteRefLine } from './types.js';

export interface ParsingFailure {
  kind: 'parsing-failure';
  line: string;
}

export interface DecodeFailure {
  kind: 'decode-failed';
  message: string;
}

const strictDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode output, rejecting invalid UTF-8
 */
export function decodeStrict(bytes: Uint8Array): Result<string, DecodeFailure> {
  try {
    return ok(strictDecoder.decode(bytes));
  } catch (error) {
    return err({
      kind: 'decode-failed',
      message: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Decode a single-value result and strip trailing whitespace
 *
 * Invalid UTF-8 sequences become U+FFFD.
 */
export function trimOutput(bytes: Buffer): string {
  return bytes.toString('utf8').trimEnd();
}

/**
 * Split multi-line output into trimmed, non-empty lines
 */
export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Drop the first two `/` segments of a reference, keeping the rest verbatim
 *
 * @returns the short name, or null when nothing is left after the prefix
 *
 * @example
 * ```typescript
 * extractRefName('refs/heads/main');     // 'main'
 * extractRefName('refs/tags/v1/extra');  // 'v1/extra'
 * extractRefName('HEAD');                // null
 * ```
 */
export function extractRefName(ref: string): string | null {
  const first = ref.indexOf('/');
  if (first === -1) {
    return null;
  }
  const second = ref.indexOf('/', first + 1);
  if (second === -1) {
    return null;
  }
  const name = ref.slice(second + 1);
  return name.length > 0 ? name : null;
}

/**
 * Parse one `<id>\t<ref>` line of `git ls-remote` output
 *
 * @example
 * ```typescript
 * parseRefLine('abc123\trefs/heads/main');
 * // ok({ id: 'abc123', ref: 'refs/heads/main', name: 'main' })
 * ```
 */
export function parseRefLine(line: string): Result<RemoteRefLine, ParsingFailure> {
  const tab = line.indexOf('\t');
  if (tab <= 0) {
    return err({ kind: 'parsing-failure', line });
  }

  const id = line.slice(0, tab);
  const ref = line.slice(tab + 1);
  return ok({ id, ref, name: extractRefName(ref) });
}

/**
 * Parse `git remote -v` output into remotes keyed by name
 *
 * Each line is `<name>\t<url> (fetch)` or `<name>\t<url> (push)`. Anything after
 * the direction, such as the `[blob:none]` filter of a partial clone, is ignored.
 */
export function parseRemotes(text: string): Result<Map<string, Remote>, ParsingFailure> {
  const remotes = new Map<string, Remote>();

  for (const line of splitLines(text)) {
    const tab = line.indexOf('\t');
    if (tab <= 0) {
      return err({ kind: 'parsing-failure', line });
    }

    const name = line.slice(0, tab);
    const tokens = line.slice(tab + 1).split(' ');
    const at = tokens.findIndex((token, index) => index > 0 && (token === '(fetch)' || token === '(push)'));
    if (at === -1) {
      return err({ kind: 'parsing-failure', line });
    }
    const url = tokens.slice(0, at).join(' ');
    const direction = tokens[at];

    const remote = remotes.get(name) ?? { name, fetch: null, push: null };
    if (direction === '(fetch)') {
      remote.fetch = url;
    } else {
      remote.push = url;
    }
    remotes.set(name, remote);
  }

  return ok(remotes);
}
