/**
 * Link declaration file.
 *
 * A JSON array of `{ "src": "...", "dest": "..." }` objects, usually
 * `.worktree-links.local.json` at the repository root and kept out of
 * version control. `source`/`target` are accepted as aliases, and an
 * entry may carry `"force": false` to opt out of `--link-force`.
 *
 * ```json
 * [
 *   { "src": "~/.secrets/widgets/.env", "dest": ".env" },
 *   { "source": "$HOME/.config/widgets/settings.json", "target": ".vscode/settings.json", "force": false }
 * ]
 * ```
 *
 * @module
 */

import * as fs from 'node:fs';
import { invalidLinkFile, linkFailed, type LinkError, type LinkSpec } from '@sprout/core';

/** Declaration file looked for at the repository root */
export const DEFAULT_LINKS_FILE = '.worktree-links.local.json';

/**
 * An entry that could not be read. It fails on its own; the others still apply.
 */
export interface MalformedLinkEntry {
  readonly index: number;
  /** Declared destination, or `links[<index>]` when there is none */
  readonly dest: string;
  readonly error: LinkError;
}

export type LinkEntry = LinkSpec | MalformedLinkEntry;

export function isMalformedLinkEntry(entry: LinkEntry): entry is MalformedLinkEntry {
  return 'error' in entry;
}

/**
 * Reads a declaration file. A missing file yields no entries.
 *
 * @throws LinkError (INVALID_LINK_FILE) when the file is unreadable, not JSON, or not an array
 */
export function loadLinkFile(filePath: string): LinkEntry[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return [];
    }
    throw invalidLinkFile(filePath, 'cannot read file', error instanceof Error ? error : undefined);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'parse error';
    throw invalidLinkFile(filePath, `not valid JSON (${reason})`, error instanceof Error ? error : undefined);
  }

  return parseLinkEntries(data, filePath);
}

/**
 * Validates already-parsed declarations
 *
 * @throws LinkError (INVALID_LINK_FILE) when the root is not an array
 */
export function parseLinkEntries(data: unknown, source = 'links'): LinkEntry[] {
  if (!Array.isArray(data)) {
    throw invalidLinkFile(source, 'expected a JSON array of {"src": ..., "dest": ...} objects');
  }
  return data.map((item: unknown, index) => parseEntry(item, index));
}

function parseEntry(item: unknown, index: number): LinkEntry {
  const label = `links[${index}]`;

  if (!isRecord(item)) {
    return malformed(index, label, 'entry must be an object');
  }

  const src = item.src ?? item.source;
  const dest = item.dest ?? item.target;
  const shownDest = typeof dest === 'string' && dest !== '' ? dest : label;

  if (typeof src !== 'string' || src.trim() === '') {
    return malformed(index, shownDest, 'entry needs a non-empty "src" (or "source")');
  }
  if (typeof dest !== 'string' || dest.trim() === '') {
    return malformed(index, shownDest, 'entry needs a non-empty "dest" (or "target")');
  }
  if (item.force !== undefined && typeof item.force !== 'boolean') {
    return malformed(index, shownDest, '"force" must be true or false');
  }

  return {
    src,
    dest,
    ...(typeof item.force === 'boolean' ? { force: item.force } : {}),
  };
}

function malformed(index: number, dest: string, reason: string): MalformedLinkEntry {
  return { index, dest, error: linkFailed(dest, reason) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
