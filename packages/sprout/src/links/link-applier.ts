/**
 * Link Applier
 *
 * Places private files into a worktree as symlinks without destroying
 * anything that is already there:
 * - destinations must stay strictly inside the worktree
 * - an existing destination is left alone unless forced
 * - forcing replaces files and symlinks, never directories
 *
 * Each entry is decided on its own; one failure does not stop the rest,
 * and nothing already applied is rolled back.
 *
 * @module
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  LinkStatus,
  LinkSkipReason,
  linkFailed,
  linkPathError,
  type LinkReport,
  type LinkResult,
  type LinkSpec,
} from '@sprout/core';
import { isMalformedLinkEntry, type LinkEntry } from './link-file.js';
import { canonicalPath, expandPath, isWithin } from '../utils/paths.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('links');

export interface ApplyLinksOptions {
  /** Replace existing files and symlinks, except for entries with `force: false` */
  readonly force?: boolean;
  /** Report outcomes without touching the filesystem */
  readonly dryRun?: boolean;
  /** Directory relative `src` paths resolve against (default: process.cwd()) */
  readonly baseDir?: string;
}

/**
 * Applies every entry and returns the per-entry report, in declaration order.
 */
export function applyLinks(
  entries: readonly LinkEntry[],
  worktreePath: string,
  options: ApplyLinksOptions = {}
): LinkReport {
  const dryRun = options.dryRun ?? false;
  const results = entries.map((entry) => applyEntry(entry, worktreePath, options));

  for (const result of results) {
    const verb = dryRun ? 'would be' : 'was';
    if (result.status === LinkStatus.FAILED) {
      logger.warn(result.message);
    } else {
      logger.debug(`${result.dest} ${verb} ${result.status}: ${result.message}`);
    }
  }

  return { results, dryRun };
}

function applyEntry(entry: LinkEntry, worktreePath: string, options: ApplyLinksOptions): LinkResult {
  if (isMalformedLinkEntry(entry)) {
    return { status: LinkStatus.FAILED, dest: entry.dest, message: entry.error.message, error: entry.error };
  }
  return applySpec(entry, worktreePath, options);
}

function applySpec(spec: LinkSpec, worktreePath: string, options: ApplyLinksOptions): LinkResult {
  const dryRun = options.dryRun ?? false;
  const root = path.resolve(worktreePath);
  const { dest } = spec;

  const pathProblem = destinationProblem(dest, root);
  if (pathProblem) {
    const error = linkPathError(dest, pathProblem);
    return { status: LinkStatus.FAILED, dest, message: error.message, error };
  }

  const target = path.resolve(root, dest);
  const src = path.resolve(options.baseDir ?? process.cwd(), expandPath(spec.src));

  if (!fs.existsSync(src)) {
    return {
      status: LinkStatus.SKIPPED,
      reason: LinkSkipReason.SOURCE_MISSING,
      dest,
      src,
      target,
      message: `source ${src} does not exist`,
    };
  }

  const existing = lstatOrUndefined(target);
  let replaced = false;

  if (existing) {
    if (existing.isSymbolicLink() && pointsTo(target, src)) {
      return {
        status: LinkStatus.SKIPPED,
        reason: LinkSkipReason.ALREADY_LINKED,
        dest,
        src,
        target,
        message: `${target} already links to ${src}`,
      };
    }

    // Replacing needs the global flag; an entry can only opt out
    const force = (options.force ?? false) && (spec.force ?? true);
    if (!force) {
      return {
        status: LinkStatus.SKIPPED,
        reason: LinkSkipReason.EXISTS,
        dest,
        src,
        target,
        message: `${target} exists; use --link-force to replace it`,
      };
    }

    if (existing.isDirectory()) {
      const error = linkFailed(dest, `${target} is a directory and is never replaced`);
      return { status: LinkStatus.FAILED, dest, src, target, message: error.message, error };
    }
    replaced = true;
  }

  if (!dryRun) {
    try {
      if (replaced) {
        fs.unlinkSync(target);
      }
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.symlinkSync(src, target);
    } catch (cause) {
      const reason = cause instanceof Error ? cause.message : String(cause);
      const error = linkFailed(dest, reason, cause instanceof Error ? cause : undefined);
      return { status: LinkStatus.FAILED, dest, src, target, message: error.message, error };
    }
  }

  return {
    status: LinkStatus.APPLIED,
    replaced,
    dest,
    src,
    target,
    message: `${replaced ? 'replaced' : 'linked'} ${target} -> ${src}`,
  };
}

/**
 * Why a destination is not allowed, or undefined when it is
 */
export function destinationProblem(dest: string, worktreeRoot: string): string | undefined {
  if (path.isAbsolute(dest) || path.win32.isAbsolute(dest)) {
    return 'must be a path relative to the worktree';
  }
  if (dest.split(/[\\/]/).includes('..')) {
    return "must not contain '..'";
  }
  const root = path.resolve(worktreeRoot);
  const target = path.resolve(root, dest);
  if (target === root || !isWithin(root, target)) {
    return 'must resolve inside the worktree';
  }
  // Catch escapes through symlinked directories already in the worktree
  const realRoot = canonicalPath(root);
  const realParent = canonicalPath(path.dirname(target));
  if (!isWithin(realRoot, realParent)) {
    return 'resolves outside the worktree through a symlink';
  }
  return undefined;
}

function lstatOrUndefined(p: string): fs.Stats | undefined {
  try {
    return fs.lstatSync(p);
  } catch {
    // Absent
    return undefined;
  }
}

function pointsTo(link: string, src: string): boolean {
  let target: string;
  try {
    target = fs.readlinkSync(link);
  } catch {
    return false;
  }
  const absolute = path.resolve(path.dirname(link), target);
  return canonicalPath(absolute) === canonicalPath(src);
}
