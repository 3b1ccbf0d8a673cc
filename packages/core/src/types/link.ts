/**
 * Private File Link Type Definitions
 *
 * Links carry untracked local files (env files, credentials, editor
 * settings) from a fixed location into each new worktree as symlinks.
 */

import type { SproutError } from '../errors/error.js';

/**
 * One declared link
 */
export interface LinkSpec {
  /** Absolute or home-relative source path (`~` and `$VAR` expanded) */
  readonly src: string;
  /** Destination relative to the worktree root */
  readonly dest: string;
  /** `false` opts out of the global force flag; `true` alone has no effect */
  readonly force?: boolean;
}

export const LinkStatus = {
  APPLIED: 'applied',
  SKIPPED: 'skipped',
  FAILED: 'failed',
} as const;

export type LinkStatus = (typeof LinkStatus)[keyof typeof LinkStatus];

export const LinkSkipReason = {
  SOURCE_MISSING: 'source-missing',
  ALREADY_LINKED: 'already-linked',
  EXISTS: 'exists',
} as const;

export type LinkSkipReason = (typeof LinkSkipReason)[keyof typeof LinkSkipReason];

interface LinkResultBase {
  /** Destination as declared */
  readonly dest: string;
  /** Expanded source path, when the entry had one */
  readonly src?: string;
  /** Absolute destination, when it resolved inside the worktree */
  readonly target?: string;
  readonly message: string;
}

export interface LinkApplied extends LinkResultBase {
  readonly status: typeof LinkStatus.APPLIED;
  /** True when an existing file or symlink was replaced */
  readonly replaced: boolean;
}

export interface LinkSkipped extends LinkResultBase {
  readonly status: typeof LinkStatus.SKIPPED;
  readonly reason: LinkSkipReason;
}

export interface LinkFailed extends LinkResultBase {
  readonly status: typeof LinkStatus.FAILED;
  readonly error: SproutError;
}

export type LinkResult = LinkApplied | LinkSkipped | LinkFailed;

/**
 * Per-entry report of one link pass
 */
export interface LinkReport {
  readonly results: readonly LinkResult[];
  readonly dryRun: boolean;
}

/**
 * First failure in declaration order, if any
 */
export function firstLinkFailure(report: LinkReport): LinkFailed | undefined {
  for (const result of report.results) {
    if (result.status === LinkStatus.FAILED) {
      return result;
    }
  }
  return undefined;
}
