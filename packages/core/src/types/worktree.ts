/**
 * Worktree Type Definitions
 */

import type { SproutError } from '../errors/error.js';

// ============================================================================
// Worktree Listing
// ============================================================================

/**
 * One entry of `git worktree list --porcelain`
 */
export interface WorktreeInfo {
  /** Absolute path to the worktree directory */
  readonly path: string;
  /** Short branch name, absent when detached or bare */
  readonly branch?: string;
  /** HEAD commit */
  readonly head: string;
  /** Whether this is the main worktree */
  readonly isMain: boolean;
  readonly isBare: boolean;
  readonly isDetached: boolean;
  readonly isLocked: boolean;
  readonly isPrunable: boolean;
}

// ============================================================================
// Worktree Outcome
// ============================================================================

export const WorktreeOutcome = {
  /** The branch already had a worktree; nothing was changed */
  REUSED: 'reused',
  /** The branch existed; a worktree was added for it */
  CREATED_FROM_EXISTING_BRANCH: 'created-from-existing-branch',
  /** Branch and worktree were both created */
  CREATED_FRESH: 'created-fresh',
  FAILED: 'failed',
} as const;

export type WorktreeOutcome = (typeof WorktreeOutcome)[keyof typeof WorktreeOutcome];

/**
 * The worktree a run resolved to. Lives for one run.
 */
export interface WorktreeRecord {
  readonly branchName: string;
  readonly path: string;
  /** True when the worktree was already there before this run */
  readonly existedBefore: boolean;
}

interface WorktreeResultBase {
  readonly record: WorktreeRecord;
  /** Ref the branch was (or would be) created from */
  readonly startPoint?: string;
  /** Git commands run, or that would run in a dry run */
  readonly commands: readonly (readonly string[])[];
  readonly dryRun: boolean;
}

export interface WorktreeSuccess extends WorktreeResultBase {
  readonly outcome: Exclude<WorktreeOutcome, typeof WorktreeOutcome.FAILED>;
}

export interface WorktreeFailure extends WorktreeResultBase {
  readonly outcome: typeof WorktreeOutcome.FAILED;
  readonly error: SproutError;
}

export type WorktreeResult = WorktreeSuccess | WorktreeFailure;

export function isWorktreeFailure(result: WorktreeResult): result is WorktreeFailure {
  return result.outcome === WorktreeOutcome.FAILED;
}
