/**
 * Branch Naming Type Definitions
 */

import { IssueSource } from './reference.js';

// ============================================================================
// Source Tags
// ============================================================================

/**
 * Short tag embedded in generated branch names, per tracker
 */
export const SourceTag = {
  [IssueSource.GITHUB]: 'gh',
  [IssueSource.LINEAR]: 'lin',
} as const;

export type SourceTag = (typeof SourceTag)[keyof typeof SourceTag];

/** Prefix used when none is configured */
export const DEFAULT_BRANCH_PREFIX = 'issue';

// ============================================================================
// Branch Spec
// ============================================================================

/**
 * A branch name together with the parts it was composed from.
 * `name` is always ASCII and a valid git branch name.
 */
export interface BranchSpec {
  /** Absent for overrides */
  readonly prefix?: string;
  readonly sourceTag?: SourceTag;
  /** Issue id as it appears in the name (Linear ids lowercased) */
  readonly id?: string;
  readonly slug?: string;
  /** Rendered branch name */
  readonly name: string;
  /** True when `name` came from an explicit override */
  readonly override: boolean;
}

/**
 * Output of name generation
 */
export interface GeneratedNames {
  readonly branch: BranchSpec;
  /** Absolute worktree path */
  readonly worktreePath: string;
}
