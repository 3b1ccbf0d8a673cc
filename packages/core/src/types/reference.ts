/**
 * Issue Reference Type Definitions
 *
 * A normalized pointer to one issue in one tracker. GitHub references are
 * always scoped to an `owner/repo`; Linear identifiers are global.
 */

// ============================================================================
// Issue Source
// ============================================================================

/**
 * Trackers a reference can point into
 */
export const IssueSource = {
  /** GitHub issues, numeric ids scoped to a repository */
  GITHUB: 'github',
  /** Linear issues, team-keyed identifiers such as ABC-7 */
  LINEAR: 'linear',
} as const;

export type IssueSource = (typeof IssueSource)[keyof typeof IssueSource];

// ============================================================================
// References
// ============================================================================

/**
 * Reference to a GitHub issue
 */
export interface GitHubIssueReference {
  readonly source: typeof IssueSource.GITHUB;
  /** Issue number as a decimal string, no leading '#' */
  readonly primaryId: string;
  /** Repository in `owner/repo` form */
  readonly ownerRepo: string;
  /** The input this reference was parsed from */
  readonly rawInput: string;
}

/**
 * Reference to a Linear issue
 */
export interface LinearIssueReference {
  readonly source: typeof IssueSource.LINEAR;
  /** Identifier exactly as given, e.g. `ABC-7` */
  readonly primaryId: string;
  readonly ownerRepo?: undefined;
  readonly rawInput: string;
}

export type IssueReference = GitHubIssueReference | LinearIssueReference;

// ============================================================================
// Helpers
// ============================================================================

export function isGitHubReference(ref: IssueReference): ref is GitHubIssueReference {
  return ref.source === IssueSource.GITHUB;
}

export function isLinearReference(ref: IssueReference): ref is LinearIssueReference {
  return ref.source === IssueSource.LINEAR;
}

/**
 * True when both references point at the same issue.
 * `rawInput` is ignored; repository and Linear keys compare case-insensitively.
 */
export function sameIssue(a: IssueReference, b: IssueReference): boolean {
  if (a.source !== b.source) {
    return false;
  }
  if (a.primaryId.toLowerCase() !== b.primaryId.toLowerCase()) {
    return false;
  }
  return (a.ownerRepo ?? '').toLowerCase() === (b.ownerRepo ?? '').toLowerCase();
}

/**
 * Renders a reference the way a user would type it
 */
export function formatReference(ref: IssueReference): string {
  if (ref.source === IssueSource.GITHUB) {
    return `${ref.ownerRepo}#${ref.primaryId}`;
  }
  return ref.primaryId;
}
