/**
 * Orchestrator Type Definitions
 */

import type {
  BranchSpec,
  ErrorExitCode,
  IssueMetadata,
  IssueReference,
  LinkReport,
  SproutError,
  WorktreeResult,
} from '@sprout/core';
import type { Configuration } from '../config/index.js';
import type { GitEngine } from '../git/index.js';
import type { IssueMetadataProvider } from '../metadata/index.js';

/**
 * What one invocation asks for
 */
export interface SproutRequest {
  /** Raw issue reference */
  readonly issue?: string;
  /** Branch name override; authoritative for naming */
  readonly branch?: string;
  /** Injected title; skips the lookup */
  readonly title?: string;
  /** Injected issue URL; skips the lookup */
  readonly url?: string;
  /** Plan only: run nothing that changes the repository or filesystem */
  readonly dryRun?: boolean;
  /** Compute the path and stop: no lookup, no git reads beyond the root */
  readonly printPath?: boolean;
}

export interface OrchestratorDependencies {
  readonly config: Configuration;
  /** Engine bound to the target repository */
  readonly engine: GitEngine;
  readonly metadataProvider: IssueMetadataProvider;
  /** Directory relative configuration paths resolve against */
  readonly cwd?: string;
}

/**
 * Everything a run resolved and did
 */
export interface SproutSummary {
  readonly repoRoot: string;
  readonly remote: string;
  /** Absent for `--print-path`, which never detects the base */
  readonly baseBranch?: string;
  readonly reference?: IssueReference;
  readonly metadata: IssueMetadata;
  readonly branch: BranchSpec;
  /** Where the worktree is (or would be); the reused worktree's own path when reused */
  readonly worktreePath: string;
  readonly worktree?: WorktreeResult;
  readonly linksFile?: string;
  readonly links?: LinkReport;
  /** Soft failures: degraded metadata lookups */
  readonly warnings: readonly SproutError[];
  readonly dryRun: boolean;
  readonly printPath: boolean;
  /** The failure that decided the exit code, if any */
  readonly error?: SproutError;
  readonly exitCode: ErrorExitCode;
}
