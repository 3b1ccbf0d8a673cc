/**
 * Worktree Manager
 *
 * Creates or safely reuses the worktree for a branch. Running it twice with
 * the same inputs is a no-op the second time.
 *
 * Decision order:
 * 1. A worktree already has the branch checked out → reused (its own path)
 * 2. The target path is registered to another branch, or exists on disk
 *    without being a worktree → failed (conflict)
 * 3. The branch exists → worktree added for it
 * 4. Otherwise → optional fetch of the base, branch created from
 *    `<remote>/<base>` (or `<base>`), worktree added
 *
 * Engine failures are reported as a `failed` outcome carrying the attempted
 * git command and git's message. Nothing is rolled back.
 *
 * @module
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  WorktreeOutcome,
  isSproutError,
  versionControlFailure,
  worktreeConflict,
  type SproutError,
  type WorktreeInfo,
  type WorktreeRecord,
  type WorktreeResult,
} from '@sprout/core';
import type { GitEngine } from './git-engine.js';
import { engineMessage } from './git-engine.js';
import { createLogger } from '../utils/logger.js';
import { canonicalPath } from '../utils/paths.js';

const logger = createLogger('worktree');

/** Remote used when none is configured */
export const DEFAULT_REMOTE = 'origin';

// ============================================================================
// Types
// ============================================================================

export interface EnsureWorktreeOptions {
  /** Branch to check out */
  readonly branch: string;
  /** Absolute worktree path */
  readonly path: string;
  /** Base branch new branches start from */
  readonly baseBranch: string;
  /** Remote the base is fetched from (default: origin) */
  readonly remote?: string;
  /** Fetch the base before creating a new branch; failures are warnings */
  readonly fetchBase?: boolean;
  /** Check and plan only; run nothing that changes the repository */
  readonly dryRun?: boolean;
}

/**
 * WorktreeManager interface for creating and finding issue worktrees.
 */
export interface WorktreeManager {
  /**
   * Ensures a worktree for the branch exists.
   * Never throws for engine failures; they come back as a `failed` outcome.
   */
  ensureWorktree(options: EnsureWorktreeOptions): Promise<WorktreeResult>;

  /**
   * Returns the worktree that has the branch checked out, if any.
   */
  findWorktreeForBranch(branch: string): Promise<WorktreeInfo | undefined>;
}

// ============================================================================
// Implementation
// ============================================================================

export class WorktreeManagerImpl implements WorktreeManager {
  constructor(private readonly engine: GitEngine) {}

  async ensureWorktree(options: EnsureWorktreeOptions): Promise<WorktreeResult> {
    const remote = options.remote ?? DEFAULT_REMOTE;
    const dryRun = options.dryRun ?? false;
    const targetPath = path.resolve(options.path);
    const commands: string[][] = [];
    let startPoint: string | undefined;

    const record = (existedBefore: boolean, at = targetPath): WorktreeRecord => ({
      branchName: options.branch,
      path: at,
      existedBefore,
    });

    const failed = (error: SproutError): WorktreeResult => ({
      outcome: WorktreeOutcome.FAILED,
      record: record(false),
      ...(startPoint !== undefined ? { startPoint } : {}),
      commands,
      dryRun,
      error,
    });

    try {
      const worktrees = await this.engine.listWorktrees();

      const existing = worktrees.find((worktree) => worktree.branch === options.branch);
      if (existing) {
        if (existing.isPrunable) {
          return failed(
            worktreeConflict(existing.path, `branch ${options.branch} is registered to a missing worktree; run git worktree prune`, {
              branch: options.branch,
            })
          );
        }
        logger.debug(`Branch ${options.branch} already checked out at ${existing.path}`);
        return {
          outcome: WorktreeOutcome.REUSED,
          record: record(true, existing.path),
          commands,
          dryRun,
        };
      }

      const occupant = worktrees.find((worktree) => samePath(worktree.path, targetPath));
      if (occupant) {
        const holder = occupant.branch ? `branch ${occupant.branch}` : 'a detached HEAD';
        return failed(
          worktreeConflict(targetPath, `path is already a worktree for ${holder}`, {
            branch: options.branch,
            ...(occupant.branch !== undefined ? { occupiedBy: occupant.branch } : {}),
          })
        );
      }

      if (fs.existsSync(targetPath)) {
        return failed(
          worktreeConflict(targetPath, 'path exists but is not a registered worktree', {
            branch: options.branch,
          })
        );
      }

      if (await this.engine.branchExists(options.branch)) {
        commands.push(['git', 'worktree', 'add', targetPath, options.branch]);
        if (!dryRun) {
          await this.engine.addWorktree(targetPath, options.branch);
          logger.debug(`Added worktree for existing branch ${options.branch}`);
        }
        return {
          outcome: WorktreeOutcome.CREATED_FROM_EXISTING_BRANCH,
          record: record(false),
          commands,
          dryRun,
        };
      }

      if (options.fetchBase) {
        commands.push(['git', 'fetch', '--prune', remote, options.baseBranch]);
        if (!dryRun) {
          await this.fetchBase(remote, options.baseBranch);
        }
      }

      startPoint = (await this.engine.refExists(`refs/remotes/${remote}/${options.baseBranch}`))
        ? `${remote}/${options.baseBranch}`
        : options.baseBranch;

      commands.push(['git', 'branch', options.branch, startPoint]);
      commands.push(['git', 'worktree', 'add', targetPath, options.branch]);

      if (!dryRun) {
        await this.engine.createBranch(options.branch, startPoint);
        await this.engine.addWorktree(targetPath, options.branch);
        logger.debug(`Created ${options.branch} from ${startPoint}`);
      }

      return {
        outcome: WorktreeOutcome.CREATED_FRESH,
        record: record(false),
        startPoint,
        commands,
        dryRun,
      };
    } catch (error) {
      if (isSproutError(error)) {
        return failed(error);
      }
      const last = commands[commands.length - 1] ?? ['git'];
      return failed(versionControlFailure(last, engineMessage(error), error instanceof Error ? error : undefined));
    }
  }

  async findWorktreeForBranch(branch: string): Promise<WorktreeInfo | undefined> {
    const worktrees = await this.engine.listWorktrees();
    return worktrees.find((worktree) => worktree.branch === branch);
  }

  // ----------------------------------------
  // Private Helpers
  // ----------------------------------------

  private async fetchBase(remote: string, baseBranch: string): Promise<void> {
    try {
      await this.engine.fetch(remote, baseBranch);
    } catch (error) {
      // Offline or no such remote: continue from whatever refs exist locally
      logger.warn(`Fetch of ${remote}/${baseBranch} failed, continuing: ${engineMessage(error)}`);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Compares paths after resolving symlinks where the path exists
 */
export function samePath(a: string, b: string): boolean {
  return canonicalPath(a) === canonicalPath(b);
}

/**
 * Creates a WorktreeManager backed by the given engine
 */
export function createWorktreeManager(engine: GitEngine): WorktreeManager {
  return new WorktreeManagerImpl(engine);
}
