/**
 * Git Engine
 *
 * Thin adapter over the `git` executable. Every call runs with a timeout
 * and with terminal prompts disabled, so a missing credential fails fast
 * instead of blocking on input.
 *
 * The process runner is injectable; tests replace it to observe the exact
 * argv without a repository.
 *
 * @module
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import * as path from 'node:path';
import { notARepository, versionControlFailure, type WorktreeInfo } from '@sprout/core';

const execFileAsync = promisify(execFile);

/** Default timeout for git operations (30 seconds) */
export const GIT_OPERATION_TIMEOUT_MS = 30_000;

// ============================================================================
// Runner
// ============================================================================

export interface GitRunOptions {
  readonly cwd: string;
  readonly timeout: number;
  readonly env: NodeJS.ProcessEnv;
}

export interface GitRunResult {
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Runs `git` with the given arguments. Rejects on a non-zero exit.
 */
export type GitRunner = (args: readonly string[], options: GitRunOptions) => Promise<GitRunResult>;

export const execGitRunner: GitRunner = async (args, options) => {
  const { stdout, stderr } = await execFileAsync('git', [...args], {
    cwd: options.cwd,
    env: options.env,
    encoding: 'utf8',
    timeout: options.timeout,
    maxBuffer: 16 * 1024 * 1024,
  });
  return { stdout, stderr };
};

// ============================================================================
// Engine Interface
// ============================================================================

/**
 * Version-control primitives used by the worktree manager.
 * All commands run in the engine's working directory.
 */
export interface GitEngine {
  /** Absolute top-level directory of the repository */
  getRepoRoot(): Promise<string>;
  /** Whether `refs/heads/<name>` exists */
  branchExists(name: string): Promise<boolean>;
  /** Whether a fully qualified ref exists */
  refExists(ref: string): Promise<boolean>;
  createBranch(name: string, startPoint: string): Promise<void>;
  listWorktrees(): Promise<WorktreeInfo[]>;
  /** Adds a worktree at `worktreePath` with `branch` checked out */
  addWorktree(worktreePath: string, branch: string): Promise<void>;
  /** URL of the named remote, or undefined when it does not exist */
  getRemoteUrl(remote: string): Promise<string | undefined>;
  /** `git fetch --prune <remote> <branch>` */
  fetch(remote: string, branch: string): Promise<void>;
  /** Remote HEAD, then `main` or `master` (local or remote), then `main` */
  detectDefaultBranch(remote: string): Promise<string>;
}

export interface GitEngineConfig {
  /** Directory commands run in (default: process.cwd()) */
  readonly cwd?: string;
  readonly timeout?: number;
  readonly runner?: GitRunner;
  readonly env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Implementation
// ============================================================================

export class GitEngineImpl implements GitEngine {
  private readonly cwd: string;
  private readonly timeout: number;
  private readonly runner: GitRunner;
  private readonly env: NodeJS.ProcessEnv;

  constructor(config: GitEngineConfig = {}) {
    this.cwd = path.resolve(config.cwd ?? process.cwd());
    this.timeout = config.timeout ?? GIT_OPERATION_TIMEOUT_MS;
    this.runner = config.runner ?? execGitRunner;
    this.env = { ...(config.env ?? process.env), GIT_TERMINAL_PROMPT: '0' };
  }

  async getRepoRoot(): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await this.execGit(['rev-parse', '--show-toplevel']));
    } catch (error) {
      throw notARepository(this.cwd, toError(error));
    }
    const root = stdout.trim();
    if (!root) {
      throw notARepository(this.cwd);
    }
    return path.resolve(root);
  }

  async branchExists(name: string): Promise<boolean> {
    return this.refExists(`refs/heads/${name}`);
  }

  async refExists(ref: string): Promise<boolean> {
    try {
      await this.execGit(['show-ref', '--verify', '--quiet', ref]);
      return true;
    } catch {
      // Non-zero exit: ref does not exist
      return false;
    }
  }

  async createBranch(name: string, startPoint: string): Promise<void> {
    await this.runChecked(['branch', name, startPoint]);
  }

  async listWorktrees(): Promise<WorktreeInfo[]> {
    const { stdout } = await this.runChecked(['worktree', 'list', '--porcelain']);
    return parseWorktreeList(stdout);
  }

  async addWorktree(worktreePath: string, branch: string): Promise<void> {
    await this.runChecked(['worktree', 'add', worktreePath, branch]);
  }

  async getRemoteUrl(remote: string): Promise<string | undefined> {
    try {
      const { stdout } = await this.execGit(['remote', 'get-url', remote]);
      const url = stdout.trim();
      return url === '' ? undefined : url;
    } catch {
      // No such remote
      return undefined;
    }
  }

  async fetch(remote: string, branch: string): Promise<void> {
    await this.runChecked(['fetch', '--prune', remote, branch]);
  }

  async detectDefaultBranch(remote: string): Promise<string> {
    try {
      const { stdout } = await this.execGit(['symbolic-ref', '-q', '--short', `refs/remotes/${remote}/HEAD`]);
      const ref = stdout.trim();
      if (ref.startsWith(`${remote}/`)) {
        return ref.slice(remote.length + 1);
      }
    } catch {
      // Remote HEAD not set, fall through
    }

    for (const candidate of ['main', 'master']) {
      if (
        (await this.refExists(`refs/remotes/${remote}/${candidate}`)) ||
        (await this.branchExists(candidate))
      ) {
        return candidate;
      }
    }
    return 'main';
  }

  // ----------------------------------------
  // Private Helpers
  // ----------------------------------------

  private async execGit(args: readonly string[]): Promise<GitRunResult> {
    return this.runner(args, { cwd: this.cwd, timeout: this.timeout, env: this.env });
  }

  /**
   * Runs a command whose failure is a version-control failure carrying
   * the argv and git's own message
   */
  private async runChecked(args: readonly string[]): Promise<GitRunResult> {
    try {
      return await this.execGit(args);
    } catch (error) {
      throw versionControlFailure(['git', ...args], engineMessage(error), toError(error));
    }
  }
}

// ============================================================================
// Porcelain Parsing
// ============================================================================

/**
 * Parses `git worktree list --porcelain` output.
 * The first entry is always the main worktree.
 */
export function parseWorktreeList(output: string): WorktreeInfo[] {
  const worktrees: WorktreeInfo[] = [];

  interface MutableWorktreeInfo {
    path?: string;
    head?: string;
    branch?: string;
    isBare?: boolean;
    isDetached?: boolean;
    isLocked?: boolean;
    isPrunable?: boolean;
  }

  let current: MutableWorktreeInfo = {};

  const flush = (): void => {
    if (current.path) {
      worktrees.push({
        path: current.path,
        ...(current.branch !== undefined ? { branch: current.branch } : {}),
        head: current.head ?? '',
        isMain: worktrees.length === 0,
        isBare: current.isBare ?? false,
        isDetached: current.isDetached ?? false,
        isLocked: current.isLocked ?? false,
        isPrunable: current.isPrunable ?? false,
      });
    }
    current = {};
  };

  for (const line of output.split('\n')) {
    if (line.startsWith('worktree ')) {
      flush();
      current.path = line.substring(9);
    } else if (line.startsWith('HEAD ')) {
      current.head = line.substring(5);
    } else if (line.startsWith('branch ')) {
      current.branch = line.substring(7).replace(/^refs\/heads\//, '');
    } else if (line === 'bare') {
      current.isBare = true;
    } else if (line === 'detached') {
      current.isDetached = true;
    } else if (line === 'locked' || line.startsWith('locked ')) {
      current.isLocked = true;
    } else if (line === 'prunable' || line.startsWith('prunable ')) {
      current.isPrunable = true;
    } else if (line === '') {
      flush();
    }
  }
  flush();

  return worktrees;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Git's own message for a failed command: stderr when present, else the error message
 */
export function engineMessage(error: unknown): string {
  if (error instanceof Error) {
    if ('stderr' in error && typeof error.stderr === 'string' && error.stderr.trim() !== '') {
      return error.stderr.trim();
    }
    return error.message;
  }
  return String(error);
}

function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * Creates a GitEngine bound to a working directory
 */
export function createGitEngine(config: GitEngineConfig = {}): GitEngine {
  return new GitEngineImpl(config);
}
