/**
 * Branch and worktree naming.
 *
 * Branch format: `<prefix>/<tag>-<id>[-<slug>]`
 * - GitHub: `issue/gh-42-fix-login-bug`
 * - Linear: `issue/lin-abc-7-fix-login-bug` (identifier lowercased)
 *
 * Worktree path: `<worktreesRoot>/<repoName>/<branch>`, where the root
 * defaults to a `worktrees` directory beside the repository.
 *
 * @module
 */

import * as path from 'node:path';
import {
  IssueSource,
  SourceTag,
  DEFAULT_BRANCH_PREFIX,
  invalidBranchName,
  nonAsciiBranchName,
  invalidWorktreePath,
  invalidInput,
  type BranchSpec,
  type GeneratedNames,
  type IssueMetadata,
  type IssueReference,
} from '@sprout/core';
import { createSlug, DEFAULT_SLUG_MAX_LENGTH } from './slug.js';
import { resolvePath, isWithin } from '../utils/paths.js';

// ============================================================================
// Types
// ============================================================================

export interface NamingOptions {
  /** Top-level directory of the repository */
  readonly repoRoot: string;
  /** Branch prefix (default: `issue`) */
  readonly prefix?: string;
  /** Explicit branch name; bypasses prefix, id and slug */
  readonly branchOverride?: string;
  /** Root for all worktrees; resolved against `cwd` with `~` expanded */
  readonly worktreesRoot?: string;
  readonly slugMaxLength?: number;
  /** Directory relative roots resolve against (default: process.cwd()) */
  readonly cwd?: string;
}

/** Directory created beside the repository when no root is configured */
export const DEFAULT_WORKTREES_DIR = 'worktrees';

// ============================================================================
// Name Generation
// ============================================================================

/**
 * Derives the branch and worktree path for an issue.
 *
 * Validation runs before anything else touches the repository.
 *
 * @throws BranchNameError (INVALID_BRANCH_NAME or INVALID_WORKTREE_PATH)
 */
export function generateNames(
  reference: IssueReference | undefined,
  metadata: IssueMetadata | undefined,
  options: NamingOptions
): GeneratedNames {
  const branch = generateBranch(reference, metadata, options);
  const worktreePath = generateWorktreePath(branch.name, options);
  return { branch, worktreePath };
}

/**
 * Composes and validates the branch spec
 */
export function generateBranch(
  reference: IssueReference | undefined,
  metadata: IssueMetadata | undefined,
  options: Pick<NamingOptions, 'prefix' | 'branchOverride' | 'slugMaxLength'>
): BranchSpec {
  if (options.branchOverride !== undefined) {
    validateBranchName(options.branchOverride);
    return { name: options.branchOverride, override: true };
  }

  const prefix = (options.prefix ?? DEFAULT_BRANCH_PREFIX).replace(/\/+$/, '');

  if (!reference) {
    throw invalidInput('An issue reference or a branch name is required');
  }

  assertAscii(prefix, 'branch prefix');

  const sourceTag = SourceTag[reference.source];
  const id = reference.source === IssueSource.LINEAR ? reference.primaryId.toLowerCase() : reference.primaryId;
  const slug = createSlug(metadata?.title, options.slugMaxLength ?? DEFAULT_SLUG_MAX_LENGTH);
  const name = slug ? `${prefix}/${sourceTag}-${id}-${slug}` : `${prefix}/${sourceTag}-${id}`;

  validateBranchName(name);

  return {
    prefix,
    sourceTag,
    id,
    ...(slug ? { slug } : {}),
    name,
    override: false,
  };
}

/**
 * Computes the worktree path for a branch
 *
 * @throws BranchNameError (INVALID_WORKTREE_PATH) when a configured root lies inside the repository
 */
export function generateWorktreePath(
  branchName: string,
  options: Pick<NamingOptions, 'repoRoot' | 'worktreesRoot' | 'cwd'>
): string {
  const repoRoot = path.resolve(options.repoRoot);
  let root: string;

  if (options.worktreesRoot !== undefined && options.worktreesRoot.trim() !== '') {
    root = resolvePath(options.worktreesRoot, options.cwd);
    if (isWithin(repoRoot, root)) {
      throw invalidWorktreePath(root, `worktrees root must be outside the repository ${repoRoot}`, {
        repoRoot,
      });
    }
  } else {
    root = path.join(path.dirname(repoRoot), DEFAULT_WORKTREES_DIR);
  }

  return path.join(root, path.basename(repoRoot), ...branchName.split('/'));
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Characters git forbids anywhere in a ref name
 */
const FORBIDDEN_CHARACTER = /[\x00-\x20\x7F~^:?*[\\]/;

/**
 * Validates a branch name: ASCII only, non-empty, then git's
 * `check-ref-format --branch` rules.
 *
 * @throws BranchNameError
 */
export function validateBranchName(name: string): void {
  assertAscii(name, 'branch name');

  if (name === '') {
    throw invalidBranchName(name, 'must not be empty');
  }

  const reason = refFormatViolation(name);
  if (reason) {
    throw invalidBranchName(name, reason);
  }
}

/**
 * Returns the first git ref-format rule the name breaks, if any
 */
export function refFormatViolation(name: string): string | undefined {
  if (name === '@') {
    return "must not be '@'";
  }
  if (name.startsWith('-')) {
    return "must not start with '-'";
  }
  if (name.startsWith('/') || name.endsWith('/')) {
    return "must not start or end with '/'";
  }
  if (name.includes('//')) {
    return "must not contain '//'";
  }
  if (name.includes('..')) {
    return "must not contain '..'";
  }
  if (name.includes('@{')) {
    return "must not contain '@{'";
  }
  const forbidden = FORBIDDEN_CHARACTER.exec(name);
  if (forbidden) {
    return `must not contain ${describeCharacter(forbidden[0])} (index ${forbidden.index})`;
  }
  if (name.endsWith('.')) {
    return "must not end with '.'";
  }
  for (const component of name.split('/')) {
    if (component.startsWith('.')) {
      return `component "${component}" must not start with '.'`;
    }
    if (component.endsWith('.lock')) {
      return `component "${component}" must not end with '.lock'`;
    }
  }
  return undefined;
}

function assertAscii(value: string, field: string): void {
  let index = 0;
  for (const char of value) {
    const codePoint = char.codePointAt(0) ?? 0;
    if (codePoint > 0x7f) {
      throw nonAsciiBranchName(value, char, index, field);
    }
    index++;
  }
}

function describeCharacter(char: string): string {
  if (char === ' ') return 'a space';
  const codePoint = char.charCodeAt(0);
  if (codePoint < 0x20 || codePoint === 0x7f) {
    return `control character 0x${codePoint.toString(16).padStart(2, '0')}`;
  }
  return `'${char}'`;
}

// ============================================================================
// Id Recovery
// ============================================================================

const GITHUB_COMPONENT = /^gh-(\d+)(?:-|$)/;
const LINEAR_COMPONENT = /^lin-([a-z][a-z0-9]*-\d+)(?:-|$)/;

/**
 * Recovers the issue id embedded in a generated branch name.
 *
 * @example
 * extractIssueId('issue/gh-42-fix-login-bug') // { source: 'github', id: '42' }
 * extractIssueId('issue/lin-abc-7')           // { source: 'linear', id: 'abc-7' }
 */
export function extractIssueId(branchName: string): { source: IssueSource; id: string } | undefined {
  const component = branchName.slice(branchName.lastIndexOf('/') + 1);

  const gh = GITHUB_COMPONENT.exec(component);
  if (gh) {
    return { source: IssueSource.GITHUB, id: gh[1] };
  }
  const lin = LINEAR_COMPONENT.exec(component);
  if (lin) {
    return { source: IssueSource.LINEAR, id: lin[1] };
  }
  return undefined;
}
