import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { BranchNameError, ErrorCode, type IssueReference } from '@sprout/core';
import {
  generateNames,
  generateBranch,
  generateWorktreePath,
  validateBranchName,
  refFormatViolation,
  extractIssueId,
} from './branch-name.js';

const repoRoot = path.join(os.tmpdir(), 'src', 'repo');

const gh42: IssueReference = {
  source: 'github',
  primaryId: '42',
  ownerRepo: 'owner/repo',
  rawInput: 'owner/repo#42',
};

const abc7: IssueReference = { source: 'linear', primaryId: 'ABC-7', rawInput: 'ABC-7' };

function catchBranchError(fn: () => unknown): BranchNameError {
  try {
    fn();
  } catch (error) {
    if (error instanceof BranchNameError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a BranchNameError');
}

describe('generateNames', () => {
  it('names a GitHub issue without metadata', () => {
    const names = generateNames(gh42, undefined, { repoRoot });
    expect(names.branch).toEqual({
      prefix: 'issue',
      sourceTag: 'gh',
      id: '42',
      name: 'issue/gh-42',
      override: false,
    });
    expect(names.worktreePath).toBe(path.join(os.tmpdir(), 'src', 'worktrees', 'repo', 'issue', 'gh-42'));
    expect(path.relative(repoRoot, names.worktreePath)).toBe(path.join('..', 'worktrees', 'repo', 'issue', 'gh-42'));
  });

  it('names a Linear issue with a title', () => {
    const names = generateNames(abc7, { title: 'Fix login bug' }, { repoRoot });
    expect(names.branch.name).toBe('issue/lin-abc-7-fix-login-bug');
    expect(names.branch.slug).toBe('fix-login-bug');
  });

  it('omits the slug when the title has no ASCII token', () => {
    expect(generateNames(gh42, { title: '日本語' }, { repoRoot }).branch.name).toBe('issue/gh-42');
  });

  it('uses a custom prefix', () => {
    expect(generateBranch(gh42, undefined, { prefix: 'fix/' }).name).toBe('fix/gh-42');
    expect(generateBranch(gh42, undefined, { prefix: 'team/fix' }).name).toBe('team/fix/gh-42');
  });

  it('honours the slug length', () => {
    expect(generateBranch(abc7, { title: 'alpha beta gamma' }, { slugMaxLength: 5 }).name).toBe('issue/lin-abc-7-alpha');
  });

  it('places the worktree under a configured root', () => {
    const root = path.join(os.tmpdir(), 'trees');
    expect(generateWorktreePath('issue/gh-42', { repoRoot, worktreesRoot: root })).toBe(
      path.join(root, 'repo', 'issue', 'gh-42')
    );
  });

  it('resolves a relative root against cwd', () => {
    const cwd = path.join(os.tmpdir(), 'work');
    expect(generateWorktreePath('b', { repoRoot, worktreesRoot: 'trees', cwd })).toBe(
      path.join(cwd, 'trees', 'repo', 'b')
    );
  });

  it('rejects a root inside the repository', () => {
    const error = catchBranchError(() =>
      generateWorktreePath('issue/gh-42', { repoRoot, worktreesRoot: path.join(repoRoot, 'trees') })
    );
    expect(error.code).toBe(ErrorCode.INVALID_WORKTREE_PATH);
    expect(error.exitCode).toBe(21);
  });

  it('is deterministic', () => {
    const a = generateNames(abc7, { title: 'Fix login bug' }, { repoRoot });
    const b = generateNames(abc7, { title: 'Fix login bug' }, { repoRoot });
    expect(a).toEqual(b);
  });
});

describe('branch override', () => {
  it('bypasses prefix, id and slug', () => {
    const branch = generateBranch(gh42, { title: 'Fix login bug' }, { branchOverride: 'feature/login' });
    expect(branch).toEqual({ name: 'feature/login', override: true });
  });

  it('ignores the configured prefix entirely', () => {
    const branch = generateBranch(gh42, undefined, { prefix: 'tâche', branchOverride: 'feature/login' });
    expect(branch).toEqual({ name: 'feature/login', override: true });
  });

  it('works without a reference', () => {
    expect(generateBranch(undefined, undefined, { branchOverride: 'chore/deps' }).name).toBe('chore/deps');
  });

  it('rejects a non-ASCII override naming the first offending character', () => {
    const error = catchBranchError(() => generateBranch(undefined, undefined, { branchOverride: 'feature/日本語' }));
    expect(error.code).toBe(ErrorCode.INVALID_BRANCH_NAME);
    expect(error.details.offending).toBe('日');
    expect(error.details.index).toBe(8);
    expect(error.message).toContain("'日'");
  });

  it('rejects an override breaking git ref rules', () => {
    expect(catchBranchError(() => generateBranch(undefined, undefined, { branchOverride: 'a..b' })).code).toBe(
      ErrorCode.INVALID_BRANCH_NAME
    );
  });
});

describe('validateBranchName', () => {
  it('rejects a non-ASCII prefix', () => {
    const error = catchBranchError(() => generateBranch(gh42, undefined, { prefix: 'tâche' }));
    expect(error.details.offending).toBe('â');
    expect(error.details.index).toBe(1);
    expect(error.details.field).toBe('branch prefix');
  });

  it('rejects an empty name', () => {
    expect(catchBranchError(() => validateBranchName('')).message).toBe('Invalid branch name "": must not be empty');
  });

  it.each(['issue/gh-42', 'feature/login', 'a.b/c-d_e', 'release/2024.10'])('accepts %s', (name) => {
    expect(refFormatViolation(name)).toBeUndefined();
  });

  it.each([
    ['@', "must not be '@'"],
    ['-x', "must not start with '-'"],
    ['/x', "must not start or end with '/'"],
    ['x/', "must not start or end with '/'"],
    ['a//b', "must not contain '//'"],
    ['a..b', "must not contain '..'"],
    ['a@{b', "must not contain '@{'"],
    ['a b', 'must not contain a space (index 1)'],
    ['a~b', "must not contain '~' (index 1)"],
    ['a^b', "must not contain '^' (index 1)"],
    ['a:b', "must not contain ':' (index 1)"],
    ['a?b', "must not contain '?' (index 1)"],
    ['a*b', "must not contain '*' (index 1)"],
    ['a[b', "must not contain '[' (index 1)"],
    ['a\\b', "must not contain '\\' (index 1)"],
    ['a\tb', 'must not contain control character 0x09 (index 1)'],
    ['a.', "must not end with '.'"],
    ['a/.b', 'component ".b" must not start with \'.\''],
    ['a/b.lock', 'component "b.lock" must not end with \'.lock\''],
  ])('rejects %j', (name, reason) => {
    expect(refFormatViolation(name)).toBe(reason);
  });
});

describe('extractIssueId', () => {
  it('round-trips generated names', () => {
    const github = generateBranch(gh42, { title: '7 up fix' }, {});
    expect(github.name).toBe('issue/gh-42-7-up-fix');
    expect(extractIssueId(github.name)).toEqual({ source: 'github', id: '42' });

    const linear = generateBranch(abc7, { title: 'Fix login bug' }, { prefix: 'team/x' });
    expect(extractIssueId(linear.name)).toEqual({ source: 'linear', id: 'abc-7' });
  });

  it('returns undefined for other names', () => {
    expect(extractIssueId('feature/login')).toBeUndefined();
  });
});
