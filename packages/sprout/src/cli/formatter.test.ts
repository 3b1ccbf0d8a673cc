import { describe, it, expect } from 'vitest';
import {
  LinkStatus,
  WorktreeOutcome,
  linkPathError,
  metadataLookupDegraded,
  type WorktreeSuccess,
} from '@sprout/core';
import type { SproutSummary } from '../orchestrator/index.js';
import { formatSummary, getFormatter, getOutputMode, summaryToJSON } from './formatter.js';
import { OutputMode, failure, success } from './types.js';

const WORKTREE_PATH = '/src/worktrees/widgets/issue/gh-42-fix-login';

function created(overrides: Partial<WorktreeSuccess> = {}): WorktreeSuccess {
  return {
    outcome: WorktreeOutcome.CREATED_FRESH,
    record: { branchName: 'issue/gh-42-fix-login', path: WORKTREE_PATH, existedBefore: false },
    startPoint: 'origin/main',
    commands: [
      ['git', 'fetch', '--prune', 'origin', 'main'],
      ['git', 'branch', 'issue/gh-42-fix-login', 'origin/main'],
      ['git', 'worktree', 'add', WORKTREE_PATH, 'issue/gh-42-fix-login'],
    ],
    dryRun: false,
    ...overrides,
  };
}

function summary(overrides: Partial<SproutSummary> = {}): SproutSummary {
  return {
    repoRoot: '/src/widgets',
    remote: 'origin',
    baseBranch: 'main',
    reference: { source: 'github', primaryId: '42', ownerRepo: 'acme/widgets', rawInput: '#42' },
    metadata: { title: 'Fix login', url: 'https://github.com/acme/widgets/issues/42' },
    branch: { prefix: 'issue', name: 'issue/gh-42-fix-login', override: false },
    worktreePath: WORKTREE_PATH,
    worktree: created(),
    warnings: [],
    dryRun: false,
    printPath: false,
    exitCode: 0,
    ...overrides,
  };
}

describe('formatSummary', () => {
  it('renders aligned rows and next steps', () => {
    expect(formatSummary(summary())).toBe(
      [
        'Repository: /src/widgets',
        'Base:       main (origin)',
        'Issue:      acme/widgets#42 "Fix login"',
        'URL:        https://github.com/acme/widgets/issues/42',
        'Branch:     issue/gh-42-fix-login',
        `Path:       ${WORKTREE_PATH}`,
        'Worktree:   created with a new branch from origin/main',
        '',
        'Next steps:',
        `  cd ${WORKTREE_PATH}`,
        '  git push -u origin issue/gh-42-fix-login',
      ].join('\n')
    );
  });

  it('prints only the path in print-path mode', () => {
    expect(formatSummary(summary({ printPath: true, worktree: undefined }))).toBe(WORKTREE_PATH);
  });

  it('lists planned commands in a dry run and drops next steps', () => {
    const lines = formatSummary(summary({ dryRun: true, worktree: created({ dryRun: true }) })).split('\n');

    expect(lines).toContain('Worktree:   would create with a new branch from origin/main');
    expect(lines.slice(lines.indexOf('Planned commands:') + 1)).toEqual([
      '  git fetch --prune origin main',
      '  git branch issue/gh-42-fix-login origin/main',
      `  git worktree add ${WORKTREE_PATH} issue/gh-42-fix-login`,
    ]);
    expect(lines).not.toContain('Next steps:');
  });

  it('marks overrides and reports links and warnings', () => {
    const output = formatSummary(
      summary({
        branch: { name: 'feature/login', override: true },
        links: {
          dryRun: false,
          results: [
            { status: LinkStatus.APPLIED, dest: '.env', replaced: true, message: 'Linked .env' },
            { status: LinkStatus.SKIPPED, dest: '.npmrc', reason: 'source-missing', message: 'Source missing' },
            {
              status: LinkStatus.FAILED,
              dest: '../.env',
              message: 'Destination escapes the worktree',
              error: linkPathError('../.env', 'Destination escapes the worktree'),
            },
          ],
        },
        warnings: [metadataLookupDegraded('acme/widgets#42', 'timed out after 10000ms')],
      })
    );
    const lines = output.split('\n');

    expect(lines).toContain('Branch:     feature/login (override)');
    expect(lines).toContain('  applied .env (replaced)');
    expect(lines).toContain('  skipped .npmrc (source-missing)');
    expect(lines).toContain('  failed  ../.env: Destination escapes the worktree');
    expect(lines).toContain('  Metadata lookup for acme/widgets#42 failed: timed out after 10000ms');
  });
});

describe('summaryToJSON', () => {
  it('flattens the summary into plain data', () => {
    const data = summaryToJSON(summary());

    expect(data.issue).toEqual({
      source: 'github',
      id: '42',
      ownerRepo: 'acme/widgets',
      display: 'acme/widgets#42',
      input: '#42',
    });
    expect(data.branch).toBe('issue/gh-42-fix-login');
    expect(data.outcome).toBe('created-fresh');
    expect(data.commands).toEqual([
      'git fetch --prune origin main',
      'git branch issue/gh-42-fix-login origin/main',
      `git worktree add ${WORKTREE_PATH} issue/gh-42-fix-login`,
    ]);
    expect(data.links).toEqual([]);
    expect(data.exitCode).toBe(0);
  });
});

describe('formatters', () => {
  it('picks the mode with json first', () => {
    expect(getOutputMode({ json: true, quiet: true })).toBe(OutputMode.JSON);
    expect(getOutputMode({ quiet: true, verbose: true })).toBe(OutputMode.QUIET);
    expect(getOutputMode({ verbose: true })).toBe(OutputMode.VERBOSE);
    expect(getOutputMode({})).toBe(OutputMode.HUMAN);
  });

  it('wraps JSON results with a success flag', () => {
    const formatter = getFormatter(OutputMode.JSON);

    expect(JSON.parse(formatter.success(success({ branch: 'issue/gh-1' })))).toEqual({
      success: true,
      data: { branch: 'issue/gh-1' },
    });
    expect(JSON.parse(formatter.error(failure('boom', 31)))).toEqual({
      success: false,
      error: 'boom',
      code: null,
      exitCode: 31,
      data: null,
    });
  });

  it('prints only the path in quiet mode', () => {
    const formatter = getFormatter(OutputMode.QUIET);

    expect(formatter.success(success({ worktreePath: WORKTREE_PATH, outcome: 'reused' }, 'summary'))).toBe(
      WORKTREE_PATH
    );
    expect(formatter.success(success({ worktreePath: WORKTREE_PATH, outcome: 'failed' }, 'summary'))).toBe('');
    expect(formatter.success(success(undefined, 'sprout v0.1.0'))).toBe('sprout v0.1.0');
  });

  it('adds the code and details in verbose mode', () => {
    const output = getFormatter(OutputMode.VERBOSE).error({
      exitCode: 31,
      error: 'Worktree path is taken',
      errorCode: 'WORKTREE_CONFLICT',
      errorDetails: { path: WORKTREE_PATH },
    });

    expect(output).toBe(
      [
        'Error: Worktree path is taken',
        '  Code: WORKTREE_CONFLICT (exit 31)',
        `  Details: {"path":"${WORKTREE_PATH}"}`,
      ].join('\n')
    );
  });
});
