import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ErrorCode, isSproutError, LinkStatus, WorktreeOutcome } from '@sprout/core';
import { createOrchestrator } from './orchestrator.js';
import { getDefaultConfig, mergeConfiguration, type PartialConfiguration } from '../config/index.js';
import type { IssueMetadataProvider } from '../metadata/index.js';
import { FakeGitEngine, makeTempDir, removeTempDir } from '../testing/index.js';

const GITHUB_REMOTE = 'git@github.com:acme/widgets.git';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('Orchestrator', () => {
  let tempDir: string;
  let repoRoot: string;
  let engine: FakeGitEngine;
  let lookup: Mock<IssueMetadataProvider['lookup']>;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    tempDir = makeTempDir('sprout-run-');
    repoRoot = path.join(tempDir, 'widgets');
    fs.mkdirSync(repoRoot);
    engine = new FakeGitEngine({
      repoRoot,
      remotes: { origin: GITHUB_REMOTE },
      remoteRefs: ['refs/remotes/origin/main'],
    });
    lookup = vi.fn<IssueMetadataProvider['lookup']>(async () => ({ title: 'Fix login bug' }));
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  function orchestrator(overrides: PartialConfiguration = {}) {
    return createOrchestrator({
      config: mergeConfiguration(getDefaultConfig(), overrides),
      engine,
      metadataProvider: { name: 'stub', lookup },
      cwd: tempDir,
    });
  }

  function worktreePath(...branch: string[]): string {
    return path.join(tempDir, 'worktrees', 'widgets', ...branch);
  }

  // --------------------------------------------------------------------------
  // Naming
  // --------------------------------------------------------------------------

  it('creates a fresh branch and worktree named from the fetched title', async () => {
    const summary = await orchestrator().run({ issue: '#42' });

    expect(summary.exitCode).toBe(0);
    expect(summary.reference).toEqual({
      source: 'github',
      primaryId: '42',
      ownerRepo: 'acme/widgets',
      rawInput: '#42',
    });
    expect(summary.branch.name).toBe('issue/gh-42-fix-login-bug');
    expect(summary.worktreePath).toBe(worktreePath('issue', 'gh-42-fix-login-bug'));
    expect(summary.baseBranch).toBe('main');
    expect(summary.worktree?.outcome).toBe(WorktreeOutcome.CREATED_FRESH);
    expect(engine.mutations).toEqual([
      ['git', 'fetch', '--prune', 'origin', 'main'],
      ['git', 'branch', 'issue/gh-42-fix-login-bug', 'origin/main'],
      ['git', 'worktree', 'add', worktreePath('issue', 'gh-42-fix-login-bug'), 'issue/gh-42-fix-login-bug'],
    ]);
  });

  it('reuses the worktree on a second run without changing anything', async () => {
    const first = await orchestrator().run({ issue: '#42' });
    const mutations = engine.mutations.length;

    const second = await orchestrator().run({ issue: '#42' });

    expect(second.worktree?.outcome).toBe(WorktreeOutcome.REUSED);
    expect(second.worktreePath).toBe(first.worktreePath);
    expect(second.worktree?.record.existedBefore).toBe(true);
    expect(engine.mutations).toHaveLength(mutations);
  });

  it('names owner/repo#n without metadata as issue/gh-n beside the repository', async () => {
    const summary = await orchestrator({ fetch: false }).run({ issue: 'acme/widgets#42' });

    expect(summary.branch.name).toBe('issue/gh-42');
    expect(summary.worktreePath).toBe(worktreePath('issue', 'gh-42'));
    expect(path.relative(repoRoot, summary.worktreePath)).toBe(path.join('..', 'worktrees', 'widgets', 'issue', 'gh-42'));
    expect(lookup).not.toHaveBeenCalled();
    expect(engine.mutations.map((argv) => argv[1])).toEqual(['branch', 'worktree']);
  });

  it('uses an injected title for a Linear identifier without a lookup', async () => {
    const summary = await orchestrator().run({ issue: 'ABC-7', title: 'Fix login bug' });

    expect(summary.branch.name).toBe('issue/lin-abc-7-fix-login-bug');
    expect(summary.metadata).toEqual({ title: 'Fix login bug' });
    expect(lookup).not.toHaveBeenCalled();
  });

  it('lets an override name the branch while still parsing the issue', async () => {
    const summary = await orchestrator().run({ issue: '#42', branch: 'feature/login' });

    expect(summary.branch).toEqual({ name: 'feature/login', override: true });
    expect(summary.reference?.primaryId).toBe('42');
    expect(summary.worktreePath).toBe(worktreePath('feature', 'login'));
  });

  it('keeps going with an override when the issue cannot be parsed', async () => {
    engine.remotes.clear();

    const summary = await orchestrator().run({ issue: '42', branch: 'feature/login' });

    expect(summary.exitCode).toBe(0);
    expect(summary.reference).toBeUndefined();
    expect(summary.branch.name).toBe('feature/login');
    expect(summary.warnings.map((warning) => warning.code)).toEqual([ErrorCode.REPO_INFERENCE_FAILED]);
    expect(summary.worktree?.outcome).toBe(WorktreeOutcome.CREATED_FRESH);
    expect(lookup).not.toHaveBeenCalled();
  });

  it('honors the configured base branch, prefix and worktrees root', async () => {
    const root = path.join(tempDir, 'elsewhere');
    const summary = await orchestrator({ baseBranch: 'develop', branchPrefix: 'task', worktreesRoot: root, fetch: false }).run({
      issue: '#5',
    });

    expect(summary.baseBranch).toBe('develop');
    expect(summary.branch.name).toBe('task/gh-5');
    expect(summary.worktreePath).toBe(path.join(root, 'widgets', 'task', 'gh-5'));
    expect(engine.mutations[0]).toEqual(['git', 'branch', 'task/gh-5', 'develop']);
  });

  // --------------------------------------------------------------------------
  // Failures before any mutation
  // --------------------------------------------------------------------------

  it('fails to infer the repository for a bare number without a remote', async () => {
    engine.remotes.clear();

    const error = await captureError(orchestrator().run({ issue: '42' }));

    expect(isSproutError(error) && error.code).toBe(ErrorCode.REPO_INFERENCE_FAILED);
    expect(engine.mutations).toEqual([]);
  });

  it('rejects a non-ASCII override naming the first offending character', async () => {
    const error = await captureError(orchestrator().run({ branch: 'feature/日本語' }));

    expect(isSproutError(error)).toBe(true);
    if (isSproutError(error)) {
      expect(error.code).toBe(ErrorCode.INVALID_BRANCH_NAME);
      expect(error.details.offending).toBe('日');
      expect(error.details.index).toBe(8);
    }
    expect(engine.mutations).toEqual([]);
  });

  it('requires an issue or a branch', async () => {
    const error = await captureError(orchestrator().run({ issue: '  ' }));
    expect(isSproutError(error) && error.code).toBe(ErrorCode.INVALID_INPUT);
  });

  // --------------------------------------------------------------------------
  // Soft and late failures
  // --------------------------------------------------------------------------

  it('degrades to empty metadata when the lookup fails', async () => {
    lookup.mockRejectedValue(new Error('503 Service Unavailable'));

    const summary = await orchestrator().run({ issue: '#42' });

    expect(summary.exitCode).toBe(0);
    expect(summary.branch.name).toBe('issue/gh-42');
    expect(summary.warnings.map((warning) => warning.code)).toEqual([ErrorCode.METADATA_LOOKUP_DEGRADED]);
  });

  it('reports a worktree conflict when the path is already taken', async () => {
    fs.mkdirSync(worktreePath('issue', 'gh-42-fix-login-bug'), { recursive: true });

    const summary = await orchestrator().run({ issue: '#42' });

    expect(summary.worktree?.outcome).toBe(WorktreeOutcome.FAILED);
    expect(summary.error?.code).toBe(ErrorCode.WORKTREE_CONFLICT);
    expect(summary.exitCode).toBe(31);
    expect(engine.mutations).toEqual([]);
  });

  it('reports git failures with exit code 30', async () => {
    engine.failOn('addWorktree', "fatal: could not create directory");

    const summary = await orchestrator({ fetch: false }).run({ issue: '#42', title: 'Fix login bug' });

    expect(summary.exitCode).toBe(30);
    expect(summary.error?.message).toBe(
      `git worktree add ${worktreePath('issue', 'gh-42-fix-login-bug')} issue/gh-42-fix-login-bug failed: fatal: could not create directory`
    );
  });

  // --------------------------------------------------------------------------
  // Print path and dry run
  // --------------------------------------------------------------------------

  it('prints the path without lookups or mutations', async () => {
    const summary = await orchestrator().run({ issue: '#42', printPath: true });

    expect(summary.worktreePath).toBe(worktreePath('issue', 'gh-42'));
    expect(summary.baseBranch).toBeUndefined();
    expect(summary.worktree).toBeUndefined();
    expect(lookup).not.toHaveBeenCalled();
    expect(engine.mutations).toEqual([]);
  });

  it('plans without mutating in a dry run', async () => {
    const summary = await orchestrator().run({ issue: '#42', dryRun: true });

    expect(summary.dryRun).toBe(true);
    expect(summary.worktree?.outcome).toBe(WorktreeOutcome.CREATED_FRESH);
    expect(summary.worktree?.commands).toHaveLength(3);
    expect(engine.mutations).toEqual([]);
    expect(fs.existsSync(worktreePath('issue', 'gh-42-fix-login-bug'))).toBe(false);
  });

  // --------------------------------------------------------------------------
  // Links
  // --------------------------------------------------------------------------

  describe('links', () => {
    let secret: string;

    beforeEach(() => {
      secret = path.join(repoRoot, 'secrets', '.env');
      fs.mkdirSync(path.dirname(secret));
      fs.writeFileSync(secret, 'TOKEN=test-secret\n');
    });

    function writeLinks(content: string): void {
      fs.writeFileSync(path.join(repoRoot, '.worktree-links.local.json'), content);
    }

    it('applies valid entries and fails escaping ones with the first failure code', async () => {
      writeLinks(
        JSON.stringify([
          { src: 'secrets/.env', dest: '.env' },
          { src: 'secrets/.env', dest: '../.env' },
        ])
      );

      const summary = await orchestrator({ fetch: false }).run({ issue: '#42' });
      const target = path.join(summary.worktreePath, '.env');

      expect(summary.links?.results.map((result) => result.status)).toEqual([LinkStatus.APPLIED, LinkStatus.FAILED]);
      expect(summary.error?.code).toBe(ErrorCode.LINK_PATH_ERROR);
      expect(summary.exitCode).toBe(40);
      expect(fs.readlinkSync(target)).toBe(secret);
    });

    it('does nothing when links are disabled', async () => {
      writeLinks(JSON.stringify([{ src: 'secrets/.env', dest: '.env' }]));

      const summary = await orchestrator({ fetch: false, links: { enabled: false } }).run({ issue: '#42' });

      expect(summary.links).toBeUndefined();
      expect(fs.existsSync(path.join(summary.worktreePath, '.env'))).toBe(false);
    });

    it('keeps the worktree when the links file is invalid', async () => {
      writeLinks('{ not json');

      const summary = await orchestrator({ fetch: false }).run({ issue: '#42' });

      expect(summary.exitCode).toBe(41);
      expect(summary.worktree?.outcome).toBe(WorktreeOutcome.CREATED_FRESH);
      expect(summary.linksFile).toBe(path.join(repoRoot, '.worktree-links.local.json'));
    });

    it('reports links without creating them in a dry run', async () => {
      writeLinks(JSON.stringify([{ src: 'secrets/.env', dest: '.env' }]));

      const summary = await orchestrator({ fetch: false }).run({ issue: '#42', dryRun: true });

      expect(summary.links?.dryRun).toBe(true);
      expect(summary.links?.results[0]?.status).toBe(LinkStatus.APPLIED);
      expect(fs.existsSync(summary.worktreePath)).toBe(false);
    });
  });
});
