/**
 * Orchestrator
 *
 * The pipeline behind one `sprout` invocation:
 *
 *   parse → metadata → name → worktree → links → summary
 *
 * Parse and naming failures throw before the repository is touched.
 * Worktree and link failures come back in the summary with the exit code
 * they map to; a worktree that was created stays in place.
 *
 * @module
 */

import * as path from 'node:path';
import {
  ErrorExitCode,
  WorktreeOutcome,
  firstLinkFailure,
  hasMetadata,
  invalidInput,
  isLinkError,
  isReferenceParseError,
  isWorktreeFailure,
  mergeMetadata,
  type IssueMetadata,
  type IssueReference,
  type LinkReport,
  type MetadataLookupError,
  type SproutError,
  type WorktreeSuccess,
} from '@sprout/core';
import { parseReference } from '../reference/index.js';
import { generateNames } from '../naming/index.js';
import { createWorktreeManager, type WorktreeManager } from '../git/index.js';
import { applyLinks, loadLinkFile, DEFAULT_LINKS_FILE } from '../links/index.js';
import { lookupMetadata } from '../metadata/index.js';
import { createLogger } from '../utils/logger.js';
import type { OrchestratorDependencies, SproutRequest, SproutSummary } from './types.js';

const logger = createLogger('sprout');

// ============================================================================
// Interface
// ============================================================================

export interface Orchestrator {
  /**
   * Runs the pipeline.
   *
   * @throws SproutError for failures that abort before any mutation
   *   (unrecognized reference, invalid names, not a repository)
   */
  run(request: SproutRequest): Promise<SproutSummary>;
}

// ============================================================================
// Implementation
// ============================================================================

export class OrchestratorImpl implements Orchestrator {
  private readonly worktrees: WorktreeManager;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.worktrees = createWorktreeManager(deps.engine);
  }

  async run(request: SproutRequest): Promise<SproutSummary> {
    const { config, engine } = this.deps;
    const dryRun = request.dryRun ?? false;
    const printPath = request.printPath ?? false;
    const remote = config.remote;

    const issue = request.issue?.trim();
    if (!issue && request.branch === undefined) {
      throw invalidInput('An issue reference or --branch is required');
    }

    const repoRoot = await engine.getRepoRoot();
    logger.debug(`Repository: ${repoRoot}`);

    // 1. Parse
    let reference: IssueReference | undefined;
    const warnings: SproutError[] = [];
    if (issue) {
      const remoteUrl = await engine.getRemoteUrl(remote);
      try {
        reference = parseReference(issue, {
          ...(remoteUrl !== undefined ? { remoteUrl } : {}),
          githubHosts: config.github.hosts,
        });
        logger.debug(`Parsed ${issue} as ${reference.source} ${reference.primaryId}`);
      } catch (err) {
        // Under an override the reference is display-only
        if (request.branch === undefined || !isReferenceParseError(err)) {
          throw err;
        }
        logger.warn(`Ignoring issue reference: ${err.message}`);
        warnings.push(err);
      }
    }

    // 2. Metadata
    const resolved = await this.resolveMetadata(reference, request, printPath);
    const metadata = resolved.metadata;
    warnings.push(...resolved.warnings);

    // 3. Names
    const names = generateNames(reference, metadata, {
      repoRoot,
      prefix: config.branchPrefix,
      slugMaxLength: config.slugMaxLength,
      ...(request.branch !== undefined ? { branchOverride: request.branch } : {}),
      ...(config.worktreesRoot !== undefined ? { worktreesRoot: config.worktreesRoot } : {}),
      ...(this.deps.cwd !== undefined ? { cwd: this.deps.cwd } : {}),
    });

    const base = {
      repoRoot,
      remote,
      ...(reference !== undefined ? { reference } : {}),
      metadata,
      branch: names.branch,
      warnings,
      dryRun,
      printPath,
    };

    if (printPath) {
      return { ...base, worktreePath: names.worktreePath, exitCode: ErrorExitCode.SUCCESS };
    }

    // 4. Worktree
    const baseBranch = config.baseBranch ?? (await engine.detectDefaultBranch(remote));
    const worktree = await this.worktrees.ensureWorktree({
      branch: names.branch.name,
      path: names.worktreePath,
      baseBranch,
      remote,
      fetchBase: config.fetch,
      dryRun,
    });

    if (isWorktreeFailure(worktree)) {
      logger.error(worktree.error.message);
      return {
        ...base,
        baseBranch,
        worktreePath: names.worktreePath,
        worktree,
        error: worktree.error,
        exitCode: worktree.error.exitCode,
      };
    }

    const worktreePath = worktree.record.path;
    logger.debug(`${describeOutcome(worktree.outcome, dryRun)} ${worktreePath}`);
    const withWorktree = { ...base, baseBranch, worktreePath, worktree };

    // 5. Links
    if (!config.links.enabled) {
      return { ...withWorktree, exitCode: ErrorExitCode.SUCCESS };
    }

    const linksFile = path.resolve(repoRoot, config.links.file ?? DEFAULT_LINKS_FILE);
    let links: LinkReport;
    try {
      const entries = loadLinkFile(linksFile);
      links = applyLinks(entries, worktreePath, {
        force: config.links.force,
        dryRun,
        baseDir: path.dirname(linksFile),
      });
    } catch (error) {
      if (isLinkError(error)) {
        logger.error(error.message);
        return { ...withWorktree, linksFile, error, exitCode: error.exitCode };
      }
      throw error;
    }

    const failure = firstLinkFailure(links);
    return {
      ...withWorktree,
      linksFile,
      links,
      ...(failure ? { error: failure.error } : {}),
      exitCode: failure ? failure.error.exitCode : ErrorExitCode.SUCCESS,
    };
  }

  private async resolveMetadata(
    reference: IssueReference | undefined,
    request: SproutRequest,
    printPath: boolean
  ): Promise<{ metadata: IssueMetadata; warnings: SproutError[] }> {
    const { config, metadataProvider } = this.deps;
    const injected: IssueMetadata = {
      ...(request.title !== undefined ? { title: request.title } : {}),
      ...(request.url !== undefined ? { url: request.url } : {}),
    };

    if (reference === undefined || printPath || !config.fetch || !config.metadata.enabled || hasMetadata(injected)) {
      return { metadata: mergeMetadata(injected, undefined), warnings: [] };
    }

    const result = await lookupMetadata(metadataProvider, reference, config.metadata.timeout);
    const warnings: MetadataLookupError[] = result.warning ? [result.warning] : [];
    return { metadata: mergeMetadata(injected, result.metadata), warnings };
  }
}

function describeOutcome(outcome: WorktreeSuccess['outcome'], dryRun: boolean): string {
  switch (outcome) {
    case WorktreeOutcome.REUSED:
      return dryRun ? 'Would reuse worktree at' : 'Reusing worktree at';
    case WorktreeOutcome.CREATED_FROM_EXISTING_BRANCH:
      return dryRun ? 'Would add a worktree for the existing branch at' : 'Added worktree for the existing branch at';
    case WorktreeOutcome.CREATED_FRESH:
      return dryRun ? 'Would create branch and worktree at' : 'Created branch and worktree at';
  }
}

/**
 * Creates an orchestrator bound to a repository engine
 */
export function createOrchestrator(deps: OrchestratorDependencies): Orchestrator {
  return new OrchestratorImpl(deps);
}
