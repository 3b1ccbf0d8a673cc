/**
 * The main command: issue reference in, worktree out.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { isSproutError } from '@sprout/core';
import { loadConfig, type Environment, type PartialConfiguration } from '../../config/index.js';
import { createGitEngine, type GitEngine } from '../../git/index.js';
import {
  createMetadataProvider,
  type IssueMetadataProvider,
  type MetadataProviderSettings,
} from '../../metadata/index.js';
import { createOrchestrator } from '../../orchestrator/index.js';
import { formatSummary, summaryToJSON } from '../formatter.js';
import type { CliOptions, Command, CommandResult } from '../types.js';
import { ExitCode, failure } from '../types.js';

// ============================================================================
// Context
// ============================================================================

/**
 * Process-level inputs of a run, replaceable in tests
 */
export interface CommandContext {
  cwd: string;
  env: Environment;
  homeDir: string;
  createEngine(cwd: string): GitEngine;
  createMetadataProvider(settings: MetadataProviderSettings): IssueMetadataProvider;
}

export function defaultCommandContext(): CommandContext {
  return {
    cwd: process.cwd(),
    env: process.env,
    homeDir: os.homedir(),
    createEngine: (cwd) => createGitEngine({ cwd }),
    createMetadataProvider,
  };
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Maps command-line flags onto a configuration layer
 */
export function cliOverrides(options: CliOptions, cwd: string): PartialConfiguration {
  const overrides: PartialConfiguration = {};
  if (options.base !== undefined) overrides.baseBranch = options.base;
  if (options.worktreesRoot !== undefined) overrides.worktreesRoot = options.worktreesRoot;
  if (options.prefix !== undefined) overrides.branchPrefix = options.prefix;
  if (options.noFetch) overrides.fetch = false;

  const links: NonNullable<PartialConfiguration['links']> = {};
  if (options.noLinks) links.enabled = false;
  if (options.linkForce) links.force = true;
  if (options.linksFile !== undefined) links.file = path.resolve(cwd, options.linksFile);
  if (Object.keys(links).length > 0) overrides.links = links;

  return overrides;
}

async function runSprout(context: CommandContext, args: string[], options: CliOptions): Promise<CommandResult> {
  if (args.length > 1) {
    return failure(`Unexpected argument: ${args[1]}`, ExitCode.INVALID_ARGUMENTS);
  }

  try {
    const repoDir = options.repo !== undefined ? path.resolve(context.cwd, options.repo) : context.cwd;
    const { config } = loadConfig({
      cwd: repoDir,
      env: context.env,
      homeDir: context.homeDir,
      cliOverrides: cliOverrides(options, context.cwd),
      ...(options.config !== undefined ? { configPath: path.resolve(context.cwd, options.config) } : {}),
    });

    const orchestrator = createOrchestrator({
      config,
      engine: context.createEngine(repoDir),
      metadataProvider: context.createMetadataProvider({
        enabled: config.metadata.enabled && config.fetch,
        ...(config.github.token !== undefined ? { githubToken: config.github.token } : {}),
        githubApiUrl: config.github.apiUrl,
        ...(config.linear.apiKey !== undefined ? { linearApiKey: config.linear.apiKey } : {}),
      }),
      cwd: context.cwd,
    });

    const summary = await orchestrator.run({
      ...(args[0] !== undefined ? { issue: args[0] } : {}),
      ...(options.branch !== undefined ? { branch: options.branch } : {}),
      ...(options.title !== undefined ? { title: options.title } : {}),
      ...(options.url !== undefined ? { url: options.url } : {}),
      dryRun: options.dryRun,
      printPath: options.printPath,
    });

    const result: CommandResult = {
      exitCode: summary.exitCode,
      data: summaryToJSON(summary),
      message: formatSummary(summary),
    };
    if (summary.error) {
      result.error = summary.error.message;
      result.errorCode = summary.error.code;
      result.errorDetails = summary.error.details;
    }
    return result;
  } catch (err) {
    if (isSproutError(err)) {
      return {
        exitCode: err.exitCode,
        error: err.message,
        errorCode: err.code,
        errorDetails: err.details,
      };
    }
    throw err;
  }
}

export function createSproutCommand(context: CommandContext = defaultCommandContext()): Command {
  return {
    name: 'sprout',
    description: 'Create or reuse the worktree for an issue',
    usage: 'sprout <issue> [options]',
    handler: (args, options) => runSprout(context, args, options),
  };
}
