/**
 * CLI Output Formatter
 *
 * Renders run summaries for the output modes (human, verbose, JSON, quiet).
 */

import {
  LinkStatus,
  WorktreeOutcome,
  formatReference,
  type LinkResult,
  type WorktreeResult,
} from '@sprout/core';
import type { SproutSummary } from '../orchestrator/index.js';
import { formatCommand, shellQuote } from '../utils/shell.js';
import type { CommandResult } from './types.js';
import { OutputMode } from './types.js';

// ============================================================================
// Formatter Interface
// ============================================================================

export interface OutputFormatter {
  /** Output for stdout; empty when there is nothing to print */
  success(result: CommandResult): string;
  /** Output for a failed result */
  error(result: CommandResult): string;
}

// ============================================================================
// Human Formatter
// ============================================================================

class HumanFormatter implements OutputFormatter {
  success(result: CommandResult): string {
    return result.message ?? '';
  }

  error(result: CommandResult): string {
    return `Error: ${result.error}`;
  }
}

// ============================================================================
// Verbose Formatter
// ============================================================================

/**
 * Human output plus the error code and details
 */
class VerboseFormatter implements OutputFormatter {
  private humanFormatter = new HumanFormatter();

  success(result: CommandResult): string {
    return this.humanFormatter.success(result);
  }

  error(result: CommandResult): string {
    const lines: string[] = [this.humanFormatter.error(result)];
    lines.push(`  Code: ${result.errorCode ?? 'UNKNOWN'} (exit ${result.exitCode})`);
    if (result.errorDetails && Object.keys(result.errorDetails).length > 0) {
      lines.push(`  Details: ${JSON.stringify(result.errorDetails)}`);
    }
    return lines.join('\n');
  }
}

// ============================================================================
// JSON Formatter
// ============================================================================

class JsonFormatter implements OutputFormatter {
  success(result: CommandResult): string {
    return JSON.stringify({ success: true, data: result.data ?? null }, null, 2);
  }

  error(result: CommandResult): string {
    return JSON.stringify(
      {
        success: false,
        error: result.error,
        code: result.errorCode ?? null,
        exitCode: result.exitCode,
        data: result.data ?? null,
      },
      null,
      2
    );
  }
}

// ============================================================================
// Quiet Formatter
// ============================================================================

/**
 * Prints only the worktree path, and nothing when no worktree came of the run
 */
class QuietFormatter implements OutputFormatter {
  success(result: CommandResult): string {
    const worktreePath = result.data?.worktreePath;
    if (typeof worktreePath === 'string') {
      return result.data?.outcome === WorktreeOutcome.FAILED ? '' : worktreePath;
    }
    return result.message ?? '';
  }

  error(result: CommandResult): string {
    return `Error: ${result.error}`;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function getFormatter(mode: OutputMode): OutputFormatter {
  switch (mode) {
    case OutputMode.JSON:
      return new JsonFormatter();
    case OutputMode.QUIET:
      return new QuietFormatter();
    case OutputMode.VERBOSE:
      return new VerboseFormatter();
    default:
      return new HumanFormatter();
  }
}

export function getOutputMode(options: { json?: boolean; quiet?: boolean; verbose?: boolean }): OutputMode {
  if (options.json) return OutputMode.JSON;
  if (options.quiet) return OutputMode.QUIET;
  if (options.verbose) return OutputMode.VERBOSE;
  return OutputMode.HUMAN;
}

// ============================================================================
// Summary Rendering
// ============================================================================

const OUTCOME_TEXT: Record<WorktreeResult['outcome'], [done: string, planned: string]> = {
  [WorktreeOutcome.REUSED]: ['reused existing worktree', 'would reuse existing worktree'],
  [WorktreeOutcome.CREATED_FROM_EXISTING_BRANCH]: [
    'created for existing branch',
    'would create for existing branch',
  ],
  [WorktreeOutcome.CREATED_FRESH]: ['created with a new branch', 'would create with a new branch'],
  [WorktreeOutcome.FAILED]: ['failed', 'would fail'],
};

/**
 * Renders a run summary for people
 */
export function formatSummary(summary: SproutSummary): string {
  if (summary.printPath) {
    return summary.worktreePath;
  }

  const rows: [string, string][] = [['Repository', summary.repoRoot]];
  if (summary.baseBranch !== undefined) {
    rows.push(['Base', `${summary.baseBranch} (${summary.remote})`]);
  }
  if (summary.reference) {
    const title = summary.metadata.title ? ` "${summary.metadata.title}"` : '';
    rows.push(['Issue', `${formatReference(summary.reference)}${title}`]);
  }
  if (summary.metadata.url) {
    rows.push(['URL', summary.metadata.url]);
  }
  rows.push(['Branch', summary.branch.override ? `${summary.branch.name} (override)` : summary.branch.name]);
  rows.push(['Path', summary.worktreePath]);

  if (summary.worktree) {
    const [done, planned] = OUTCOME_TEXT[summary.worktree.outcome];
    const from = summary.worktree.startPoint !== undefined ? ` from ${summary.worktree.startPoint}` : '';
    rows.push(['Worktree', `${summary.dryRun ? planned : done}${from}`]);
  }

  const width = Math.max(...rows.map(([label]) => label.length)) + 1;
  const lines = rows.map(([label, value]) => `${`${label}:`.padEnd(width)} ${value}`);

  if (summary.dryRun && summary.worktree && summary.worktree.commands.length > 0) {
    lines.push('', 'Planned commands:');
    for (const argv of summary.worktree.commands) {
      lines.push(`  ${formatCommand(argv)}`);
    }
  }

  if (summary.links && summary.links.results.length > 0) {
    lines.push('', summary.dryRun ? 'Links (dry run):' : 'Links:');
    for (const result of summary.links.results) {
      lines.push(`  ${formatLinkResult(result)}`);
    }
  }

  if (summary.warnings.length > 0) {
    lines.push('', 'Warnings:');
    for (const warning of summary.warnings) {
      lines.push(`  ${warning.message}`);
    }
  }

  const worktreeFailed = summary.worktree?.outcome === WorktreeOutcome.FAILED;
  if (!summary.dryRun && summary.worktree && !worktreeFailed) {
    lines.push('', 'Next steps:');
    lines.push(`  cd ${shellQuote(summary.worktreePath)}`);
    lines.push(`  git push -u ${shellQuote(summary.remote)} ${shellQuote(summary.branch.name)}`);
  }

  return lines.join('\n');
}

function formatLinkResult(result: LinkResult): string {
  const status = result.status.padEnd(8);
  switch (result.status) {
    case LinkStatus.APPLIED:
      return `${status}${result.dest}${result.replaced ? ' (replaced)' : ''}`;
    case LinkStatus.SKIPPED:
      return `${status}${result.dest} (${result.reason})`;
    case LinkStatus.FAILED:
      return `${status}${result.dest}: ${result.message}`;
  }
}

/**
 * The summary as plain JSON data
 */
export function summaryToJSON(summary: SproutSummary): Record<string, unknown> {
  return {
    repoRoot: summary.repoRoot,
    remote: summary.remote,
    baseBranch: summary.baseBranch ?? null,
    issue: summary.reference
      ? {
          source: summary.reference.source,
          id: summary.reference.primaryId,
          ownerRepo: summary.reference.ownerRepo ?? null,
          display: formatReference(summary.reference),
          input: summary.reference.rawInput,
        }
      : null,
    metadata: summary.metadata,
    branch: summary.branch.name,
    branchOverride: summary.branch.override,
    worktreePath: summary.worktreePath,
    outcome: summary.worktree?.outcome ?? null,
    startPoint: summary.worktree?.startPoint ?? null,
    commands: summary.worktree?.commands.map((argv) => formatCommand(argv)) ?? [],
    linksFile: summary.linksFile ?? null,
    links:
      summary.links?.results.map((result) => ({
        status: result.status,
        dest: result.dest,
        src: result.src ?? null,
        target: result.target ?? null,
        ...(result.status === LinkStatus.SKIPPED ? { reason: result.reason } : {}),
        ...(result.status === LinkStatus.APPLIED ? { replaced: result.replaced } : {}),
        ...(result.status === LinkStatus.FAILED ? { code: result.error.code } : {}),
        message: result.message,
      })) ?? [],
    warnings: summary.warnings.map((warning) => ({ code: warning.code, message: warning.message })),
    dryRun: summary.dryRun,
    exitCode: summary.exitCode,
  };
}
