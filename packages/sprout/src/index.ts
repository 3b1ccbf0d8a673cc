/**
 * @sprout/sprout
 *
 * Turns an issue reference into a ready git worktree: reference parsing,
 * deterministic naming, worktree creation or reuse, private file links and
 * optional tracker lookups, behind a CLI with YAML configuration.
 */

export * from '@sprout/core';

// Pipeline stages
export * from './reference/index.js';
export * from './naming/index.js';
export * from './git/index.js';
export * from './links/index.js';
export * from './metadata/index.js';

// Orchestration
export * from './orchestrator/index.js';

// Configuration
export * from './config/index.js';

// CLI
export {
  run,
  main,
  parseArgs,
  formatSummary,
  summaryToJSON,
  createSproutCommand,
  defaultCommandContext,
  VERSION,
  type CliOptions,
  type CommandContext,
  type CommandResult,
} from './cli/index.js';

// Utilities
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './utils/logger.js';
