/**
 * CLI Types - Type definitions for the command-line interface
 */

import { ErrorExitCode } from '@sprout/core';

// ============================================================================
// Output Modes
// ============================================================================

/**
 * Output format modes supported by the CLI
 */
export const OutputMode = {
  /** Human-readable summary */
  HUMAN: 'human',
  /** Human summary plus error codes and details */
  VERBOSE: 'verbose',
  /** Machine-parseable JSON on stdout */
  JSON: 'json',
  /** Only the worktree path */
  QUIET: 'quiet',
} as const;

export type OutputMode = (typeof OutputMode)[keyof typeof OutputMode];

// ============================================================================
// Options
// ============================================================================

/**
 * Options that take a value
 */
export type ValueOptionKey =
  | 'repo'
  | 'base'
  | 'worktreesRoot'
  | 'prefix'
  | 'branch'
  | 'title'
  | 'url'
  | 'linksFile'
  | 'config';

/**
 * Boolean flags
 */
export type FlagOptionKey =
  | 'noFetch'
  | 'dryRun'
  | 'printPath'
  | 'noLinks'
  | 'linkForce'
  | 'json'
  | 'quiet'
  | 'verbose'
  | 'help'
  | 'version';

export type CliOptions = { [K in FlagOptionKey]: boolean } & { [K in ValueOptionKey]?: string };

/**
 * Default values for CLI options
 */
export const DEFAULT_CLI_OPTIONS: CliOptions = {
  noFetch: false,
  dryRun: false,
  printPath: false,
  noLinks: false,
  linkForce: false,
  json: false,
  quiet: false,
  verbose: false,
  help: false,
  version: false,
};

/**
 * Result of parsing command line arguments
 */
export interface ParsedCommandLine {
  /** Positional arguments (the issue reference) */
  args: string[];
  options: CliOptions;
}

// ============================================================================
// Command Definition
// ============================================================================

export type CommandHandler = (args: string[], options: CliOptions) => Promise<CommandResult> | CommandResult;

export interface Command {
  name: string;
  description: string;
  usage: string;
  handler: CommandHandler;
}

// ============================================================================
// Command Result
// ============================================================================

/**
 * Result of command execution
 */
export interface CommandResult {
  exitCode: number;
  /** Structured output (for JSON and quiet modes) */
  data?: Record<string, unknown>;
  /** Human-readable output */
  message?: string;
  /** Error message */
  error?: string;
  /** Machine-readable error code */
  errorCode?: string;
  errorDetails?: Record<string, unknown>;
}

/**
 * Factory for successful command results
 */
export function success(data?: Record<string, unknown>, message?: string): CommandResult {
  return {
    exitCode: ExitCode.SUCCESS,
    ...(data !== undefined ? { data } : {}),
    ...(message !== undefined ? { message } : {}),
  };
}

/**
 * Factory for error command results
 */
export function failure(error: string, exitCode: number = ExitCode.GENERAL_ERROR): CommandResult {
  return { exitCode, error };
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Process exit codes; ranges per failure family (10s parse, 20s naming,
 * 30s version control, 40s links)
 */
export const ExitCode = ErrorExitCode;

export type ExitCode = ErrorExitCode;
