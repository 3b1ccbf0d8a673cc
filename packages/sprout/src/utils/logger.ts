/**
 * Logger Utility
 *
 * Level-filtered console logging with a `[scope]` prefix. Every level
 * writes to stderr so stdout stays reserved for command output
 * (`--quiet` paths and `--json` summaries).
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const logger = createLogger('worktree');
 *   logger.info('Created worktree');
 *   logger.debug('git worktree list --porcelain');
 *   logger.warn('Fetch failed, continuing');
 *   logger.error('Something failed', error);
 *
 * Environment:
 *   LOG_LEVEL=DEBUG|INFO|WARNING|ERROR (default: INFO)
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Supported log levels in ascending severity order.
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

/**
 * Logger interface with leveled logging methods.
 */
export interface Logger {
  /** Git commands, resolved configuration, lookup timings */
  debug(message: string, ...args: unknown[]): void;
  /** Key events */
  info(message: string, ...args: unknown[]): void;
  /** Recoverable issues (failed fetch, degraded metadata, skipped link) */
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

/** Set by `--verbose` / `--quiet`; wins over LOG_LEVEL */
let levelOverride: LogLevel | undefined;

// ============================================================================
// Log Level Resolution
// ============================================================================

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

/**
 * Resolves the current log level: explicit override, then LOG_LEVEL,
 * then INFO. LOG_LEVEL is read fresh on each call.
 */
export function getLogLevel(): LogLevel {
  if (levelOverride) {
    return levelOverride;
  }
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return DEFAULT_LOG_LEVEL;
}

/**
 * Overrides the level for the rest of the process. `undefined` clears it.
 */
export function setLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
}

function shouldLog(messageLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[messageLevel] >= LOG_LEVEL_VALUES[getLogLevel()];
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a scoped logger.
 *
 * @example
 * ```ts
 * const logger = createLogger('links');
 * logger.warn('Source missing, skipped: ~/.secrets/.env');
 * // stderr: [links] Source missing, skipped: ~/.secrets/.env
 * ```
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (!shouldLog(level)) {
      return;
    }
    if (args.length > 0) {
      console.error(prefix, message, ...args);
    } else {
      console.error(prefix, message);
    }
  };

  return {
    debug(message: string, ...args: unknown[]): void {
      write('DEBUG', message, args);
    },
    info(message: string, ...args: unknown[]): void {
      write('INFO', message, args);
    },
    warn(message: string, ...args: unknown[]): void {
      write('WARNING', message, args);
    },
    error(message: string, ...args: unknown[]): void {
      write('ERROR', message, args);
    },
  };
}
