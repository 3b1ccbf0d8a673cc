/**
 * Duration Parsing and Formatting
 *
 * Converts duration strings (e.g. '500ms', '10s', '2m') to milliseconds.
 */

import { invalidConfig } from '@sprout/core';
import type { Duration, DurationString } from './types.js';

/**
 * Duration unit multipliers (to milliseconds)
 */
export const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h)$/;

export function isDurationString(value: unknown): value is DurationString {
  return typeof value === 'string' && DURATION_PATTERN.test(value.trim());
}

/**
 * Parses a duration string to milliseconds
 *
 * @param field - Configuration key, for the error message
 * @throws {ConfigError} If the format is invalid
 *
 * @example
 * parseDuration('500ms') // 500
 * parseDuration('10s')   // 10000
 * parseDuration('2m')    // 120000
 */
export function parseDuration(value: string, field = 'duration'): Duration {
  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    throw invalidConfig(field, value, "a duration such as '500ms', '10s' or '2m'");
  }
  const [, amount, unit] = match;
  return Math.round(parseFloat(amount) * DURATION_UNITS[unit]);
}

/**
 * Parses a duration given as a string or a number of milliseconds
 */
export function parseDurationValue(value: unknown, field = 'duration'): Duration {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw invalidConfig(field, value, 'a non-negative number of milliseconds');
    }
    return Math.round(value);
  }
  if (typeof value === 'string') {
    // Bare numbers are milliseconds
    if (/^\d+$/.test(value.trim())) {
      return parseInt(value, 10);
    }
    return parseDuration(value, field);
  }
  throw invalidConfig(field, value, "a duration such as '10s' or a number of milliseconds");
}

/**
 * Formats milliseconds with the largest unit that divides evenly
 *
 * @example
 * formatDuration(10000) // '10s'
 * formatDuration(1500)  // '1500ms'
 */
export function formatDuration(ms: Duration): string {
  for (const unit of ['h', 'm', 's'] as const) {
    const size = DURATION_UNITS[unit];
    if (ms >= size && ms % size === 0) {
      return `${ms / size}${unit}`;
    }
  }
  return `${ms}ms`;
}
