/**
 * Environment Variable Configuration
 */

import type { Environment, EnvVar, PartialConfiguration } from './types.js';
import { EnvVars } from './types.js';

// ============================================================================
// Boolean Parsing
// ============================================================================

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSY_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Parses a boolean from an environment variable value
 *
 * @returns Parsed boolean, or undefined if not a recognized boolean value
 */
export function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const lower = value.toLowerCase().trim();
  if (TRUTHY_VALUES.has(lower)) {
    return true;
  }
  if (FALSY_VALUES.has(lower)) {
    return false;
  }
  return undefined;
}

// ============================================================================
// Environment Configuration Loading
// ============================================================================

/**
 * Reads a variable, treating the empty string as unset
 */
export function getEnvVar(env: Environment, name: EnvVar): string | undefined {
  const value = env[name];
  return value !== undefined && value !== '' ? value : undefined;
}

/**
 * Loads configuration from environment variables
 */
export function loadEnvConfig(env: Environment = process.env): PartialConfiguration {
  const config: PartialConfiguration = {};

  const baseBranch = getEnvVar(env, EnvVars.BASE_BRANCH);
  if (baseBranch !== undefined) {
    config.baseBranch = baseBranch;
  }

  const worktreesRoot = getEnvVar(env, EnvVars.WORKTREES_ROOT);
  if (worktreesRoot !== undefined) {
    config.worktreesRoot = worktreesRoot;
  }

  const branchPrefix = getEnvVar(env, EnvVars.BRANCH_PREFIX);
  if (branchPrefix !== undefined) {
    config.branchPrefix = branchPrefix;
  }

  const remote = getEnvVar(env, EnvVars.REMOTE);
  if (remote !== undefined) {
    config.remote = remote;
  }

  const noFetch = parseEnvBoolean(getEnvVar(env, EnvVars.NO_FETCH));
  if (noFetch !== undefined) {
    config.fetch = !noFetch;
  }

  const noLinks = parseEnvBoolean(getEnvVar(env, EnvVars.NO_LINKS));
  if (noLinks !== undefined) {
    config.links = { ...config.links, enabled: !noLinks };
  }

  const linkForce = parseEnvBoolean(getEnvVar(env, EnvVars.LINK_FORCE));
  if (linkForce !== undefined) {
    config.links = { ...config.links, force: linkForce };
  }

  // Credentials
  const token = getEnvVar(env, EnvVars.GITHUB_TOKEN);
  if (token !== undefined) {
    config.github = { token };
  }
  const apiKey = getEnvVar(env, EnvVars.LINEAR_API_KEY);
  if (apiKey !== undefined) {
    config.linear = { apiKey };
  }

  return config;
}

/**
 * Gets the config file path override from environment
 */
export function getEnvConfigPath(env: Environment = process.env): string | undefined {
  return getEnvVar(env, EnvVars.CONFIG);
}

/**
 * Gets the JSON output mode flag from environment
 */
export function getEnvJsonMode(env: Environment = process.env): boolean | undefined {
  return parseEnvBoolean(getEnvVar(env, EnvVars.JSON));
}

/**
 * Gets the verbose mode flag from environment
 */
export function getEnvVerboseMode(env: Environment = process.env): boolean | undefined {
  return parseEnvBoolean(getEnvVar(env, EnvVars.VERBOSE));
}
