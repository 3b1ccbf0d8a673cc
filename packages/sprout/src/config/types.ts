/**
 * Configuration Type Definitions
 */

// ============================================================================
// Base Types
// ============================================================================

/**
 * Duration in milliseconds
 */
export type Duration = number;

/**
 * Duration string with unit suffix (e.g. '500ms', '10s', '2m')
 */
export type DurationString = `${number}${'ms' | 's' | 'm' | 'h'}`;

// ============================================================================
// Configuration Sections
// ============================================================================

export interface GitHubConfig {
  /** Hosts whose URLs and remotes count as GitHub */
  hosts: string[];
  /** REST API base URL */
  apiUrl: string;
  /** From GITHUB_TOKEN; never read from the file */
  token?: string;
}

export interface LinearConfig {
  /** From LINEAR_API_KEY; never read from the file */
  apiKey?: string;
}

export interface LinksConfig {
  /** Apply the private file links after the worktree exists */
  enabled: boolean;
  /** Replace existing files at link destinations */
  force: boolean;
  /** Declaration file; relative paths resolve against the repository root */
  file?: string;
}

export interface MetadataConfig {
  /** Look up issue titles from the tracker */
  enabled: boolean;
  /** Lookup timeout */
  timeout: Duration;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Fully resolved configuration, threaded through one run
 */
export interface Configuration {
  /** Base branch; detected from the remote when unset */
  baseBranch?: string;
  /** Root for new worktrees; a sibling `worktrees/` directory when unset */
  worktreesRoot?: string;
  branchPrefix: string;
  remote: string;
  slugMaxLength: number;
  /** Fetch the base branch and look up metadata. `--no-fetch` clears it */
  fetch: boolean;
  github: GitHubConfig;
  linear: LinearConfig;
  links: LinksConfig;
  metadata: MetadataConfig;
}

/**
 * A layer of configuration from one source
 */
export interface PartialConfiguration {
  baseBranch?: string;
  worktreesRoot?: string;
  branchPrefix?: string;
  remote?: string;
  slugMaxLength?: number;
  fetch?: boolean;
  github?: Partial<GitHubConfig>;
  linear?: Partial<LinearConfig>;
  links?: Partial<LinksConfig>;
  metadata?: Partial<MetadataConfig>;
}

// ============================================================================
// Sources
// ============================================================================

export const ConfigSource = {
  DEFAULT: 'default',
  FILE: 'file',
  ENVIRONMENT: 'environment',
  CLI: 'cli',
} as const;

export type ConfigSource = (typeof ConfigSource)[keyof typeof ConfigSource];

export const EnvVars = {
  CONFIG: 'SPROUT_CONFIG',
  BASE_BRANCH: 'SPROUT_BASE_BRANCH',
  WORKTREES_ROOT: 'SPROUT_WORKTREES_ROOT',
  BRANCH_PREFIX: 'SPROUT_BRANCH_PREFIX',
  REMOTE: 'SPROUT_REMOTE',
  NO_FETCH: 'SPROUT_NO_FETCH',
  NO_LINKS: 'SPROUT_NO_LINKS',
  LINK_FORCE: 'SPROUT_LINK_FORCE',
  JSON: 'SPROUT_JSON',
  VERBOSE: 'SPROUT_VERBOSE',
  GITHUB_TOKEN: 'GITHUB_TOKEN',
  LINEAR_API_KEY: 'LINEAR_API_KEY',
} as const;

export type EnvVar = (typeof EnvVars)[keyof typeof EnvVars];

/**
 * Environment as read from `process.env`
 */
export type Environment = Readonly<Record<string, string | undefined>>;

export interface ConfigFileDiscovery {
  /** Path checked, absent when no candidate was found */
  path?: string;
  exists: boolean;
  /** Where the path came from */
  origin: 'explicit' | 'project' | 'global' | 'none';
}

export interface LoadConfigOptions {
  /** `--config`; wins over SPROUT_CONFIG */
  configPath?: string;
  /** Directory discovery walks up from (default: process.cwd()) */
  cwd?: string;
  /** Home directory for the global file (default: os.homedir()) */
  homeDir?: string;
  /** Environment (default: process.env) */
  env?: Environment;
  /** Values from command-line flags */
  cliOverrides?: PartialConfiguration;
  skipFile?: boolean;
  skipEnv?: boolean;
}

export interface LoadedConfiguration {
  config: Configuration;
  /** The file that contributed, if any */
  configPath?: string;
}
