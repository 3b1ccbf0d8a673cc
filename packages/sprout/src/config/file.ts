/**
 * Configuration File Loading
 *
 * Discovers and parses the YAML configuration file. Keys are snake_case
 * in the file and camelCase in `Configuration`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import * as yaml from 'yaml';
import { ConfigError, invalidConfig } from '@sprout/core';
import type { ConfigFileDiscovery, PartialConfiguration } from './types.js';
import { parseDurationValue } from './duration.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('config');

// ============================================================================
// Constants
// ============================================================================

export const CONFIG_FILE_NAME = 'config.yaml';

export const SPROUT_DIR = '.sprout';

const TOP_LEVEL_KEYS = new Set([
  'base_branch',
  'worktrees_root',
  'branch_prefix',
  'remote',
  'slug_max_length',
  'github',
  'links',
  'metadata',
]);

// ============================================================================
// File Discovery
// ============================================================================

/**
 * Finds the nearest `.sprout/config.yaml` by walking up from `startDir`
 */
export function findProjectConfig(startDir: string): string | undefined {
  let currentDir = path.resolve(startDir);

  for (;;) {
    const candidate = path.join(currentDir, SPROUT_DIR, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      return undefined;
    }
    currentDir = parent;
  }
}

export function getGlobalConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, SPROUT_DIR, CONFIG_FILE_NAME);
}

/**
 * Discovers the configuration file: explicit path, then the nearest
 * project file, then the global one.
 */
export function discoverConfigFile(
  overridePath: string | undefined,
  startDir: string = process.cwd(),
  homeDir: string = os.homedir()
): ConfigFileDiscovery {
  if (overridePath) {
    const resolvedPath = path.resolve(startDir, overridePath);
    return { path: resolvedPath, exists: fs.existsSync(resolvedPath), origin: 'explicit' };
  }

  const projectPath = findProjectConfig(startDir);
  if (projectPath) {
    return { path: projectPath, exists: true, origin: 'project' };
  }

  const globalPath = getGlobalConfigPath(homeDir);
  if (fs.existsSync(globalPath)) {
    return { path: globalPath, exists: true, origin: 'global' };
  }

  return { exists: false, origin: 'none' };
}

// ============================================================================
// YAML Parsing
// ============================================================================

type YamlSection = Record<string, unknown>;

function isSection(value: unknown): value is YamlSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses YAML content into its top-level mapping
 */
export function parseYamlConfig(content: string, filePath?: string): YamlSection {
  const where = filePath ? ` (${filePath})` : '';
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse YAML configuration${where}: ${err instanceof Error ? err.message : String(err)}`,
      { path: filePath },
      err instanceof Error ? err : undefined
    );
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isSection(parsed)) {
    throw new ConfigError(`Configuration file must contain a mapping${where}`, { path: filePath });
  }
  return parsed;
}

function readString(section: YamlSection, key: string, field: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw invalidConfig(field, value, 'a string');
  }
  return value;
}

function readBoolean(section: YamlSection, key: string, field: string): boolean | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw invalidConfig(field, value, 'true or false');
  }
  return value;
}

function readInteger(section: YamlSection, key: string, field: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw invalidConfig(field, value, 'an integer');
  }
  return value;
}

function readStringList(section: YamlSection, key: string, field: string): string[] | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return [value];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw invalidConfig(field, value, 'a list of strings');
  }
  return value;
}

function readSection(section: YamlSection, key: string): YamlSection | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isSection(value)) {
    throw invalidConfig(key, value, 'a mapping');
  }
  return value;
}

/**
 * Converts the parsed file (snake_case) to a configuration layer (camelCase)
 *
 * @throws {ConfigError} On values of the wrong type
 */
export function convertYamlToConfig(yamlConfig: YamlSection): PartialConfiguration {
  const result: PartialConfiguration = {};

  for (const key of Object.keys(yamlConfig)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      logger.warn(`Ignoring unknown configuration key '${key}'`);
    }
  }

  const baseBranch = readString(yamlConfig, 'base_branch', 'base_branch');
  if (baseBranch !== undefined) {
    result.baseBranch = baseBranch;
  }
  const worktreesRoot = readString(yamlConfig, 'worktrees_root', 'worktrees_root');
  if (worktreesRoot !== undefined) {
    result.worktreesRoot = worktreesRoot;
  }
  const branchPrefix = readString(yamlConfig, 'branch_prefix', 'branch_prefix');
  if (branchPrefix !== undefined) {
    result.branchPrefix = branchPrefix;
  }
  const remote = readString(yamlConfig, 'remote', 'remote');
  if (remote !== undefined) {
    result.remote = remote;
  }
  const slugMaxLength = readInteger(yamlConfig, 'slug_max_length', 'slug_max_length');
  if (slugMaxLength !== undefined) {
    result.slugMaxLength = slugMaxLength;
  }

  // GitHub section
  const github = readSection(yamlConfig, 'github');
  if (github) {
    result.github = {};
    const hosts = readStringList(github, 'hosts', 'github.hosts');
    if (hosts !== undefined) {
      result.github.hosts = hosts;
    }
    const apiUrl = readString(github, 'api_url', 'github.api_url');
    if (apiUrl !== undefined) {
      result.github.apiUrl = apiUrl;
    }
  }

  // Links section
  const links = readSection(yamlConfig, 'links');
  if (links) {
    result.links = {};
    const enabled = readBoolean(links, 'enabled', 'links.enabled');
    if (enabled !== undefined) {
      result.links.enabled = enabled;
    }
    const force = readBoolean(links, 'force', 'links.force');
    if (force !== undefined) {
      result.links.force = force;
    }
    const file = readString(links, 'file', 'links.file');
    if (file !== undefined) {
      result.links.file = file;
    }
  }

  // Metadata section
  const metadata = readSection(yamlConfig, 'metadata');
  if (metadata) {
    result.metadata = {};
    const enabled = readBoolean(metadata, 'enabled', 'metadata.enabled');
    if (enabled !== undefined) {
      result.metadata.enabled = enabled;
    }
    if (metadata.timeout !== undefined && metadata.timeout !== null) {
      result.metadata.timeout = parseDurationValue(metadata.timeout, 'metadata.timeout');
    }
  }

  return result;
}

/**
 * Reads and parses a configuration file. A missing file yields `{}`.
 */
export function readConfigFile(filePath: string): PartialConfiguration {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(
      `Failed to read configuration file '${filePath}': ${err instanceof Error ? err.message : String(err)}`,
      { path: filePath },
      err instanceof Error ? err : undefined
    );
  }
  return convertYamlToConfig(parseYamlConfig(content, filePath));
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
