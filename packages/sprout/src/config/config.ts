/**
 * Configuration Loading
 *
 * Resolves one `Configuration` per run with the precedence
 * CLI > environment > config file > defaults.
 */

import * as path from 'node:path';
import { ConfigError } from '@sprout/core';
import type {
  ConfigFileDiscovery,
  Configuration,
  LoadConfigOptions,
  LoadedConfiguration,
  PartialConfiguration,
} from './types.js';
import { getDefaultConfig } from './defaults.js';
import { discoverConfigFile, readConfigFile } from './file.js';
import { getEnvConfigPath, loadEnvConfig } from './env.js';
import { validateConfiguration, validatePartialConfiguration } from './validation.js';
import { formatDuration } from './duration.js';
import { mergeConfiguration } from './merge.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('config');

// ============================================================================
// Loading
// ============================================================================

/**
 * Loads configuration with the full precedence chain.
 *
 * Relative `worktrees_root` and `links.file` values from the file are
 * resolved against the directory holding the `.sprout` directory.
 *
 * @throws {ConfigError} When a source holds an invalid value, or an
 *   explicitly named file does not exist
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfiguration {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  let config = getDefaultConfig();
  let configPath: string | undefined;

  if (!options.skipFile) {
    const override = options.configPath ?? (options.skipEnv ? undefined : getEnvConfigPath(env));
    const discovery = discoverConfigFile(override, cwd, options.homeDir);
    if (discovery.origin === 'explicit' && !discovery.exists) {
      throw new ConfigError(`Configuration file not found: ${discovery.path ?? override}`, {
        path: discovery.path,
      });
    }
    if (discovery.exists && discovery.path) {
      configPath = discovery.path;
      const fileConfig = resolveFilePaths(readConfigFile(discovery.path), discovery.path, discovery.origin);
      validatePartialConfiguration(fileConfig);
      config = mergeConfiguration(config, fileConfig);
      logger.debug(`Loaded configuration from ${discovery.path}`);
    }
  }

  if (!options.skipEnv) {
    const envConfig = loadEnvConfig(env);
    validatePartialConfiguration(envConfig);
    config = mergeConfiguration(config, envConfig);
  }

  if (options.cliOverrides) {
    validatePartialConfiguration(options.cliOverrides);
    config = mergeConfiguration(config, options.cliOverrides);
  }

  validateConfiguration(config);
  logger.debug(describeConfiguration(config));

  return configPath !== undefined ? { config, configPath } : { config };
}

/**
 * The directory a file's relative paths are anchored to: the parent of
 * `.sprout/` for discovered files, the file's own directory otherwise
 */
function configBaseDir(filePath: string, origin: ConfigFileDiscovery['origin']): string {
  const dir = path.dirname(filePath);
  return origin === 'explicit' ? dir : path.dirname(dir);
}

function resolveFilePaths(layer: PartialConfiguration, filePath: string, origin: ConfigFileDiscovery['origin']): PartialConfiguration {
  const baseDir = configBaseDir(filePath, origin);
  const anchor = (value: string): string =>
    value.startsWith('~') || value.startsWith('$') || path.isAbsolute(value) ? value : path.resolve(baseDir, value);

  return {
    ...layer,
    ...(layer.worktreesRoot !== undefined ? { worktreesRoot: anchor(layer.worktreesRoot) } : {}),
    ...(layer.links?.file !== undefined ? { links: { ...layer.links, file: anchor(layer.links.file) } } : {}),
  };
}

/**
 * One-line summary for debug logs. Credentials are reported as set or unset.
 */
export function describeConfiguration(config: Configuration): string {
  return [
    `base=${config.baseBranch ?? '(detect)'}`,
    `worktrees_root=${config.worktreesRoot ?? '(sibling)'}`,
    `prefix=${config.branchPrefix}`,
    `remote=${config.remote}`,
    `slug_max_length=${config.slugMaxLength}`,
    `fetch=${config.fetch}`,
    `github.hosts=${config.github.hosts.join(',')}`,
    `github.token=${config.github.token ? 'set' : 'unset'}`,
    `linear.api_key=${config.linear.apiKey ? 'set' : 'unset'}`,
    `links=${config.links.enabled ? (config.links.force ? 'force' : 'on') : 'off'}`,
    `metadata=${config.metadata.enabled ? formatDuration(config.metadata.timeout) : 'off'}`,
  ].join(' ');
}
