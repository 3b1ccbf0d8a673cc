/**
 * Configuration Module
 *
 * Precedence: CLI > environment > config file > defaults.
 */

export type {
  Configuration,
  PartialConfiguration,
  GitHubConfig,
  LinearConfig,
  LinksConfig,
  MetadataConfig,
  Duration,
  DurationString,
  EnvVar,
  Environment,
  ConfigFileDiscovery,
  LoadConfigOptions,
  LoadedConfiguration,
} from './types.js';
export { ConfigSource, EnvVars } from './types.js';

export { getDefaultConfig } from './defaults.js';

export { loadConfig, describeConfiguration } from './config.js';
export { mergeConfiguration } from './merge.js';

export {
  CONFIG_FILE_NAME,
  SPROUT_DIR,
  findProjectConfig,
  getGlobalConfigPath,
  discoverConfigFile,
  parseYamlConfig,
  convertYamlToConfig,
  readConfigFile,
} from './file.js';

export {
  parseEnvBoolean,
  getEnvVar,
  loadEnvConfig,
  getEnvConfigPath,
  getEnvJsonMode,
  getEnvVerboseMode,
} from './env.js';

export { validateConfiguration, validatePartialConfiguration } from './validation.js';

export { DURATION_UNITS, isDurationString, parseDuration, parseDurationValue, formatDuration } from './duration.js';
