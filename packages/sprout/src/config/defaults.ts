/**
 * Default Configuration Values
 */

import { DEFAULT_BRANCH_PREFIX } from '@sprout/core';
import { DEFAULT_GITHUB_HOSTS } from '../reference/index.js';
import { DEFAULT_SLUG_MAX_LENGTH } from '../naming/index.js';
import { DEFAULT_REMOTE } from '../git/index.js';
import { DEFAULT_GITHUB_API_URL, DEFAULT_METADATA_TIMEOUT_MS } from '../metadata/index.js';
import type { Configuration } from './types.js';

/**
 * Returns a fresh default configuration
 */
export function getDefaultConfig(): Configuration {
  return {
    branchPrefix: DEFAULT_BRANCH_PREFIX,
    remote: DEFAULT_REMOTE,
    slugMaxLength: DEFAULT_SLUG_MAX_LENGTH,
    fetch: true,
    github: {
      hosts: [...DEFAULT_GITHUB_HOSTS],
      apiUrl: DEFAULT_GITHUB_API_URL,
    },
    linear: {},
    links: {
      enabled: true,
      force: false,
    },
    metadata: {
      enabled: true,
      timeout: DEFAULT_METADATA_TIMEOUT_MS,
    },
  };
}
