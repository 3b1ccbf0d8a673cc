/**
 * Configuration Validation
 */

import { invalidConfig } from '@sprout/core';
import type { Configuration, PartialConfiguration } from './types.js';

const HOST_PATTERN = /^[A-Za-z0-9.-]+(?::\d+)?$/;

const NON_ASCII = /[^\x00-\x7F]/;

/**
 * Validates a fully merged configuration
 *
 * @throws {ConfigError} On the first invalid value
 */
export function validateConfiguration(config: Configuration): void {
  validatePartialConfiguration(config);
}

/**
 * Validates whichever fields a layer sets
 */
export function validatePartialConfiguration(config: PartialConfiguration): void {
  if (config.branchPrefix !== undefined) {
    if (NON_ASCII.test(config.branchPrefix)) {
      throw invalidConfig('branch_prefix', config.branchPrefix, 'ASCII characters only');
    }
  }

  if (config.remote !== undefined && config.remote.trim() === '') {
    throw invalidConfig('remote', config.remote, 'a non-empty remote name');
  }

  if (config.baseBranch !== undefined && config.baseBranch.trim() === '') {
    throw invalidConfig('base_branch', config.baseBranch, 'a non-empty branch name');
  }

  if (config.slugMaxLength !== undefined) {
    if (!Number.isInteger(config.slugMaxLength) || config.slugMaxLength <= 0) {
      throw invalidConfig('slug_max_length', config.slugMaxLength, 'a positive integer');
    }
  }

  if (config.github?.hosts !== undefined) {
    const { hosts } = config.github;
    if (hosts.length === 0) {
      throw invalidConfig('github.hosts', hosts, 'at least one host name');
    }
    for (const host of hosts) {
      if (!HOST_PATTERN.test(host)) {
        throw invalidConfig('github.hosts', host, 'a host name such as github.com');
      }
    }
  }

  if (config.github?.apiUrl !== undefined && !isHttpUrl(config.github.apiUrl)) {
    throw invalidConfig('github.api_url', config.github.apiUrl, 'an http(s) URL');
  }

  if (config.metadata?.timeout !== undefined) {
    const { timeout } = config.metadata;
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw invalidConfig('metadata.timeout', timeout, 'a positive duration');
    }
  }

  if (config.links?.file !== undefined && config.links.file.trim() === '') {
    throw invalidConfig('links.file', config.links.file, 'a file path');
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
