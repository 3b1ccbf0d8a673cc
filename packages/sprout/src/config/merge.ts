/**
 * Configuration Merging
 */

import type { Configuration, PartialConfiguration } from './types.js';

/**
 * Merges a partial configuration into a complete one. Fields the layer
 * leaves undefined keep the base value; lists are replaced.
 */
export function mergeConfiguration(base: Configuration, partial: PartialConfiguration): Configuration {
  return {
    baseBranch: partial.baseBranch !== undefined ? partial.baseBranch : base.baseBranch,
    worktreesRoot: partial.worktreesRoot !== undefined ? partial.worktreesRoot : base.worktreesRoot,
    branchPrefix: partial.branchPrefix !== undefined ? partial.branchPrefix : base.branchPrefix,
    remote: partial.remote !== undefined ? partial.remote : base.remote,
    slugMaxLength: partial.slugMaxLength !== undefined ? partial.slugMaxLength : base.slugMaxLength,
    fetch: partial.fetch !== undefined ? partial.fetch : base.fetch,
    github: {
      hosts: partial.github?.hosts !== undefined ? [...partial.github.hosts] : [...base.github.hosts],
      apiUrl: partial.github?.apiUrl !== undefined ? partial.github.apiUrl : base.github.apiUrl,
      token: partial.github?.token !== undefined ? partial.github.token : base.github.token,
    },
    linear: {
      apiKey: partial.linear?.apiKey !== undefined ? partial.linear.apiKey : base.linear.apiKey,
    },
    links: {
      enabled: partial.links?.enabled !== undefined ? partial.links.enabled : base.links.enabled,
      force: partial.links?.force !== undefined ? partial.links.force : base.links.force,
      file: partial.links?.file !== undefined ? partial.links.file : base.links.file,
    },
    metadata: {
      enabled: partial.metadata?.enabled !== undefined ? partial.metadata.enabled : base.metadata.enabled,
      timeout: partial.metadata?.timeout !== undefined ? partial.metadata.timeout : base.metadata.timeout,
    },
  };
}
