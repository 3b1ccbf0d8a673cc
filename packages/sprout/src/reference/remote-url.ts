/**
 * Git remote URL parsing.
 *
 * Accepts the three shapes git itself writes into `remote.<name>.url`:
 * - `https://host/owner/repo(.git)`
 * - `ssh://git@host[:port]/owner/repo(.git)`
 * - `git@host:owner/repo(.git)` (scp-like)
 */

export interface ParsedRemote {
  /** Lowercased hostname, without port or user */
  readonly host: string;
  readonly owner: string;
  readonly repo: string;
}

const SEGMENT = /^[A-Za-z0-9_.-]+$/;

/**
 * Parses a remote URL into host, owner and repo.
 * Returns undefined for local paths and anything that is not `owner/repo` shaped.
 */
export function parseRemoteUrl(remote: string): ParsedRemote | undefined {
  const trimmed = remote.trim();
  if (!trimmed) {
    return undefined;
  }

  let host: string;
  let pathPart: string;

  if (trimmed.includes('://')) {
    let url: URL;
    try {
      url = new URL(trimmed);
    } catch {
      return undefined;
    }
    if (url.protocol === 'file:') {
      return undefined;
    }
    host = url.hostname;
    pathPart = url.pathname;
  } else {
    // Local paths are not remotes we can read an owner from
    if (/^(?:[A-Za-z]:[/\\]|\\\\|\/|\.)/.test(trimmed)) {
      return undefined;
    }
    const scp = /^(?:[^@/]+@)?([^:/]+):(.+)$/.exec(trimmed);
    if (!scp) {
      return undefined;
    }
    host = scp[1];
    pathPart = scp[2];
  }

  const segments = pathPart
    .replace(/^\/+/, '')
    .replace(/\/+$/, '')
    .replace(/\.git$/, '')
    .split('/');
  if (segments.length !== 2) {
    return undefined;
  }
  const [owner, repo] = segments;
  if (!owner || !repo || !SEGMENT.test(owner) || !SEGMENT.test(repo)) {
    return undefined;
  }

  return { host: host.toLowerCase(), owner, repo };
}
