/**
 * Reference Parser
 *
 * Turns what a user types (a URL, `owner/repo#42`, `ABC-7`, `#42`, `42`)
 * into a normalized IssueReference. Shapes are tried in a fixed order:
 *
 * 1. Full URLs (GitHub on a known host, Linear). Any other URL is rejected.
 * 2. `owner/repo#<n>`
 * 3. `<KEY>-<n>` (Linear)
 * 4. `#<n>` or `<n>`, with `owner/repo` taken from the local remote
 *
 * Parsing never guesses: input matching none of the shapes, or a bare
 * number without a usable remote, is an error.
 *
 * @module
 */

import {
  IssueSource,
  unrecognizedReference,
  repoInferenceFailed,
  type IssueReference,
  type GitHubIssueReference,
  type LinearIssueReference,
} from '@sprout/core';
import { parseRemoteUrl } from './remote-url.js';

// ============================================================================
// Types
// ============================================================================

export interface ParseContext {
  /** URL of the repository's remote, when it has one */
  readonly remoteUrl?: string;
  /** Hostnames treated as GitHub (default: github.com) */
  readonly githubHosts?: readonly string[];
}

export const DEFAULT_GITHUB_HOSTS: readonly string[] = ['github.com'];

const LINEAR_HOSTS = new Set(['linear.app', 'www.linear.app']);

// ============================================================================
// Patterns
// ============================================================================

const URL_SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;
const OWNER_REPO_ISSUE = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)#(\d+)$/;
const LINEAR_IDENTIFIER = /^[A-Za-z][A-Za-z0-9]*-\d+$/;
const BARE_ISSUE = /^#?(\d+)$/;
const ISSUE_NUMBER = /^\d+$/;

// ============================================================================
// Parser
// ============================================================================

/**
 * Parses raw input into an IssueReference.
 *
 * @throws ReferenceParseError (UNRECOGNIZED_REFERENCE or REPO_INFERENCE_FAILED)
 */
export function parseReference(raw: string, context: ParseContext = {}): IssueReference {
  const input = raw.trim();
  if (input === '') {
    throw unrecognizedReference(raw);
  }

  const hosts = normalizeHosts(context.githubHosts ?? DEFAULT_GITHUB_HOSTS);

  if (URL_SCHEME.test(input)) {
    const fromUrl = parseIssueUrl(input, raw, hosts);
    if (!fromUrl) {
      throw unrecognizedReference(raw, { reason: 'URL is not a GitHub or Linear issue' });
    }
    return fromUrl;
  }

  const explicit = OWNER_REPO_ISSUE.exec(input);
  if (explicit) {
    const issueNumber = normalizeIssueNumber(explicit[3]);
    if (issueNumber === undefined) {
      throw unrecognizedReference(raw, { reason: 'issue number must be positive' });
    }
    return github(`${explicit[1]}/${explicit[2]}`, issueNumber, raw);
  }

  if (LINEAR_IDENTIFIER.test(input)) {
    return linear(input, raw);
  }

  const bare = BARE_ISSUE.exec(input);
  if (bare) {
    const issueNumber = normalizeIssueNumber(bare[1]);
    if (issueNumber === undefined) {
      throw unrecognizedReference(raw, { reason: 'issue number must be positive' });
    }
    return github(inferOwnerRepo(raw, context.remoteUrl, hosts), issueNumber, raw);
  }

  throw unrecognizedReference(raw);
}

/**
 * Returns `owner/repo` for the remote, or throws REPO_INFERENCE_FAILED
 */
export function inferOwnerRepo(
  input: string,
  remoteUrl: string | undefined,
  githubHosts: readonly string[] = DEFAULT_GITHUB_HOSTS
): string {
  if (remoteUrl === undefined || remoteUrl.trim() === '') {
    throw repoInferenceFailed(input, 'the repository has no remote');
  }
  const parsed = parseRemoteUrl(remoteUrl);
  if (!parsed) {
    throw repoInferenceFailed(input, `cannot parse remote URL ${remoteUrl}`, { remoteUrl });
  }
  if (!normalizeHosts(githubHosts).includes(parsed.host)) {
    throw repoInferenceFailed(input, `remote host ${parsed.host} is not a known GitHub host`, {
      remoteUrl,
      host: parsed.host,
    });
  }
  return `${parsed.owner}/${parsed.repo}`;
}

// ============================================================================
// Helpers
// ============================================================================

function parseIssueUrl(
  input: string,
  raw: string,
  githubHosts: readonly string[]
): IssueReference | undefined {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return undefined;
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    return undefined;
  }

  const host = url.hostname.toLowerCase();
  const segments = url.pathname.split('/').filter((segment) => segment !== '');

  if (githubHosts.includes(host) || githubHosts.includes(host.replace(/^www\./, ''))) {
    const [owner, repo, kind, id] = segments;
    if (!owner || !repo || kind !== 'issues' || !id || !ISSUE_NUMBER.test(id)) {
      return undefined;
    }
    const issueNumber = normalizeIssueNumber(id);
    if (issueNumber === undefined) {
      return undefined;
    }
    return github(`${owner}/${repo}`, issueNumber, raw);
  }

  if (LINEAR_HOSTS.has(host)) {
    const [workspace, kind, identifier] = segments;
    if (!workspace || kind !== 'issue' || !identifier || !LINEAR_IDENTIFIER.test(identifier)) {
      return undefined;
    }
    return linear(identifier, raw);
  }

  return undefined;
}

function github(ownerRepo: string, primaryId: string, rawInput: string): GitHubIssueReference {
  return { source: IssueSource.GITHUB, primaryId, ownerRepo, rawInput };
}

function linear(primaryId: string, rawInput: string): LinearIssueReference {
  return { source: IssueSource.LINEAR, primaryId, rawInput };
}

/** Strips leading zeros; undefined for zero */
function normalizeIssueNumber(digits: string): string | undefined {
  const stripped = digits.replace(/^0+/, '');
  return stripped === '' ? undefined : stripped;
}

function normalizeHosts(hosts: readonly string[]): string[] {
  return hosts.map((host) => host.trim().toLowerCase()).filter((host) => host !== '');
}
