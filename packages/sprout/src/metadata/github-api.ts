/**
 * GitHub REST API Client
 *
 * Fetch-based client for reading a single issue. Works without a token
 * for public repositories; `apiBaseUrl` points it at GitHub Enterprise.
 */

import { isRecord, readJson, stringField } from './json.js';

// ============================================================================
// Types
// ============================================================================

/**
 * The fields read from GitHub's issue response
 */
export interface GitHubIssue {
  readonly number: number;
  readonly title: string;
  /** URL to view the issue in a browser */
  readonly html_url: string;
}

/**
 * Rate limit information parsed from GitHub response headers
 */
export interface RateLimitInfo {
  readonly limit: number;
  readonly remaining: number;
  /** UTC epoch seconds when the window resets */
  readonly reset: number;
}

export interface GitHubApiClientOptions {
  /** Token for private repositories and higher rate limits */
  token?: string;
  /** Base URL for GitHub API (default: https://api.github.com) */
  apiBaseUrl?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

// ============================================================================
// Error Types
// ============================================================================

/**
 * Typed error for GitHub API failures.
 */
export class GitHubApiError extends Error {
  /** HTTP status code, 0 for network errors */
  readonly status: number;
  readonly rateLimit: RateLimitInfo | null;

  constructor(message: string, status: number, rateLimit: RateLimitInfo | null = null, cause?: Error) {
    super(message);
    this.name = 'GitHubApiError';
    this.status = status;
    this.rateLimit = rateLimit;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GitHubApiError);
    }
  }

  get isRateLimited(): boolean {
    return (this.status === 403 || this.status === 429) && this.rateLimit !== null && this.rateLimit.remaining === 0;
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }
}

export function isGitHubApiError(error: unknown): error is GitHubApiError {
  return error instanceof GitHubApiError;
}

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * @example
 * ```typescript
 * const client = new GitHubApiClient({ token: process.env.GITHUB_TOKEN });
 * const issue = await client.getIssue('owner', 'repo', 42);
 * ```
 */
export class GitHubApiClient {
  private readonly token: string | undefined;
  private readonly apiBaseUrl: string;

  constructor(options: GitHubApiClientOptions = {}) {
    this.token = options.token?.trim() || undefined;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, '');
  }

  /**
   * GET /repos/{owner}/{repo}/issues/{issue_number}
   */
  async getIssue(owner: string, repo: string, issueNumber: string, options: RequestOptions = {}): Promise<GitHubIssue> {
    const path = `/repos/${enc(owner)}/${enc(repo)}/issues/${enc(issueNumber)}`;
    const body = await this.request(path, options);

    if (!isRecord(body)) {
      throw new GitHubApiError(`Unexpected response for ${path}`, 200);
    }
    const number = body.number;
    if (typeof number !== 'number') {
      throw new GitHubApiError(`Unexpected response for ${path}`, 200);
    }
    return {
      number,
      title: stringField(body, 'title') ?? '',
      html_url: stringField(body, 'html_url') ?? '',
    };
  }

  // --------------------------------------------------------------------------
  // Internal: HTTP Request Handling
  // --------------------------------------------------------------------------

  private async request(path: string, options: RequestOptions): Promise<unknown> {
    const url = `${this.apiBaseUrl}${path}`;

    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let response: Response;
    try {
      response = await fetch(url, { method: 'GET', headers, signal: options.signal });
    } catch (err) {
      throw new GitHubApiError(
        `Network error requesting GET ${path}: ${err instanceof Error ? err.message : String(err)}`,
        0,
        null,
        err instanceof Error ? err : undefined
      );
    }

    const rateLimit = parseRateLimitHeaders(response.headers);
    const body = await readJson(response);

    if (!response.ok) {
      const detail = isRecord(body) ? stringField(body, 'message') : undefined;
      let message = `GitHub API error: ${response.status} ${response.statusText}${detail ? ` - ${detail}` : ''}`;
      if (rateLimit && rateLimit.remaining === 0) {
        message = `GitHub API rate limit exhausted. Resets at ${new Date(rateLimit.reset * 1000).toISOString()}. ${message}`;
      }
      throw new GitHubApiError(message, response.status, rateLimit);
    }

    return body;
  }
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Parses the X-RateLimit-* headers. Null when any is missing.
 */
export function parseRateLimitHeaders(headers: Headers): RateLimitInfo | null {
  const limit = headers.get('x-ratelimit-limit');
  const remaining = headers.get('x-ratelimit-remaining');
  const reset = headers.get('x-ratelimit-reset');
  if (limit === null || remaining === null || reset === null) {
    return null;
  }
  const parsed = {
    limit: parseInt(limit, 10),
    remaining: parseInt(remaining, 10),
    reset: parseInt(reset, 10),
  };
  if (Number.isNaN(parsed.limit) || Number.isNaN(parsed.remaining) || Number.isNaN(parsed.reset)) {
    return null;
  }
  return parsed;
}

function enc(segment: string): string {
  return encodeURIComponent(segment);
}
