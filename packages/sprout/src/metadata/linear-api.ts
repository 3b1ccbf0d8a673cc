/**
 * Linear GraphQL API Client
 *
 * Fetch-based client for reading a single issue by its identifier.
 * The key is sent as-is in `Authorization` (personal API keys); a 401
 * is retried once with `Bearer <key>` for OAuth tokens.
 *
 * @see https://developers.linear.app/docs/graphql/working-with-the-graphql-api
 */

import { isRecord, readJson, recordField, stringField, type JsonRecord } from './json.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('linear-api');

// ============================================================================
// Types
// ============================================================================

export interface LinearIssue {
  /** Human-readable identifier, e.g. ENG-123 */
  readonly identifier: string;
  readonly title: string;
  readonly url: string;
}

export interface GraphQLError {
  readonly message: string;
  readonly extensions?: { readonly code?: string };
}

export interface LinearApiClientOptions {
  apiKey: string;
  /** GraphQL endpoint (default: https://api.linear.app/graphql) */
  apiUrl?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export const LINEAR_API_URL = 'https://api.linear.app/graphql';

const ISSUE_FIELDS = 'identifier title url';

// ============================================================================
// Error Types
// ============================================================================

/**
 * Typed error for Linear API failures.
 */
export class LinearApiError extends Error {
  /** HTTP status code, 0 for network errors */
  readonly status: number;
  readonly graphqlErrors: readonly GraphQLError[];

  constructor(message: string, status: number, graphqlErrors: readonly GraphQLError[] = [], cause?: Error) {
    super(message);
    this.name = 'LinearApiError';
    this.status = status;
    this.graphqlErrors = graphqlErrors;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LinearApiError);
    }
  }

  get isAuthError(): boolean {
    return this.status === 401;
  }
}

export function isLinearApiError(error: unknown): error is LinearApiError {
  return error instanceof LinearApiError;
}

// ============================================================================
// Client Implementation
// ============================================================================

export class LinearApiClient {
  private readonly apiKey: string;
  private readonly apiUrl: string;

  constructor(options: LinearApiClientOptions) {
    if (!options.apiKey.trim()) {
      throw new Error('Linear API key is required');
    }
    this.apiKey = options.apiKey.trim();
    this.apiUrl = options.apiUrl ?? LINEAR_API_URL;
  }

  /**
   * Fetches an issue by identifier, falling back to a search when the
   * direct lookup finds nothing. Null when neither finds it.
   */
  async getIssue(identifier: string, options: RequestOptions = {}): Promise<LinearIssue | null> {
    const direct = await this.getIssueById(identifier, options);
    if (direct) {
      return direct;
    }

    logger.debug(`issue(id: ${identifier}) found nothing, trying issueSearch`);
    const data = await this.graphql(
      `query IssueSearch($query: String!) { issueSearch(query: $query, first: 5) { nodes { ${ISSUE_FIELDS} } } }`,
      { query: identifier },
      options
    );
    const nodes = recordField(data, 'issueSearch')?.nodes;
    if (!Array.isArray(nodes)) {
      return null;
    }
    const issues = nodes.map(toIssue).filter((issue): issue is LinearIssue => issue !== null);
    return issues.find((issue) => issue.identifier.toLowerCase() === identifier.toLowerCase()) ?? issues[0] ?? null;
  }

  /**
   * Performs a GraphQL request and returns `data`.
   *
   * @throws {LinearApiError} On network errors, non-2xx responses, or responses with only errors
   */
  async graphql(query: string, variables: Record<string, unknown>, options: RequestOptions = {}): Promise<JsonRecord> {
    let response = await this.post(query, variables, this.apiKey, options);
    if (response.status === 401) {
      logger.debug('Linear rejected the key as-is, retrying as a Bearer token');
      response = await this.post(query, variables, `Bearer ${this.apiKey}`, options);
    }

    const body = await readJson(response);
    const graphqlErrors = isRecord(body) ? parseGraphQLErrors(body.errors) : [];

    if (!response.ok) {
      const detail =
        graphqlErrors.length > 0
          ? graphqlErrors.map((e) => e.message).join('; ')
          : `${response.status} ${response.statusText}`;
      throw new LinearApiError(`Linear GraphQL request failed: ${detail}`, response.status, graphqlErrors);
    }

    const data = isRecord(body) ? recordField(body, 'data') : undefined;
    if (!data) {
      const detail = graphqlErrors.map((e) => e.message).join('; ') || 'response has no data';
      throw new LinearApiError(`Linear GraphQL request failed: ${detail}`, response.status, graphqlErrors);
    }
    if (graphqlErrors.length > 0) {
      logger.warn(`Linear returned partial errors: ${graphqlErrors.map((e) => e.message).join('; ')}`);
    }
    return data;
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private async getIssueById(identifier: string, options: RequestOptions): Promise<LinearIssue | null> {
    try {
      const data = await this.graphql(
        `query Issue($issueId: String!) { issue(id: $issueId) { ${ISSUE_FIELDS} } }`,
        { issueId: identifier },
        options
      );
      return toIssue(data.issue);
    } catch (err) {
      // Linear reports a missing issue as an error rather than null
      if (err instanceof LinearApiError && isNotFound(err)) {
        return null;
      }
      throw err;
    }
  }

  private async post(
    query: string,
    variables: Record<string, unknown>,
    authorization: string,
    options: RequestOptions
  ): Promise<Response> {
    try {
      return await fetch(this.apiUrl, {
        method: 'POST',
        headers: {
          Authorization: authorization,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ query, variables }),
        signal: options.signal,
      });
    } catch (err) {
      throw new LinearApiError(
        `Network error requesting Linear API: ${err instanceof Error ? err.message : String(err)}`,
        0,
        [],
        err instanceof Error ? err : undefined
      );
    }
  }
}

// ============================================================================
// Utilities
// ============================================================================

function toIssue(value: unknown): LinearIssue | null {
  if (!isRecord(value)) {
    return null;
  }
  const identifier = stringField(value, 'identifier');
  if (!identifier) {
    return null;
  }
  return {
    identifier,
    title: stringField(value, 'title') ?? '',
    url: stringField(value, 'url') ?? '',
  };
}

function parseGraphQLErrors(value: unknown): GraphQLError[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isRecord).map((error) => {
    const code = stringField(recordField(error, 'extensions') ?? {}, 'code');
    return {
      message: stringField(error, 'message') ?? 'unknown error',
      ...(code !== undefined ? { extensions: { code } } : {}),
    };
  });
}

function isNotFound(error: LinearApiError): boolean {
  return error.graphqlErrors.some(
    (e) => e.message.toLowerCase().includes('not found') || e.extensions?.code === 'RESOURCE_NOT_FOUND'
  );
}
