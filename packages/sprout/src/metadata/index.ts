import { IssueSource } from '@sprout/core';
import { GitHubMetadataProvider } from './github-provider.js';
import { LinearMetadataProvider } from './linear-provider.js';
import { NullMetadataProvider, TrackerMetadataProvider, type IssueMetadataProvider } from './provider.js';

export {
  NullMetadataProvider,
  TrackerMetadataProvider,
  lookupMetadata,
  DEFAULT_METADATA_TIMEOUT_MS,
  type IssueMetadataProvider,
  type LookupOptions,
  type MetadataLookupResult,
} from './provider.js';
export { GitHubMetadataProvider } from './github-provider.js';
export { LinearMetadataProvider } from './linear-provider.js';
export {
  GitHubApiClient,
  GitHubApiError,
  isGitHubApiError,
  parseRateLimitHeaders,
  DEFAULT_GITHUB_API_URL,
  type GitHubIssue,
  type GitHubApiClientOptions,
} from './github-api.js';
export { LinearApiClient, LinearApiError, isLinearApiError, LINEAR_API_URL, type LinearIssue } from './linear-api.js';

export interface MetadataProviderSettings {
  readonly enabled: boolean;
  readonly githubToken?: string;
  readonly githubApiUrl?: string;
  readonly linearApiKey?: string;
}

/**
 * Builds the provider for a run: GitHub always, Linear only with a key.
 */
export function createMetadataProvider(settings: MetadataProviderSettings): IssueMetadataProvider {
  if (!settings.enabled) {
    return new NullMetadataProvider();
  }
  const linearApiKey = settings.linearApiKey?.trim();
  return new TrackerMetadataProvider({
    [IssueSource.GITHUB]: new GitHubMetadataProvider({
      ...(settings.githubToken !== undefined ? { token: settings.githubToken } : {}),
      ...(settings.githubApiUrl !== undefined ? { apiBaseUrl: settings.githubApiUrl } : {}),
    }),
    ...(linearApiKey ? { [IssueSource.LINEAR]: new LinearMetadataProvider({ apiKey: linearApiKey }) } : {}),
  });
}
