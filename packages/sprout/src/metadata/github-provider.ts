import { IssueSource, type IssueMetadata, type IssueReference } from '@sprout/core';
import { GitHubApiClient, type GitHubApiClientOptions } from './github-api.js';
import type { IssueMetadataProvider, LookupOptions } from './provider.js';

/**
 * Looks up GitHub issues over the REST API
 */
export class GitHubMetadataProvider implements IssueMetadataProvider {
  readonly name = 'github';
  private readonly client: GitHubApiClient;

  constructor(options: GitHubApiClientOptions | GitHubApiClient = {}) {
    this.client = options instanceof GitHubApiClient ? options : new GitHubApiClient(options);
  }

  async lookup(reference: IssueReference, options: LookupOptions = {}): Promise<IssueMetadata> {
    if (reference.source !== IssueSource.GITHUB) {
      return {};
    }
    const [owner, repo] = reference.ownerRepo.split('/');
    const issue = await this.client.getIssue(owner, repo, reference.primaryId, options);
    return {
      ...(issue.title ? { title: issue.title } : {}),
      ...(issue.html_url ? { url: issue.html_url } : {}),
    };
  }
}
