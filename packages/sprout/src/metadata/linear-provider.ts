import { IssueSource, type IssueMetadata, type IssueReference } from '@sprout/core';
import { LinearApiClient, type LinearApiClientOptions } from './linear-api.js';
import type { IssueMetadataProvider, LookupOptions } from './provider.js';

/**
 * Looks up Linear issues over GraphQL. Needs an API key.
 */
export class LinearMetadataProvider implements IssueMetadataProvider {
  readonly name = 'linear';
  private readonly client: LinearApiClient;

  constructor(options: LinearApiClientOptions | LinearApiClient) {
    this.client = options instanceof LinearApiClient ? options : new LinearApiClient(options);
  }

  async lookup(reference: IssueReference, options: LookupOptions = {}): Promise<IssueMetadata> {
    if (reference.source !== IssueSource.LINEAR) {
      return {};
    }
    const issue = await this.client.getIssue(reference.primaryId, options);
    if (!issue) {
      throw new Error(`Linear issue ${reference.primaryId} not found`);
    }
    return {
      ...(issue.title ? { title: issue.title } : {}),
      ...(issue.url ? { url: issue.url } : {}),
    };
  }
}
