/**
 * Issue metadata lookup.
 *
 * A provider answers "what is this issue called?" for one or more
 * trackers. Lookups are best effort: `lookupMetadata` bounds them with a
 * timeout and turns every failure into empty metadata plus a warning.
 *
 * @module
 */

import {
  formatReference,
  metadataLookupDegraded,
  type IssueMetadata,
  type IssueReference,
  type IssueSource,
  type MetadataLookupError,
} from '@sprout/core';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('metadata');

/** Default lookup timeout (10 seconds) */
export const DEFAULT_METADATA_TIMEOUT_MS = 10_000;

// ============================================================================
// Provider Interface
// ============================================================================

export interface LookupOptions {
  readonly signal?: AbortSignal;
}

export interface IssueMetadataProvider {
  /** Provider name for diagnostics */
  readonly name: string;
  /**
   * Returns whatever metadata the tracker has for the issue.
   * Rejects on transport or authorization failures.
   */
  lookup(reference: IssueReference, options?: LookupOptions): Promise<IssueMetadata>;
}

/**
 * Provider that never knows anything. Used offline and with `--no-fetch`.
 */
export class NullMetadataProvider implements IssueMetadataProvider {
  readonly name = 'none';

  async lookup(): Promise<IssueMetadata> {
    return {};
  }
}

/**
 * Dispatches to a provider per tracker. Sources without a provider yield `{}`.
 */
export class TrackerMetadataProvider implements IssueMetadataProvider {
  readonly name = 'tracker';

  constructor(private readonly providers: Partial<Record<IssueSource, IssueMetadataProvider>>) {}

  async lookup(reference: IssueReference, options: LookupOptions = {}): Promise<IssueMetadata> {
    const provider = this.providers[reference.source];
    if (!provider) {
      logger.debug(`No metadata provider for ${reference.source}`);
      return {};
    }
    return provider.lookup(reference, options);
  }
}

// ============================================================================
// Bounded Lookup
// ============================================================================

export interface MetadataLookupResult {
  readonly metadata: IssueMetadata;
  /** Set when the lookup failed or timed out */
  readonly warning?: MetadataLookupError;
}

/**
 * Runs a lookup with a timeout. Never rejects.
 */
export async function lookupMetadata(
  provider: IssueMetadataProvider,
  reference: IssueReference,
  timeoutMs: number = DEFAULT_METADATA_TIMEOUT_MS
): Promise<MetadataLookupResult> {
  const issue = formatReference(reference);
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timedOut = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    const metadata = await Promise.race([provider.lookup(reference, { signal: controller.signal }), timedOut]);
    logger.debug(`${provider.name} metadata for ${issue}: ${metadata.title ?? '(no title)'}`);
    return { metadata };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    const warning = metadataLookupDegraded(issue, reason, error instanceof Error ? error : undefined);
    logger.warn(`${warning.message}; continuing without it`);
    return { metadata: {}, warning };
  } finally {
    clearTimeout(timer);
  }
}
