/**
 * Issue metadata. Either injected by the caller or looked up from the
 * tracker; absent fields never block naming.
 */
export interface IssueMetadata {
  /** Issue title, used for the branch slug */
  readonly title?: string;
  /** Canonical web URL of the issue */
  readonly url?: string;
}

/**
 * Combines injected and fetched metadata. Injected fields win.
 */
export function mergeMetadata(
  injected: IssueMetadata | undefined,
  fetched: IssueMetadata | undefined
): IssueMetadata {
  const title = nonEmpty(injected?.title) ?? nonEmpty(fetched?.title);
  const url = nonEmpty(injected?.url) ?? nonEmpty(fetched?.url);
  return {
    ...(title !== undefined ? { title } : {}),
    ...(url !== undefined ? { url } : {}),
  };
}

/**
 * True when any field is set. Injected metadata of this kind replaces the lookup.
 */
export function hasMetadata(metadata: IssueMetadata | undefined): boolean {
  return nonEmpty(metadata?.title) !== undefined || nonEmpty(metadata?.url) !== undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value.trim() === '' ? undefined : value;
}
