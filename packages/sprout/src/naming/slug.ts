/** Default maximum slug length */
export const DEFAULT_SLUG_MAX_LENGTH = 50;

/**
 * Creates a URL- and branch-safe slug from an issue title.
 *
 * Titles are NFKD-normalized so accented letters keep their base letter;
 * anything still outside ASCII is dropped. Runs of other characters become
 * a single hyphen. When truncation would split a word, the slug is cut back
 * to the previous hyphen.
 *
 * @example
 * createSlug('Fix login bug') // 'fix-login-bug'
 * createSlug('Café crème!')   // 'cafe-creme'
 * createSlug('日本語')         // ''
 */
export function createSlug(title: string | undefined, maxLength = DEFAULT_SLUG_MAX_LENGTH): string {
  if (!title || maxLength < 1) {
    return '';
  }

  const slug = title
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')   // Drop non-ASCII (combining marks included)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')    // Collapse separators
    .replace(/^-+|-+$/g, '');       // Trim hyphens

  if (slug.length <= maxLength) {
    return slug;
  }

  let cut = slug.slice(0, maxLength);
  const splitsWord = slug[maxLength] !== '-';
  const lastSeparator = cut.lastIndexOf('-');
  if (splitsWord && lastSeparator > 0) {
    cut = cut.slice(0, lastSeparator);
  }
  return cut.replace(/-+$/, '');
}
