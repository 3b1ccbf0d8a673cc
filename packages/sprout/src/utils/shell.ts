const SAFE_WORD = /^[A-Za-z0-9@%_+=:,./-]+$/;

/**
 * Quotes a word for a POSIX shell. Words made only of safe characters are
 * returned unchanged.
 */
export function shellQuote(word: string): string {
  if (SAFE_WORD.test(word)) {
    return word;
  }
  return `'${word.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Renders an argv as a copy-pasteable command line
 */
export function formatCommand(argv: readonly string[]): string {
  return argv.map(shellQuote).join(' ');
}
