import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Expands a leading `~` and `$VAR` / `${VAR}` references.
 * Unset variables are left as written.
 */
export function expandPath(input: string, env: NodeJS.ProcessEnv = process.env): string {
  let expanded = input;
  if (expanded === '~') {
    expanded = os.homedir();
  } else if (expanded.startsWith('~/')) {
    expanded = path.join(os.homedir(), expanded.slice(2));
  }
  return expanded.replace(/\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g, (match, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare;
    if (name === undefined) return match;
    const value = env[name];
    return value === undefined ? match : value;
  });
}

/**
 * Expands and resolves a path against `cwd`
 */
export function resolvePath(input: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, expandPath(input));
}

/**
 * True when `child` is `parent` or lies beneath it
 */
export function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  if (relative === '') return true;
  if (relative === '..' || relative.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(relative);
}

/**
 * Resolves symlinks in the deepest existing ancestor and appends the
 * not-yet-existing remainder as written
 */
export function canonicalPath(p: string): string {
  const resolved = path.resolve(p);
  let existing = resolved;
  const missing: string[] = [];
  while (!fs.existsSync(existing)) {
    const parent = path.dirname(existing);
    if (parent === existing) {
      return resolved;
    }
    missing.unshift(path.basename(existing));
    existing = parent;
  }
  return path.join(fs.realpathSync(existing), ...missing);
}
