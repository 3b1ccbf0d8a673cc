/**
 * CLI Argument Parser
 *
 * Parses command-line arguments into positional arguments and options.
 */

import { invalidInput } from '@sprout/core';
import type { CliOptions, FlagOptionKey, ParsedCommandLine, ValueOptionKey } from './types.js';
import { DEFAULT_CLI_OPTIONS } from './types.js';

// ============================================================================
// Option Definitions
// ============================================================================

const VALUE_OPTIONS: Record<string, ValueOptionKey> = {
  '--repo': 'repo',
  '--base': 'base',
  '--worktrees-root': 'worktreesRoot',
  '--prefix': 'prefix',
  '--branch': 'branch',
  '--title': 'title',
  '--url': 'url',
  '--links-file': 'linksFile',
  '--config': 'config',
};

const FLAG_OPTIONS: Record<string, FlagOptionKey> = {
  '--no-fetch': 'noFetch',
  '--dry-run': 'dryRun',
  '--print-path': 'printPath',
  '--no-links': 'noLinks',
  '--link-force': 'linkForce',
  '--json': 'json',
  '--quiet': 'quiet',
  '--verbose': 'verbose',
  '--help': 'help',
  '--version': 'version',
};

const SHORT_TO_LONG: Record<string, string> = {
  '-q': '--quiet',
  '-v': '--verbose',
  '-h': '--help',
  '-V': '--version',
};

// ============================================================================
// Parse Function
// ============================================================================

/**
 * Parses command-line arguments
 *
 * @param argv - Raw arguments (typically process.argv.slice(2))
 * @throws SproutError (INVALID_INPUT) for unknown options or missing values
 */
export function parseArgs(argv: readonly string[]): ParsedCommandLine {
  const args: string[] = [];
  const options: CliOptions = { ...DEFAULT_CLI_OPTIONS };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    // -- stops option parsing
    if (arg === '--') {
      args.push(...argv.slice(i + 1));
      break;
    }

    // Positional, including a lone '-'
    if (!arg.startsWith('-') || arg === '-') {
      args.push(arg);
      i++;
      continue;
    }

    // Combined short flags (e.g. -qv)
    if (/^-[A-Za-z]{2,}$/.test(arg)) {
      for (const letter of arg.slice(1)) {
        const long = SHORT_TO_LONG[`-${letter}`];
        const flag = long !== undefined ? FLAG_OPTIONS[long] : undefined;
        if (flag === undefined) {
          throw invalidInput(`Unknown option: -${letter}`, { input: arg });
        }
        options[flag] = true;
      }
      i++;
      continue;
    }

    // --option=value
    let name = arg;
    let inlineValue: string | undefined;
    const eqIndex = arg.indexOf('=');
    if (eqIndex !== -1) {
      name = arg.slice(0, eqIndex);
      inlineValue = arg.slice(eqIndex + 1);
    }
    name = SHORT_TO_LONG[name] ?? name;

    const valueKey = VALUE_OPTIONS[name];
    if (valueKey !== undefined) {
      const value = inlineValue ?? argv[i + 1];
      if (value === undefined || (inlineValue === undefined && value.startsWith('-') && value !== '-')) {
        throw invalidInput(`Option ${name} requires a value`, { input: name });
      }
      options[valueKey] = value;
      i += inlineValue === undefined ? 2 : 1;
      continue;
    }

    const flagKey = FLAG_OPTIONS[name];
    if (flagKey !== undefined) {
      if (inlineValue !== undefined) {
        throw invalidInput(`Option ${name} does not take a value`, { input: arg });
      }
      options[flagKey] = true;
      i++;
      continue;
    }

    throw invalidInput(`Unknown option: ${name}`, { input: arg });
  }

  return { args, options };
}

// ============================================================================
// Help Text Generation
// ============================================================================

/**
 * Help text for every option
 */
export function getOptionsHelp(): string {
  return `Options:
  --repo <path>            Repository to work in (default: current directory)
  --base <branch>          Base branch for new branches (default: remote HEAD)
  --worktrees-root <path>  Root for worktrees (default: ../worktrees)
  --prefix <prefix>        Branch prefix (default: issue)
  --branch <name>          Use this branch name instead of a generated one
  --title <text>           Issue title for the branch slug; skips the lookup
  --url <url>              Issue URL; skips the lookup
  --no-fetch               Skip the metadata lookup and the base branch fetch
  --dry-run                Show what would happen without changing anything
  --print-path             Print the worktree path and exit
  --links-file <path>      Link declaration file (default: .worktree-links.local.json)
  --no-links               Do not apply private file links
  --link-force             Replace existing files at link destinations
  --config <path>          Configuration file

Global Options:
  --json                   Output in JSON format
  -q, --quiet              Print only the worktree path
  -v, --verbose            Enable debug output
  -h, --help               Show help
  -V, --version            Show version`;
}
