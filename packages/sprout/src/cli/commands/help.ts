/**
 * help and version commands
 */

import type { Command, CommandResult } from '../types.js';
import { success } from '../types.js';
import { getOptionsHelp } from '../parser.js';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';

// ============================================================================
// Help Text
// ============================================================================

export const USAGE = `Usage:
  sprout <issue> [options]
  sprout --branch <name> [<issue>] [options]`;

const ISSUE_FORMS = `Issue references:
  42, #42                                    GitHub issue in the current repository
  owner/repo#42                              GitHub issue in another repository
  https://github.com/owner/repo/issues/42    GitHub issue URL
  ABC-7                                      Linear issue
  https://linear.app/team/issue/ABC-7        Linear issue URL`;

const ENVIRONMENT = `Environment:
  GITHUB_TOKEN        Token for GitHub issue lookups
  LINEAR_API_KEY      API key for Linear issue lookups
  SPROUT_CONFIG       Configuration file (default: .sprout/config.yaml, then ~/.sprout/config.yaml)
  LOG_LEVEL           DEBUG, INFO, WARNING or ERROR`;

export function getHelpText(): string {
  return [
    'sprout - create a git worktree for an issue',
    '',
    USAGE,
    '',
    ISSUE_FORMS,
    '',
    getOptionsHelp(),
    '',
    ENVIRONMENT,
  ].join('\n');
}

function helpHandler(): CommandResult {
  return success(undefined, getHelpText());
}

function versionHandler(): CommandResult {
  return success({ version: VERSION }, `sprout v${VERSION}`);
}

export const helpCommand: Command = {
  name: 'help',
  description: 'Show help',
  usage: 'sprout --help',
  handler: helpHandler,
};

export const versionCommand: Command = {
  name: 'version',
  description: 'Show version',
  usage: 'sprout --version',
  handler: versionHandler,
};
