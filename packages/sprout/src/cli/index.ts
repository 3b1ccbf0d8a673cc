/**
 * CLI Module
 */

export * from './types.js';
export { parseArgs, getOptionsHelp } from './parser.js';
export {
  getFormatter,
  getOutputMode,
  formatSummary,
  summaryToJSON,
  type OutputFormatter,
} from './formatter.js';
export { run, main } from './runner.js';
export { helpCommand, versionCommand, getHelpText, VERSION } from './commands/help.js';
export {
  createSproutCommand,
  defaultCommandContext,
  cliOverrides,
  type CommandContext,
} from './commands/create.js';
