/**
 * CLI Runner
 *
 * Main entry point for command execution.
 */

import { getEnvJsonMode, getEnvVerboseMode } from '../config/index.js';
import { setLogLevel } from '../utils/logger.js';
import type { CliOptions, CommandResult } from './types.js';
import { failure, ExitCode } from './types.js';
import { parseArgs } from './parser.js';
import { getFormatter, getOutputMode } from './formatter.js';
import { helpCommand, versionCommand } from './commands/help.js';
import { createSproutCommand, defaultCommandContext, type CommandContext } from './commands/create.js';

// ============================================================================
// Runner
// ============================================================================

/**
 * Runs the CLI with the given arguments and returns the exit code
 */
export async function run(argv: string[], context: CommandContext = defaultCommandContext()): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    return ExitCode.INVALID_ARGUMENTS;
  }

  const { args } = parsed;
  const options: CliOptions = {
    ...parsed.options,
    json: parsed.options.json || getEnvJsonMode(context.env) === true,
    verbose: parsed.options.verbose || getEnvVerboseMode(context.env) === true,
  };

  if (options.verbose) {
    setLogLevel('DEBUG');
  }

  if (options.version) {
    return outputResult(await versionCommand.handler([], options), options);
  }

  if (options.help) {
    return outputResult(await helpCommand.handler([], options), options);
  }

  // Bare `sprout`: show usage, but as a usage error
  if (args.length === 0 && options.branch === undefined) {
    const help = await helpCommand.handler([], options);
    if (help.message) {
      console.error(help.message);
    }
    return ExitCode.INVALID_ARGUMENTS;
  }

  const command = createSproutCommand(context);
  try {
    const result = await command.handler(args, options);
    return outputResult(result, options);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return outputResult(failure(message, ExitCode.GENERAL_ERROR), options);
  }
}

// ============================================================================
// Output
// ============================================================================

/**
 * Outputs a command result and returns the exit code.
 *
 * JSON output always goes to stdout. In the other modes a failed run still
 * prints whatever summary it produced, then the error on stderr.
 */
function outputResult(result: CommandResult, options: CliOptions): number {
  const mode = getOutputMode(options);
  const formatter = getFormatter(mode);

  if (result.error === undefined) {
    const output = formatter.success(result);
    if (output) {
      console.log(output);
    }
    return result.exitCode;
  }

  if (options.json) {
    console.log(formatter.error(result));
    return result.exitCode;
  }

  const summary = formatter.success(result);
  if (summary) {
    console.log(summary);
  }
  console.error(formatter.error(result));
  return result.exitCode;
}

// ============================================================================
// CLI Entry Point
// ============================================================================

/**
 * Main CLI entry point
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<never> {
  const exitCode = await run(argv);
  process.exit(exitCode);
}
