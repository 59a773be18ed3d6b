/**
 * Process boundary
 *
 * Folds a parse into an exit code: help when asked for, the error and usage
 * when parsing failed. Exiting is left to the caller.
 */

import { Parser, ParseResult } from '../core/parser';
import { Command } from '../command/command';
import { isFlagSet } from '../arguments/argument';
import { ExitCode } from '../types/exit-codes';
import { getHelpText } from './help';

export interface RunOptions {
  /** Help output; defaults to console.log */
  stdout?: (text: string) => void;
  /** The error, then usage; defaults to console.error */
  stderr?: (text: string) => void;
}

/**
 * Deepest entered command whose help flag was given
 */
function findHelpRequest(result: ParseResult): number {
  for (let i = result.trail.length - 1; i >= 0; i--) {
    const flag = result.trail[i].helpFlag;
    if (flag && isFlagSet(flag)) {
      return i;
    }
  }
  return -1;
}

/**
 * Parse `argv` with `parser` and map the outcome to an exit code
 *
 * @example
 * const exitCode = runParser(parser, process.argv.slice(1));
 * if (exitCode !== ExitCode.SUCCESS) process.exitCode = exitCode;
 */
export function runParser(parser: Parser, argv: readonly string[], options: RunOptions = {}): ExitCode {
  const stdout = options.stdout ?? ((text: string) => console.log(text));
  const stderr = options.stderr ?? ((text: string) => console.error(text));

  let result: ParseResult;
  try {
    result = parser.parse(argv);
  } catch (error) {
    parser.logger.error(error instanceof Error ? error.message : String(error));
    return ExitCode.UNEXPECTED_ERROR;
  }

  const helpIndex = findHelpRequest(result);
  if (helpIndex >= 0) {
    const command: Command = result.trail[helpIndex];
    const path = result.path.slice(0, helpIndex + 1);
    parser.logger.event('help_requested', `Help requested for ${path.join(' ')}`, {
      command: path.join(' '),
    });
    stdout(getHelpText(command, path));
    return ExitCode.SUCCESS;
  }

  if (!result.success) {
    parser.logger.error(result.error.message, {
      command: result.path.join(' '),
      token: result.error.token,
    });
    stderr(result.error.message);
    stderr(getHelpText(result.command, result.path));
    return ExitCode.USAGE_ERROR;
  }

  return ExitCode.SUCCESS;
}
