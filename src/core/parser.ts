/**
 * Root of a command tree
 *
 * A Parser is the root Command plus the parse entry point. It folds the
 * engine's token count into success/failure and reports the commands that
 * were entered, so callers can show help for the right one.
 */

import { Command } from '../command/command';
import { createEngineContext, parseCommand } from './engine';
import { ParseError, RegistrationError } from '../types/parse-error';
import { Logger } from '../types/logger';
import { createConsoleLogger } from '../logging/console-logger';
import {
  ParserSettings,
  ParserSettingsInput,
  validateParserSettings,
} from '../schemas/validators';

export interface ParserOptions extends ParserSettingsInput {
  /** Receives parse lifecycle events; defaults to a console logger at `warn` */
  logger?: Logger;
}

interface ParseOutcome {
  /** Deepest command reached */
  command: Command;
  /** Every command entered, root first */
  trail: readonly Command[];
  /** Names along `trail` */
  path: readonly string[];
}

export type ParseResult =
  | (ParseOutcome & { success: true })
  | (ParseOutcome & { success: false; error: ParseError });

function resolveSettings(options: ParserOptions): ParserSettings {
  // Unknown keys such as `logger` are stripped by the schema
  const validation = validateParserSettings(options);
  if (!validation.success) {
    throw new RegistrationError(
      'INVALID_OPTIONS',
      `Invalid parser options: ${validation.errors.join(', ')}`
    );
  }
  return validation.data;
}

export class Parser extends Command {
  readonly logger: Logger;
  private readonly skipProgramName: boolean;
  private parsed: boolean;

  constructor(options: ParserOptions) {
    const settings = resolveSettings(options);
    super(settings.programName, settings.description, { addHelp: settings.addHelp });
    this.skipProgramName = settings.skipProgramName;
    this.logger = (options.logger ?? createConsoleLogger()).child({ program: settings.programName });
    this.parsed = false;
  }

  /**
   * Parse an argument vector. A tree accumulates values, so it can only be
   * parsed once.
   */
  parse(argv: readonly string[]): ParseResult {
    if (this.parsed) {
      throw new Error('Parser has already parsed arguments; build a new tree to parse again');
    }
    this.parsed = true;

    const tokens = this.skipProgramName ? argv.slice(1) : [...argv];
    this.logger.event('parse_started', `Parsing ${tokens.length} argument(s)`, {
      command: this.name,
      argv: tokens.join(' '),
    });

    const context = createEngineContext(this);
    const result = parseCommand(this, tokens, context);

    for (const entered of context.trail.slice(1)) {
      this.logger.event('subcommand_entered', `Entered subcommand ${entered.name}`, {
        command: entered.name,
      });
    }

    const outcome: ParseOutcome = {
      command: context.trail[context.trail.length - 1],
      trail: context.trail,
      path: context.path,
    };
    const command = context.path.join(' ');

    if (!result.ok) {
      this.logger.event('parse_failed', result.error.message, {
        command,
        token: result.error.token,
        code: result.error.code,
      });
      return { ...outcome, success: false, error: result.error };
    }

    this.logger.event('parse_completed', `Consumed ${result.value} argument(s)`, { command });
    return { ...outcome, success: true };
  }
}
