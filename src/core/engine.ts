/**
 * Parsing Engine
 *
 * Walks a token window left to right for one command. Flags are resolved
 * against the command's optionals, plain tokens fill positional slots in
 * declared order, and once every slot is filled a plain token may name a
 * subcommand, which then owns the rest of the window.
 *
 * The engine neither logs nor exits. It returns the number of tokens consumed
 * or the first error, leaving already-written values in place.
 */

import { Command } from '../command/command';
import { ArgumentSpec, OptionalFlag, ConsumeError, consume, displayName } from '../arguments/argument';
import { ParseError, createParseError } from '../types/parse-error';
import { Result, ok, err, map, mapErr } from '../types/result';

export type TokenClass = 'end-of-options' | 'long' | 'short' | 'positional';

/**
 * State shared by every command invocation of one parse
 */
export interface EngineContext {
  /** Names of the commands entered so far, root first */
  path: string[];
  /** Commands entered so far, root first */
  trail: Command[];
  /** A lone `--` has been seen; nothing after it is a flag */
  optionsEnded: boolean;
}

export function createEngineContext(root: Command): EngineContext {
  return { path: [root.name], trail: [root], optionsEnded: false };
}

const NEGATIVE_NUMBER = /^-(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Decide how a token is read by `command`
 */
export function classifyToken(token: string, command: Command, optionsEnded: boolean): TokenClass {
  if (optionsEnded) {
    return 'positional';
  }
  if (token === '--') {
    return 'end-of-options';
  }
  if (token.startsWith('--')) {
    return 'long';
  }
  if (token.startsWith('-') && token !== '-') {
    if (NEGATIVE_NUMBER.test(token) && !command.hasDigitShortFlag()) {
      return 'positional';
    }
    return 'short';
  }
  return 'positional';
}

/**
 * Tokens from `start` up to (not including) the next token that is not
 * positional. This is what a value or list is allowed to consume.
 */
function valueWindow(
  window: readonly string[],
  start: number,
  command: Command,
  context: EngineContext
): readonly string[] {
  let end = start;
  while (end < window.length && classifyToken(window[end], command, context.optionsEnded) === 'positional') {
    end += 1;
  }
  return window.slice(start, end);
}

function toParseError(
  error: ConsumeError,
  spec: ArgumentSpec,
  trigger: string,
  context: EngineContext
): ParseError {
  const argument = displayName(spec);
  const commandPath = [...context.path];
  switch (error.code) {
    case 'MISSING_VALUE':
      return createParseError('MISSING_VALUE', { commandPath, token: trigger, argument });
    case 'CONVERSION_FAILURE':
      return createParseError('CONVERSION_FAILURE', {
        commandPath,
        token: error.token,
        argument,
        reason: error.reason,
      });
  }
}

/**
 * Hand the tokens after a matched flag to its spec.
 * Resolves to the number of window positions to advance, flag included.
 */
function delegate(
  spec: ArgumentSpec,
  window: readonly string[],
  index: number,
  command: Command,
  context: EngineContext
): Result<number, ParseError> {
  const available = spec.kind === 'flag' ? [] : valueWindow(window, index + 1, command, context);
  const consumed = mapErr(consume(spec, available), (error) =>
    toParseError(error, spec, window[index], context)
  );
  return map(consumed, (count) => 1 + count);
}

function parseLong(
  command: Command,
  window: readonly string[],
  index: number,
  context: EngineContext
): Result<number, ParseError> {
  const token = window[index];
  const body = token.slice(2);
  const eq = body.indexOf('=');
  const name = eq === -1 ? body : body.slice(0, eq);

  const spec = command.findLong(name);
  if (!spec) {
    return err(createParseError('UNKNOWN_OPTION', { commandPath: [...context.path], token: `--${name}` }));
  }
  if (eq === -1) {
    return delegate(spec, window, index, command, context);
  }

  // --name=value
  const inline = body.slice(eq + 1);
  if (spec.kind === 'flag') {
    return err(
      createParseError('UNEXPECTED_VALUE', { commandPath: [...context.path], token, argument: `--${name}` })
    );
  }
  const consumed = mapErr(consume(spec, inline === '' ? [] : [inline]), (error) =>
    toParseError(error, spec, token, context)
  );
  return map(consumed, () => 1);
}

function parseShort(
  command: Command,
  window: readonly string[],
  index: number,
  context: EngineContext
): Result<number, ParseError> {
  const token = window[index];
  const chars = [...token.slice(1)];

  if (chars.length === 1) {
    const spec = command.findShort(chars[0]);
    if (!spec) {
      return err(createParseError('UNKNOWN_OPTION', { commandPath: [...context.path], token }));
    }
    return delegate(spec, window, index, command, context);
  }

  // -xyz: every character must be a flag; resolve all before counting any
  const flags: OptionalFlag[] = [];
  for (const char of chars) {
    const spec = command.findShort(char);
    if (!spec) {
      return err(
        createParseError(
          'UNKNOWN_OPTION',
          { commandPath: [...context.path], token },
          `Unknown option: -${char} (in ${token})`
        )
      );
    }
    if (spec.kind !== 'flag') {
      return err(
        createParseError('AMBIGUOUS_SHORT_GROUP', {
          commandPath: [...context.path],
          token,
          argument: displayName(spec),
        })
      );
    }
    flags.push(spec);
  }
  for (const flag of flags) {
    consume(flag, []);
  }
  return ok(1);
}

/**
 * Parse `window` against `command`.
 *
 * Resolves to the number of tokens consumed. Entering a subcommand hands it
 * the rest of the window, so a successful call always consumes everything.
 */
export function parseCommand(
  command: Command,
  window: readonly string[],
  context: EngineContext
): Result<number, ParseError> {
  let index = 0;

  while (index < window.length) {
    const token = window[index];
    const kind = classifyToken(token, command, context.optionsEnded);
    let step: Result<number, ParseError>;

    if (kind === 'end-of-options') {
      context.optionsEnded = true;
      step = ok(1);
    } else if (kind === 'long') {
      step = parseLong(command, window, index, context);
    } else if (kind === 'short') {
      step = parseShort(command, window, index, context);
    } else {
      const slot = command.nextUnsatisfied();
      if (!slot) {
        const child = command.findCommand(token);
        if (!child) {
          return err(createParseError('UNEXPECTED_TOKEN', { commandPath: [...context.path], token }));
        }
        context.path.push(child.name);
        context.trail.push(child);
        const start = index + 1;
        return map(parseCommand(child, window.slice(start), context), (count) => start + count);
      }
      const available = valueWindow(window, index, command, context);
      step = mapErr(consume(slot, available), (error) => toParseError(error, slot, token, context));
    }

    if (!step.ok) {
      return step;
    }
    index += step.value;
  }

  const missing = command.nextUnsatisfied();
  if (missing) {
    return err(
      createParseError('UNSATISFIED_REQUIRED', {
        commandPath: [...context.path],
        argument: displayName(missing),
      })
    );
  }
  return ok(index);
}
