/**
 * Parse and registration errors
 */

/**
 * Parse-time error codes
 */
export type ParseErrorCode =
  | 'UNKNOWN_OPTION'
  | 'MISSING_VALUE'
  | 'CONVERSION_FAILURE'
  | 'UNSATISFIED_REQUIRED'
  | 'UNEXPECTED_TOKEN'
  | 'AMBIGUOUS_SHORT_GROUP'
  | 'UNEXPECTED_VALUE';

/**
 * A parse failure, with enough context to build a user-facing message
 */
export interface ParseError {
  code: ParseErrorCode;
  message: string;
  /** Names of the commands entered so far, root first */
  commandPath: string[];
  /** Offending token, when there is one */
  token?: string;
  /** Display name of the argument involved, e.g. "--output" or "<file>" */
  argument?: string;
  /** Why a conversion failed */
  reason?: string;
}

export interface ParseErrorContext {
  commandPath: string[];
  token?: string;
  argument?: string;
  reason?: string;
}

/**
 * Create a ParseError with the default message for its code
 */
export function createParseError(
  code: ParseErrorCode,
  context: ParseErrorContext,
  message?: string
): ParseError {
  const { token, argument, reason } = context;
  const where = context.commandPath.join(' ');
  const defaultMessages: Record<ParseErrorCode, string> = {
    UNKNOWN_OPTION: `Unknown option: ${token ?? ''}`,
    MISSING_VALUE: `${argument ?? 'Option'} requires a value`,
    CONVERSION_FAILURE: `Invalid value "${token ?? ''}" for ${argument ?? 'argument'}: ${reason ?? 'conversion failed'}`,
    UNSATISFIED_REQUIRED: `Missing required argument ${argument ?? ''} for ${where}`,
    UNEXPECTED_TOKEN: `Unexpected argument: ${token ?? ''}`,
    AMBIGUOUS_SHORT_GROUP: `${argument ?? 'Option'} takes a value and cannot be grouped in ${token ?? ''}`,
    UNEXPECTED_VALUE: `${argument ?? 'Flag'} does not take a value`,
  };

  return {
    code,
    message: message ?? defaultMessages[code],
    ...context,
  };
}

/**
 * Registration-time error codes
 */
export type RegistrationErrorCode =
  | 'DUPLICATE_ARGUMENT'
  | 'INVALID_NAME'
  | 'UNREACHABLE_ARGUMENT'
  | 'INVALID_OPTIONS';

/**
 * Thrown while building a command tree. These are programming mistakes,
 * so they abort construction instead of surfacing at parse time.
 */
export class RegistrationError extends Error {
  readonly code: RegistrationErrorCode;

  constructor(code: RegistrationErrorCode, message: string) {
    super(message);
    this.name = 'RegistrationError';
    this.code = code;
  }
}
