/**
 * Types module - shared interfaces and types
 */

// Result type for typed error handling
export { ok, err, isOk, isErr, map, mapErr, andThen, collect } from './result';
export type { Result, Ok, Err } from './result';

// Exit codes
export { ExitCode } from './exit-codes';

// Parse and registration errors
export { createParseError, RegistrationError } from './parse-error';
export type {
  ParseError,
  ParseErrorCode,
  ParseErrorContext,
  RegistrationErrorCode,
} from './parse-error';

// Logger interface
export {
  compareLogLevels,
  shouldLog,
  getEventLevel,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from './logger';
export type {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
} from './logger';
