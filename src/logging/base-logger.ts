/**
 * Shared logger behaviour: level filtering, context merging and redaction.
 * Subclasses decide where a finished event goes.
 *
 * Messages are emitted verbatim; string metadata such as the logged argv is
 * redacted.
 */

import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  shouldLog,
  getEventLevel,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from '../types/logger';

export abstract class BaseLogger<O extends LoggerOptions = LoggerOptions> implements Logger {
  protected minLevel: LogLevel;
  protected context: Partial<LogMetadata> = {};
  protected readonly options: O;
  private readonly redactPatterns: RegExp[];

  protected constructor(options: O, defaultLevel: LogLevel) {
    this.options = options;
    this.minLevel = options.minLevel ?? defaultLevel;
    this.redactPatterns = options.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
  }

  /** Deliver an event that passed the level filter */
  protected abstract emit(event: LogEvent): void;

  /** A logger of the same kind and destination, without context */
  protected abstract spawn(): BaseLogger<O>;

  abstract getEvents(): LogEvent[];

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(getEventLevel(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const child = this.spawn();
    child.setContext({ ...this.context, ...additionalContext });
    child.setMinLevel(this.minLevel);
    return child;
  }

  private log(level: LogLevel, eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }
    this.emit({
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message,
      metadata: this.mergeMetadata(metadata),
    });
  }

  private mergeMetadata(metadata?: LogMetadata): LogMetadata {
    const merged: LogMetadata = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = redactSecrets(value, this.redactPatterns);
      }
    }
    return merged;
  }
}
