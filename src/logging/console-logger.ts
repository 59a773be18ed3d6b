/**
 * Console Logger implementation
 * Pretty or JSON-lines output, warnings and errors to stderr
 */

import { Logger, LogLevel, LogEvent, LoggerOptions } from '../types/logger';
import { BaseLogger } from './base-logger';

/**
 * Where rendered lines go. Defaults to the console.
 */
export interface ConsoleSink {
  out(line: string): void;
  err(line: string): void;
}

export interface ConsoleLoggerOptions extends LoggerOptions {
  sink?: ConsoleSink;
}

const defaultSink: ConsoleSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'debug',
  info: 'info ',
  warn: 'warn ',
  error: 'error',
};

const BASIC_EVENT_TYPES: ReadonlySet<string> = new Set(['debug', 'info', 'warn', 'error']);

export class ConsoleLogger extends BaseLogger<ConsoleLoggerOptions> {
  private readonly events: LogEvent[] = [];
  private readonly sink: ConsoleSink;

  constructor(options: ConsoleLoggerOptions = {}) {
    super(options, 'warn');
    this.sink = options.sink ?? defaultSink;
  }

  protected emit(event: LogEvent): void {
    this.events.push(event);
    const line = this.options.jsonOutput ? JSON.stringify(event) : this.formatPretty(event);
    if (event.level === 'error' || event.level === 'warn') {
      this.sink.err(line);
    } else {
      this.sink.out(line);
    }
  }

  protected spawn(): ConsoleLogger {
    return new ConsoleLogger(this.options);
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  private formatPretty(event: LogEvent): string {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      parts.push(`[${event.timestamp}]`);
    }
    parts.push(LEVEL_LABELS[event.level]);
    if (!BASIC_EVENT_TYPES.has(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }
    parts.push(event.message);

    // command and token only; the rest is for JSON output
    const { command, token } = event.metadata;
    const meta: string[] = [];
    if (command) meta.push(`command=${command}`);
    if (token !== undefined) meta.push(`token=${JSON.stringify(token)}`);
    if (meta.length > 0) {
      parts.push(`{${meta.join(', ')}}`);
    }

    return parts.join(' ');
  }
}

export function createConsoleLogger(options?: ConsoleLoggerOptions): Logger {
  return new ConsoleLogger(options);
}
