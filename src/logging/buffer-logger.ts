/**
 * In-memory logger for tests
 *
 * Children write into the parent's buffer, so a test holding the root logger
 * sees every event of a parse, whichever command logged it.
 */

import { LogEvent, LogEventType, LogLevel, LoggerOptions } from '../types/logger';
import { BaseLogger } from './base-logger';

export class BufferLogger extends BaseLogger {
  private readonly events: LogEvent[];

  constructor(options: LoggerOptions = {}, events: LogEvent[] = []) {
    super(options, 'debug');
    this.events = events;
  }

  protected emit(event: LogEvent): void {
    this.events.push(event);
  }

  protected spawn(): BufferLogger {
    return new BufferLogger(this.options, this.events);
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  clear(): void {
    this.events.length = 0;
  }

  getEventsByLevel(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }

  hasEventType(eventType: LogEventType): boolean {
    return this.events.some((e) => e.eventType === eventType);
  }

  getLastEvent(): LogEvent | undefined {
    return this.events[this.events.length - 1];
  }
}

export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
