/**
 * Logging module - structured logging implementations
 */

export { BaseLogger } from './base-logger';
export { ConsoleLogger, createConsoleLogger } from './console-logger';
export type { ConsoleSink, ConsoleLoggerOptions } from './console-logger';
export { BufferLogger, createBufferLogger } from './buffer-logger';
