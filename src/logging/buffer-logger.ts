/**
 * Buffer Logger implementation
 * For testing - stores events in memory without output
 */

import { shouldLog, getEventLevel } from '../types/logger';
import type {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
} from '../types/logger';

export class BufferLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  private events: LogEvent[];

  constructor(options: LoggerOptions = {}, events: LogEvent[] = []) {
    this.minLevel = options.minLevel ?? 'debug'; // Capture all by default for testing
    this.events = events;
  }

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

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Child loggers share the parent's buffer
   */
  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new BufferLogger({ minLevel: this.minLevel }, this.events);
    childLogger.context = { ...this.context, ...additionalContext };
    return childLogger;
  }

  clear(): void {
    this.events.length = 0;
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

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    this.events.push({
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message,
      metadata: { ...this.context, ...metadata },
    });
  }
}

export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
