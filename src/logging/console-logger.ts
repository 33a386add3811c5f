/**
 * Console Logger implementation
 * Structured events written through console.*
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

export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  private events: LogEvent[] = [];
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.options = {
      includeTimestamp: true,
      jsonOutput: false,
      ...options,
    };
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

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new ConsoleLogger(this.options);
    childLogger.context = { ...this.context, ...additionalContext };
    childLogger.setMinLevel(this.minLevel);
    return childLogger;
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

    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message,
      metadata: { ...this.context, ...metadata },
    };

    this.events.push(event);
    this.output(event);
  }

  private output(event: LogEvent): void {
    const line = this.options.jsonOutput ? JSON.stringify(event) : this.formatPretty(event);

    if (event.level === 'error') {
      console.error(line);
    } else if (event.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private formatPretty(event: LogEvent): string {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      const time = new Date(event.timestamp).toLocaleTimeString();
      parts.push(`[${time}]`);
    }

    parts.push(event.level.toUpperCase());

    // Event type (if not a basic level)
    if (event.eventType !== event.level) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const { code, codeName } = event.metadata;
    if (code !== undefined) {
      parts.push(codeName ? `{code=${code} ${codeName}}` : `{code=${code}}`);
    }

    return parts.join(' ');
  }
}

export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
