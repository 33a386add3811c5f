/**
 * Logger interface
 * Structured diagnostics for the reporting path. Logging is opt-in: the
 * library only emits events when a logger is passed in its options.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types emitted while reporting an exit
 */
export type LogEventType =
  // Reporting lifecycle
  | 'exit_reported'
  | 'exit_code_substituted'
  | 'message_write_failed'
  | 'unexpected_error'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Metadata attached to every log event
 */
export interface LogMetadata {
  /** Raw exit code involved in the event */
  code?: number;
  /** Catalog name of the code, when it has one */
  codeName?: string;
  /** Additional context-specific metadata */
  [key: string]: unknown;
}

export interface LogEvent {
  /** Timestamp of the event (ISO 8601) */
  timestamp: string;
  level: LogLevel;
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Whether to use JSON format for output */
  jsonOutput?: boolean;
}

/**
 * Interface for structured logging
 * Implementations can write to the console or to a buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event; its level is derived from the event type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Get all logged events (for testing/diagnostics)
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a child logger that adds the given metadata to every event
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Compare log levels (returns positive if a > b)
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LEVEL_ORDER[a] - LEVEL_ORDER[b];
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Level an event type is logged at
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'unexpected_error':
      return 'error';
    case 'warn':
    case 'exit_code_substituted':
      return 'warn';
    case 'debug':
    case 'message_write_failed':
      return 'debug';
    default:
      return 'info';
  }
}
