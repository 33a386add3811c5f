/**
 * Types module - shared interfaces and types
 */

// Result type for typed error handling
export type { Result, Ok, Err } from './result';
export { ok, err, isOk, isErr, mapErr } from './result';

// Process termination
export type { ProcessTerminator, ErrorSink } from './process-terminator';

// Logger interface
export type {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
} from './logger';
export { compareLogLevels, shouldLog, getEventLevel } from './logger';
