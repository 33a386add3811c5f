/**
 * ProcessTerminator interface
 * Abstracts the final process exit so the reporting path can be tested
 * without ending the test runner.
 */

export interface ProcessTerminator {
  /**
   * End the current process with the given numeric status
   * @param status - Portable (0-255) exit status
   */
  terminate(status: number): never;
}

/**
 * Destination for the one-line failure message
 * `process.stderr` and any other Writable satisfy this interface. Streams
 * report failed writes through an 'error' event rather than by throwing.
 */
export interface ErrorSink {
  write(chunk: string, callback?: (error?: Error | null) => void): unknown;
  once?(event: 'error', listener: (error: Error) => void): unknown;
  removeListener?(event: 'error', listener: (error: Error) => void): unknown;
}
