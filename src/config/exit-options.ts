/**
 * Exit options resolution
 * Caller options > defaults, validated once at the entry point
 */

import { ExitCode } from '../code/exit-code';
import type { Logger } from '../types/logger';
import type { ErrorSink, ProcessTerminator } from '../types/process-terminator';
import { nodeProcessTerminator } from '../process/node-process-terminator';
import { validateExitOptions } from '../schemas/validators';

/**
 * Options accepted by report, exit and runMain
 */
export interface ExitOptions {
  /**
   * Replace non-portable codes with the fallback as soon as they are
   * reported, instead of only when the process terminates
   */
  portable?: boolean;
  /** Code used when the carried one is outside 0-255 (default: FAILURE) */
  fallback?: ExitCode;
  /** Where the failure message is written (default: process.stderr) */
  stderr?: ErrorSink;
  /** Receives diagnostic events; nothing is logged without one */
  logger?: Logger;
  /** Ends the process (default: process.exit) */
  terminator?: ProcessTerminator;
}

export interface ResolvedExitOptions {
  portable: boolean;
  fallback: ExitCode;
  stderr: ErrorSink;
  logger: Logger | undefined;
  terminator: ProcessTerminator;
}

export const DEFAULT_EXIT_OPTIONS = {
  portable: false,
  fallback: ExitCode.DEFAULT,
} as const;

/**
 * Merge caller options over the defaults.
 * Throws a TypeError when the options are malformed (a programming error).
 */
export function resolveExitOptions(options: ExitOptions = {}): ResolvedExitOptions {
  const validation = validateExitOptions(options);
  if (!validation.success) {
    throw new TypeError(`Invalid exit options: ${(validation.errors ?? []).join('; ')}`);
  }

  return {
    portable: options.portable ?? DEFAULT_EXIT_OPTIONS.portable,
    fallback: options.fallback ?? DEFAULT_EXIT_OPTIONS.fallback,
    stderr: options.stderr ?? process.stderr,
    logger: options.logger,
    terminator: options.terminator ?? nodeProcessTerminator,
  };
}
