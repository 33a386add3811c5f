/**
 * Reporting and process termination
 *
 * The last step of a failing run: print the carried message, if any, and
 * hand the code to the operating system.
 */

import { ExitCode } from '../code/exit-code';
import { formatExitCode, describeExitCode } from '../code/describe';
import { resolveExitOptions } from '../config/exit-options';
import type { ExitOptions, ResolvedExitOptions } from '../config/exit-options';
import { isOk } from '../types/result';
import type { ExitResult } from './exit';

function writeMessage(message: string, options: ResolvedExitOptions): void {
  const { stderr } = options;
  const onError = (error: unknown): void => {
    options.logger?.event('message_write_failed', 'Could not write exit message', {
      error: error instanceof Error ? error.message : String(error),
    });
  };

  // Best effort: a closed stderr must not change the reported code, whether
  // the write throws or the stream emits 'error' after it returns.
  stderr.once?.('error', onError);
  try {
    stderr.write(`${message}\n`, (error) => {
      if (!error) {
        stderr.removeListener?.('error', onError);
      }
    });
  } catch (error) {
    stderr.removeListener?.('error', onError);
    onError(error);
  }
}

function reportResolved(result: ExitResult, options: ResolvedExitOptions): ExitCode {
  if (isOk(result)) {
    options.logger?.event('exit_reported', 'Exiting successfully', { code: 0, codeName: 'SUCCESS' });
    return ExitCode.SUCCESS;
  }

  const failure = result.error;
  if (failure.hasMessage()) {
    writeMessage(failure.message, options);
  }

  let code = failure.code;
  if (options.portable && !code.isPortable()) {
    options.logger?.event(
      'exit_code_substituted',
      `Exit code ${code.raw()} is not portable, using ${formatExitCode(options.fallback)}`,
      { code: code.raw(), fallback: options.fallback.raw() }
    );
    code = options.fallback;
  }

  options.logger?.event('exit_reported', `Exiting with ${formatExitCode(code)}`, {
    code: code.raw(),
    codeName: describeExitCode(code),
  });
  return code;
}

/**
 * Print the message of a failed result to stderr and return its code.
 * Success returns SUCCESS and prints nothing.
 */
export function report(result: ExitResult, options: ExitOptions = {}): ExitCode {
  return reportResolved(result, resolveExitOptions(options));
}

/**
 * Report the result, then end the process with its code
 */
export function exit(result: ExitResult, options: ExitOptions = {}): never {
  const resolved = resolveExitOptions(options);
  const code = reportResolved(result, resolved);
  return code.processExit({ fallback: resolved.fallback, terminator: resolved.terminator });
}
