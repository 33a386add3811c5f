/**
 * Adapters from ordinary failures to Exit results
 */

import type { ExitCode } from '../code/exit-code';
import { ok, err, mapErr } from '../types/result';
import type { Result } from '../types/result';
import { Exit } from './exit';
import type { Displayable } from './exit';

/**
 * Attach an exit code to the error side of a result; the error's text
 * becomes the message
 */
export function withCode<T, E extends Displayable>(
  result: Result<T, E>,
  code: ExitCode
): Result<T, Exit> {
  return mapErr(result, (error) => new Exit(code, error));
}

/**
 * Classify the error side of a result as an I/O failure
 */
export function toSysexits<T>(result: Result<T, unknown>): Result<T, Exit> {
  return mapErr(result, (error) => Exit.fromIoError(error));
}

/**
 * Run a throwing (or rejecting) operation and capture its failure as an Exit
 * with the given code. Exits thrown by the operation keep their own code.
 */
export async function withCodeAsync<T>(
  work: Promise<T> | (() => T | Promise<T>),
  code: ExitCode
): Promise<Result<T, Exit>> {
  try {
    const value = typeof work === 'function' ? await work() : await work;
    return ok(value);
  } catch (error) {
    if (error instanceof Exit) {
      return err(error);
    }
    return err(Exit.fromError(error, code));
  }
}
