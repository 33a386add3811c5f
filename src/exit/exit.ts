/**
 * Exit error wrapper
 *
 * Couples an exit code with an optional message for the user. An Exit is
 * created where a failure is first observed and travels unchanged up to
 * the entry point, usually as the error side of an ExitResult.
 */

import { ExitCode } from '../code/exit-code';
import { ok, err } from '../types/result';
import type { Result } from '../types/result';
import { fromIoError } from '../io/classify-io-error';
import { getErrnoCode } from '../io/io-error-kind';

/**
 * Anything that can be rendered as message text
 */
export type Displayable = string | Error | { toString(): string };

export type ExitResult = Result<void, Exit>;

/**
 * Render a displayable value. Errors render as their message, without the
 * "Error: " prefix of Error.prototype.toString.
 */
export function renderDisplayable(value: Displayable): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Error) {
    return value.message;
  }
  return value.toString();
}

export class Exit extends Error {
  readonly code: ExitCode;
  readonly detail: Displayable | undefined;

  constructor(code: ExitCode, message?: Displayable) {
    if (code.isSuccess()) {
      throw new RangeError('An Exit cannot carry the success code (0)');
    }
    super(message === undefined ? '' : renderDisplayable(message));
    this.name = 'Exit';
    this.code = code;
    this.detail = message;
  }

  /**
   * Same code, message replaced
   */
  withMessage(message: Displayable): Exit {
    return new Exit(this.code, message);
  }

  hasMessage(): boolean {
    return this.detail !== undefined;
  }

  /**
   * The message alone; the code is communicated through the exit status
   */
  override toString(): string {
    return this.message;
  }

  /**
   * Wrap any failure with a caller-chosen code, keeping its text as message
   */
  static fromError(error: unknown, code: ExitCode): Exit {
    return new Exit(code, toDisplayable(error));
  }

  /**
   * Wrap an I/O failure, deriving the code from its errno
   */
  static fromIoError(error: unknown): Exit {
    return new Exit(fromIoError(error), toDisplayable(error));
  }
}

function toDisplayable(value: unknown): Displayable {
  if (value instanceof Error || typeof value === 'string') {
    return value;
  }
  return String(value);
}

/**
 * Success for SUCCESS, otherwise an Exit without a message
 */
export function resultFromCode(code: ExitCode): ExitResult {
  return code.isSuccess() ? ok() : err(new Exit(code));
}

/**
 * An Exit for a failing code, carrying a message
 */
export function exitWithMessage(code: ExitCode, message: Displayable): Exit {
  return new Exit(code, message);
}

/**
 * Normalize anything thrown into an Exit.
 * Exits pass through, errors carrying an errno are classified as I/O
 * failures, everything else becomes a generic FAILURE.
 */
export function toExit(thrown: unknown): Exit {
  if (thrown instanceof Exit) {
    return thrown;
  }
  if (getErrnoCode(thrown) !== undefined) {
    return Exit.fromIoError(thrown);
  }
  return Exit.fromError(thrown, ExitCode.FAILURE);
}
