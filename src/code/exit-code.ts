/**
 * Process exit code value type
 *
 * Wraps the raw integer handed to the operating system when the process
 * ends. Any integer can be represented; only 0-255 survives on every
 * platform (Unix keeps the low 8 bits, Windows keeps 32).
 */

import type { ProcessTerminator } from '../types/process-terminator';
import { nodeProcessTerminator } from '../process/node-process-terminator';
import { isReservedRaw } from './reserved';

const PORTABLE_MIN = 0;
const PORTABLE_MAX = 255;

/**
 * Options for terminating the process with an exit code
 */
export interface ProcessExitOptions {
  /** Code used when this one is outside the portable range */
  fallback?: ExitCode;
  /** Terminator to use instead of process.exit */
  terminator?: ProcessTerminator;
}

export class ExitCode {
  /** The process exited successfully. */
  static readonly SUCCESS = new ExitCode(0);

  /** Generic failure. */
  static readonly FAILURE = new ExitCode(1);

  /** Catch-all code when the process exits for an unknown reason. */
  static readonly UNKNOWN = new ExitCode(2);

  /**
   * Code substituted when another one cannot be represented.
   * Never SUCCESS, so coercion cannot turn a failure into a success.
   */
  static readonly DEFAULT = ExitCode.FAILURE;

  private readonly value: number;

  constructor(raw: number) {
    if (!Number.isInteger(raw)) {
      throw new RangeError(`Exit code must be an integer, got ${raw}`);
    }
    this.value = raw;
  }

  static from(raw: number): ExitCode {
    return new ExitCode(raw);
  }

  raw(): number {
    return this.value;
  }

  /**
   * Whether the code survives on every supported platform
   */
  isPortable(): boolean {
    return PORTABLE_MIN <= this.value && this.value <= PORTABLE_MAX;
  }

  /**
   * This code when it is portable, otherwise undefined
   */
  coerce(): ExitCode | undefined {
    return this.isPortable() ? this : undefined;
  }

  /**
   * The raw value narrowed to the 0-255 range, or undefined
   */
  asPortable(): number | undefined {
    return this.isPortable() ? this.value : undefined;
  }

  /**
   * The status to hand to the operating system
   */
  toPortable(fallback: ExitCode = ExitCode.DEFAULT): number {
    return this.asPortable() ?? fallback.raw();
  }

  isSuccess(): boolean {
    return this.value === 0;
  }

  isFailure(): boolean {
    return !this.isSuccess();
  }

  /**
   * Whether the code collides with a generic, sysexits or shell convention.
   * Application-specific codes should pick values for which this is false.
   */
  isReserved(): boolean {
    return isReservedRaw(this.value);
  }

  equals(other: ExitCode): boolean {
    return this.value === other.value;
  }

  /**
   * End the process with this code. Out-of-range codes are replaced by the
   * fallback only here.
   */
  processExit(options: ProcessExitOptions = {}): never {
    const terminator = options.terminator ?? nodeProcessTerminator;
    return terminator.terminate(this.toPortable(options.fallback));
  }

  valueOf(): number {
    return this.value;
  }

  toString(): string {
    return String(this.value);
  }

  toJSON(): number {
    return this.value;
  }
}

/**
 * Fallback used wherever a code is not representable
 */
export const DEFAULT_FALLBACK: ExitCode = ExitCode.DEFAULT;
