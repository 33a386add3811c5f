import { ExitCode } from './exit-code';
import { SYSEXITS } from './sysexits';
import {
  NOT_EXECUTABLE,
  NOT_FOUND,
  INVALID_EXIT,
  STATUS_OUT_OF_RANGE,
  SIGNALS,
} from './bash';

// First name wins: 2 is UNKNOWN rather than bash USAGE.
const NAMED_CODES: ReadonlyArray<readonly [string, ExitCode]> = [
  ['SUCCESS', ExitCode.SUCCESS],
  ['FAILURE', ExitCode.FAILURE],
  ['UNKNOWN', ExitCode.UNKNOWN],
  ...Object.entries(SYSEXITS),
  ['NOT_EXECUTABLE', NOT_EXECUTABLE],
  ['NOT_FOUND', NOT_FOUND],
  ['INVALID_EXIT', INVALID_EXIT],
  ...Object.entries(SIGNALS),
  ['STATUS_OUT_OF_RANGE', STATUS_OUT_OF_RANGE],
];

/**
 * Catalog name of a code, or undefined for application-specific codes
 */
export function describeExitCode(code: ExitCode): string | undefined {
  const match = NAMED_CODES.find(([, named]) => named.equals(code));
  return match?.[0];
}

/**
 * Human-readable label such as "NO_PERM (77)" or "42"
 */
export function formatExitCode(code: ExitCode): string {
  const name = describeExitCode(code);
  return name ? `${name} (${code.raw()})` : code.toString();
}
