/**
 * BSD sysexits(3) codes
 *
 * A finer-grained taxonomy of why a program failed, occupying 64-78.
 */

import { ExitCode } from './exit-code';

/** The sysexits spelling of success. */
export const OK = ExitCode.SUCCESS;

/**
 * The command was used incorrectly: wrong number of arguments, a bad flag,
 * bad syntax in a parameter, or whatever.
 */
export const USAGE_ERR = new ExitCode(64);

/**
 * The input data was incorrect in some way. This should only be used for
 * user's data and not system files.
 */
export const DATA_ERR = new ExitCode(65);

/**
 * An input file (not a system file) did not exist or was not readable.
 */
export const NO_INPUT = new ExitCode(66);

/** The user specified did not exist. */
export const NO_USER = new ExitCode(67);

/** The host specified did not exist. */
export const NO_HOST = new ExitCode(68);

/**
 * A service is unavailable. This can occur if a support program or file
 * does not exist.
 */
export const SERVICE_UNAVAILABLE = new ExitCode(69);

/** An internal software error has been detected. */
export const SOFTWARE_ERR = new ExitCode(70);

/**
 * An operating system error has been detected, such as "cannot fork" or
 * "cannot create pipe".
 */
export const OS_ERR = new ExitCode(71);

/**
 * Some system file (e.g. /etc/passwd) does not exist, cannot be opened, or
 * has some sort of error.
 */
export const OS_FILE_ERR = new ExitCode(72);

/** A (user specified) output file cannot be created. */
export const CANT_CREAT = new ExitCode(73);

/** An error occurred while doing I/O on some file. */
export const IO_ERR = new ExitCode(74);

/**
 * Temporary failure, indicating something that is not really an error.
 * The user is invited to retry later.
 */
export const TEMP_FAIL = new ExitCode(75);

/** The remote system returned something that was "not possible". */
export const PROTOCOL_ERR = new ExitCode(76);

/**
 * Insufficient permission to perform the operation. Not for file system
 * problems, which use NO_INPUT or CANT_CREAT.
 */
export const NO_PERM = new ExitCode(77);

/** Something was found in an unconfigured or misconfigured state. */
export const CONFIG_ERR = new ExitCode(78);

/**
 * All sysexits failure codes by name, in ascending order
 */
export const SYSEXITS = {
  USAGE_ERR,
  DATA_ERR,
  NO_INPUT,
  NO_USER,
  NO_HOST,
  SERVICE_UNAVAILABLE,
  SOFTWARE_ERR,
  OS_ERR,
  OS_FILE_ERR,
  CANT_CREAT,
  IO_ERR,
  TEMP_FAIL,
  PROTOCOL_ERR,
  NO_PERM,
  CONFIG_ERR,
} as const;

export type SysexitsName = keyof typeof SYSEXITS;
