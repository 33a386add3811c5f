/**
 * Shell exit codes, following the Bash conventions
 *
 * A process killed by signal N is reported by the shell as 128 + N.
 */

import { ExitCode } from './exit-code';

/** Misuse of shell builtins. */
export const USAGE = new ExitCode(2);

/** Command was found but is not executable by the shell. */
export const NOT_EXECUTABLE = new ExitCode(126);

/**
 * Usually indicates that the command was not found by the shell, or that
 * the command is found but a library it requires is not.
 */
export const NOT_FOUND = new ExitCode(127);

/** The command exited with a status outside of what `exit` accepts. */
export const INVALID_EXIT = new ExitCode(128);

/** Exit status out of range (`exit -1` is reported as 255). */
export const STATUS_OUT_OF_RANGE = new ExitCode(255);

export const SIGNAL_BASE = 128;

/**
 * POSIX signal numbers with a named exit code
 */
export const SIGNAL_NUMBERS = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGQUIT: 3,
  SIGILL: 4,
  SIGTRAP: 5,
  SIGABRT: 6,
  SIGFPE: 8,
  SIGKILL: 9,
  SIGSEGV: 11,
  SIGPIPE: 13,
  SIGALRM: 14,
  SIGTERM: 15,
} as const;

export type SignalName = keyof typeof SIGNAL_NUMBERS;

/**
 * Exit code a shell reports for a process terminated by the given signal
 */
export function signalExitCode(signal: number): ExitCode {
  return new ExitCode(SIGNAL_BASE + signal);
}

/** The controlling terminal was closed. */
export const SIGHUP = signalExitCode(SIGNAL_NUMBERS.SIGHUP);

/** Interrupted from the terminal (Ctrl-C). */
export const SIGINT = signalExitCode(SIGNAL_NUMBERS.SIGINT);

/** Quit from the terminal (Ctrl-\). */
export const SIGQUIT = signalExitCode(SIGNAL_NUMBERS.SIGQUIT);

/** Illegal instruction. */
export const SIGILL = signalExitCode(SIGNAL_NUMBERS.SIGILL);

/** Trace/breakpoint trap. */
export const SIGTRAP = signalExitCode(SIGNAL_NUMBERS.SIGTRAP);

/** Process abort signal. */
export const SIGABRT = signalExitCode(SIGNAL_NUMBERS.SIGABRT);

/** Erroneous arithmetic operation. */
export const SIGFPE = signalExitCode(SIGNAL_NUMBERS.SIGFPE);

/** Killed; cannot be caught or ignored. */
export const SIGKILL = signalExitCode(SIGNAL_NUMBERS.SIGKILL);

/** Invalid memory reference. */
export const SIGSEGV = signalExitCode(SIGNAL_NUMBERS.SIGSEGV);

/** Write to a pipe with no reader. */
export const SIGPIPE = signalExitCode(SIGNAL_NUMBERS.SIGPIPE);

/** Timer set by alarm(2) expired. */
export const SIGALRM = signalExitCode(SIGNAL_NUMBERS.SIGALRM);

/** Termination requested; can be caught. */
export const SIGTERM = signalExitCode(SIGNAL_NUMBERS.SIGTERM);

export const SIGNALS: Record<SignalName, ExitCode> = {
  SIGHUP,
  SIGINT,
  SIGQUIT,
  SIGILL,
  SIGTRAP,
  SIGABRT,
  SIGFPE,
  SIGKILL,
  SIGSEGV,
  SIGPIPE,
  SIGALRM,
  SIGTERM,
};

export function isSignalName(name: string): name is SignalName {
  return Object.prototype.hasOwnProperty.call(SIGNAL_NUMBERS, name);
}
