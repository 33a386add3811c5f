/**
 * I/O error to exit code mappings
 *
 * Two partial tables, one per convention, combined into a total
 * classification: sysexits first, then the signal a shell would have
 * reported, then a generic fallback.
 */

import { ExitCode } from '../code/exit-code';
import {
  CANT_CREAT,
  DATA_ERR,
  IO_ERR,
  NO_INPUT,
  NO_PERM,
  OS_FILE_ERR,
  PROTOCOL_ERR,
  SERVICE_UNAVAILABLE,
} from '../code/sysexits';
import { SIGALRM, SIGINT, SIGPIPE } from '../code/bash';
import { ioErrorKind } from './io-error-kind';
import type { IoErrorKind } from './io-error-kind';

/**
 * Sysexits code for an I/O error kind, if the taxonomy has one
 */
export function ioToSysexits(kind: IoErrorKind): ExitCode | undefined {
  switch (kind) {
    case 'not-found':
      return OS_FILE_ERR;
    case 'permission-denied':
      return NO_PERM;
    case 'connection-refused':
    case 'connection-reset':
    case 'connection-aborted':
    case 'not-connected':
      return PROTOCOL_ERR;
    case 'addr-in-use':
    case 'addr-not-available':
      return SERVICE_UNAVAILABLE;
    case 'already-exists':
      return CANT_CREAT;
    case 'invalid-input':
    case 'invalid-data':
    case 'unexpected-eof':
      return DATA_ERR;
    case 'write-zero':
      return NO_INPUT;
    default:
      return undefined;
  }
}

/**
 * Signal-equivalent code for an I/O error kind, if it behaves like one
 */
export function ioToSignal(kind: IoErrorKind): ExitCode | undefined {
  switch (kind) {
    case 'broken-pipe':
      return SIGPIPE;
    case 'timed-out':
      return SIGALRM;
    case 'interrupted':
      return SIGINT;
    default:
      return undefined;
  }
}

/**
 * Exit code for an I/O error kind. Defined for every kind.
 */
export function classifyIoErrorKind(kind: IoErrorKind): ExitCode {
  const code = ioToSysexits(kind) ?? ioToSignal(kind);
  if (code) {
    return code;
  }
  return kind === 'other' ? ExitCode.FAILURE : IO_ERR;
}

/**
 * Exit code for a thrown I/O error (a Node.js ErrnoException or anything else)
 */
export function fromIoError(error: unknown): ExitCode {
  return classifyIoErrorKind(ioErrorKind(error));
}
