/**
 * IO module - classification of I/O failures
 */

export {
  ioErrorKind,
  errnoToIoErrorKind,
  getErrnoCode,
  isErrnoException,
} from './io-error-kind';
export type { IoErrorKind, ErrnoException } from './io-error-kind';
export { ioToSysexits, ioToSignal, classifyIoErrorKind, fromIoError } from './classify-io-error';
