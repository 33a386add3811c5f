/**
 * I/O error categories
 * Platform errno codes reduced to a closed set of kinds that exit codes are
 * chosen from.
 */

export type IoErrorKind =
  | 'not-found'
  | 'permission-denied'
  | 'connection-refused'
  | 'connection-reset'
  | 'connection-aborted'
  | 'not-connected'
  | 'addr-in-use'
  | 'addr-not-available'
  | 'broken-pipe'
  | 'already-exists'
  | 'would-block'
  | 'invalid-input'
  | 'invalid-data'
  | 'timed-out'
  | 'write-zero'
  | 'interrupted'
  | 'unsupported'
  | 'unexpected-eof'
  | 'out-of-memory'
  | 'is-a-directory'
  | 'not-a-directory'
  | 'directory-not-empty'
  | 'read-only-filesystem'
  | 'storage-full'
  | 'resource-busy'
  /** Not an OS error at all, e.g. a plain Error */
  | 'other'
  /** An OS error with no matching kind */
  | 'uncategorized';

export type ErrnoException = NodeJS.ErrnoException;

const ERRNO_KINDS: Record<string, IoErrorKind> = {
  ENOENT: 'not-found',
  EACCES: 'permission-denied',
  EPERM: 'permission-denied',
  ECONNREFUSED: 'connection-refused',
  ECONNRESET: 'connection-reset',
  ECONNABORTED: 'connection-aborted',
  ENOTCONN: 'not-connected',
  EADDRINUSE: 'addr-in-use',
  EADDRNOTAVAIL: 'addr-not-available',
  EPIPE: 'broken-pipe',
  ERR_STREAM_DESTROYED: 'broken-pipe',
  ERR_STREAM_WRITE_AFTER_END: 'broken-pipe',
  EEXIST: 'already-exists',
  EAGAIN: 'would-block',
  EWOULDBLOCK: 'would-block',
  EINVAL: 'invalid-input',
  ERR_INVALID_ARG_TYPE: 'invalid-input',
  ERR_INVALID_ARG_VALUE: 'invalid-input',
  ETIMEDOUT: 'timed-out',
  EINTR: 'interrupted',
  ENOTSUP: 'unsupported',
  EOPNOTSUPP: 'unsupported',
  ENOSYS: 'unsupported',
  ERR_STREAM_PREMATURE_CLOSE: 'unexpected-eof',
  ENOMEM: 'out-of-memory',
  EISDIR: 'is-a-directory',
  ENOTDIR: 'not-a-directory',
  ENOTEMPTY: 'directory-not-empty',
  EROFS: 'read-only-filesystem',
  ENOSPC: 'storage-full',
  EDQUOT: 'storage-full',
  EBUSY: 'resource-busy',
};

export const isErrnoException = (error: unknown): error is ErrnoException =>
  error instanceof Error &&
  'code' in error &&
  (typeof error.code === 'string' || typeof error.code === 'number');

/**
 * The errno code carried by an error, if it has one
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (!isErrnoException(error)) {
    return undefined;
  }
  return error.code === undefined ? undefined : String(error.code);
}

/**
 * Map an errno code such as "EACCES" to its kind
 */
export function errnoToIoErrorKind(code: string): IoErrorKind {
  return Object.prototype.hasOwnProperty.call(ERRNO_KINDS, code)
    ? ERRNO_KINDS[code]
    : 'uncategorized';
}

/**
 * Classify any thrown value into an I/O error kind
 */
export function ioErrorKind(error: unknown): IoErrorKind {
  const code = getErrnoCode(error);
  return code === undefined ? 'other' : errnoToIoErrorKind(code);
}
