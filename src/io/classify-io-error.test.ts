/**
 * Tests for I/O error classification
 */

import { describe, it, expect } from 'vitest';
import { ExitCode } from '../code/exit-code';
import { ioToSysexits, ioToSignal, classifyIoErrorKind, fromIoError } from './classify-io-error';
import { ioErrorKind, errnoToIoErrorKind, getErrnoCode } from './io-error-kind';
import type { IoErrorKind } from './io-error-kind';
import { errnoError } from '../../tests/utils/recording-terminator';

const ALL_KINDS: IoErrorKind[] = [
  'not-found',
  'permission-denied',
  'connection-refused',
  'connection-reset',
  'connection-aborted',
  'not-connected',
  'addr-in-use',
  'addr-not-available',
  'broken-pipe',
  'already-exists',
  'would-block',
  'invalid-input',
  'invalid-data',
  'timed-out',
  'write-zero',
  'interrupted',
  'unsupported',
  'unexpected-eof',
  'out-of-memory',
  'is-a-directory',
  'not-a-directory',
  'directory-not-empty',
  'read-only-filesystem',
  'storage-full',
  'resource-busy',
  'other',
  'uncategorized',
];

describe('classifyIoErrorKind', () => {
  it.each<[IoErrorKind, number]>([
    ['not-found', 72],
    ['permission-denied', 77],
    ['connection-refused', 76],
    ['connection-reset', 76],
    ['connection-aborted', 76],
    ['not-connected', 76],
    ['addr-in-use', 69],
    ['addr-not-available', 69],
    ['broken-pipe', 141],
    ['already-exists', 73],
    ['invalid-input', 65],
    ['invalid-data', 65],
    ['unexpected-eof', 65],
    ['timed-out', 142],
    ['write-zero', 66],
    ['interrupted', 130],
    ['other', 1],
    ['would-block', 74],
    ['unsupported', 74],
    ['is-a-directory', 74],
    ['uncategorized', 74],
  ])('should map %s to %i', (kind, expected) => {
    expect(classifyIoErrorKind(kind).raw()).toBe(expected);
  });

  it('should return the same code on repeated calls for every kind', () => {
    for (const kind of ALL_KINDS) {
      const first = classifyIoErrorKind(kind);
      expect(first).toBeInstanceOf(ExitCode);
      expect(classifyIoErrorKind(kind).equals(first)).toBe(true);
    }
  });
});

describe('ioToSignal', () => {
  it('should only map signal-like kinds', () => {
    expect(ioToSignal('broken-pipe')?.raw()).toBe(141);
    expect(ioToSignal('timed-out')?.raw()).toBe(142);
    expect(ioToSignal('interrupted')?.raw()).toBe(130);
    expect(ioToSignal('not-found')).toBeUndefined();
    expect(ioToSignal('other')).toBeUndefined();
  });
});

describe('ioToSysexits', () => {
  it('should leave signal-like and unknown kinds unmapped', () => {
    expect(ioToSysexits('broken-pipe')).toBeUndefined();
    expect(ioToSysexits('uncategorized')).toBeUndefined();
    expect(ioToSysexits('permission-denied')?.raw()).toBe(77);
  });
});

describe('ioErrorKind', () => {
  it('should read the errno code of Node.js errors', () => {
    expect(ioErrorKind(errnoError('ENOENT', "ENOENT: no such file or directory, open 'a.txt'"))).toBe(
      'not-found'
    );
    expect(ioErrorKind(errnoError('EACCES', 'EACCES: permission denied'))).toBe('permission-denied');
    expect(ioErrorKind(errnoError('EPERM', 'EPERM: operation not permitted'))).toBe(
      'permission-denied'
    );
    expect(ioErrorKind(errnoError('EPIPE', 'write EPIPE'))).toBe('broken-pipe');
    expect(ioErrorKind(errnoError('ETIMEDOUT', 'connect ETIMEDOUT'))).toBe('timed-out');
  });

  it('should treat errors without a code as other', () => {
    expect(ioErrorKind(new Error('boom'))).toBe('other');
    expect(ioErrorKind('boom')).toBe('other');
    expect(ioErrorKind(undefined)).toBe('other');
  });

  it('should treat unknown errno codes as uncategorized', () => {
    expect(errnoToIoErrorKind('EMFILE')).toBe('uncategorized');
    expect(errnoToIoErrorKind('constructor')).toBe('uncategorized');
  });

  it('should extract errno codes', () => {
    expect(getErrnoCode(errnoError('EEXIST', 'exists'))).toBe('EEXIST');
    expect(getErrnoCode({ code: 'EEXIST' })).toBeUndefined();
  });
});

describe('fromIoError', () => {
  it('should classify thrown errors end to end', () => {
    expect(fromIoError(errnoError('EEXIST', 'EEXIST: file already exists')).raw()).toBe(73);
    expect(fromIoError(errnoError('ECONNREFUSED', 'connect ECONNREFUSED')).raw()).toBe(76);
    expect(fromIoError(errnoError('EMFILE', 'too many open files')).raw()).toBe(74);
    expect(fromIoError(new Error('plain')).raw()).toBe(1);
  });
});
