/**
 * Tests for child process status classification
 */

import { describe, it, expect } from 'vitest';
import { constants } from 'os';
import { ExitCode } from '../code/exit-code';
import { fromStatus, signalNumber } from './process-status';

describe('fromStatus', () => {
  it('should keep the numeric code of a normal exit', () => {
    expect(fromStatus({ code: 0, signal: null }).raw()).toBe(0);
    expect(fromStatus({ code: 3, signal: null }).raw()).toBe(3);
    expect(fromStatus({ status: 64, signal: null }).raw()).toBe(64);
  });

  it('should report a signal as 128 + N', () => {
    expect(fromStatus({ code: null, signal: 'SIGKILL' }).raw()).toBe(137);
    expect(fromStatus({ status: null, signal: 'SIGTERM' }).raw()).toBe(143);
    expect(fromStatus({ code: null, signal: 9 }).raw()).toBe(137);
  });

  it('should resolve signals outside the catalog through the platform table', () => {
    const usr1 = constants.signals.SIGUSR1;
    expect(fromStatus({ code: null, signal: 'SIGUSR1' }).raw()).toBe(128 + usr1);
  });

  it('should prefer the code when both are present', () => {
    expect(fromStatus({ code: 2, signal: 'SIGINT' }).raw()).toBe(2);
  });

  it('should fall back to FAILURE when nothing is known', () => {
    expect(fromStatus({ code: null, signal: null })).toBe(ExitCode.FAILURE);
  });

  it('should accept an explicit fallback', () => {
    expect(fromStatus({ status: null, signal: null }, ExitCode.UNKNOWN)).toBe(ExitCode.UNKNOWN);
  });
});

describe('signalNumber', () => {
  it('should resolve catalog names and pass numbers through', () => {
    expect(signalNumber('SIGPIPE')).toBe(13);
    expect(signalNumber(15)).toBe(15);
  });
});
