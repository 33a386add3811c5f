/**
 * Integration tests: real failures classified and reported end to end
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { spawnSync } from 'node:child_process';
import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import {
  ExitCode,
  Exit,
  exit,
  fromStatus,
  ok,
  err,
  isErr,
  runMain,
  toSysexits,
  withCodeAsync,
  sysexits,
  bash,
} from '../../src';
import type { ExitResult, Result } from '../../src';
import { createTempDir, removeTempDir } from '../utils/temp-directory';
import {
  CapturingSink,
  RecordingTerminator,
  TerminatedError,
  errnoError,
} from '../utils/recording-terminator';

function readConfig(path: string): Result<string, unknown> {
  try {
    return ok(readFileSync(path, 'utf-8'));
  } catch (error) {
    return err(error);
  }
}

describe('exit flow', () => {
  let tempDir: string;
  let stderr: CapturingSink;
  let terminator: RecordingTerminator;

  beforeEach(() => {
    tempDir = createTempDir();
    stderr = new CapturingSink();
    terminator = new RecordingTerminator();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should exit with OS_FILE_ERR and the OS text for a missing file', () => {
    const missing = join(tempDir, 'missing.json');
    const read = toSysexits(readConfig(missing));
    const result: ExitResult = read.ok ? ok() : err(read.error);

    expect(() => exit(result, { stderr, terminator })).toThrow(TerminatedError);
    expect(terminator.statuses).toEqual([72]);
    expect(stderr.text).toBe(`ENOENT: no such file or directory, open '${missing}'\n`);
  });

  it('should exit with NO_PERM for a permission failure', () => {
    const denied = errnoError('EACCES', "EACCES: permission denied, open '/srv/app/secret.key'");
    expect(() => exit(err(Exit.fromIoError(denied)), { stderr, terminator })).toThrow(
      TerminatedError
    );
    expect(terminator.statuses).toEqual([sysexits.NO_PERM.raw()]);
    expect(stderr.text).toBe("EACCES: permission denied, open '/srv/app/secret.key'\n");
  });

  it('should exit with SIGPIPE for a broken pipe', () => {
    const brokenPipe = errnoError('EPIPE', 'write EPIPE');
    expect(() => exit(err(Exit.fromIoError(brokenPipe)), { stderr, terminator })).toThrow(
      TerminatedError
    );
    expect(terminator.statuses).toEqual([141]);
  });

  it('should exit with CANT_CREAT when the output already exists', async () => {
    const target = join(tempDir, 'out');
    mkdirSync(target);
    await expect(
      runMain(
        async () => {
          const written = await withCodeAsync(
            () => writeFileSync(target, 'data', { flag: 'wx' }),
            sysexits.CANT_CREAT
          );
          return isErr(written) ? err(written.error) : ok();
        },
        { stderr, terminator }
      )
    ).rejects.toBeInstanceOf(TerminatedError);
    expect(terminator.statuses).toEqual([73]);
  });

  it('should exit silently with SUCCESS when main succeeds', async () => {
    await expect(runMain(() => ok(), { stderr, terminator })).rejects.toBeInstanceOf(TerminatedError);
    expect(terminator.statuses).toEqual([0]);
    expect(stderr.chunks).toEqual([]);
  });
});

describe('child process statuses', () => {
  it('should pass through the status of a normal exit', () => {
    const child = spawnSync(process.execPath, ['-e', 'process.exit(3)']);
    expect(fromStatus(child).raw()).toBe(3);
  });

  it('should report a killed child as 128 + 9', () => {
    const child = spawnSync(process.execPath, ['-e', "process.kill(process.pid, 'SIGKILL')"]);
    expect(child.signal).toBe('SIGKILL');
    const code = fromStatus(child);
    expect(code.raw()).toBe(137);
    expect(code.equals(bash.SIGKILL)).toBe(true);
    expect(code.equals(ExitCode.FAILURE)).toBe(false);
  });
});
