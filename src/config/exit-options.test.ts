import { describe, it, expect } from 'vitest';
import { ExitCode } from '../code/exit-code';
import { resolveExitOptions, DEFAULT_EXIT_OPTIONS } from './exit-options';
import { nodeProcessTerminator } from '../process/node-process-terminator';
import { CapturingSink, RecordingTerminator } from '../../tests/utils/recording-terminator';

describe('resolveExitOptions', () => {
  it('should apply defaults', () => {
    const resolved = resolveExitOptions();
    expect(resolved.portable).toBe(false);
    expect(resolved.fallback).toBe(ExitCode.FAILURE);
    expect(resolved.stderr).toBe(process.stderr);
    expect(resolved.logger).toBeUndefined();
    expect(resolved.terminator).toBe(nodeProcessTerminator);
    expect(DEFAULT_EXIT_OPTIONS.fallback).toBe(ExitCode.DEFAULT);
  });

  it('should prefer caller options', () => {
    const stderr = new CapturingSink();
    const terminator = new RecordingTerminator();
    const resolved = resolveExitOptions({
      portable: true,
      fallback: ExitCode.UNKNOWN,
      stderr,
      terminator,
    });
    expect(resolved.portable).toBe(true);
    expect(resolved.fallback).toBe(ExitCode.UNKNOWN);
    expect(resolved.stderr).toBe(stderr);
    expect(resolved.terminator).toBe(terminator);
  });

  it('should throw on invalid options', () => {
    expect(() => resolveExitOptions({ fallback: new ExitCode(-2) })).toThrow(
      'Invalid exit options: fallback: must be within 0-255'
    );
  });
});
