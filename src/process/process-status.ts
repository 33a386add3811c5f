/**
 * Child process completion status to exit code
 */

import { constants } from 'os';
import { ExitCode } from '../code/exit-code';
import { SIGNAL_NUMBERS, isSignalName, signalExitCode } from '../code/bash';

/**
 * Arguments of a ChildProcess 'exit' or 'close' event
 */
export interface ExitEventStatus {
  code: number | null;
  signal: NodeJS.Signals | number | null;
}

/**
 * The status/signal pair of a spawnSync result
 */
export interface SpawnSyncStatus {
  status: number | null;
  signal: NodeJS.Signals | number | null;
}

export type ProcessStatus = ExitEventStatus | SpawnSyncStatus;

const PLATFORM_SIGNALS = new Map<string, number>(Object.entries(constants.signals));

function completionCode(status: ProcessStatus): number | null {
  return 'status' in status ? status.status : status.code;
}

/**
 * Number of a signal given by name or number
 */
export function signalNumber(signal: NodeJS.Signals | number): number | undefined {
  if (typeof signal === 'number') {
    return signal;
  }
  if (isSignalName(signal)) {
    return SIGNAL_NUMBERS[signal];
  }
  return PLATFORM_SIGNALS.get(signal);
}

/**
 * Exit code for a finished child process.
 *
 * A normal exit keeps its numeric status. A process killed by signal N is
 * reported as 128 + N, the way a shell would. When neither is known the
 * fallback (FAILURE) is used.
 */
export function fromStatus(status: ProcessStatus, fallback: ExitCode = ExitCode.DEFAULT): ExitCode {
  const code = completionCode(status);
  if (code !== null) {
    return new ExitCode(code);
  }
  if (status.signal !== null) {
    const signal = signalNumber(status.signal);
    if (signal !== undefined) {
      return signalExitCode(signal);
    }
  }
  return fallback;
}
