/**
 * Process module - child process statuses and process termination
 */

export { fromStatus, signalNumber } from './process-status';
export type { ProcessStatus, ExitEventStatus, SpawnSyncStatus } from './process-status';
export { NodeProcessTerminator, nodeProcessTerminator } from './node-process-terminator';
