/**
 * Code module - the ExitCode value type and the catalog of named codes
 */

export { ExitCode, DEFAULT_FALLBACK } from './exit-code';
export type { ProcessExitOptions } from './exit-code';
export * as sysexits from './sysexits';
export * as bash from './bash';
export { RESERVED_RANGES, findReservedRange, isReservedRaw } from './reserved';
export type { ReservedRange } from './reserved';
export { describeExitCode, formatExitCode } from './describe';
