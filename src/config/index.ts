/**
 * Config module - exit options resolution
 */

export { resolveExitOptions, DEFAULT_EXIT_OPTIONS } from './exit-options';
export type { ExitOptions, ResolvedExitOptions } from './exit-options';
