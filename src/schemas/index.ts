/**
 * Schemas module - runtime validation with Zod
 */

export { exitOptionsSchema, exitCodeSchema, rawExitCodeSchema } from './exit-options.schema';
export { validateExitOptions, parseExitCode } from './validators';
export type { ValidationResult, ValidatedExitOptions } from './validators';
