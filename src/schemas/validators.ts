/**
 * Runtime validation with Zod
 */

import { z } from 'zod';
import { ExitCode } from '../code/exit-code';
import { exitOptionsSchema, rawExitCodeSchema } from './exit-options.schema';

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

export type ValidatedExitOptions = z.infer<typeof exitOptionsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate exit options supplied by a caller
 */
export function validateExitOptions(data: unknown): ValidationResult<ValidatedExitOptions> {
  const result = exitOptionsSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Parse an exit code from a number or a decimal string such as "77"
 */
export function parseExitCode(input: unknown): ValidationResult<ExitCode> {
  const result = rawExitCodeSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: new ExitCode(result.data) };
  }
  return { success: false, errors: formatIssues(result.error) };
}
