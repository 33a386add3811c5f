/**
 * Schemas for exit options and textual exit codes
 */

import { z } from 'zod';
import { ExitCode } from '../code/exit-code';
import type { Logger } from '../types/logger';
import type { ErrorSink, ProcessTerminator } from '../types/process-terminator';

const PORTABLE_CODE_MESSAGE = 'must be within 0-255';
const SAFE_INTEGER_MESSAGE = 'must be a safe integer';

export const exitCodeSchema = z.instanceof(ExitCode, { message: 'must be an ExitCode' });

/**
 * Raw exit code from a number or a decimal string, e.g. an env variable
 */
export const rawExitCodeSchema = z.union([
  z.number().int('must be an integer').safe(SAFE_INTEGER_MESSAGE),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'must be a decimal integer')
    .transform((value) => Number(value))
    .refine(Number.isSafeInteger, SAFE_INTEGER_MESSAGE),
]);

const fallbackSchema = exitCodeSchema.superRefine((code, ctx) => {
  if (!code.isPortable()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: PORTABLE_CODE_MESSAGE });
  } else if (code.isSuccess()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must not be SUCCESS' });
  }
});

const errorSinkSchema = z.custom<ErrorSink>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'write' in value &&
    typeof value.write === 'function',
  'must have a write(chunk) method'
);

const loggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'event' in value &&
    typeof value.event === 'function',
  'must implement the Logger interface'
);

const terminatorSchema = z.custom<ProcessTerminator>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'terminate' in value &&
    typeof value.terminate === 'function',
  'must have a terminate(status) method'
);

export const exitOptionsSchema = z
  .object({
    portable: z.boolean().optional(),
    fallback: fallbackSchema.optional(),
    stderr: errorSinkSchema.optional(),
    logger: loggerSchema.optional(),
    terminator: terminatorSchema.optional(),
  })
  .strict();
