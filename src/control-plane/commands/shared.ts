import type { z } from 'zod';
import { formatZodErrors } from '../validators.js';
import { formatError, formatValidationErrors, printError } from '../formatter.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Validate raw commander options. Prints the validation errors and sets a
 * failing exit code when they do not match.
 */
export function parseOptions<S extends z.ZodTypeAny>(
  schema: S,
  rawOptions: unknown
): z.infer<S> | null {
  const result = schema.safeParse(rawOptions);
  if (result.success) {
    return result.data;
  }
  printError(formatValidationErrors(formatZodErrors(result.error)));
  process.exitCode = 1;
  return null;
}

/**
 * Report a failed command on stderr.
 */
export function reportCommandError(error: unknown): void {
  printError(formatError(errorMessage(error)));
  process.exitCode = 1;
}
