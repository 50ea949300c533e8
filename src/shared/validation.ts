/**
 * UAE Mortgage Advisor - Input Validation
 */

import { z } from 'zod';
import { InvalidInputError } from './errors';

/**
 * Parse with a zod schema; the first failing issue becomes an
 * InvalidInputError naming its field ('input' for the value as a whole).
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'input';
  throw new InvalidInputError(field, issue ? issue.message : 'Invalid input');
}
