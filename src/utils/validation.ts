import { z } from 'zod';
import { parseIsoDate } from './dates.js';
import { ValidationError } from './errors.js';

/**
 * Parse untrusted input against a schema, turning zod issues into a ValidationError.
 */
export function parseInput<Schema extends z.ZodTypeAny>(
  schema: Schema,
  input: unknown,
  message = 'Validation failed'
): z.output<Schema> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      message,
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
      { cause: result.error }
    );
  }
  return result.data;
}

export const isoDateString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format')
  .refine((value) => parseIsoDate(value) !== null, 'Date is not a valid calendar day');

/** Optional trimmed free text; blank strings count as absent. */
export function optionalText(max: number) {
  return z
    .string()
    .trim()
    .max(max)
    .optional()
    .transform((value) => (value ? value : undefined));
}

/** For queries with inclusive `from`/`to` days: flags `from` after `to`. */
export function checkRangeOrder(query: { from?: string; to?: string }, ctx: z.RefinementCtx): void {
  // YYYY-MM-DD compares correctly as a string
  if (query.from && query.to && query.from > query.to) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['from'],
      message: 'Start date must not be after end date',
    });
  }
}
