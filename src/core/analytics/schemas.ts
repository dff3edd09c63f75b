import { z } from 'zod';
import { ENTRY_CATEGORIES } from '../../persistence/repositories/EntryRepository.js';
import { checkRangeOrder, isoDateString } from '../../utils/validation.js';

const rangeQuery = z.object({
  category: z.enum(ENTRY_CATEGORIES, {
    required_error: 'Category is required',
    invalid_type_error: 'Category must be workout, mood or habit',
  }),
  from: isoDateString.optional(),
  to: isoDateString.optional(),
});

export const analyticsQuerySchema = rangeQuery.superRefine(checkRangeOrder);

export type AnalyticsQuery = z.input<typeof analyticsQuerySchema>;

export const seriesQuerySchema = rangeQuery
  .extend({ bucket: z.enum(['day', 'week']).default('day') })
  .superRefine(checkRangeOrder);

export type SeriesQuery = z.input<typeof seriesQuerySchema>;
