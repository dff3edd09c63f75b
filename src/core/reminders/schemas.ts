import { z } from 'zod';
import { optionalText } from '../../utils/validation.js';

/** Reminders may be scheduled up to a year ahead. */
export const MAX_DAYS_AHEAD = 365;

export const reminderCreateSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(100, 'Title must be at most 100 characters'),
  dueAt: z.string({ required_error: 'Due time is required' }).datetime({
    offset: true,
    message: 'Due time must be an ISO 8601 date-time',
  }),
  notes: optionalText(500),
});

export type ReminderCreateInput = z.input<typeof reminderCreateSchema>;

export const reminderListQuerySchema = z.object({
  includeCompleted: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

export const reminderStatusSchema = z.object({
  completed: z.boolean({ required_error: 'completed is required' }),
});
