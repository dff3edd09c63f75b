import { z } from 'zod';
import { ACTIVITY_TYPES, ENTRY_CATEGORIES } from '../../persistence/repositories/EntryRepository.js';
import { checkRangeOrder, isoDateString, optionalText } from '../../utils/validation.js';

export const MOOD_SCALE = { min: 1, max: 5 } as const;

const recordedAtSchema = z.string().datetime({ offset: true }).optional();
const noteSchema = optionalText(1000);

export const workoutEntrySchema = z.object({
  activityType: z.enum(ACTIVITY_TYPES),
  durationMinutes: z.number().int().min(1).max(600),
  caloriesBurned: z.number().int().min(0).max(10000).optional(),
  note: noteSchema,
  recordedAt: recordedAtSchema,
});

export const moodEntrySchema = z.object({
  score: z
    .number({ required_error: 'Mood score is required' })
    .int('Mood score must be a whole number')
    .min(MOOD_SCALE.min, `Mood score must be between ${MOOD_SCALE.min} and ${MOOD_SCALE.max}`)
    .max(MOOD_SCALE.max, `Mood score must be between ${MOOD_SCALE.min} and ${MOOD_SCALE.max}`),
  note: noteSchema,
  recordedAt: recordedAtSchema,
});

export const habitEntrySchema = z.object({
  habit: z.string().trim().min(1, 'Habit name is required').max(60),
  value: z.number().min(0).max(100000),
  unit: optionalText(20),
  note: noteSchema,
  recordedAt: recordedAtSchema,
});

export type WorkoutEntryRequest = z.input<typeof workoutEntrySchema>;
export type MoodEntryRequest = z.input<typeof moodEntrySchema>;
export type HabitEntryRequest = z.input<typeof habitEntrySchema>;

export const entryListQuerySchema = z.object({
  category: z.enum(ENTRY_CATEGORIES).optional(),
  from: isoDateString.optional(),
  to: isoDateString.optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
}).superRefine(checkRangeOrder);

export type EntryListQuery = z.input<typeof entryListQuerySchema>;
