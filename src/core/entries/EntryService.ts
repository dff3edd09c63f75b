import type {
  Entry,
  EntryInput,
  EntryRepository,
  HabitEntry,
  MoodEntry,
  WorkoutEntry,
} from '../../persistence/repositories/EntryRepository.js';
import type { UserRepository } from '../../persistence/repositories/UserRepository.js';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { parseInput } from '../../utils/validation.js';
import { addDays, startOfUtcDay, systemClock, toDateRange, type Clock } from '../../utils/dates.js';
import { estimateCaloriesBurned } from './calories.js';
import { entryListQuerySchema, habitEntrySchema, moodEntrySchema, workoutEntrySchema } from './schemas.js';

export interface EntryServiceOptions {
  /** Reject a second mood entry on the same UTC day. */
  moodOncePerDay: boolean;
  clock?: Clock;
}

export interface EntryPage {
  entries: Entry[];
  total: number;
  limit: number;
  offset: number;
}

/**
 * Append-only log of workouts, moods and habits. Entries are never edited; a correction is a new
 * entry, optionally after deleting the old one.
 */
export class EntryService {
  private readonly logger = createLogger({ service: 'EntryService' });
  private readonly clock: Clock;

  constructor(
    private readonly entryRepository: EntryRepository,
    private readonly userRepository: UserRepository,
    private readonly options: EntryServiceOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  logWorkout(userId: number, input: unknown): WorkoutEntry {
    const data = parseInput(workoutEntrySchema, input, 'Invalid workout entry');
    const user = this.userRepository.getById(userId);
    if (!user) {
      throw new NotFoundError('User');
    }

    const entry = this.append({
      category: 'workout',
      userId,
      recordedAt: this.resolveRecordedAt(data.recordedAt),
      activityType: data.activityType,
      durationMinutes: data.durationMinutes,
      caloriesBurned:
        data.caloriesBurned ?? estimateCaloriesBurned(data.activityType, data.durationMinutes, user.weightKg),
      note: data.note,
    });
    return entry.category === 'workout' ? entry : categoryMismatch(entry, 'workout');
  }

  logMood(userId: number, input: unknown): MoodEntry {
    const data = parseInput(moodEntrySchema, input, 'Invalid mood entry');
    const recordedAt = this.resolveRecordedAt(data.recordedAt);

    if (this.options.moodOncePerDay) {
      const dayStart = startOfUtcDay(new Date(recordedAt));
      const existing = this.entryRepository.count(userId, {
        category: 'mood',
        start: dayStart.getTime(),
        end: addDays(dayStart, 1).getTime(),
      });
      if (existing > 0) {
        throw new ConflictError('Mood already logged for this day');
      }
    }

    const entry = this.append({
      category: 'mood',
      userId,
      recordedAt,
      score: data.score,
      note: data.note,
    });
    return entry.category === 'mood' ? entry : categoryMismatch(entry, 'mood');
  }

  logHabit(userId: number, input: unknown): HabitEntry {
    const data = parseInput(habitEntrySchema, input, 'Invalid habit entry');
    const entry = this.append({
      category: 'habit',
      userId,
      recordedAt: this.resolveRecordedAt(data.recordedAt),
      habit: data.habit,
      value: data.value,
      unit: data.unit,
      note: data.note,
    });
    return entry.category === 'habit' ? entry : categoryMismatch(entry, 'habit');
  }

  list(userId: number, query: unknown = {}): EntryPage {
    const data = parseInput(entryListQuerySchema, query, 'Invalid entry query');
    const range = toDateRange(data.from, data.to);
    const filter = { category: data.category, ...range };

    return {
      entries: this.entryRepository.list(userId, { ...filter, limit: data.limit, offset: data.offset }),
      total: this.entryRepository.count(userId, filter),
      limit: data.limit,
      offset: data.offset,
    };
  }

  get(userId: number, entryId: number): Entry {
    const entry = this.entryRepository.getById(userId, entryId);
    if (!entry) {
      throw new NotFoundError('Entry');
    }
    return entry;
  }

  delete(userId: number, entryId: number): void {
    if (!this.entryRepository.delete(userId, entryId)) {
      throw new NotFoundError('Entry');
    }
    this.logger.info({ userId, entryId }, 'Entry deleted');
  }

  private append(input: EntryInput): Entry {
    const entry = this.entryRepository.create(input, this.clock().getTime());
    this.logger.info({ userId: input.userId, entryId: entry.id, category: entry.category }, 'Entry logged');
    return entry;
  }

  private resolveRecordedAt(recordedAt: string | undefined): number {
    const now = this.clock().getTime();
    if (recordedAt === undefined) {
      return now;
    }
    const at = new Date(recordedAt).getTime();
    if (at > now) {
      throw new ValidationError('Invalid entry', [{ path: 'recordedAt', message: 'Entry time cannot be in the future' }]);
    }
    return at;
  }
}

function categoryMismatch(entry: Entry, expected: Entry['category']): never {
  throw new Error(`Stored entry ${entry.id} has category ${entry.category}, expected ${expected}`);
}
