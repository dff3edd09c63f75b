import type {
  Entry,
  EntryCategory,
  EntryRepository,
  HabitEntry,
  WorkoutEntry,
} from '../../persistence/repositories/EntryRepository.js';
import { DAY_MS, systemClock, toDateRange, type Clock } from '../../utils/dates.js';
import { createLogger } from '../../utils/logger.js';
import { parseInput } from '../../utils/validation.js';
import {
  aggregate,
  currentStreak,
  round,
  series,
  summarize,
  type Aggregate,
  type SeriesBucket,
  type SeriesPoint,
  type Summary,
} from './aggregates.js';
import { analyticsQuerySchema, seriesQuerySchema } from './schemas.js';

/** Mood chart needs at least this many entries before it says anything useful. */
export const MOOD_CHART_MIN_ENTRIES = 5;

export interface HabitBreakdown extends Aggregate {
  habit: string;
  unit?: string;
}

export interface SummaryResult extends Summary {
  category: EntryCategory;
  from?: string;
  to?: string;
  /** Only for habits: one aggregate per habit name, alphabetical. */
  habits?: HabitBreakdown[];
}

export interface SeriesResult {
  category: EntryCategory;
  bucket: SeriesBucket;
  from?: string;
  to?: string;
  points: SeriesPoint[];
}

export interface WorkoutWindow {
  workouts: number;
  minutes: number;
  calories: number;
}

export interface Overview {
  week: WorkoutWindow;
  month: WorkoutWindow;
  allTime: WorkoutWindow;
  averageDurationMinutes: number;
  streakDays: number;
  latestMood: { score: number; recordedAt: string } | null;
  moodEntries: number;
  moodChartReady: boolean;
}

export interface AnalyticsServiceOptions {
  clock?: Clock;
}

/**
 * Read-only aggregates over a user's entries. Empty ranges produce zeroed results.
 */
export class AnalyticsService {
  private readonly logger = createLogger({ service: 'AnalyticsService' });
  private readonly clock: Clock;

  constructor(
    private readonly entryRepository: EntryRepository,
    options: AnalyticsServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  summary(userId: number, query: unknown): SummaryResult {
    const { category, from, to } = parseInput(analyticsQuerySchema, query, 'Invalid analytics query');
    const entries = this.entryRepository.list(userId, { category, ...toDateRange(from, to) });

    const result: SummaryResult = { category, from, to, ...summarize(entries) };
    if (category === 'habit') {
      result.habits = breakdownByHabit(entries.filter(isHabit));
    }

    this.logger.debug({ userId, category, count: result.count }, 'Summary computed');
    return result;
  }

  series(userId: number, query: unknown): SeriesResult {
    const { category, from, to, bucket } = parseInput(seriesQuerySchema, query, 'Invalid analytics query');
    const entries = this.entryRepository.list(userId, { category, ...toDateRange(from, to) });
    return { category, bucket, from, to, points: series(entries, bucket) };
  }

  overview(userId: number): Overview {
    const now = this.clock();
    const workouts = this.entryRepository.list(userId, { category: 'workout' }).filter(isWorkout);
    const allTime = windowTotals(workouts);
    const latestMood = this.entryRepository.getLatest(userId, 'mood');
    const moodEntries = this.entryRepository.count(userId, { category: 'mood' });

    return {
      week: windowTotals(workouts.filter((entry) => entry.recordedAt >= now.getTime() - 7 * DAY_MS)),
      month: windowTotals(workouts.filter((entry) => entry.recordedAt >= now.getTime() - 30 * DAY_MS)),
      allTime,
      averageDurationMinutes: allTime.workouts > 0 ? round(allTime.minutes / allTime.workouts, 1) : 0,
      streakDays: currentStreak(
        workouts.map((entry) => entry.recordedAt),
        now
      ),
      latestMood:
        latestMood?.category === 'mood'
          ? { score: latestMood.score, recordedAt: new Date(latestMood.recordedAt).toISOString() }
          : null,
      moodEntries,
      moodChartReady: moodEntries >= MOOD_CHART_MIN_ENTRIES,
    };
  }
}

function isWorkout(entry: Entry): entry is WorkoutEntry {
  return entry.category === 'workout';
}

function isHabit(entry: Entry): entry is HabitEntry {
  return entry.category === 'habit';
}

function windowTotals(workouts: WorkoutEntry[]): WorkoutWindow {
  return workouts.reduce<WorkoutWindow>(
    (totals, entry) => ({
      workouts: totals.workouts + 1,
      minutes: totals.minutes + entry.durationMinutes,
      calories: totals.calories + entry.caloriesBurned,
    }),
    { workouts: 0, minutes: 0, calories: 0 }
  );
}

function breakdownByHabit(entries: HabitEntry[]): HabitBreakdown[] {
  const byHabit = new Map<string, HabitEntry[]>();
  for (const entry of entries) {
    const group = byHabit.get(entry.habit) ?? [];
    group.push(entry);
    byHabit.set(entry.habit, group);
  }

  return [...byHabit.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([habit, group]) => {
      const breakdown: HabitBreakdown = { habit, ...aggregate(group.map((entry) => entry.value)) };
      // Entries are newest first, so this is the unit most recently used
      const unit = group.find((entry) => entry.unit !== undefined)?.unit;
      if (unit !== undefined) breakdown.unit = unit;
      return breakdown;
    });
}
