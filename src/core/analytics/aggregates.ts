import type { Entry } from '../../persistence/repositories/EntryRepository.js';
import { DAY_MS, addDays, startOfUtcDay, startOfUtcWeek, toIsoDate } from '../../utils/dates.js';

export type TrendDirection = 'up' | 'down' | 'flat';
export type SeriesBucket = 'day' | 'week';

/** Below this many units per day a slope counts as flat. */
export const FLAT_SLOPE_THRESHOLD = 0.01;

export interface Trend {
  direction: TrendDirection;
  slopePerDay: number;
}

export interface Aggregate {
  count: number;
  total: number;
  mean: number;
  min: number;
  max: number;
}

export interface Summary extends Aggregate {
  trend: Trend;
}

export interface SeriesPoint {
  /** YYYY-MM-DD of the bucket's first day */
  period: string;
  count: number;
  total: number;
  mean: number;
}

/** The number an entry contributes to charts: minutes, mood score or habit value. */
export function entryValue(entry: Entry): number {
  switch (entry.category) {
    case 'workout':
      return entry.durationMinutes;
    case 'mood':
      return entry.score;
    case 'habit':
      return entry.value;
  }
}

export function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function aggregate(values: number[]): Aggregate {
  if (values.length === 0) {
    return { count: 0, total: 0, mean: 0, min: 0, max: 0 };
  }
  const total = values.reduce((sum, value) => sum + value, 0);
  return {
    count: values.length,
    total: round(total),
    mean: round(total / values.length),
    min: values.reduce((low, value) => Math.min(low, value), Infinity),
    max: values.reduce((high, value) => Math.max(high, value), -Infinity),
  };
}

/**
 * Least-squares slope of value against time, in value units per day.
 * Entries may arrive in any order.
 */
export function trend(points: Array<{ at: number; value: number }>): Trend {
  if (points.length < 2) {
    return { direction: 'flat', slopePerDay: 0 };
  }

  const xs = points.map((point) => point.at / DAY_MS);
  const meanX = xs.reduce((sum, x) => sum + x, 0) / xs.length;
  const meanY = points.reduce((sum, point) => sum + point.value, 0) / points.length;

  let numerator = 0;
  let denominator = 0;
  points.forEach((point, index) => {
    const dx = (xs[index] ?? meanX) - meanX;
    numerator += dx * (point.value - meanY);
    denominator += dx * dx;
  });

  // Every point at the same instant: no time axis to slope along
  if (denominator === 0) {
    return { direction: 'flat', slopePerDay: 0 };
  }

  const slope = numerator / denominator;
  const direction: TrendDirection =
    Math.abs(slope) < FLAT_SLOPE_THRESHOLD ? 'flat' : slope > 0 ? 'up' : 'down';
  return { direction, slopePerDay: round(slope, 4) };
}

export function summarize(entries: Entry[]): Summary {
  return {
    ...aggregate(entries.map(entryValue)),
    trend: trend(entries.map((entry) => ({ at: entry.recordedAt, value: entryValue(entry) }))),
  };
}

export function bucketStart(at: number, bucket: SeriesBucket): string {
  const date = new Date(at);
  return toIsoDate(bucket === 'week' ? startOfUtcWeek(date) : startOfUtcDay(date));
}

/** One point per bucket that has entries, oldest first. */
export function series(entries: Entry[], bucket: SeriesBucket): SeriesPoint[] {
  const groups = new Map<string, number[]>();
  for (const entry of entries) {
    const period = bucketStart(entry.recordedAt, bucket);
    const values = groups.get(period) ?? [];
    values.push(entryValue(entry));
    groups.set(period, values);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([period, values]) => {
      const { count, total, mean } = aggregate(values);
      return { period, count, total, mean };
    });
}

/**
 * Consecutive UTC days with at least one timestamp, counting back from today.
 * A streak that last ran yesterday is still current; one that ended earlier is 0.
 */
export function currentStreak(timestamps: number[], now: Date): number {
  const days = new Set(timestamps.map((at) => toIsoDate(new Date(at))));
  const today = startOfUtcDay(now);

  let cursor = days.has(toIsoDate(today)) ? today : addDays(today, -1);
  let streak = 0;
  while (days.has(toIsoDate(cursor))) {
    streak += 1;
    cursor = addDays(cursor, -1);
  }
  return streak;
}
