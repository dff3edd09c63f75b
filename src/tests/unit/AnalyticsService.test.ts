import { describe, it, expect, beforeEach } from 'vitest';
import { AnalyticsService } from '../../core/analytics/AnalyticsService.js';
import { EntryService } from '../../core/entries/EntryService.js';
import { ValidationError } from '../../utils/errors.js';
import { createClock, createTestStore, detailsOf, insertUser, thrownBy, type TestStore } from '../helpers.js';

const NOW = '2026-03-10T12:00:00.000Z';

describe('AnalyticsService', () => {
  let store: TestStore;
  let entries: EntryService;
  let analytics: AnalyticsService;
  let userId: number;

  beforeEach(() => {
    store = createTestStore();
    userId = insertUser(store.users);
    const clock = createClock(NOW);
    entries = new EntryService(store.entries, store.users, { moodOncePerDay: true, clock });
    analytics = new AnalyticsService(store.entries, { clock });
  });

  describe('summary', () => {
    it('returns a zero summary when nothing was logged', () => {
      expect(analytics.summary(userId, { category: 'mood' })).toEqual({
        category: 'mood',
        count: 0,
        total: 0,
        mean: 0,
        min: 0,
        max: 0,
        trend: { direction: 'flat', slopePerDay: 0 },
      });
    });

    it('aggregates mood scores inside the date range only', () => {
      entries.logMood(userId, { score: 1, recordedAt: '2026-03-01T20:00:00Z' });
      entries.logMood(userId, { score: 2, recordedAt: '2026-03-02T20:00:00Z' });
      entries.logMood(userId, { score: 4, recordedAt: '2026-03-03T20:00:00Z' });
      entries.logMood(userId, { score: 5, recordedAt: '2026-03-04T20:00:00Z' });

      const summary = analytics.summary(userId, { category: 'mood', from: '2026-03-02', to: '2026-03-04' });

      expect(summary).toMatchObject({ count: 3, total: 11, mean: 3.67, min: 2, max: 5 });
      expect(summary.trend.direction).toBe('up');
      expect(summary.trend.slopePerDay).toBe(1.5);
    });

    it('breaks habits down per habit name', () => {
      entries.logHabit(userId, { habit: 'Water', value: 2, unit: 'l', recordedAt: '2026-03-08T09:00:00Z' });
      entries.logHabit(userId, { habit: 'Water', value: 1, unit: 'l', recordedAt: '2026-03-09T09:00:00Z' });
      entries.logHabit(userId, { habit: 'Steps', value: 8000, recordedAt: '2026-03-09T21:00:00Z' });

      const summary = analytics.summary(userId, { category: 'habit' });

      expect(summary.count).toBe(3);
      expect(summary.habits).toEqual([
        { habit: 'Steps', count: 1, total: 8000, mean: 8000, min: 8000, max: 8000 },
        { habit: 'Water', unit: 'l', count: 2, total: 3, mean: 1.5, min: 1, max: 2 },
      ]);
    });

    it("ignores other users' entries", () => {
      const otherId = insertUser(store.users, { username: 'sam' });
      entries.logWorkout(otherId, { activityType: 'cardio', durationMinutes: 50 });

      expect(analytics.summary(userId, { category: 'workout' }).count).toBe(0);
      expect(analytics.summary(otherId, { category: 'workout' }).total).toBe(50);
    });

    it('requires a category and an ordered range', () => {
      expect(() => analytics.summary(userId, {})).toThrow(ValidationError);

      const error = thrownBy(() =>
        analytics.summary(userId, { category: 'mood', from: '2026-03-05', to: '2026-03-01' })
      );
      expect(detailsOf(error)).toEqual([{ path: 'from', message: 'Start date must not be after end date' }]);
    });
  });

  describe('series', () => {
    it('returns per-day workout minutes, oldest first', () => {
      entries.logWorkout(userId, { activityType: 'yoga', durationMinutes: 30, recordedAt: '2026-03-03T07:00:00Z' });
      entries.logWorkout(userId, { activityType: 'hiit', durationMinutes: 20, recordedAt: '2026-03-03T18:00:00Z' });
      entries.logWorkout(userId, { activityType: 'cardio', durationMinutes: 45, recordedAt: '2026-03-01T07:00:00Z' });

      expect(analytics.series(userId, { category: 'workout' })).toEqual({
        category: 'workout',
        bucket: 'day',
        points: [
          { period: '2026-03-01', count: 1, total: 45, mean: 45 },
          { period: '2026-03-03', count: 2, total: 50, mean: 25 },
        ],
      });
    });

    it('groups by ISO week', () => {
      // 2026-03-01 is a Sunday, so it belongs to the week of Monday 2026-02-23
      entries.logWorkout(userId, { activityType: 'cardio', durationMinutes: 45, recordedAt: '2026-03-01T07:00:00Z' });
      entries.logWorkout(userId, { activityType: 'yoga', durationMinutes: 30, recordedAt: '2026-03-02T07:00:00Z' });
      entries.logWorkout(userId, { activityType: 'hiit', durationMinutes: 20, recordedAt: '2026-03-08T07:00:00Z' });

      const { points } = analytics.series(userId, { category: 'workout', bucket: 'week' });

      expect(points).toEqual([
        { period: '2026-02-23', count: 1, total: 45, mean: 45 },
        { period: '2026-03-02', count: 2, total: 50, mean: 25 },
      ]);
    });

    it('rejects an unknown bucket', () => {
      expect(() => analytics.series(userId, { category: 'mood', bucket: 'month' })).toThrow(ValidationError);
    });
  });

  describe('overview', () => {
    it('returns zeros for a new user', () => {
      expect(analytics.overview(userId)).toEqual({
        week: { workouts: 0, minutes: 0, calories: 0 },
        month: { workouts: 0, minutes: 0, calories: 0 },
        allTime: { workouts: 0, minutes: 0, calories: 0 },
        averageDurationMinutes: 0,
        streakDays: 0,
        latestMood: null,
        moodEntries: 0,
        moodChartReady: false,
      });
    });

    it('totals workouts over 7 days, 30 days and all time', () => {
      const log = (durationMinutes: number, caloriesBurned: number, recordedAt: string): void => {
        entries.logWorkout(userId, { activityType: 'strength', durationMinutes, caloriesBurned, recordedAt });
      };
      log(30, 200, '2026-03-10T07:00:00Z');
      log(45, 300, '2026-03-09T07:00:00Z');
      log(20, 100, '2026-03-08T07:00:00Z');
      log(60, 400, '2026-02-20T07:00:00Z');
      log(40, 250, '2026-01-01T07:00:00Z');
      entries.logMood(userId, { score: 2, recordedAt: '2026-03-08T21:00:00Z' });
      entries.logMood(userId, { score: 4, recordedAt: '2026-03-09T21:00:00Z' });

      expect(analytics.overview(userId)).toEqual({
        week: { workouts: 3, minutes: 95, calories: 600 },
        month: { workouts: 4, minutes: 155, calories: 1000 },
        allTime: { workouts: 5, minutes: 195, calories: 1250 },
        averageDurationMinutes: 39,
        streakDays: 3,
        latestMood: { score: 4, recordedAt: '2026-03-09T21:00:00.000Z' },
        moodEntries: 2,
        moodChartReady: false,
      });
    });

    it('rounds the average duration to one decimal', () => {
      entries.logWorkout(userId, { activityType: 'yoga', durationMinutes: 20, recordedAt: '2026-03-01T07:00:00Z' });
      entries.logWorkout(userId, { activityType: 'yoga', durationMinutes: 25, recordedAt: '2026-03-02T07:00:00Z' });
      entries.logWorkout(userId, { activityType: 'yoga', durationMinutes: 25, recordedAt: '2026-03-03T07:00:00Z' });

      expect(analytics.overview(userId).averageDurationMinutes).toBe(23.3);
    });

    it('marks the mood chart ready from five entries', () => {
      for (let day = 1; day <= 4; day++) {
        entries.logMood(userId, { score: 3, recordedAt: `2026-03-0${day}T21:00:00Z` });
      }
      expect(analytics.overview(userId).moodChartReady).toBe(false);

      entries.logMood(userId, { score: 3, recordedAt: '2026-03-05T21:00:00Z' });
      expect(analytics.overview(userId).moodChartReady).toBe(true);
    });
  });
});
