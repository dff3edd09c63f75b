import type { ActivityType } from '../../persistence/repositories/EntryRepository.js';

/** Metabolic equivalents: kcal burned per kg of body weight per hour. */
export const MET_VALUES: Record<ActivityType, number> = {
  warm_up: 3.5, // light calisthenics
  cool_down: 2.5,
  exercise: 5.0,
  stretching: 2.5,
  breathwork: 2.0,
  meditation: 1.3, // seated
  cardio: 7.0, // moderate
  strength: 5.0,
  hiit: 8.0,
  yoga: 3.0, // hatha
  pilates: 3.5,
  unknown: 3.0,
};

export const DEFAULT_WEIGHT_KG = 70;

export function estimateCaloriesBurned(
  activityType: ActivityType,
  durationMinutes: number,
  weightKg: number = DEFAULT_WEIGHT_KG
): number {
  return Math.round(MET_VALUES[activityType] * weightKg * (durationMinutes / 60));
}
