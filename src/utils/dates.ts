const DAY_MS = 24 * 60 * 60 * 1000;

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** YYYY-MM-DD of the UTC day containing `date`. */
export function toIsoDate(date: Date): string {
  return date.toISOString().split('T')[0] ?? '';
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Monday 00:00 UTC of the week containing `date`. */
export function startOfUtcWeek(date: Date): Date {
  const day = startOfUtcDay(date);
  const daysSinceMonday = (day.getUTCDay() + 6) % 7;
  return addDays(day, -daysSinceMonday);
}

/** Whole UTC days from `from` to `to` (both truncated to their day). */
export function daysBetween(from: Date, to: Date): number {
  return Math.round((startOfUtcDay(to).getTime() - startOfUtcDay(from).getTime()) / DAY_MS);
}

/** Parses YYYY-MM-DD as midnight UTC; null when malformed or not a real calendar day. */
export function parseIsoDate(value: string): Date | null {
  if (!ISO_DATE_PATTERN.test(value)) return null;
  const date = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(date.getTime()) || toIsoDate(date) !== value) return null;
  return date;
}

export interface DateRange {
  /** Inclusive lower bound, epoch ms. */
  start?: number;
  /** Exclusive upper bound, epoch ms. */
  end?: number;
}

/** Turns inclusive YYYY-MM-DD bounds into an epoch-ms half-open range. */
export function toDateRange(from?: string, to?: string): DateRange {
  const range: DateRange = {};
  if (from) {
    const start = parseIsoDate(from);
    if (start) range.start = start.getTime();
  }
  if (to) {
    const end = parseIsoDate(to);
    if (end) range.end = addDays(end, 1).getTime();
  }
  return range;
}

export { DAY_MS };

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
