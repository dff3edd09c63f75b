import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export const ENTRY_CATEGORIES = ['workout', 'mood', 'habit'] as const;
export type EntryCategory = (typeof ENTRY_CATEGORIES)[number];

export const ACTIVITY_TYPES = [
  'warm_up',
  'cool_down',
  'exercise',
  'stretching',
  'breathwork',
  'meditation',
  'cardio',
  'strength',
  'hiit',
  'yoga',
  'pilates',
  'unknown',
] as const;
export type ActivityType = (typeof ACTIVITY_TYPES)[number];

interface EntryBase {
  id: number;
  userId: number;
  /** When the activity happened (epoch ms) */
  recordedAt: number;
  note?: string;
  createdAt: number;
}

export interface WorkoutEntry extends EntryBase {
  category: 'workout';
  activityType: ActivityType;
  durationMinutes: number;
  caloriesBurned: number;
}

export interface MoodEntry extends EntryBase {
  category: 'mood';
  /** Well-being score, 1 (low) to 5 (great) */
  score: number;
}

export interface HabitEntry extends EntryBase {
  category: 'habit';
  habit: string;
  value: number;
  unit?: string;
}

export type Entry = WorkoutEntry | MoodEntry | HabitEntry;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type EntryInput = DistributiveOmit<Entry, 'id' | 'createdAt'>;

export interface EntryFilter {
  category?: EntryCategory;
  /** Inclusive lower bound on recordedAt (epoch ms) */
  start?: number;
  /** Exclusive upper bound on recordedAt (epoch ms) */
  end?: number;
  limit?: number;
  offset?: number;
}

type EntryRow = {
  id: number;
  user_id: number;
  category: EntryCategory;
  recorded_at: number;
  value: number;
  label: string | null;
  unit: string | null;
  calories: number | null;
  note: string | null;
  created_at: number;
};

function toActivityType(label: string | null): ActivityType {
  return ACTIVITY_TYPES.find((type) => type === label) ?? 'unknown';
}

function rowToEntry(row: EntryRow): Entry {
  const base = {
    id: row.id,
    userId: row.user_id,
    recordedAt: row.recorded_at,
    createdAt: row.created_at,
    ...(row.note != null ? { note: row.note } : {}),
  };

  switch (row.category) {
    case 'workout':
      return {
        ...base,
        category: 'workout',
        activityType: toActivityType(row.label),
        durationMinutes: row.value,
        caloriesBurned: row.calories ?? 0,
      };
    case 'mood':
      return { ...base, category: 'mood', score: row.value };
    case 'habit': {
      const entry: HabitEntry = { ...base, category: 'habit', habit: row.label ?? '', value: row.value };
      if (row.unit != null) entry.unit = row.unit;
      return entry;
    }
  }
}

/** Flatten an entry into the shared column layout. */
function entryColumns(input: EntryInput): { value: number; label: string | null; unit: string | null; calories: number | null } {
  switch (input.category) {
    case 'workout':
      return { value: input.durationMinutes, label: input.activityType, unit: 'min', calories: input.caloriesBurned };
    case 'mood':
      return { value: input.score, label: null, unit: null, calories: null };
    case 'habit':
      return { value: input.value, label: input.habit, unit: input.unit ?? null, calories: null };
  }
}

export class EntryRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  create(input: EntryInput, now = Date.now()): Entry {
    const columns = entryColumns(input);
    const result = this.db
      .prepare(
        `INSERT INTO entries (user_id, category, recorded_at, value, label, unit, calories, note, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        input.userId,
        input.category,
        input.recordedAt,
        columns.value,
        columns.label,
        columns.unit,
        columns.calories,
        input.note ?? null,
        now
      );

    const created = this.getById(input.userId, Number(result.lastInsertRowid));
    if (!created) {
      throw new Error('Entry vanished right after insert');
    }
    return created;
  }

  getById(userId: number, entryId: number): Entry | null {
    const row = this.db
      .prepare('SELECT * FROM entries WHERE id = ? AND user_id = ?')
      .get(entryId, userId) as EntryRow | undefined;
    return row ? rowToEntry(row) : null;
  }

  /** Newest first. */
  list(userId: number, filter: EntryFilter = {}): Entry[] {
    const { clause, values } = buildWhere(userId, filter);
    let sql = `SELECT * FROM entries WHERE ${clause} ORDER BY recorded_at DESC, id DESC`;
    if (filter.limit !== undefined) {
      sql += ' LIMIT ? OFFSET ?';
      values.push(filter.limit, filter.offset ?? 0);
    }
    const rows = this.db.prepare(sql).all(...values) as EntryRow[];
    return rows.map(rowToEntry);
  }

  count(userId: number, filter: Omit<EntryFilter, 'limit' | 'offset'> = {}): number {
    const { clause, values } = buildWhere(userId, filter);
    const row = this.db.prepare(`SELECT COUNT(*) AS count FROM entries WHERE ${clause}`).get(...values) as {
      count: number;
    };
    return row.count;
  }

  /** Most recent entry of a category, or null. */
  getLatest(userId: number, category: EntryCategory): Entry | null {
    const row = this.db
      .prepare(
        'SELECT * FROM entries WHERE user_id = ? AND category = ? ORDER BY recorded_at DESC, id DESC LIMIT 1'
      )
      .get(userId, category) as EntryRow | undefined;
    return row ? rowToEntry(row) : null;
  }

  delete(userId: number, entryId: number): boolean {
    const result = this.db.prepare('DELETE FROM entries WHERE id = ? AND user_id = ?').run(entryId, userId);
    return result.changes > 0;
  }
}

function buildWhere(userId: number, filter: EntryFilter): { clause: string; values: unknown[] } {
  const conditions = ['user_id = ?'];
  const values: unknown[] = [userId];

  if (filter.category !== undefined) {
    conditions.push('category = ?');
    values.push(filter.category);
  }
  if (filter.start !== undefined) {
    conditions.push('recorded_at >= ?');
    values.push(filter.start);
  }
  if (filter.end !== undefined) {
    conditions.push('recorded_at < ?');
    values.push(filter.end);
  }

  return { clause: conditions.join(' AND '), values };
}
