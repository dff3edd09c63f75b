import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export interface Reminder {
  id: number;
  userId: number;
  title: string;
  dueAt: number;
  notes?: string;
  completed: boolean;
  createdAt: number;
}

export type ReminderInput = Omit<Reminder, 'id' | 'createdAt' | 'completed'>;

type ReminderRow = {
  id: number;
  user_id: number;
  title: string;
  due_at: number;
  notes: string | null;
  completed: number;
  created_at: number;
};

function rowToReminder(row: ReminderRow): Reminder {
  const reminder: Reminder = {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    dueAt: row.due_at,
    completed: row.completed === 1,
    createdAt: row.created_at,
  };
  if (row.notes != null) reminder.notes = row.notes;
  return reminder;
}

export class ReminderRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  create(input: ReminderInput, now = Date.now()): Reminder {
    const result = this.db
      .prepare('INSERT INTO reminders (user_id, title, due_at, notes, created_at) VALUES (?, ?, ?, ?, ?)')
      .run(input.userId, input.title, input.dueAt, input.notes ?? null, now);
    return {
      id: Number(result.lastInsertRowid),
      ...input,
      completed: false,
      createdAt: now,
    };
  }

  getById(userId: number, reminderId: number): Reminder | null {
    const row = this.db
      .prepare('SELECT * FROM reminders WHERE id = ? AND user_id = ?')
      .get(reminderId, userId) as ReminderRow | undefined;
    return row ? rowToReminder(row) : null;
  }

  /** Soonest first. */
  list(userId: number, includeCompleted = true): Reminder[] {
    const sql = includeCompleted
      ? 'SELECT * FROM reminders WHERE user_id = ? ORDER BY due_at ASC, id ASC'
      : 'SELECT * FROM reminders WHERE user_id = ? AND completed = 0 ORDER BY due_at ASC, id ASC';
    const rows = this.db.prepare(sql).all(userId) as ReminderRow[];
    return rows.map(rowToReminder);
  }

  setCompleted(userId: number, reminderId: number, completed: boolean): Reminder | null {
    const result = this.db
      .prepare('UPDATE reminders SET completed = ? WHERE id = ? AND user_id = ?')
      .run(completed ? 1 : 0, reminderId, userId);
    if (result.changes === 0) return null;
    return this.getById(userId, reminderId);
  }

  delete(userId: number, reminderId: number): boolean {
    const result = this.db.prepare('DELETE FROM reminders WHERE id = ? AND user_id = ?').run(reminderId, userId);
    return result.changes > 0;
  }
}
