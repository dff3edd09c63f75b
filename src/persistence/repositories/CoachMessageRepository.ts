import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export interface CoachMessage {
  id: number;
  role: 'user' | 'assistant';
  content: string;
  createdAt: number;
}

type CoachMessageRow = {
  id: number;
  role: 'user' | 'assistant';
  content: string;
  created_at: number;
};

export class CoachMessageRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  save(userId: number, role: CoachMessage['role'], content: string, now = Date.now()): CoachMessage {
    const result = this.db
      .prepare('INSERT INTO coach_messages (user_id, role, content, created_at) VALUES (?, ?, ?, ?)')
      .run(userId, role, content, now);
    return { id: Number(result.lastInsertRowid), role, content, createdAt: now };
  }

  /**
   * Get the conversation for a user in chronological order (oldest first),
   * limited to the most recent `limit` messages.
   */
  getConversation(userId: number, limit = 20): CoachMessage[] {
    const rows = this.db
      .prepare('SELECT id, role, content, created_at FROM coach_messages WHERE user_id = ? ORDER BY id DESC LIMIT ?')
      .all(userId, limit) as CoachMessageRow[];

    return rows.reverse().map((row) => ({
      id: row.id,
      role: row.role,
      content: row.content,
      createdAt: row.created_at,
    }));
  }

  clear(userId: number): number {
    const result = this.db.prepare('DELETE FROM coach_messages WHERE user_id = ?').run(userId);
    return result.changes;
  }
}
