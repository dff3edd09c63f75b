import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export interface Session {
  tokenHash: string;
  userId: number;
  createdAt: number;
  expiresAt: number;
}

type SessionRow = {
  token_hash: string;
  user_id: number;
  created_at: number;
  expires_at: number;
};

function rowToSession(row: SessionRow): Session {
  return {
    tokenHash: row.token_hash,
    userId: row.user_id,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
  };
}

export class SessionRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  create(session: Session): Session {
    this.db
      .prepare('INSERT INTO sessions (token_hash, user_id, created_at, expires_at) VALUES (?, ?, ?, ?)')
      .run(session.tokenHash, session.userId, session.createdAt, session.expiresAt);
    return session;
  }

  getByTokenHash(tokenHash: string): Session | null {
    const row = this.db
      .prepare('SELECT * FROM sessions WHERE token_hash = ?')
      .get(tokenHash) as SessionRow | undefined;
    return row ? rowToSession(row) : null;
  }

  countForUser(userId: number): number {
    const row = this.db
      .prepare('SELECT COUNT(*) AS count FROM sessions WHERE user_id = ?')
      .get(userId) as { count: number };
    return row.count;
  }

  delete(tokenHash: string): boolean {
    const result = this.db.prepare('DELETE FROM sessions WHERE token_hash = ?').run(tokenHash);
    return result.changes > 0;
  }

  /** Drop every session of a user except the one given. */
  deleteOthers(userId: number, keepTokenHash?: string): number {
    const result = this.db
      .prepare('DELETE FROM sessions WHERE user_id = ? AND token_hash != ?')
      .run(userId, keepTokenHash ?? '');
    return result.changes;
  }

  deleteExpired(now: number): number {
    const result = this.db.prepare('DELETE FROM sessions WHERE expires_at <= ?').run(now);
    return result.changes;
  }
}
