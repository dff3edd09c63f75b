import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import { ConflictError, isSqliteError } from '../../utils/errors.js';

export const FITNESS_GOALS = [
  'Flexibility',
  'Better Mental Health',
  'Stress Resilience',
  'General Fitness',
  'Weight Loss',
  'Muscle Gain',
] as const;

export type FitnessGoal = (typeof FITNESS_GOALS)[number];

export interface UserProfile {
  firstName: string;
  lastName: string;
  email: string;
  /** Height in cm */
  heightCm?: number;
  /** Weight in kg */
  weightKg?: number;
  fitnessGoals: FitnessGoal[];
}

export interface User extends UserProfile {
  id: number;
  username: string;
  createdAt: number;
  lastLoginAt?: number;
}

/** A user row including the credential hash. Never leaves the auth and profile services. */
export interface UserWithCredentials extends User {
  passwordHash: string;
}

export type UserInput = Omit<UserWithCredentials, 'id' | 'createdAt' | 'lastLoginAt'>;

type UserRow = {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  height_cm: number | null;
  weight_kg: number | null;
  fitness_goals: string;
  created_at: number;
  last_login_at: number | null;
};

function parseGoals(raw: string): FitnessGoal[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  const stored: unknown[] = parsed;
  // Saved order is kept; names no longer in FITNESS_GOALS are dropped
  return stored.filter((goal): goal is FitnessGoal => FITNESS_GOALS.some((known) => known === goal));
}

function rowToUser(row: UserRow): UserWithCredentials {
  const user: UserWithCredentials = {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    firstName: row.first_name,
    lastName: row.last_name,
    fitnessGoals: parseGoals(row.fitness_goals),
    createdAt: row.created_at,
  };
  if (row.height_cm != null) user.heightCm = row.height_cm;
  if (row.weight_kg != null) user.weightKg = row.weight_kg;
  if (row.last_login_at != null) user.lastLoginAt = row.last_login_at;
  return user;
}

export function withoutCredentials(user: UserWithCredentials): User {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export class UserRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  create(input: UserInput, now = Date.now()): UserWithCredentials {
    const stmt = this.db.prepare(`
      INSERT INTO users (
        username, email, password_hash, first_name, last_name,
        height_cm, weight_kg, fitness_goals, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    try {
      const result = stmt.run(
        input.username,
        input.email,
        input.passwordHash,
        input.firstName,
        input.lastName,
        input.heightCm ?? null,
        input.weightKg ?? null,
        JSON.stringify(input.fitnessGoals),
        now
      );
      return {
        id: Number(result.lastInsertRowid),
        ...input,
        createdAt: now,
      };
    } catch (error) {
      if (isSqliteError(error) && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
        throw new ConflictError('Username or email already registered', { cause: error });
      }
      throw error;
    }
  }

  getById(id: number): UserWithCredentials | null {
    const row = this.db.prepare('SELECT * FROM users WHERE id = ?').get(id) as UserRow | undefined;
    return row ? rowToUser(row) : null;
  }

  getByUsername(username: string): UserWithCredentials | null {
    const row = this.db
      .prepare('SELECT * FROM users WHERE username = ?')
      .get(username.toLowerCase()) as UserRow | undefined;
    return row ? rowToUser(row) : null;
  }

  getByEmail(email: string): UserWithCredentials | null {
    const row = this.db
      .prepare('SELECT * FROM users WHERE email = ?')
      .get(email.toLowerCase()) as UserRow | undefined;
    return row ? rowToUser(row) : null;
  }

  recordLogin(id: number, at: number): void {
    this.db.prepare('UPDATE users SET last_login_at = ? WHERE id = ?').run(at, id);
  }

  /** Update only provided fields. Returns the updated user or null if not found. */
  updateProfile(id: number, partial: Partial<UserProfile>): UserWithCredentials | null {
    const updates: string[] = [];
    const values: unknown[] = [];

    if (partial.firstName !== undefined) {
      updates.push('first_name = ?');
      values.push(partial.firstName);
    }
    if (partial.lastName !== undefined) {
      updates.push('last_name = ?');
      values.push(partial.lastName);
    }
    if (partial.email !== undefined) {
      updates.push('email = ?');
      values.push(partial.email.toLowerCase());
    }
    if (partial.heightCm !== undefined) {
      updates.push('height_cm = ?');
      values.push(partial.heightCm);
    }
    if (partial.weightKg !== undefined) {
      updates.push('weight_kg = ?');
      values.push(partial.weightKg);
    }
    if (partial.fitnessGoals !== undefined) {
      updates.push('fitness_goals = ?');
      values.push(JSON.stringify(partial.fitnessGoals));
    }

    if (updates.length > 0) {
      values.push(id);
      try {
        this.db.prepare(`UPDATE users SET ${updates.join(', ')} WHERE id = ?`).run(...values);
      } catch (error) {
        if (isSqliteError(error) && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
          throw new ConflictError('Email already registered', { cause: error });
        }
        throw error;
      }
    }
    return this.getById(id);
  }

  updatePasswordHash(id: number, passwordHash: string): boolean {
    const result = this.db.prepare('UPDATE users SET password_hash = ? WHERE id = ?').run(passwordHash, id);
    return result.changes > 0;
  }

  /** Removes the user; sessions, entries, reminders and coach messages go with it. */
  delete(id: number): boolean {
    const result = this.db.prepare('DELETE FROM users WHERE id = ?').run(id);
    return result.changes > 0;
  }
}
