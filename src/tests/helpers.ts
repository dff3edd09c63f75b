import type { Database } from 'better-sqlite3';
import { openDatabase } from '../persistence/database.js';
import { EntryRepository } from '../persistence/repositories/EntryRepository.js';
import { SessionRepository } from '../persistence/repositories/SessionRepository.js';
import { UserRepository } from '../persistence/repositories/UserRepository.js';
import type { RegisterInput } from '../core/auth/schemas.js';
import { ValidationError, type ErrorDetail } from '../utils/errors.js';

/** Lowest cost bcryptjs accepts; keeps hashing in tests fast. */
export const TEST_BCRYPT_ROUNDS = 4;
export const TEST_PASSWORD = 'test-password';

export interface TestClock {
  (): Date;
  set(iso: string): void;
  advanceHours(hours: number): void;
  advanceDays(days: number): void;
}

export function createClock(iso: string): TestClock {
  let now = new Date(iso);
  const advanceHours = (hours: number): void => {
    now = new Date(now.getTime() + hours * 60 * 60 * 1000);
  };
  return Object.assign(() => new Date(now.getTime()), {
    set: (next: string): void => {
      now = new Date(next);
    },
    advanceHours,
    advanceDays: (days: number): void => advanceHours(days * 24),
  });
}

export interface TestStore {
  db: Database;
  users: UserRepository;
  sessions: SessionRepository;
  entries: EntryRepository;
}

export function createTestStore(): TestStore {
  const db = openDatabase(':memory:');
  return {
    db,
    users: new UserRepository(db),
    sessions: new SessionRepository(db),
    entries: new EntryRepository(db),
  };
}

export function registration(overrides: Partial<RegisterInput> = {}): RegisterInput {
  return {
    username: 'alex',
    email: 'alex@example.com',
    password: TEST_PASSWORD,
    passwordConfirm: TEST_PASSWORD,
    firstName: 'Alex',
    lastName: 'Doe',
    ...overrides,
  };
}

/** Inserts a user straight through the repository, skipping password hashing. */
export function insertUser(
  users: UserRepository,
  overrides: { username?: string; weightKg?: number; heightCm?: number } = {},
  now = Date.parse('2026-01-01T00:00:00.000Z')
): number {
  const username = overrides.username ?? 'alex';
  return users.create(
    {
      username,
      email: `${username}@example.com`,
      passwordHash: 'not-a-hash',
      firstName: 'Alex',
      lastName: 'Doe',
      heightCm: overrides.heightCm,
      weightKg: overrides.weightKg,
      fitnessGoals: [],
    },
    now
  ).id;
}

/** The error a call throws, or undefined when it returns. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

export function detailsOf(error: unknown): ErrorDetail[] {
  return error instanceof ValidationError ? error.details : [];
}
