import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

export function defaultDatabasePath(): string {
  return process.env.DATABASE_PATH || join(__dirname, '../../data', 'fitlistic.db');
}

/**
 * Open a database and bring its schema up to date. Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(pathDirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');

  runMigrations(database);

  return database;
}

export function getDatabase(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  const path = dbPath ?? defaultDatabasePath();
  logger.info({ dbPath: path }, 'Initializing database');
  db = openDatabase(path);
  return db;
}

function runMigrations(db: Database.Database): void {
  logger.debug('Running database migrations');

  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL UNIQUE,
      email TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      first_name TEXT NOT NULL,
      last_name TEXT NOT NULL,
      height_cm REAL,
      weight_kg REAL,
      fitness_goals TEXT NOT NULL DEFAULT '[]',
      created_at INTEGER NOT NULL,
      last_login_at INTEGER
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      token_hash TEXT PRIMARY KEY,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      created_at INTEGER NOT NULL,
      expires_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(user_id);
    CREATE INDEX IF NOT EXISTS idx_sessions_expires ON sessions(expires_at);
  `);

  // Append-only activity log; value/label meaning depends on category
  db.exec(`
    CREATE TABLE IF NOT EXISTS entries (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      category TEXT NOT NULL CHECK (category IN ('workout', 'mood', 'habit')),
      recorded_at INTEGER NOT NULL,
      value REAL NOT NULL,
      label TEXT,
      unit TEXT,
      calories INTEGER,
      note TEXT,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_entries_user_recorded ON entries(user_id, recorded_at);
    CREATE INDEX IF NOT EXISTS idx_entries_user_category ON entries(user_id, category, recorded_at);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS reminders (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      title TEXT NOT NULL,
      due_at INTEGER NOT NULL,
      notes TEXT,
      completed INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_reminders_user_due ON reminders(user_id, due_at);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS coach_messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
      content TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_coach_messages_user ON coach_messages(user_id, id);
  `);

  logger.debug('Database migrations completed');
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
