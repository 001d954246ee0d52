import Database from 'better-sqlite3';
import { dbLogger } from '../utils/logger';

export type SqliteDatabase = Database.Database;

// Complete SQLite schema. Timestamps are ISO-8601 text so lexical
// comparison matches chronological order.
const SCHEMA = `
  -- Users table
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    full_name TEXT NOT NULL,
    role TEXT NOT NULL DEFAULT 'citizen',
    commune TEXT,
    points INTEGER NOT NULL DEFAULT 0,
    subscription_active INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  -- Reports table
  CREATE TABLE IF NOT EXISTS reports (
    id TEXT PRIMARY KEY,
    latitude REAL NOT NULL,
    longitude REAL NOT NULL,
    address_description TEXT,
    description TEXT,
    image_url TEXT NOT NULL,
    weight_kg REAL,
    weight_verified_at TEXT,
    weight_verified_by TEXT REFERENCES users(id) ON DELETE SET NULL,
    description_quality_score INTEGER,
    status TEXT NOT NULL DEFAULT 'PENDING',
    cleanup_photo_url TEXT,
    cleanup_photo_submitted_at TEXT,
    citizen_confirmed INTEGER NOT NULL DEFAULT 0,
    citizen_confirmed_at TEXT,
    confirmation_code TEXT UNIQUE,
    confirmation_deadline TEXT,
    auto_confirmed INTEGER NOT NULL DEFAULT 0,
    dispute_reason TEXT,
    last_action TEXT,
    last_action_at TEXT,
    created_at TEXT NOT NULL,
    resolved_at TEXT,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    collector_id TEXT REFERENCES users(id) ON DELETE SET NULL
  );

  -- Subscriptions table
  CREATE TABLE IF NOT EXISTS subscriptions (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    is_active INTEGER NOT NULL DEFAULT 1,
    start_date TEXT NOT NULL,
    end_date TEXT
  );

  -- Point credit ledger
  CREATE TABLE IF NOT EXISTS point_credits (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    source_key TEXT NOT NULL,
    component TEXT NOT NULL,
    points INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    UNIQUE (source_key, component)
  );

  -- Notifications table
  CREATE TABLE IF NOT EXISTS notifications (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    type TEXT NOT NULL,
    title TEXT NOT NULL,
    message TEXT NOT NULL,
    data TEXT DEFAULT '{}',
    is_read INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  -- Indexes
  CREATE INDEX IF NOT EXISTS idx_reports_status ON reports(status);
  CREATE INDEX IF NOT EXISTS idx_reports_deadline ON reports(status, confirmation_deadline);
  CREATE INDEX IF NOT EXISTS idx_reports_user_id ON reports(user_id);
  CREATE INDEX IF NOT EXISTS idx_subscriptions_user_id ON subscriptions(user_id);
  CREATE INDEX IF NOT EXISTS idx_point_credits_user_id ON point_credits(user_id);
  CREATE INDEX IF NOT EXISTS idx_notifications_user_id ON notifications(user_id);
  CREATE INDEX IF NOT EXISTS idx_notifications_created_at ON notifications(created_at);
`;

/**
 * Open (or create) a SQLite database with the full schema applied.
 * Pass ':memory:' for a throwaway database.
 */
export const createSqliteDatabase = (filename: string): SqliteDatabase => {
  const db = new Database(filename);

  // WAL only applies to file-backed databases
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.pragma('synchronous = NORMAL');

  db.exec(SCHEMA);

  dbLogger.debug({ filename }, 'SQLite database initialized');
  return db;
};
