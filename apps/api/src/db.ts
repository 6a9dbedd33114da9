import Database from "better-sqlite3";

export type Db = Database.Database;

const SCHEMA_VERSION = 1;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    email TEXT NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    role TEXT NOT NULL DEFAULT 'USER' CHECK (role IN ('ADMIN', 'USER')),
    first_name TEXT,
    last_name TEXT,
    phone TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    last_login TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_users_created_at ON users(created_at);

  CREATE TABLE IF NOT EXISTS activity_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
    action TEXT NOT NULL,
    description TEXT,
    ip_address TEXT,
    timestamp TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_activity_log_timestamp ON activity_log(timestamp);
  CREATE INDEX IF NOT EXISTS idx_activity_log_user ON activity_log(user_id, timestamp);

  -- user_id stays writable so ON DELETE SET NULL keeps working
  CREATE TRIGGER IF NOT EXISTS activity_log_immutable
  BEFORE UPDATE OF action, description, ip_address, timestamp ON activity_log
  BEGIN
    SELECT RAISE(ABORT, 'activity log entries are immutable');
  END;
`;

export function migrate(db: Db): void {
  db.exec(SCHEMA);
  db.pragma(`user_version = ${SCHEMA_VERSION}`);
}

/**
 * Open (or create) the SQLite database and make sure the schema exists.
 */
export function openDatabase(filename: string): Db {
  const db = new Database(filename);
  if (filename !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  migrate(db);
  return db;
}
