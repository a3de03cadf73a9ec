import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { logger } from '@parley/shared';

const log = logger.child({ module: 'db' });

const DB_FILE = 'parley.db';

let db: Database.Database | undefined;

function migrate(conn: Database.Database): void {
  conn.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      session_id     TEXT PRIMARY KEY,
      created_at     TEXT NOT NULL,
      last_active_at TEXT NOT NULL,
      system_prompt  TEXT NOT NULL DEFAULT '',
      user_info      TEXT NOT NULL DEFAULT '{}',
      messages       TEXT NOT NULL DEFAULT '[]'
    )
  `);
  conn.exec('CREATE INDEX IF NOT EXISTS idx_sessions_last_active ON sessions(last_active_at)');

  conn.exec(`
    CREATE TABLE IF NOT EXISTS roles (
      role_id    TEXT PRIMARY KEY,
      category   TEXT NOT NULL,
      user_id    TEXT,
      is_system  INTEGER NOT NULL DEFAULT 0,
      updated_at TEXT NOT NULL,
      data       TEXT NOT NULL
    )
  `);
  conn.exec('CREATE INDEX IF NOT EXISTS idx_roles_category ON roles(category)');
  conn.exec('CREATE INDEX IF NOT EXISTS idx_roles_user ON roles(user_id)');
}

/** Shared connection to `<dataDir>/parley.db`, opened and migrated on first use. */
export function getDb(dataDir: string = process.env.DATA_DIR ?? './data'): Database.Database {
  if (db) return db;

  mkdirSync(dataDir, { recursive: true });
  const file = path.join(dataDir, DB_FILE);
  log.info({ path: file }, 'opening SQLite database');
  const conn = new Database(file);

  conn.pragma('journal_mode = WAL');
  conn.pragma('busy_timeout = 5000');

  migrate(conn);
  db = conn;
  return conn;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
    log.info('database closed');
  }
}
