/**
 * db/index.ts
 * SQLite DB holding the single trivia config row.
 */
import Database from 'better-sqlite3';
import path from 'path';

export type TriviaDatabase = Database.Database;

export function openDatabase(file: string): TriviaDatabase {
    const db = new Database(file === ':memory:' ? file : path.resolve(file));

    // id is pinned to 1: there is at most one trivia config
    db.exec(`CREATE TABLE IF NOT EXISTS trivia_config (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  channel_id TEXT NOT NULL,
  schedule TEXT NOT NULL,
  last_sent_date TEXT,
  updated_at TEXT DEFAULT CURRENT_TIMESTAMP
)`);

    return db;
}

export function isDatabaseHealthy(db: TriviaDatabase): boolean {
    const row = db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
    return row?.ok === 1;
}
