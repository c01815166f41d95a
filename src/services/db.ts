import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS conversation_contexts (
    conversation_id TEXT PRIMARY KEY,
    payload TEXT NOT NULL,
    last_activity_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_conversation_contexts_activity
    ON conversation_contexts(last_activity_at);

  CREATE TABLE IF NOT EXISTS stats_counters (
    category TEXT NOT NULL,
    name TEXT NOT NULL,
    count INTEGER NOT NULL DEFAULT 0,
    updated_at INTEGER NOT NULL,
    PRIMARY KEY (category, name)
  );
`;

/**
 * Open (or create) the assistant database and apply the schema. Pass
 * `':memory:'` for a throwaway database.
 */
export function openDatabase(filePath: string): SqliteDatabase {
  if (filePath !== ':memory:') {
    const directory = path.dirname(path.resolve(filePath));
    if (!fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }
  }

  const db = new Database(filePath);
  if (filePath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);
  return db;
}
