/**
 * SQLite connection and schema
 */

import Database from 'better-sqlite3';
import { DatabaseError, toError } from '../errors/index.js';

export type CapturerDatabase = Database.Database;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS accounts (
  username TEXT PRIMARY KEY,
  password TEXT,
  misc TEXT,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS schedules (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  start_time TEXT NOT NULL,
  duration_minutes INTEGER NOT NULL,
  enabled INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL
);
`;

/**
 * Open (or create) the database file and apply the schema.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(path: string): CapturerDatabase {
  try {
    const db = new Database(path);
    db.pragma('journal_mode = WAL');
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    throw new DatabaseError(`Failed to open database: ${toError(error).message}`, { path });
  }
}
