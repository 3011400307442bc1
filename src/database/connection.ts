/**
 * Database Connection Module
 *
 * One SQLite connection per process, opened lazily at ~/.concierge/concierge.db
 * (or CONCIERGE_DB_PATH). Tests open their own connection with
 * `openDatabase()` against a temp file.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDbPath } from '../config/paths.js';
import { DatabaseError } from '../errors/index.js';

let db: Database.Database | null = null;

/**
 * Open a connection with foreign keys and WAL enabled.
 */
export function openDatabase(path: string): Database.Database {
  try {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    const connection = new Database(path);
    // OFF by default in SQLite
    connection.pragma('foreign_keys = ON');
    connection.pragma('journal_mode = WAL');
    return connection;
  } catch (error) {
    throw new DatabaseError(
      `Failed to open database at ${path}`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Get the process-wide connection, opening it on first use.
 *
 * @example
 * ```ts
 * const db = getDb();
 * const sessions = db.prepare('SELECT id FROM sessions').all();
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(getDbPath());

  process.on('exit', () => closeDb());
  return db;
}

/**
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
