import type Database from 'better-sqlite3';
import { getDb, openDatabase } from './connection.js';
import { runMigrations } from './migrate.js';
import { DatabaseError } from '../errors/index.js';

/**
 * Open a connection (the process singleton when no path is given) and bring
 * its schema up to date.
 *
 * @throws DatabaseError if any migration fails
 */
export function openMigratedDatabase(path?: string): Database.Database {
  const db = path === undefined ? getDb() : openDatabase(path);
  const result = runMigrations(db);
  const [first] = result.failed;
  if (first) {
    throw new DatabaseError(`Migration ${first.name} failed: ${first.error}`);
  }
  return db;
}
