/**
 * Database Migration Runner
 *
 * Applies embedded SQL migrations in order, recording each in `_migrations`.
 * Safe to run on every command.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { getDb } from './connection.js';
import { validateRows } from './validation.js';

export interface MigrationResult {
  /** Names of migrations applied by this call */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// Connections that have been fully migrated this process
let migrated = new WeakSet<Database.Database>();

// ============================================================================
// Embedded Migrations
// ============================================================================

const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-sessions.sql',
    sql: `
CREATE TABLE IF NOT EXISTS sessions (
  id TEXT PRIMARY KEY,
  created_at INTEGER NOT NULL
);

-- Append-only conversation log, ordered by turn_index
CREATE TABLE IF NOT EXISTS turns (
  session_id TEXT NOT NULL,
  turn_index INTEGER NOT NULL,
  role TEXT NOT NULL CHECK (role IN ('user', 'system')),
  text TEXT NOT NULL,
  responder TEXT,
  timestamp INTEGER NOT NULL,
  PRIMARY KEY (session_id, turn_index),
  FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
);

-- One current value per entity type
CREATE TABLE IF NOT EXISTS entities (
  session_id TEXT NOT NULL,
  entity_type TEXT NOT NULL,
  value TEXT NOT NULL,
  confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
  updated_at INTEGER NOT NULL,
  PRIMARY KEY (session_id, entity_type),
  FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
);
`,
  },
  {
    name: '002-vectors.sql',
    sql: `
CREATE TABLE IF NOT EXISTS vectors (
  namespace TEXT NOT NULL,
  id TEXT NOT NULL,
  embedding BLOB NOT NULL,
  dimensions INTEGER NOT NULL,
  metadata TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (namespace, id)
);
`,
  },
  {
    name: '003-eval.sql',
    sql: `
CREATE TABLE IF NOT EXISTS eval_runs (
  id TEXT PRIMARY KEY,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  config TEXT NOT NULL,
  cell_count INTEGER NOT NULL DEFAULT 0,
  failed_count INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS eval_cells (
  run_id TEXT NOT NULL,
  chunk_strategy TEXT NOT NULL,
  retrieval_strategy TEXT NOT NULL,
  query_id TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('scored', 'failed')),
  faithfulness REAL,
  relevancy REAL,
  correctness REAL,
  answer TEXT,
  error TEXT,
  attempts INTEGER NOT NULL,
  PRIMARY KEY (run_id, chunk_strategy, retrieval_strategy, query_id),
  FOREIGN KEY (run_id) REFERENCES eval_runs(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_eval_runs_started ON eval_runs(started_at DESC);
`,
  },
];

const MigrationRowSchema = z.object({ name: z.string(), applied_at: z.string() });

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

/**
 * Apply pending migrations, each in its own transaction. A failure is
 * recorded and the remaining migrations still run; the connection is only
 * marked as migrated when nothing failed.
 *
 * @example
 * ```ts
 * const result = runMigrations();
 * if (result.failed.length > 0) {
 *   throw new DatabaseError(`Migration failed: ${result.failed[0].error}`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database = getDb()): MigrationResult {
  if (migrated.has(db)) {
    return { applied: [], failed: [] };
  }

  ensureMigrationsTable(db);
  const done = new Set(getAppliedMigrations(db).map((row) => row.name));
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  for (const migration of MIGRATIONS) {
    if (done.has(migration.name)) {
      continue;
    }
    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  if (failed.length === 0) {
    migrated.add(db);
  }
  return { applied, failed };
}

export function getAppliedMigrations(
  db: Database.Database = getDb()
): Array<{ name: string; applied_at: string }> {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();
  if (!tableExists) {
    return [];
  }
  return validateRows(
    MigrationRowSchema,
    db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all(),
    '_migrations'
  );
}

/**
 * Forget which connections were migrated, so the next call re-checks.
 */
export function resetMigrationState(): void {
  migrated = new WeakSet();
}

export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
