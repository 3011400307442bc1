/**
 * Database Module
 *
 * SQLite persistence for sessions, vectors and evaluation runs.
 */

export { getDb, openDatabase, closeDb } from './connection.js';

export {
  runMigrations,
  getAppliedMigrations,
  resetMigrationState,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

export { embeddingToBlob, blobToEmbedding, isoNow } from './schema.js';

export {
  SessionRowSchema,
  TurnRowSchema,
  EntityRowSchema,
  VectorRowSchema,
  EvalRunRowSchema,
  EvalCellRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
  type SessionRow,
  type TurnRow,
  type EntityRow,
  type VectorRow,
  type EvalRunRow,
  type EvalCellRow,
} from './validation.js';

export { openMigratedDatabase } from './setup.js';
