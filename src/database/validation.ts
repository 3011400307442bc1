/**
 * Database Row Validation
 *
 * better-sqlite3 returns `unknown` rows. Every read goes through one of these
 * schemas so a drifted database fails loudly instead of leaking a bad shape.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM sessions WHERE id = ?').get(id);
 * return row ? validateRow(SessionRowSchema, row, `sessions.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Session tables
// ============================================================================

export const SessionRowSchema = z.object({
  id: z.string(),
  created_at: z.number().int(),
});
export type SessionRow = z.infer<typeof SessionRowSchema>;

export const TurnRowSchema = z.object({
  session_id: z.string(),
  turn_index: z.number().int().nonnegative(),
  role: z.enum(['user', 'system']),
  text: z.string(),
  responder: z.string().nullable(),
  timestamp: z.number().int(),
});
export type TurnRow = z.infer<typeof TurnRowSchema>;

export const EntityRowSchema = z.object({
  session_id: z.string(),
  entity_type: z.string(),
  value: z.string(),
  confidence: z.number().min(0).max(1),
  updated_at: z.number().int(),
});
export type EntityRow = z.infer<typeof EntityRowSchema>;

// ============================================================================
// Vector table
// ============================================================================

export const VectorRowSchema = z.object({
  namespace: z.string(),
  id: z.string(),
  // BLOBs come back as Buffers
  embedding: z.instanceof(Buffer),
  dimensions: z.number().int().positive(),
  metadata: z.string(),
});
export type VectorRow = z.infer<typeof VectorRowSchema>;

// ============================================================================
// Evaluation tables
// ============================================================================

export const EvalRunRowSchema = z.object({
  id: z.string(),
  started_at: z.string(),
  completed_at: z.string().nullable(),
  config: z.string(),
  cell_count: z.number().int().nonnegative(),
  failed_count: z.number().int().nonnegative(),
});
export type EvalRunRow = z.infer<typeof EvalRunRowSchema>;

export const EvalCellRowSchema = z.object({
  run_id: z.string(),
  chunk_strategy: z.string(),
  retrieval_strategy: z.string(),
  query_id: z.string(),
  status: z.enum(['scored', 'failed']),
  faithfulness: z.number().nullable(),
  relevancy: z.number().nullable(),
  correctness: z.number().nullable(),
  answer: z.string().nullable(),
  error: z.string().nullable(),
  attempts: z.number().int().nonnegative(),
});
export type EvalCellRow = z.infer<typeof EvalCellRowSchema>;

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * A row that does not match its schema: usually a failed migration or a
 * database written by a different version.
 *
 * Exit code 5, same as DatabaseError
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const issues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');
    const more = issues.length > 3 ? `\n  ... and ${issues.length - 3} more` : '';

    super(message, `Schema validation failed:\n${summary}${more}`, 5);
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

export function validateRow<T extends z.ZodTypeAny>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);
  if (result.success) {
    return result.data;
  }
  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate every row, throwing on the first mismatch.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
