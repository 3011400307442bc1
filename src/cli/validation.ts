/**
 * Zod validation schemas for CLI inputs
 *
 * Commander parses arguments into strings; these schemas turn them into
 * typed options, so an unknown strategy or a non-numeric concurrency fails
 * with a ValidationError before any provider is created.
 */

import { z } from 'zod';

import {
  ChunkStrategyNameSchema,
  RetrievalStrategyNameSchema,
} from '../config/schema.js';
import { ValidationError } from '../errors/index.js';

// ============================================================================
// SHARED
// ============================================================================

export const SessionIdSchema = z
  .string()
  .trim()
  .min(1, 'Session id cannot be empty')
  .max(100, 'Session id too long (max 100 chars)')
  .regex(/^[a-zA-Z0-9_-]+$/, 'Session id can only contain letters, numbers, hyphens, and underscores');

const PositiveIntSchema = z
  .string()
  .transform((val) => Number(val))
  .refine((val) => Number.isInteger(val) && val >= 1 && val <= 64, {
    message: 'must be a whole number between 1 and 64',
  });

// ============================================================================
// ASK / CHAT
// ============================================================================

export const TurnOptionsSchema = z.object({
  session: SessionIdSchema.optional(),
  strategy: RetrievalStrategyNameSchema.optional(),
});

export type TurnOptions = z.output<typeof TurnOptionsSchema>;

export const DemoOptionsSchema = TurnOptionsSchema.pick({ strategy: true });

// ============================================================================
// INGEST
// ============================================================================

export const IngestOptionsSchema = z.object({
  namespace: z
    .string()
    .trim()
    .min(1, 'Namespace cannot be empty')
    .regex(/^[a-zA-Z0-9_-]+$/, 'Namespace can only contain letters, numbers, hyphens, and underscores'),
  chunker: ChunkStrategyNameSchema.default('recursive'),
  clear: z.boolean().default(false),
});

export type IngestOptions = z.output<typeof IngestOptionsSchema>;

// ============================================================================
// EVAL
// ============================================================================

export const EvalOptionsSchema = z.object({
  queries: z.string().min(1).default('fixtures/eval/queries.txt'),
  corpus: z.string().min(1).default('fixtures/eval/corpus'),
  concurrency: PositiveIntSchema.optional(),
  output: z.string().min(1).optional(),
});

export type EvalOptions = z.output<typeof EvalOptionsSchema>;

// ============================================================================
// PARSING
// ============================================================================

/**
 * @throws ValidationError listing every failing field
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError('Invalid command options', issues);
  }
  return result.data;
}
