/**
 * Configuration Schema
 *
 * Defines the shape of ~/.concierge/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

export const LLMProviderTypeSchema = z.enum(['anthropic', 'openai', 'ollama']);
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;

export const RetrievalStrategyNameSchema = z.enum(['direct', 'hypothesis', 'multi-phrasing']);
export type RetrievalStrategyName = z.infer<typeof RetrievalStrategyNameSchema>;

export const ChunkStrategyNameSchema = z.enum(['fixed_size', 'recursive', 'semantic']);
export type ChunkStrategyName = z.infer<typeof ChunkStrategyNameSchema>;

/**
 * Generation model settings. Retries and timeout apply to every call the
 * router, responders, retrieval strategies and judge make.
 */
export const GenerationConfigSchema = z.object({
  provider: LLMProviderTypeSchema.describe('Generation provider'),
  model: z.string().min(1).describe('Model name passed to the provider'),
  max_retries: z.number().int().min(0).max(10).describe('Retries after a failed call'),
  retry_base_ms: z.number().int().min(0).max(60000).describe('Backoff before the first retry'),
  timeout_ms: z.number().int().min(1000).max(600000).describe('Per-call timeout'),
});

export const EmbeddingConfigSchema = z.object({
  provider: z
    .enum(['huggingface', 'ollama'])
    .describe('Embedding provider (huggingface runs locally, ollama needs a server)'),
  model: z.string().min(1).describe('Embedding model name'),
  dimensions: z.number().int().min(8).max(4096).describe('Vector dimensions of the model'),
});

export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).max(50).describe('Chunks fetched per query'),
  strategy: RetrievalStrategyNameSchema.describe('Default retrieval strategy'),
  reference_namespace: z.string().min(1).describe('Namespace for general knowledge'),
  customer_namespace: z.string().min(1).describe('Namespace for customer documents'),
});

export const ValidationConfigSchema = z.object({
  confidence_threshold: z
    .number()
    .min(0)
    .max(1)
    .describe('Minimum retrieval confidence for an account answer to be approved'),
});

export const ChunkingConfigSchema = z
  .object({
    chunk_size: z.number().int().min(50).max(4000).describe('Target chunk size in tokens'),
    chunk_overlap: z.number().int().min(0).max(1000).describe('Overlap between chunks in tokens'),
    semantic_threshold: z
      .number()
      .min(0)
      .max(1)
      .describe('Sentence similarity below which the semantic chunker splits'),
  })
  .refine((c) => c.chunk_overlap < c.chunk_size, {
    message: 'chunk_overlap must be smaller than chunk_size',
    path: ['chunk_overlap'],
  });

export const EvalConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(32).describe('Cells evaluated at once'),
  max_retries: z.number().int().min(0).max(10).describe('Retries per cell on transient failures'),
  retry_base_ms: z.number().int().min(0).max(60000).describe('Backoff before the first cell retry'),
  output_dir: z.string().min(1).describe('Where reports are written'),
});

/**
 * Root configuration schema
 */
export const ConfigSchema = z.object({
  generation: GenerationConfigSchema,
  embedding: EmbeddingConfigSchema,
  retrieval: RetrievalConfigSchema,
  validation: ValidationConfigSchema,
  chunking: ChunkingConfigSchema,
  eval: EvalConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Sparse user config, merged over the defaults
 */
export const PartialConfigSchema = z
  .object({
    generation: GenerationConfigSchema.partial(),
    embedding: EmbeddingConfigSchema.partial(),
    retrieval: RetrievalConfigSchema.partial(),
    validation: ValidationConfigSchema.partial(),
    chunking: z.object({
      chunk_size: z.number().int(),
      chunk_overlap: z.number().int(),
      semantic_threshold: z.number(),
    }).partial(),
    eval: EvalConfigSchema.partial(),
  })
  .partial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
