/**
 * Search Module Types
 *
 * Vector storage and query-to-chunk retrieval shared by the responders, the
 * ingestion pipeline and the evaluation harness.
 */

import { z } from 'zod';

// ============================================================================
// Vector storage
// ============================================================================

/**
 * Metadata stored beside each vector. Validated on read because it lives in a
 * TEXT column.
 */
export const VectorMetadataSchema = z.object({
  docId: z.string(),
  chunkId: z.string(),
  text: z.string(),
  /** Chunk strategy that produced the chunk, when ingested by one */
  chunkStrategy: z.string().optional(),
});

export type VectorMetadata = z.infer<typeof VectorMetadataSchema>;

export interface VectorMatch {
  id: string;
  /** Cosine similarity, clamped to [0,1] */
  score: number;
  metadata: VectorMetadata;
}

export interface VectorRecord {
  id: string;
  vector: number[];
  metadata: VectorMetadata;
}

/**
 * Namespaced vector store. Namespaces are fully isolated.
 */
export interface VectorStore {
  upsert(namespace: string, records: VectorRecord[]): Promise<void>;
  /** Best matches first, at most `topK` */
  query(namespace: string, vector: number[], topK: number): Promise<VectorMatch[]>;
  clearNamespace(namespace: string): Promise<void>;
  count(namespace: string): Promise<number>;
}

// ============================================================================
// Retrieval
// ============================================================================

export interface RetrievedChunk {
  /** Vector id, unique within the namespace */
  id: string;
  docId: string;
  chunkId: string;
  text: string;
  /** In [0,1] */
  score: number;
}

/**
 * Query-to-chunk retrieval. Callers pick one through the factory and never
 * branch on its name.
 */
export interface RetrievalStrategy {
  readonly name: string;
  /** Sorted by descending score; ties ordered by chunk id */
  retrieve(query: string, namespace: string, topK: number): Promise<RetrievedChunk[]>;
}

/**
 * Text-to-vector surface shared by retrieval and ingestion. The CLI adapts an
 * SDK embedding provider to it; tests use a deterministic hashed embedder.
 */
export interface Embedder {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}
