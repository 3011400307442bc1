/**
 * Ingestion Pipeline
 *
 * Chunk → Embed → Store for a set of documents into one namespace.
 * Used by `concierge ingest` and by the evaluation harness, once per chunk
 * strategy. Non-fatal errors (a chunk that would not embed) are collected,
 * not thrown.
 */

import type { ChunkStrategy, Chunk, SourceDocument } from './chunker/types.js';
import { embedChunks } from './embedder/index.js';
import type { Embedder, VectorStore } from '../search/types.js';

export type IngestStage = 'chunking' | 'embedding' | 'storing';

export interface IngestOptions {
  documents: SourceDocument[];
  namespace: string;
  chunker: ChunkStrategy;
  embedder: Embedder;
  store: VectorStore;
  /** Empty the namespace before writing (default: false) */
  clear?: boolean;
  /** Per-batch embedding timeout */
  embeddingTimeoutMs?: number;
  onStageStart?: (stage: IngestStage, total: number) => void;
  onProgress?: (stage: IngestStage, processed: number, total: number) => void;
}

export interface IngestResult {
  namespace: string;
  chunkStrategy: string;
  documentCount: number;
  chunkCount: number;
  storedCount: number;
  /** Chunk id → error message */
  errors: Array<{ chunkId: string; message: string }>;
  durationMs: number;
}

export async function ingestDocuments(options: IngestOptions): Promise<IngestResult> {
  const { documents, namespace, chunker, embedder, store, onStageStart, onProgress } = options;
  const startedAt = Date.now();
  const errors: IngestResult['errors'] = [];

  onStageStart?.('chunking', documents.length);
  const chunks: Chunk[] = [];
  for (const [index, document] of documents.entries()) {
    chunks.push(...(await chunker.chunk(document)));
    onProgress?.('chunking', index + 1, documents.length);
  }

  onStageStart?.('embedding', chunks.length);
  const records = await embedChunks(chunks, embedder, {
    timeoutMs: options.embeddingTimeoutMs,
    chunkStrategy: chunker.name,
    onProgress: (processed, total) => onProgress?.('embedding', processed, total),
    onError: (error, chunkId) => errors.push({ chunkId, message: error.message }),
  });

  onStageStart?.('storing', records.length);
  if (options.clear) {
    await store.clearNamespace(namespace);
  }
  await store.upsert(namespace, records);
  onProgress?.('storing', records.length, records.length);

  return {
    namespace,
    chunkStrategy: chunker.name,
    documentCount: documents.length,
    chunkCount: chunks.length,
    storedCount: records.length,
    errors,
    durationMs: Date.now() - startedAt,
  };
}
