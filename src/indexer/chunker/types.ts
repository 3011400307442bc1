/**
 * Chunker Types
 */

import type { ChunkStrategyName } from '../../config/schema.js';

/**
 * A loaded corpus document before chunking.
 */
export interface SourceDocument {
  /** File name without extension, e.g. "invoice-acc-demo-001" */
  docId: string;
  text: string;
  /** Where it was read from, for error messages */
  source?: string;
}

/**
 * A chunk ready for embedding.
 */
export interface Chunk {
  /** `${docId}:${chunkId}`, unique within a namespace */
  id: string;
  docId: string;
  /** Position within the document, as a string: "0", "1", ... */
  chunkId: string;
  text: string;
}

/**
 * Interchangeable document splitting.
 */
export interface ChunkStrategy {
  readonly name: ChunkStrategyName;
  chunk(document: SourceDocument): Promise<Chunk[]>;
}

export interface ChunkSizing {
  /** Target chunk size in tokens */
  chunkSize: number;
  /** Overlap between consecutive chunks in tokens */
  chunkOverlap: number;
}
