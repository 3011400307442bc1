/**
 * Chunker Configuration
 */

import type { Chunk } from './types.js';

/**
 * Segments shorter than this (in characters) are not worth a chunk.
 */
export const MIN_CHUNK_SIZE = 10;

/**
 * Largest corpus file read during ingestion.
 */
export const MAX_FILE_SIZE = 500 * 1024;

/**
 * ~4 characters per English token. An approximation; the embedding model's
 * tokenizer is the real count.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Number trimmed, non-empty texts into chunks of one document.
 */
export function toChunks(docId: string, texts: string[]): Chunk[] {
  return texts
    .map((text) => text.trim())
    .filter((text) => text.length > 0)
    .map((text, index) => ({
      id: `${docId}:${index}`,
      docId,
      chunkId: String(index),
      text,
    }));
}
