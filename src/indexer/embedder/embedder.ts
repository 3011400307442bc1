/**
 * Batch Embedding
 *
 * Turns chunks into vector records for the store. Embeds in batches; when a
 * batch fails, retries its chunks one at a time so one bad chunk costs only
 * itself.
 */

import { withTimeout } from '../../utils/index.js';
import type { Embedder, VectorRecord } from '../../search/types.js';
import type { Chunk } from '../chunker/types.js';
import type { EmbedderOptions } from './types.js';

const DEFAULT_BATCH_SIZE = 32;

export class EmbeddingTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(
      `Embedding timed out after ${timeoutMs}ms. ` +
        'The model may still be downloading on first run, or the Ollama server is slow.'
    );
    this.name = 'EmbeddingTimeoutError';
  }
}

async function embedTexts(
  embedder: Embedder,
  texts: string[],
  timeoutMs?: number
): Promise<number[][]> {
  const pending = embedder.embedBatch(texts);
  return timeoutMs ? withTimeout(pending, timeoutMs, () => new EmbeddingTimeoutError(timeoutMs)) : pending;
}

const toRecord = (chunk: Chunk, vector: number[], chunkStrategy?: string): VectorRecord => ({
  id: chunk.id,
  vector,
  metadata: {
    docId: chunk.docId,
    chunkId: chunk.chunkId,
    text: chunk.text,
    ...(chunkStrategy ? { chunkStrategy } : {}),
  },
});

/**
 * Embed chunks into vector records.
 *
 * @example
 * ```typescript
 * const records = await embedChunks(chunks, embedder, {
 *   onProgress: (done, total) => spinner.text = `Embedding ${done}/${total}`,
 * });
 * await store.upsert('customer-docs', records);
 * ```
 */
export async function embedChunks(
  chunks: Chunk[],
  embedder: Embedder,
  options: EmbedderOptions = {}
): Promise<VectorRecord[]> {
  const { batchSize = DEFAULT_BATCH_SIZE, timeoutMs, chunkStrategy, onProgress, onError } = options;

  const records: VectorRecord[] = [];
  let processed = 0;

  for (let i = 0; i < chunks.length; i += batchSize) {
    const batch = chunks.slice(i, i + batchSize);

    try {
      const vectors = await embedTexts(
        embedder,
        batch.map((chunk) => chunk.text),
        timeoutMs
      );
      batch.forEach((chunk, j) => {
        const vector = vectors[j];
        if (vector && vector.length > 0) {
          records.push(toRecord(chunk, vector, chunkStrategy));
        } else {
          onError?.(new Error('Empty embedding returned'), chunk.id);
        }
      });
      processed += batch.length;
      onProgress?.(processed, chunks.length);
    } catch {
      for (const chunk of batch) {
        try {
          const [vector] = await embedTexts(embedder, [chunk.text], timeoutMs);
          if (vector && vector.length > 0) {
            records.push(toRecord(chunk, vector, chunkStrategy));
          } else {
            onError?.(new Error('Empty embedding returned'), chunk.id);
          }
        } catch (chunkError) {
          onError?.(
            chunkError instanceof Error ? chunkError : new Error(String(chunkError)),
            chunk.id
          );
        }
        processed++;
        onProgress?.(processed, chunks.length);
      }
    }
  }

  return records;
}
