/**
 * Chunker Module
 *
 * Usage:
 * ```typescript
 * const chunker = createChunkStrategy('fixed_size', deps);
 * const chunks = await chunker.chunk({ docId: 'invoice-acc-demo-001', text });
 * ```
 */

export {
  FixedSizeChunker,
  RecursiveChunkStrategy,
  SemanticChunkStrategy,
  createChunkStrategy,
  type ChunkStrategyDeps,
} from './chunker.js';
export { MAX_FILE_SIZE, MIN_CHUNK_SIZE, estimateTokens, toChunks } from './config.js';
export type { Chunk, ChunkSizing, ChunkStrategy, SourceDocument } from './types.js';
