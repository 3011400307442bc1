/**
 * Embedder Module
 *
 * Usage:
 * ```typescript
 * const embedder = await createEmbedder(config.embedding);
 * const records = await embedChunks(chunks, embedder);
 * ```
 */

export {
  createEmbedder,
  toEmbedder,
  toSdkEmbeddingProvider,
  normalizeHuggingFaceModel,
} from './provider.js';
export { embedChunks, EmbeddingTimeoutError } from './embedder.js';
export type { EmbedderOptions, ModelLoadProgress, ProviderOptions } from './types.js';
