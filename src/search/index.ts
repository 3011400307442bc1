/**
 * Search Module
 *
 * Namespaced vector storage and the interchangeable retrieval strategies.
 *
 * @example
 * ```typescript
 * const store = new SqliteVectorStore(getDb());
 * const retrieval = createRetrievalStrategy('hypothesis', { embedder, store, generation });
 * const chunks = await retrieval.retrieve('Why was I charged a late fee?', 'customer-docs', 4);
 * ```
 */

export { SqliteVectorStore, type SqliteVectorStoreOptions } from './sqlite-vector-store.js';
export {
  createRetrievalStrategy,
  DirectRetrieval,
  HypothesisRetrieval,
  MultiPhrasingRetrieval,
  parsePhrasings,
  sortChunks,
  type RetrievalDeps,
} from './strategies.js';
export {
  VectorMetadataSchema,
  type Embedder,
  type RetrievalStrategy,
  type RetrievedChunk,
  type VectorMatch,
  type VectorMetadata,
  type VectorRecord,
  type VectorStore,
} from './types.js';
