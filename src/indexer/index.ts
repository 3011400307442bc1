/**
 * Indexer Module
 *
 * Loads a document corpus from disk and ingests it into a vector store
 * namespace: chunk, embed, store.
 *
 * @example
 * ```ts
 * const { documents } = await loadCorpus('fixtures/eval/corpus');
 * const result = await ingestDocuments({
 *   documents,
 *   namespace: 'customer-docs',
 *   chunker: createChunkStrategy('recursive', deps),
 *   embedder,
 *   store,
 * });
 * console.log(`Stored ${result.storedCount} chunks`);
 * ```
 */

export { loadCorpus, CORPUS_PATTERNS, type CorpusLoadResult, type SkippedFile, type SkipReason } from './corpus.js';
export {
  ingestDocuments,
  type IngestOptions,
  type IngestResult,
  type IngestStage,
} from './pipeline.js';
export * from './chunker/index.js';
export * from './embedder/index.js';
