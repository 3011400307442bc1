/**
 * Test Utilities Module
 *
 * @example
 * ```typescript
 * import { FakeVectorStore, HashedEmbedder, ScriptedGeneration } from '../test-utils/index.js';
 * ```
 */

export { resetAll } from './reset.js';
export {
  ScriptedGeneration,
  HashedEmbedder,
  FakeVectorStore,
  StaticRetrieval,
  cosineSimilarity,
  seedDocuments,
  tokenize,
  type GenerationScript,
} from './fakes.js';
