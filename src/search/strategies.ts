/**
 * Retrieval Strategies
 *
 * Three ways to turn a query into ranked chunks:
 * - direct: embed the query as written
 * - hypothesis: embed a short generated answer to the query, which tends to
 *   sit closer to answer-bearing chunks than the question does
 * - multi-phrasing: retrieve for three generated paraphrases and merge
 *
 * Responders receive a RetrievalStrategy and never branch on which one it is.
 */

import type { RetrievalStrategyName } from '../config/schema.js';
import { RetrievalError } from '../agent/errors.js';
import type { GenerationClient } from '../providers/generation.js';
import { silentLogger, type Logger } from '../utils/index.js';
import type {
  Embedder,
  RetrievalStrategy,
  RetrievedChunk,
  VectorMatch,
  VectorStore,
} from './types.js';

export interface RetrievalDeps {
  embedder: Embedder;
  store: VectorStore;
  /** Used by the hypothesis and multi-phrasing strategies */
  generation: GenerationClient;
  logger?: Logger;
}

const HYPOTHESIS_PROMPT = (query: string) =>
  `You are a billing support expert. Write a concise hypothetical answer to the following question. Maximum 3 sentences.

Question: ${query}`;

const PHRASING_PROMPT = (query: string) =>
  `Generate 3 different phrasings of the following customer question for a billing support system. Return only the 3 phrasings, one per line, nothing else.

Question: ${query}`;

/** List numbering ("1.", "2)") and bullets ("-", "*", "•") */
const LIST_MARKER = /^\s*(?:\d+[.)]|[-*•])\s*/;

/**
 * Descending score; ties broken by id so output is stable.
 */
export function sortChunks(chunks: RetrievedChunk[]): RetrievedChunk[] {
  return [...chunks].sort((a, b) => b.score - a.score || a.id.localeCompare(b.id));
}

function toRetrievedChunk(match: VectorMatch): RetrievedChunk {
  return {
    id: match.id,
    docId: match.metadata.docId,
    chunkId: match.metadata.chunkId,
    text: match.metadata.text,
    score: Math.min(1, Math.max(0, match.score)),
  };
}

/**
 * Embed a text and search one namespace. Embedding failures surface as
 * RetrievalError, the same as store failures.
 */
async function searchByText(
  deps: RetrievalDeps,
  text: string,
  namespace: string,
  topK: number
): Promise<RetrievedChunk[]> {
  let vector: number[];
  try {
    vector = await deps.embedder.embed(text);
  } catch (error) {
    throw new RetrievalError(
      `Embedding failed: ${error instanceof Error ? error.message : String(error)}`,
      namespace,
      { cause: error }
    );
  }

  const matches = await deps.store.query(namespace, vector, topK);
  return sortChunks(matches.map(toRetrievedChunk));
}

export class DirectRetrieval implements RetrievalStrategy {
  readonly name = 'direct';

  constructor(private readonly deps: RetrievalDeps) {}

  async retrieve(query: string, namespace: string, topK: number): Promise<RetrievedChunk[]> {
    return searchByText(this.deps, query, namespace, topK);
  }
}

export class HypothesisRetrieval implements RetrievalStrategy {
  readonly name = 'hypothesis';
  private readonly logger: Logger;

  constructor(private readonly deps: RetrievalDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async retrieve(query: string, namespace: string, topK: number): Promise<RetrievedChunk[]> {
    const hypothesis = (
      await this.deps.generation.complete({
        prompt: HYPOTHESIS_PROMPT(query),
        temperature: 0.3,
        maxTokens: 200,
      })
    ).trim();

    if (!hypothesis) {
      this.logger.debug('[Retrieval] Empty hypothesis; searching with the query');
    }
    return searchByText(this.deps, hypothesis || query, namespace, topK);
  }
}

/**
 * Up to three paraphrases from the model output, stripped of list markers.
 */
export function parsePhrasings(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.replace(LIST_MARKER, '').trim())
    .filter((line) => line.length > 0)
    .slice(0, 3);
}

export class MultiPhrasingRetrieval implements RetrievalStrategy {
  readonly name = 'multi-phrasing';
  private readonly logger: Logger;

  constructor(private readonly deps: RetrievalDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async retrieve(query: string, namespace: string, topK: number): Promise<RetrievedChunk[]> {
    const output = await this.deps.generation.complete({
      prompt: PHRASING_PROMPT(query),
      temperature: 0.5,
      maxTokens: 200,
    });

    let phrasings = parsePhrasings(output);
    if (phrasings.length === 0) {
      this.logger.debug('[Retrieval] No usable phrasings; searching with the query');
      phrasings = [query];
    }

    // Highest score per chunk id across all phrasings
    const best = new Map<string, RetrievedChunk>();
    for (const phrasing of phrasings) {
      for (const chunk of await searchByText(this.deps, phrasing, namespace, topK)) {
        const seen = best.get(chunk.id);
        if (!seen || chunk.score > seen.score) {
          best.set(chunk.id, chunk);
        }
      }
    }

    return sortChunks([...best.values()]).slice(0, topK);
  }
}

/**
 * @example
 * ```typescript
 * const retrieval = createRetrievalStrategy(config.retrieval.strategy, {
 *   embedder, store, generation,
 * });
 * const chunks = await retrieval.retrieve('Why is my bill higher?', 'customer-docs', 4);
 * ```
 */
export function createRetrievalStrategy(
  name: RetrievalStrategyName,
  deps: RetrievalDeps
): RetrievalStrategy {
  switch (name) {
    case 'direct':
      return new DirectRetrieval(deps);
    case 'hypothesis':
      return new HypothesisRetrieval(deps);
    case 'multi-phrasing':
      return new MultiPhrasingRetrieval(deps);
  }
}
