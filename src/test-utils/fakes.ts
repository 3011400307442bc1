/**
 * In-process stand-ins for the model, the embedding model and the vector
 * store. Deterministic, so tests can assert exact scores and orderings.
 */

import type { GenerationClient, GenerationRequest } from '../providers/generation.js';
import type {
  Embedder,
  RetrievalStrategy,
  RetrievedChunk,
  VectorMatch,
  VectorRecord,
  VectorStore,
} from '../search/types.js';

// ============================================================================
// Generation
// ============================================================================

export type GenerationScript = (request: GenerationRequest, call: number) => string | Promise<string>;

/**
 * GenerationClient driven by a script. Every request is recorded.
 *
 * @example
 * ```typescript
 * const generation = new ScriptedGeneration((req) =>
 *   req.prompt.includes('Classify') ? 'account_specific' : '{"answer": "..."}'
 * );
 * ```
 */
export class ScriptedGeneration implements GenerationClient {
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly script: GenerationScript) {}

  /**
   * Replies in order; an Error entry is thrown. Past the end, the last entry
   * repeats.
   */
  static sequence(...outputs: Array<string | Error>): ScriptedGeneration {
    return new ScriptedGeneration((_request, call) => {
      const output = outputs[Math.min(call, outputs.length) - 1];
      if (output === undefined) {
        throw new Error('ScriptedGeneration.sequence() needs at least one output');
      }
      if (output instanceof Error) {
        throw output;
      }
      return output;
    });
  }

  async complete(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.script(request, this.requests.length);
  }

  /** Requests whose prompt contains `marker` */
  requestsMatching(marker: string): GenerationRequest[] {
    return this.requests.filter((request) => request.prompt.includes(marker));
  }
}

// ============================================================================
// Embedding
// ============================================================================

/** FNV-1a, 32-bit */
function hashToken(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * Hashed bag-of-words embedder: each token adds 1 to one bucket, then the
 * vector is L2-normalized. Texts sharing words score higher; text with no
 * words embeds to the zero vector.
 */
export class HashedEmbedder implements Embedder {
  readonly calls: string[] = [];

  constructor(readonly dimensions: number = 64) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.vectorFor(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((text) => this.embed(text)));
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const bucket = hashToken(token) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

// ============================================================================
// Vector store
// ============================================================================

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  return normA === 0 || normB === 0 ? 0 : dot / Math.sqrt(normA * normB);
}

/**
 * Brute-force namespaced store held in Maps.
 */
export class FakeVectorStore implements VectorStore {
  private readonly namespaces = new Map<string, Map<string, VectorRecord>>();
  private failure: Error | null = null;
  readonly queries: Array<{ namespace: string; topK: number }> = [];

  /** Make every later query reject with `error` (null to recover) */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  async upsert(namespace: string, records: VectorRecord[]): Promise<void> {
    const target = this.namespaces.get(namespace) ?? new Map<string, VectorRecord>();
    for (const record of records) {
      target.set(record.id, record);
    }
    this.namespaces.set(namespace, target);
  }

  async query(namespace: string, vector: number[], topK: number): Promise<VectorMatch[]> {
    this.queries.push({ namespace, topK });
    if (this.failure) {
      throw this.failure;
    }
    const records = [...(this.namespaces.get(namespace)?.values() ?? [])];
    return records
      .map((record) => ({
        id: record.id,
        score: Math.min(1, Math.max(0, cosineSimilarity(vector, record.vector))),
        metadata: record.metadata,
      }))
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, Math.max(0, topK));
  }

  async clearNamespace(namespace: string): Promise<void> {
    this.namespaces.delete(namespace);
  }

  async count(namespace: string): Promise<number> {
    return this.namespaces.get(namespace)?.size ?? 0;
  }

  namespaceNames(): string[] {
    return [...this.namespaces.keys()].sort();
  }
}

/**
 * Embed `texts` as chunks of one document and store them.
 *
 * @example
 * ```typescript
 * await seedDocuments(store, embedder, 'customer-docs', {
 *   'invoice-acc-demo-001': ['Total due: $137.14 for ACC-DEMO-001'],
 * });
 * ```
 */
export async function seedDocuments(
  store: VectorStore,
  embedder: Embedder,
  namespace: string,
  documents: Record<string, string[]>
): Promise<void> {
  const records: VectorRecord[] = [];
  for (const [docId, texts] of Object.entries(documents)) {
    for (const [index, text] of texts.entries()) {
      records.push({
        id: `${docId}:${index}`,
        vector: await embedder.embed(text),
        metadata: { docId, chunkId: String(index), text },
      });
    }
  }
  await store.upsert(namespace, records);
}

// ============================================================================
// Retrieval
// ============================================================================

/**
 * RetrievalStrategy with fixed results per namespace. Results are returned in
 * the order given, truncated to topK.
 */
export class StaticRetrieval implements RetrievalStrategy {
  readonly name = 'static';
  readonly calls: Array<{ query: string; namespace: string; topK: number }> = [];
  private readonly failures = new Map<string, Error>();

  constructor(private readonly results: Record<string, RetrievedChunk[]> = {}) {}

  /** Make retrieval from `namespace` reject with `error` */
  failOn(namespace: string, error: Error): void {
    this.failures.set(namespace, error);
  }

  async retrieve(query: string, namespace: string, topK: number): Promise<RetrievedChunk[]> {
    this.calls.push({ query, namespace, topK });
    const failure = this.failures.get(namespace);
    if (failure) {
      throw failure;
    }
    return (this.results[namespace] ?? []).slice(0, topK);
  }
}
