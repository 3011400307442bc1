/**
 * SQLite-backed Vector Store
 *
 * Vectors persist in the `vectors` table keyed by (namespace, id). Searches
 * run against an InMemoryVectorStore per namespace, built lazily from SQLite
 * on first query and dropped whenever the namespace is written to.
 */

import { InMemoryVectorStore } from '@contextaisdk/rag';
import type Database from 'better-sqlite3';

import { embeddingToBlob, blobToEmbedding } from '../database/schema.js';
import { VectorRowSchema, validateRows } from '../database/validation.js';
import { RetrievalError } from '../agent/errors.js';
import { parseStoredJson, silentLogger, type Logger } from '../utils/index.js';
import {
  VectorMetadataSchema,
  type VectorMatch,
  type VectorMetadata,
  type VectorRecord,
  type VectorStore,
} from './types.js';

/** Batch size for loading rows from SQLite */
const LOAD_BATCH_SIZE = 1000;

interface LoadedNamespace {
  store: InMemoryVectorStore;
  dimensions: number;
  /** Kept beside the SDK store so reads stay typed */
  metadata: Map<string, VectorMetadata>;
}

export interface SqliteVectorStoreOptions {
  /** HNSW trades exactness for speed on large namespaces (default: false) */
  useHNSW?: boolean;
  logger?: Logger;
}

const clampScore = (score: number): number => Math.min(1, Math.max(0, score));

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class SqliteVectorStore implements VectorStore {
  /** Cache of built stores by namespace; null marks an empty namespace */
  private loaded = new Map<string, LoadedNamespace | null>();

  /** In-progress builds, so concurrent first queries share one load */
  private building = new Map<string, Promise<LoadedNamespace | null>>();

  /** Bumped on every invalidation; a build only caches if it is unchanged */
  private generations = new Map<string, number>();

  private readonly useHNSW: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    options: SqliteVectorStoreOptions = {}
  ) {
    this.useHNSW = options.useHNSW ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  async upsert(namespace: string, records: VectorRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const existing = this.db
      .prepare('SELECT dimensions FROM vectors WHERE namespace = ? LIMIT 1')
      .pluck()
      .get(namespace);
    const expected = typeof existing === 'number' ? existing : records[0]?.vector.length;

    for (const record of records) {
      if (record.vector.length !== expected) {
        throw new RetrievalError(
          `Embedding dimension mismatch for '${record.id}': expected ${expected}, got ${record.vector.length}`,
          namespace
        );
      }
    }

    const stmt = this.db.prepare(`
      INSERT INTO vectors (namespace, id, embedding, dimensions, metadata)
      VALUES (@namespace, @id, @embedding, @dimensions, @metadata)
      ON CONFLICT (namespace, id) DO UPDATE SET
        embedding = excluded.embedding,
        dimensions = excluded.dimensions,
        metadata = excluded.metadata
    `);

    const insertAll = this.db.transaction((rows: VectorRecord[]) => {
      for (const row of rows) {
        stmt.run({
          namespace,
          id: row.id,
          embedding: embeddingToBlob(row.vector),
          dimensions: row.vector.length,
          metadata: JSON.stringify(row.metadata),
        });
      }
    });

    try {
      insertAll(records);
    } catch (error) {
      throw new RetrievalError(
        `Failed to write vectors to '${namespace}': ${describeError(error)}`,
        namespace,
        { cause: error }
      );
    } finally {
      this.invalidate(namespace);
    }
  }

  async query(namespace: string, vector: number[], topK: number): Promise<VectorMatch[]> {
    if (topK <= 0) {
      return [];
    }

    try {
      const loaded = await this.getNamespace(namespace);
      if (!loaded) {
        return [];
      }
      if (vector.length !== loaded.dimensions) {
        throw new RetrievalError(
          `Query has ${vector.length} dimensions but '${namespace}' holds ${loaded.dimensions}. ` +
            'Re-ingest with the configured embedding model.',
          namespace
        );
      }

      const results = await loaded.store.search(vector, { topK });
      const matches: VectorMatch[] = [];
      for (const result of results) {
        const metadata = loaded.metadata.get(result.chunk.id);
        if (metadata) {
          matches.push({ id: result.chunk.id, score: clampScore(result.score), metadata });
        }
      }
      return matches.sort((a, b) => b.score - a.score || a.id.localeCompare(b.id));
    } catch (error) {
      if (error instanceof RetrievalError) {
        throw error;
      }
      throw new RetrievalError(
        `Vector search failed in '${namespace}': ${describeError(error)}`,
        namespace,
        { cause: error }
      );
    }
  }

  async clearNamespace(namespace: string): Promise<void> {
    this.db.prepare('DELETE FROM vectors WHERE namespace = ?').run(namespace);
    this.invalidate(namespace);
  }

  async count(namespace: string): Promise<number> {
    const count = this.db
      .prepare('SELECT COUNT(*) FROM vectors WHERE namespace = ?')
      .pluck()
      .get(namespace);
    return typeof count === 'number' ? count : 0;
  }

  /**
   * Drop the cached search index; the next query rebuilds it from SQLite.
   * A build already in flight still answers its own callers but is not cached.
   */
  invalidate(namespace: string): void {
    this.loaded.delete(namespace);
    this.building.delete(namespace);
    this.generations.set(namespace, this.generationOf(namespace) + 1);
  }

  hasLoaded(namespace: string): boolean {
    return this.loaded.has(namespace);
  }

  private async getNamespace(namespace: string): Promise<LoadedNamespace | null> {
    const cached = this.loaded.get(namespace);
    if (cached !== undefined) {
      return cached;
    }

    const inFlight = this.building.get(namespace);
    if (inFlight) {
      return inFlight;
    }

    const generation = this.generationOf(namespace);
    const build = this.buildNamespace(namespace);
    this.building.set(namespace, build);
    try {
      const loaded = await build;
      if (this.generationOf(namespace) === generation) {
        this.loaded.set(namespace, loaded);
      }
      return loaded;
    } finally {
      if (this.building.get(namespace) === build) {
        this.building.delete(namespace);
      }
    }
  }

  private generationOf(namespace: string): number {
    return this.generations.get(namespace) ?? 0;
  }

  private async buildNamespace(namespace: string): Promise<LoadedNamespace | null> {
    const stmt = this.db.prepare(`
      SELECT namespace, id, embedding, dimensions, metadata
      FROM vectors
      WHERE namespace = ?
      ORDER BY id
      LIMIT ? OFFSET ?
    `);

    let loaded: LoadedNamespace | null = null;

    for (let offset = 0; ; offset += LOAD_BATCH_SIZE) {
      const batch = validateRows(
        VectorRowSchema,
        stmt.all(namespace, LOAD_BATCH_SIZE, offset),
        `vectors.namespace=${namespace}`
      );
      if (batch.length === 0) {
        break;
      }

      if (!loaded) {
        const dimensions = batch[0]?.dimensions ?? 0;
        loaded = {
          dimensions,
          metadata: new Map(),
          store: new InMemoryVectorStore({
            dimensions,
            distanceMetric: 'cosine',
            indexType: this.useHNSW ? 'hnsw' : 'brute-force',
            hnswConfig: this.useHNSW ? { M: 16, efConstruction: 200, efSearch: 100 } : undefined,
            useFloat32: true,
          }),
        };
      }
      const target = loaded;

      const chunks: Parameters<InMemoryVectorStore['insert']>[0] = [];
      for (const row of batch) {
        if (row.dimensions !== target.dimensions) {
          throw new RetrievalError(
            `Vector '${row.id}' has ${row.dimensions} dimensions, expected ${target.dimensions}`,
            namespace
          );
        }
        const metadata = parseStoredJson(VectorMetadataSchema, row.metadata, null, (message) => {
          this.logger.warn(`[VectorStore] Skipping vector ${row.id} with corrupt metadata: ${message}`);
        });
        if (!metadata) {
          continue;
        }
        target.metadata.set(row.id, metadata);
        chunks.push({
          id: row.id,
          content: metadata.text,
          embedding: Array.from(blobToEmbedding(row.embedding)),
          metadata: { docId: metadata.docId, chunkId: metadata.chunkId },
        });
      }

      await target.store.insert(chunks);

      if (batch.length < LOAD_BATCH_SIZE) {
        break;
      }
    }

    if (loaded) {
      this.logger.debug(`[VectorStore] Loaded ${loaded.metadata.size} vectors for '${namespace}'`);
    }
    return loaded;
  }
}
