/**
 * SqliteVectorStore Tests
 *
 * Real SQLite (in memory) and the SDK's in-memory index; nothing mocked.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';

import { openMigratedDatabase } from '../../database/setup.js';
import { resetMigrationState } from '../../database/migrate.js';
import { SqliteVectorStore } from '../sqlite-vector-store.js';
import { RetrievalError } from '../../agent/errors.js';
import type { VectorRecord } from '../types.js';

const record = (id: string, vector: number[]): VectorRecord => ({
  id,
  vector,
  metadata: { docId: id.split(':')[0] ?? id, chunkId: id.split(':')[1] ?? '0', text: `text of ${id}` },
});

describe('SqliteVectorStore', () => {
  let db: Database.Database;
  let store: SqliteVectorStore;

  beforeEach(() => {
    resetMigrationState();
    db = openMigratedDatabase(':memory:');
    store = new SqliteVectorStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('returns the closest vectors first with their metadata', async () => {
    await store.upsert('customer-docs', [
      record('faq:0', [0, 1, 0]),
      record('invoice:0', [1, 0, 0]),
      record('invoice:1', [0.9, 0.1, 0]),
    ]);

    const matches = await store.query('customer-docs', [1, 0, 0], 2);

    expect(matches.map((m) => m.id)).toEqual(['invoice:0', 'invoice:1']);
    expect(matches[0]?.score).toBeCloseTo(1, 4);
    expect(matches[0]?.metadata).toEqual({ docId: 'invoice', chunkId: '0', text: 'text of invoice:0' });
  });

  it('keeps namespaces isolated', async () => {
    await store.upsert('eval-recursive', [record('a:0', [1, 0, 0])]);

    expect(await store.query('customer-docs', [1, 0, 0], 4)).toEqual([]);
    expect(await store.count('eval-recursive')).toBe(1);
    expect(await store.count('customer-docs')).toBe(0);
  });

  it('persists across store instances on the same database', async () => {
    await store.upsert('reference-wiki', [record('wiki:0', [0, 0, 1])]);

    const reopened = new SqliteVectorStore(db);
    const matches = await reopened.query('reference-wiki', [0, 0, 1], 1);

    expect(matches.map((m) => m.id)).toEqual(['wiki:0']);
  });

  it('rebuilds the index after an upsert', async () => {
    await store.upsert('customer-docs', [record('a:0', [0, 1, 0])]);
    await store.query('customer-docs', [1, 0, 0], 1);
    expect(store.hasLoaded('customer-docs')).toBe(true);

    await store.upsert('customer-docs', [record('b:0', [1, 0, 0])]);
    expect(store.hasLoaded('customer-docs')).toBe(false);

    const matches = await store.query('customer-docs', [1, 0, 0], 1);
    expect(matches.map((m) => m.id)).toEqual(['b:0']);
  });

  it('does not cache an index whose build overlapped an upsert', async () => {
    await store.upsert('customer-docs', [record('a:0', [0, 1, 0])]);

    const first = store.query('customer-docs', [0, 1, 0], 1);
    await store.upsert('customer-docs', [record('b:0', [1, 0, 0])]);

    expect((await first).map((m) => m.id)).toEqual(['a:0']);
    expect(store.hasLoaded('customer-docs')).toBe(false);

    const matches = await store.query('customer-docs', [1, 0, 0], 1);
    expect(matches.map((m) => m.id)).toEqual(['b:0']);
  });

  it('overwrites a vector with the same id', async () => {
    await store.upsert('customer-docs', [record('a:0', [0, 1, 0])]);
    await store.upsert('customer-docs', [record('a:0', [1, 0, 0])]);

    const matches = await store.query('customer-docs', [1, 0, 0], 4);

    expect(await store.count('customer-docs')).toBe(1);
    expect(matches[0]?.score).toBeCloseTo(1, 4);
  });

  it('clears a namespace', async () => {
    await store.upsert('eval-semantic', [record('a:0', [1, 0, 0]), record('b:0', [0, 1, 0])]);

    await store.clearNamespace('eval-semantic');

    expect(await store.count('eval-semantic')).toBe(0);
    expect(await store.query('eval-semantic', [1, 0, 0], 4)).toEqual([]);
  });

  it('rejects a query with the wrong dimensions', async () => {
    await store.upsert('customer-docs', [record('a:0', [1, 0, 0])]);

    await expect(store.query('customer-docs', [1, 0], 1)).rejects.toBeInstanceOf(RetrievalError);
  });

  it('rejects records whose dimensions differ from the namespace', async () => {
    await store.upsert('customer-docs', [record('a:0', [1, 0, 0])]);

    await expect(store.upsert('customer-docs', [record('b:0', [1, 0])])).rejects.toMatchObject({
      code: 'RETRIEVAL_FAILED',
      namespace: 'customer-docs',
    });
  });

  it('returns nothing for topK 0', async () => {
    await store.upsert('customer-docs', [record('a:0', [1, 0, 0])]);

    expect(await store.query('customer-docs', [1, 0, 0], 0)).toEqual([]);
  });

  it('skips rows with corrupt metadata and warns', async () => {
    const warn = vi.fn();
    const logged = new SqliteVectorStore(db, {
      logger: { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() },
    });
    await logged.upsert('customer-docs', [record('good:0', [1, 0, 0])]);
    db.prepare(
      "INSERT INTO vectors (namespace, id, embedding, dimensions, metadata) VALUES ('customer-docs', 'bad:0', ?, 3, '{oops')"
    ).run(Buffer.from(new Float32Array([1, 0, 0]).buffer));

    const matches = await logged.query('customer-docs', [1, 0, 0], 4);

    expect(matches.map((m) => m.id)).toEqual(['good:0']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toContain('bad:0');
  });
});
