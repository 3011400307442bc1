import { describe, it, expect, beforeEach } from 'vitest';

import { ingestDocuments, type IngestStage } from '../pipeline.js';
import { FixedSizeChunker } from '../chunker/index.js';
import { FakeVectorStore, HashedEmbedder } from '../../test-utils/index.js';
import type { Embedder } from '../../search/types.js';

const documents = [
  { docId: 'late-fees', text: 'A $5 late fee applies after 15 days.' },
  { docId: 'premium', text: 'Premium includes unlimited data.\n\nIt costs $49.99 per month.' },
];

describe('ingestDocuments', () => {
  let store: FakeVectorStore;
  let embedder: HashedEmbedder;
  const chunker = new FixedSizeChunker({ chunkSize: 10, chunkOverlap: 0 });

  beforeEach(() => {
    store = new FakeVectorStore();
    embedder = new HashedEmbedder(32);
  });

  it('should chunk, embed and store every document', async () => {
    const result = await ingestDocuments({
      documents,
      namespace: 'customer-docs',
      chunker,
      embedder,
      store,
    });

    expect(result).toMatchObject({
      namespace: 'customer-docs',
      chunkStrategy: 'fixed_size',
      documentCount: 2,
      chunkCount: 3,
      storedCount: 3,
      errors: [],
    });
    expect(await store.count('customer-docs')).toBe(3);

    const [top] = await store.query('customer-docs', embedder.vectorFor('It costs $49.99 per month.'), 1);
    expect(top?.id).toBe('premium:1');
    expect(top?.metadata).toEqual({
      docId: 'premium',
      chunkId: '1',
      text: 'It costs $49.99 per month.',
      chunkStrategy: 'fixed_size',
    });
  });

  it('should clear the namespace first when asked', async () => {
    await store.upsert('customer-docs', [
      { id: 'stale:0', vector: embedder.vectorFor('old'), metadata: { docId: 'stale', chunkId: '0', text: 'old' } },
    ]);

    await ingestDocuments({ documents, namespace: 'customer-docs', chunker, embedder, store, clear: true });

    expect(await store.count('customer-docs')).toBe(3);
    expect(await store.query('customer-docs', embedder.vectorFor('old'), 1)).not.toContainEqual(
      expect.objectContaining({ id: 'stale:0' })
    );
  });

  it('should collect chunks that fail to embed', async () => {
    const failing: Embedder = {
      dimensions: 32,
      embed: async () => {
        throw new Error('model offline');
      },
      embedBatch: async () => {
        throw new Error('model offline');
      },
    };

    const result = await ingestDocuments({
      documents: [{ docId: 'late-fees', text: 'A $5 late fee applies after 15 days.' }],
      namespace: 'customer-docs',
      chunker,
      embedder: failing,
      store,
    });

    expect(result.storedCount).toBe(0);
    expect(result.errors).toEqual([{ chunkId: 'late-fees:0', message: 'model offline' }]);
  });

  it('should report each stage', async () => {
    const stages: Array<[IngestStage, number]> = [];

    await ingestDocuments({
      documents,
      namespace: 'customer-docs',
      chunker,
      embedder,
      store,
      onStageStart: (stage, total) => stages.push([stage, total]),
    });

    expect(stages).toEqual([
      ['chunking', 2],
      ['embedding', 3],
      ['storing', 3],
    ]);
  });
});
