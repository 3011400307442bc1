/**
 * Evaluation Harness Tests
 *
 * All dependencies are injected: hashed embedder, in-memory vector store,
 * scripted generation and paragraph-splitting chunkers. No vi.mock() needed.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';

import { runEvaluation, assertEvalNamespace, type EvalHarnessDeps, type EvalRunOptions } from '../harness.js';
import { EvalError, type CellResult, type EvalQuery } from '../types.js';
import type { EvalRecorder } from '../recorder.js';
import { GenerationError } from '../../agent/errors.js';
import { toChunks, type ChunkStrategy, type SourceDocument } from '../../indexer/chunker/index.js';
import { DirectRetrieval } from '../../search/strategies.js';
import type { ChunkStrategyName } from '../../config/schema.js';
import {
  FakeVectorStore,
  HashedEmbedder,
  ScriptedGeneration,
  seedDocuments,
  type GenerationScript,
} from '../../test-utils/index.js';

// ============================================================================
// TEST SETUP
// ============================================================================

const JUDGE_OK = '{"faithfulness": 0.9, "relevancy": 0.8, "correctness": 0.7}';

const documents: SourceDocument[] = [
  { docId: 'late-fee-policy', text: 'A late fee of $5.00 applies after 15 days.\n\nFees appear on the next statement.' },
  { docId: 'due-dates', text: 'Payment is due on the 15th of each month.' },
];

const queries: EvalQuery[] = [
  { id: 'q01', query: 'What is the late fee?', groundTruth: 'A $5.00 late fee.' },
  { id: 'q02', query: 'When is payment due?', groundTruth: 'The 15th.' },
];

const paragraphChunker = (name: ChunkStrategyName): ChunkStrategy => ({
  name,
  chunk: async (document) => toChunks(document.docId, document.text.split('\n\n')),
});

/** Answers every answer prompt and judges every judge prompt */
const answerAndJudge: GenerationScript = (request) =>
  request.prompt.includes('GROUND TRUTH') ? JUDGE_OK : 'A $5.00 late fee applies.';

class MemoryRecorder implements EvalRecorder {
  runs: Array<{ runId: string; config: Record<string, unknown>; completed?: { cellCount: number; failedCount: number } }> = [];
  cells: CellResult[] = [];

  startRun(runId: string, config: Record<string, unknown>): void {
    this.runs.push({ runId, config });
  }
  recordCell(_runId: string, cell: CellResult): void {
    this.cells.push(cell);
  }
  completeRun(runId: string, counts: { cellCount: number; failedCount: number }): void {
    const run = this.runs.find((r) => r.runId === runId);
    if (run) run.completed = counts;
  }
}

describe('runEvaluation', () => {
  let embedder: HashedEmbedder;
  let store: FakeVectorStore;
  let recorder: MemoryRecorder;
  let sleep: Mock<(ms: number) => Promise<void>>;

  const makeDeps = (generation: ScriptedGeneration): EvalHarnessDeps => ({
    generation,
    embedder,
    store,
    recorder,
    sleep,
    createChunker: paragraphChunker,
    createRetrieval: () => new DirectRetrieval({ embedder, store, generation }),
    clock: () => new Date('2026-01-01T00:00:00.000Z'),
  });

  const options = (overrides: Partial<EvalRunOptions> = {}): EvalRunOptions => ({
    queries,
    documents,
    topK: 2,
    concurrency: 4,
    maxRetries: 2,
    retryBaseMs: 500,
    productionNamespaces: ['reference-wiki', 'customer-docs'],
    runId: 'run-test',
    ...overrides,
  });

  beforeEach(() => {
    embedder = new HashedEmbedder();
    store = new FakeVectorStore();
    recorder = new MemoryRecorder();
    sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  });

  it('fills every cell of the 3 × 3 × queries grid', async () => {
    const report = await runEvaluation(options(), makeDeps(new ScriptedGeneration(answerAndJudge)));

    expect(report.cells).toHaveLength(18);
    expect(report.cells.every((cell) => cell.status === 'scored')).toBe(true);
    expect(report.failedCells).toEqual([]);
    expect(report.pairs).toHaveLength(9);
    expect(report.pairs[0]?.composite).toBeCloseTo(0.8);
    expect(report).toMatchObject({
      runId: 'run-test',
      startedAt: '2026-01-01T00:00:00.000Z',
      completedAt: '2026-01-01T00:00:00.000Z',
    });
  });

  it('ingests into one cleared eval namespace per chunk strategy', async () => {
    await seedDocuments(store, embedder, 'eval-recursive', { stale: ['left over from an old run'] });
    await seedDocuments(store, embedder, 'customer-docs', { invoice: ['Total due: $137.14'] });

    await runEvaluation(options(), makeDeps(new ScriptedGeneration(answerAndJudge)));

    expect(store.namespaceNames()).toEqual(['customer-docs', 'eval-fixed_size', 'eval-recursive', 'eval-semantic']);
    // 3 chunks from the two documents; the stale record is gone
    expect(await store.count('eval-recursive')).toBe(3);
    expect(await store.count('customer-docs')).toBe(1);
  });

  it('retrieves only from eval namespaces', async () => {
    await runEvaluation(options(), makeDeps(new ScriptedGeneration(answerAndJudge)));

    const namespaces = new Set(store.queries.map((q) => q.namespace));
    expect([...namespaces].sort()).toEqual(['eval-fixed_size', 'eval-recursive', 'eval-semantic']);
    expect(store.queries.every((q) => q.topK === 2)).toBe(true);
  });

  it('records the run and every cell', async () => {
    await runEvaluation(options(), makeDeps(new ScriptedGeneration(answerAndJudge)));

    expect(recorder.runs).toHaveLength(1);
    expect(recorder.runs[0]?.config).toMatchObject({ top_k: 2, query_count: 2 });
    expect(recorder.runs[0]?.completed).toEqual({ cellCount: 18, failedCount: 0 });
    expect(recorder.cells).toHaveLength(18);
  });

  it('produces 90 cells for ten queries and ranks pairs by composite', async () => {
    const tenQueries: EvalQuery[] = Array.from({ length: 10 }, (_, i) => ({
      id: `q${String(i + 1).padStart(2, '0')}`,
      query: `What is the late fee, variant ${i + 1}?`,
      groundTruth: 'A $5.00 late fee.',
    }));
    const report = await runEvaluation(
      options({ queries: tenQueries }),
      makeDeps(new ScriptedGeneration(answerAndJudge))
    );

    expect(report.cells).toHaveLength(90);
    expect(report.failedCells).toEqual([]);
    const composites = report.pairs.map((pair) => pair.composite ?? -1);
    expect(composites).toEqual([...composites].sort((a, b) => b - a));
    expect(report.pairs.map((pair) => pair.rank)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('finishes the run when recording or progress reporting throws', async () => {
    const warn = vi.fn<(message: string) => void>();
    const brokenRecorder: EvalRecorder = {
      startRun: () => {},
      recordCell: () => {
        throw new Error('disk full');
      },
      completeRun: () => {},
    };
    const onCellComplete = vi.fn(() => {
      throw new Error('terminal closed');
    });

    const report = await runEvaluation(options({ onCellComplete }), {
      ...makeDeps(new ScriptedGeneration(answerAndJudge)),
      recorder: brokenRecorder,
      logger: { debug: () => {}, info: () => {}, warn, error: () => {} },
    });

    expect(report.cells).toHaveLength(18);
    expect(report.cells.every((cell) => cell.status === 'scored')).toBe(true);
    expect(onCellComplete).toHaveBeenCalledTimes(18);
    expect(warn).toHaveBeenCalledWith('[Eval] Could not record cell fixed_size/direct q01: disk full');
    expect(warn).toHaveBeenCalledWith('[Eval] Progress callback failed for cell fixed_size/direct q01: terminal closed');
  });

  it('retries transient failures with backoff', async () => {
    let failuresLeft = 2;
    const generation = new ScriptedGeneration((request) => {
      if (request.prompt.includes('GROUND TRUTH')) return JUDGE_OK;
      if (failuresLeft > 0) {
        failuresLeft--;
        throw new GenerationError('rate limited');
      }
      return 'answer';
    });

    const report = await runEvaluation(
      options({ concurrency: 1, chunkStrategies: ['recursive'], retrievalStrategies: ['direct'] }),
      makeDeps(generation)
    );

    expect(report.cells[0]).toMatchObject({ queryId: 'q01', status: 'scored', attempts: 3 });
    expect(report.cells[1]).toMatchObject({ queryId: 'q02', status: 'scored', attempts: 1 });
    expect(sleep.mock.calls).toEqual([[500], [1000]]);
  });

  it('marks a cell failed when retries run out and keeps going', async () => {
    const generation = new ScriptedGeneration((request) => {
      if (request.prompt === 'What is the late fee?') throw new GenerationError('service unavailable');
      return answerAndJudge(request, 0);
    });

    const report = await runEvaluation(
      options({ chunkStrategies: ['recursive'], retrievalStrategies: ['direct'] }),
      makeDeps(generation)
    );

    expect(report.failedCells).toEqual([
      {
        chunk: 'recursive',
        retrieval: 'direct',
        queryId: 'q01',
        status: 'failed',
        error: 'service unavailable',
        attempts: 3,
      },
    ]);
    expect(report.cells.find((cell) => cell.queryId === 'q02')?.status).toBe('scored');
    expect(recorder.runs[0]?.completed).toEqual({ cellCount: 2, failedCount: 1 });
  });

  it('does not retry unparsable judge output', async () => {
    const generation = new ScriptedGeneration((request) =>
      request.prompt.includes('GROUND TRUTH') ? 'Looks fine to me.' : 'answer'
    );

    const report = await runEvaluation(
      options({ chunkStrategies: ['semantic'], retrievalStrategies: ['hypothesis'], queries: queries.slice(0, 1) }),
      makeDeps(generation)
    );

    expect(report.failedCells[0]).toMatchObject({ attempts: 1, error: 'Unparsable judge output: no JSON object found' });
    expect(report.pairs[0]).toMatchObject({ composite: null, scoredCount: 0, totalCount: 1 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('keeps at most `concurrency` cells in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const generation = new ScriptedGeneration(async (request, call) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      inFlight--;
      return answerAndJudge(request, call);
    });

    await runEvaluation(options({ concurrency: 2 }), makeDeps(generation));

    expect(peak).toBe(2);
  });

  it('refuses a production namespace before ingesting anything', async () => {
    const run = runEvaluation(
      options({ productionNamespaces: ['eval-semantic'] }),
      makeDeps(new ScriptedGeneration(answerAndJudge))
    );

    const error = await run.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EvalError);
    expect(error).toHaveProperty('code', 'NAMESPACE_CONFLICT');
    expect(store.namespaceNames()).toEqual([]);
    expect(recorder.runs).toEqual([]);
  });

  it('rejects an empty corpus', async () => {
    await expect(
      runEvaluation(options({ documents: [], corpusDir: 'fixtures/empty' }), makeDeps(new ScriptedGeneration(answerAndJudge)))
    ).rejects.toThrow('No .txt or .md documents found in fixtures/empty');
  });

  it('wraps ingestion failures', async () => {
    const deps = makeDeps(new ScriptedGeneration(answerAndJudge));
    deps.createChunker = (name) => ({
      name,
      chunk: async () => {
        throw new Error('tokenizer crashed');
      },
    });

    const error = await runEvaluation(options(), deps).catch((e: unknown) => e);

    expect(error).toHaveProperty('code', 'INGEST_FAILED');
    expect(error).toHaveProperty('message', 'Ingestion into eval-fixed_size failed: tokenizer crashed');
  });
});

describe('assertEvalNamespace', () => {
  it('accepts an eval- namespace that is not in production', () => {
    expect(() => assertEvalNamespace('eval-recursive', ['customer-docs'])).not.toThrow();
  });

  it('rejects a namespace without the eval- prefix', () => {
    expect(() => assertEvalNamespace('customer-docs-copy', [])).toThrow(EvalError);
  });

  it('rejects a production namespace even with the prefix', () => {
    expect(() => assertEvalNamespace('eval-live', ['eval-live'])).toThrow('it is a production namespace');
  });
});
