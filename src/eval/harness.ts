/**
 * Evaluation Harness
 *
 * Compares every chunk strategy against every retrieval strategy over a
 * fixed query set.
 *
 * Flow:
 * 1. Ingest the corpus once per chunk strategy into a cleared `eval-<chunk>`
 *    namespace
 * 2. Fill the grid on a bounded worker pool: retrieve, answer, judge
 * 3. Rank the pairs and return the report
 *
 * A cell that keeps failing is recorded as failed and the run carries on.
 * Ingestion failures and namespace conflicts abort the run before any cell
 * is evaluated.
 */

import { randomUUID } from 'node:crypto';

import { isTransientError } from '../agent/errors.js';
import type { Config, ChunkStrategyName, RetrievalStrategyName } from '../config/schema.js';
import { createChunkStrategy, type ChunkStrategy, type SourceDocument } from '../indexer/chunker/index.js';
import { ingestDocuments, type IngestResult } from '../indexer/pipeline.js';
import type { GenerationClient } from '../providers/generation.js';
import { createRetrievalStrategy } from '../search/strategies.js';
import type { Embedder, RetrievalStrategy, VectorStore } from '../search/types.js';
import { silentLogger, withRetry, type Logger } from '../utils/index.js';
import { summarizePairs } from './aggregator.js';
import { generateEvalAnswer } from './answer.js';
import { judgeAnswer } from './judge.js';
import { runPool } from './pool.js';
import type { EvalRecorder } from './recorder.js';
import {
  CHUNK_STRATEGIES,
  EVAL_NAMESPACE_PREFIX,
  EvalError,
  EvalGrid,
  RETRIEVAL_STRATEGIES,
  evalNamespaceFor,
  type CellCoordinates,
  type CellResult,
  type ComparisonReport,
  type EvalQuery,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface EvalHarnessDeps {
  /** Answers, judge calls and query rewriting all go through this client */
  generation: GenerationClient;
  embedder: Embedder;
  store: VectorStore;
  createChunker: (name: ChunkStrategyName) => ChunkStrategy;
  createRetrieval: (name: RetrievalStrategyName) => RetrievalStrategy;
  recorder?: EvalRecorder;
  logger?: Logger;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

export interface EvalRunOptions {
  queries: EvalQuery[];
  documents: SourceDocument[];
  topK: number;
  concurrency: number;
  maxRetries: number;
  retryBaseMs: number;
  /** Namespaces the concierge serves from; evaluation must never touch them */
  productionNamespaces: string[];
  /** Shown in errors about the corpus */
  corpusDir?: string;
  runId?: string;
  chunkStrategies?: readonly ChunkStrategyName[];
  retrievalStrategies?: readonly RetrievalStrategyName[];
  onIngested?: (result: IngestResult) => void;
  onCellComplete?: (cell: CellResult, completed: number, total: number) => void;
}

// ============================================================================
// NAMESPACES
// ============================================================================

/**
 * @throws EvalError NAMESPACE_CONFLICT
 */
export function assertEvalNamespace(namespace: string, productionNamespaces: readonly string[]): void {
  if (productionNamespaces.includes(namespace)) {
    throw EvalError.namespaceConflict(namespace, 'it is a production namespace');
  }
  if (!namespace.startsWith(EVAL_NAMESPACE_PREFIX)) {
    throw EvalError.namespaceConflict(namespace, `evaluation namespaces must start with "${EVAL_NAMESPACE_PREFIX}"`);
  }
}

// ============================================================================
// CELLS
// ============================================================================

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

async function evaluateCell(
  coordinates: CellCoordinates,
  query: EvalQuery,
  retrieval: RetrievalStrategy,
  options: EvalRunOptions,
  deps: EvalHarnessDeps,
  logger: Logger
): Promise<CellResult> {
  let attempts = 0;
  const namespace = evalNamespaceFor(coordinates.chunk);
  const label = `${coordinates.chunk}/${coordinates.retrieval} ${coordinates.queryId}`;

  try {
    const { value } = await withRetry(
      async (attempt) => {
        attempts = attempt;
        const chunks = await retrieval.retrieve(query.query, namespace, options.topK);
        const answer = await generateEvalAnswer(deps.generation, query.query, chunks);
        const scores = await judgeAnswer(deps.generation, {
          query: query.query,
          answer,
          contexts: chunks.map((chunk) => chunk.text),
          groundTruth: query.groundTruth,
        });
        return { answer, scores };
      },
      {
        maxRetries: options.maxRetries,
        baseDelayMs: options.retryBaseMs,
        shouldRetry: (error) => isTransientError(error),
        onRetry: (error, attempt, delayMs) =>
          logger.debug(`[Eval] ${label} attempt ${attempt} failed (${describeError(error)}); retrying in ${delayMs}ms`),
        sleep: deps.sleep,
      }
    );
    return { ...coordinates, status: 'scored', ...value, attempts };
  } catch (error) {
    logger.warn(`[Eval] ${label} failed after ${attempts} attempt(s): ${describeError(error)}`);
    return { ...coordinates, status: 'failed', error: describeError(error), attempts };
  }
}

// ============================================================================
// MAIN FUNCTION
// ============================================================================

/**
 * @throws EvalError NAMESPACE_CONFLICT, CORPUS_EMPTY or INGEST_FAILED
 *
 * @example
 * ```typescript
 * const deps = createEvalHarnessDeps(config, { generation, embedder, store });
 * const report = await runEvaluation({ queries, documents, ...evalSettings(config) }, deps);
 * console.log(formatComparisonReport(report));
 * ```
 */
export async function runEvaluation(options: EvalRunOptions, deps: EvalHarnessDeps): Promise<ComparisonReport> {
  const logger = deps.logger ?? silentLogger;
  const clock = deps.clock ?? (() => new Date());
  const chunkStrategies = options.chunkStrategies ?? CHUNK_STRATEGIES;
  const retrievalStrategies = options.retrievalStrategies ?? RETRIEVAL_STRATEGIES;

  // ── Step 0: Guard namespaces and inputs ─────────────────────────────────
  for (const chunk of chunkStrategies) {
    assertEvalNamespace(evalNamespaceFor(chunk), options.productionNamespaces);
  }
  if (options.documents.length === 0) {
    throw EvalError.corpusEmpty(options.corpusDir ?? '(no directory)');
  }

  const runId = options.runId ?? randomUUID();
  const startedAt = clock().toISOString();
  const grid = new EvalGrid(options.queries, chunkStrategies, retrievalStrategies);
  deps.recorder?.startRun(runId, {
    top_k: options.topK,
    concurrency: options.concurrency,
    max_retries: options.maxRetries,
    chunk_strategies: chunkStrategies,
    retrieval_strategies: retrievalStrategies,
    query_count: options.queries.length,
  });

  // ── Step 1: Ingest once per chunk strategy ──────────────────────────────
  for (const chunk of chunkStrategies) {
    const namespace = evalNamespaceFor(chunk);
    logger.info(`[Eval] Ingesting ${options.documents.length} document(s) into ${namespace}`);
    try {
      const result = await ingestDocuments({
        documents: options.documents,
        namespace,
        chunker: deps.createChunker(chunk),
        embedder: deps.embedder,
        store: deps.store,
        clear: true,
      });
      options.onIngested?.(result);
    } catch (error) {
      throw EvalError.ingestFailed(namespace, error instanceof Error ? error : undefined);
    }
  }

  // ── Step 2: Fill the grid ───────────────────────────────────────────────
  const retrievals = new Map(retrievalStrategies.map((name) => [name, deps.createRetrieval(name)] as const));
  const queriesById = new Map(options.queries.map((query) => [query.id, query] as const));
  const work = [...grid.coordinates()];
  let completed = 0;

  await runPool(work, options.concurrency, async (coordinates) => {
    const query = queriesById.get(coordinates.queryId);
    const retrieval = retrievals.get(coordinates.retrieval);
    const cell: CellResult =
      query && retrieval
        ? await evaluateCell(coordinates, query, retrieval, options, deps, logger)
        : { ...coordinates, status: 'failed', error: 'missing query or strategy', attempts: 0 };

    grid.fill(cell);
    completed++;
    const label = `${coordinates.chunk}/${coordinates.retrieval} ${coordinates.queryId}`;
    try {
      deps.recorder?.recordCell(runId, cell);
    } catch (error) {
      logger.warn(`[Eval] Could not record cell ${label}: ${describeError(error)}`);
    }
    try {
      options.onCellComplete?.(cell, completed, work.length);
    } catch (error) {
      logger.warn(`[Eval] Progress callback failed for cell ${label}: ${describeError(error)}`);
    }
  });

  // ── Step 3: Aggregate ───────────────────────────────────────────────────
  const cells = grid.results();
  const failedCells = cells.filter(
    (cell): cell is Extract<CellResult, { status: 'failed' }> => cell.status === 'failed'
  );
  deps.recorder?.completeRun(runId, { cellCount: cells.length, failedCount: failedCells.length });

  return {
    runId,
    startedAt,
    completedAt: clock().toISOString(),
    queries: options.queries,
    pairs: summarizePairs(grid),
    cells,
    failedCells,
  };
}

// ============================================================================
// FACTORY
// ============================================================================

export interface EvalServices {
  generation: GenerationClient;
  embedder: Embedder;
  store: VectorStore;
  recorder?: EvalRecorder;
  logger?: Logger;
}

/**
 * Production wiring from the application config. Tests construct
 * EvalHarnessDeps directly instead.
 */
export function createEvalHarnessDeps(config: Config, services: EvalServices): EvalHarnessDeps {
  const { generation, embedder, store, logger } = services;
  return {
    generation,
    embedder,
    store,
    recorder: services.recorder,
    logger,
    createChunker: (name) =>
      createChunkStrategy(name, {
        sizing: { chunkSize: config.chunking.chunk_size, chunkOverlap: config.chunking.chunk_overlap },
        embedder,
        semanticThreshold: config.chunking.semantic_threshold,
      }),
    createRetrieval: (name) => createRetrievalStrategy(name, { embedder, store, generation, logger }),
  };
}

/**
 * The run options that come from config; queries and documents are loaded
 * by the caller.
 */
export function evalSettings(
  config: Config
): Pick<EvalRunOptions, 'topK' | 'concurrency' | 'maxRetries' | 'retryBaseMs' | 'productionNamespaces'> {
  return {
    topK: config.retrieval.top_k,
    concurrency: config.eval.concurrency,
    maxRetries: config.eval.max_retries,
    retryBaseMs: config.eval.retry_base_ms,
    productionNamespaces: [config.retrieval.reference_namespace, config.retrieval.customer_namespace],
  };
}
