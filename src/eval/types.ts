/**
 * Evaluation Types
 *
 * The comparison grid (chunk strategy × retrieval strategy × query), the
 * per-cell results it holds, the ranked pair summaries derived from it, and
 * the error type for the harness.
 */

import {
  ChunkStrategyNameSchema,
  RetrievalStrategyNameSchema,
  type ChunkStrategyName,
  type RetrievalStrategyName,
} from '../config/schema.js';

// ============================================================================
// AXES
// ============================================================================

export const CHUNK_STRATEGIES: readonly ChunkStrategyName[] = ChunkStrategyNameSchema.options;
export const RETRIEVAL_STRATEGIES: readonly RetrievalStrategyName[] = RetrievalStrategyNameSchema.options;

/** Prefix every evaluation namespace carries */
export const EVAL_NAMESPACE_PREFIX = 'eval-';

export const evalNamespaceFor = (chunk: ChunkStrategyName): string => `${EVAL_NAMESPACE_PREFIX}${chunk}`;

/**
 * One line of the queries file.
 */
export interface EvalQuery {
  /** "q01", "q02", ... in file order */
  id: string;
  query: string;
  groundTruth: string;
}

// ============================================================================
// CELLS
// ============================================================================

export interface JudgeScores {
  /** Is the answer grounded in the retrieved context only? */
  faithfulness: number;
  /** Does the answer address the question? */
  relevancy: number;
  /** How well does the answer match the ground truth? */
  correctness: number;
}

export const SCORE_AXES: readonly (keyof JudgeScores)[] = ['faithfulness', 'relevancy', 'correctness'];

export interface CellCoordinates {
  chunk: ChunkStrategyName;
  retrieval: RetrievalStrategyName;
  queryId: string;
}

export type CellResult = CellCoordinates &
  (
    | {
        status: 'scored';
        scores: JudgeScores;
        answer: string;
        /** 1 + retries used */
        attempts: number;
      }
    | {
        status: 'failed';
        error: string;
        attempts: number;
      }
  );

export type ScoredCell = Extract<CellResult, { status: 'scored' }>;

/** "recursive/direct" */
export type PairName = `${ChunkStrategyName}/${RetrievalStrategyName}`;

export const pairName = (chunk: ChunkStrategyName, retrieval: RetrievalStrategyName): PairName =>
  `${chunk}/${retrieval}`;

// ============================================================================
// GRID
// ============================================================================

/** "chunk|retrieval|queryId" */
export type CellKey = `${ChunkStrategyName}|${RetrievalStrategyName}|${string}`;

export const cellKey = (cell: CellCoordinates): CellKey =>
  `${cell.chunk}|${cell.retrieval}|${cell.queryId}`;

/**
 * The full cross product of strategies and queries, filled one cell at a
 * time. Keys outside the product and second fills of the same cell are
 * programming errors and throw.
 *
 * @example
 * ```typescript
 * const grid = new EvalGrid(queries);
 * grid.fill({ chunk: 'recursive', retrieval: 'direct', queryId: 'q01', status: 'failed', error: 'x', attempts: 3 });
 * grid.isComplete(); // false until every cell is filled
 * ```
 */
export class EvalGrid {
  private readonly cells = new Map<CellKey, CellResult | null>();

  constructor(
    readonly queries: readonly EvalQuery[],
    readonly chunkStrategies: readonly ChunkStrategyName[] = CHUNK_STRATEGIES,
    readonly retrievalStrategies: readonly RetrievalStrategyName[] = RETRIEVAL_STRATEGIES
  ) {
    for (const coordinates of this.coordinates()) {
      this.cells.set(cellKey(coordinates), null);
    }
  }

  /** Every cell, chunk-major then retrieval then query order */
  *coordinates(): Generator<CellCoordinates> {
    for (const chunk of this.chunkStrategies) {
      for (const retrieval of this.retrievalStrategies) {
        for (const query of this.queries) {
          yield { chunk, retrieval, queryId: query.id };
        }
      }
    }
  }

  get size(): number {
    return this.cells.size;
  }

  fill(result: CellResult): void {
    const key = cellKey(result);
    if (!this.cells.has(key)) {
      throw EvalError.unknownCell(key);
    }
    if (this.cells.get(key)) {
      throw EvalError.duplicateCell(key);
    }
    this.cells.set(key, result);
  }

  get(coordinates: CellCoordinates): CellResult | undefined {
    return this.cells.get(cellKey(coordinates)) ?? undefined;
  }

  /** Filled cells in grid order */
  results(): CellResult[] {
    return [...this.cells.values()].filter((cell): cell is CellResult => cell !== null);
  }

  isComplete(): boolean {
    return [...this.cells.values()].every((cell) => cell !== null);
  }

  pairs(): Array<{ chunk: ChunkStrategyName; retrieval: RetrievalStrategyName }> {
    return this.chunkStrategies.flatMap((chunk) =>
      this.retrievalStrategies.map((retrieval) => ({ chunk, retrieval }))
    );
  }
}

// ============================================================================
// AGGREGATES
// ============================================================================

export interface PairSummary {
  pair: PairName;
  chunk: ChunkStrategyName;
  retrieval: RetrievalStrategyName;
  /** Axis means over scored cells; null when nothing was scored */
  means: JudgeScores | null;
  /** Mean of the three axis means */
  composite: number | null;
  /** Population variance of the three axis means */
  variance: number | null;
  scoredCount: number;
  totalCount: number;
  /** 1-based; pairs with no scored cells rank last */
  rank: number;
}

export interface ComparisonReport {
  runId: string;
  startedAt: string;
  completedAt: string;
  queries: EvalQuery[];
  /** Best first */
  pairs: PairSummary[];
  cells: CellResult[];
  failedCells: Extract<CellResult, { status: 'failed' }>[];
}

// ============================================================================
// ERRORS
// ============================================================================

export const EvalErrorCodes = {
  NAMESPACE_CONFLICT: 'NAMESPACE_CONFLICT',
  QUERIES_NOT_FOUND: 'QUERIES_NOT_FOUND',
  QUERIES_INVALID: 'QUERIES_INVALID',
  CORPUS_EMPTY: 'CORPUS_EMPTY',
  INGEST_FAILED: 'INGEST_FAILED',
  JUDGE_OUTPUT_INVALID: 'JUDGE_OUTPUT_INVALID',
  UNKNOWN_CELL: 'UNKNOWN_CELL',
  DUPLICATE_CELL: 'DUPLICATE_CELL',
  EXPORT_FAILED: 'EXPORT_FAILED',
} as const;

export type EvalErrorCode = (typeof EvalErrorCodes)[keyof typeof EvalErrorCodes];

export class EvalError extends Error {
  public readonly code: EvalErrorCode;
  public readonly cause?: Error;

  constructor(code: EvalErrorCode, message: string, cause?: Error) {
    super(message);
    this.name = 'EvalError';
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EvalError);
    }
  }

  /** Factory: evaluation would write into a namespace it does not own */
  static namespaceConflict(namespace: string, reason: string): EvalError {
    return new EvalError(
      EvalErrorCodes.NAMESPACE_CONFLICT,
      `Refusing to use namespace "${namespace}" for evaluation: ${reason}`
    );
  }

  static queriesNotFound(path: string): EvalError {
    return new EvalError(EvalErrorCodes.QUERIES_NOT_FOUND, `Queries file not found: ${path}`);
  }

  static queriesInvalid(reason: string): EvalError {
    return new EvalError(EvalErrorCodes.QUERIES_INVALID, `Invalid queries file: ${reason}`);
  }

  static corpusEmpty(dir: string): EvalError {
    return new EvalError(EvalErrorCodes.CORPUS_EMPTY, `No .txt or .md documents found in ${dir}`);
  }

  static ingestFailed(namespace: string, cause?: Error): EvalError {
    return new EvalError(
      EvalErrorCodes.INGEST_FAILED,
      `Ingestion into ${namespace} failed${cause ? `: ${cause.message}` : ''}`,
      cause
    );
  }

  /** Factory: judge output that is not the scores object */
  static judgeOutputInvalid(reason: string): EvalError {
    return new EvalError(EvalErrorCodes.JUDGE_OUTPUT_INVALID, `Unparsable judge output: ${reason}`);
  }

  static unknownCell(key: string): EvalError {
    return new EvalError(EvalErrorCodes.UNKNOWN_CELL, `Cell ${key} is not part of the grid`);
  }

  static duplicateCell(key: string): EvalError {
    return new EvalError(EvalErrorCodes.DUPLICATE_CELL, `Cell ${key} was already filled`);
  }

  static exportFailed(path: string, cause?: Error): EvalError {
    return new EvalError(EvalErrorCodes.EXPORT_FAILED, `Failed to write ${path}`, cause);
  }
}
