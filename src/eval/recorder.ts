/**
 * Evaluation Run Recorder
 *
 * Persists runs to `eval_runs` and their cells to `eval_cells`. Cells are
 * written as they finish, so an interrupted run still leaves its completed
 * cells behind.
 */

import type Database from 'better-sqlite3';

import {
  EvalCellRowSchema,
  EvalRunRowSchema,
  validateRow,
  validateRows,
  type EvalCellRow,
  type EvalRunRow,
} from '../database/validation.js';
import { isoNow } from '../database/schema.js';
import type { CellResult } from './types.js';

export interface EvalRecorder {
  startRun(runId: string, config: Record<string, unknown>): void;
  recordCell(runId: string, cell: CellResult): void;
  completeRun(runId: string, counts: { cellCount: number; failedCount: number }): void;
}

export class SqliteEvalRecorder implements EvalRecorder {
  constructor(private readonly db: Database.Database) {}

  startRun(runId: string, config: Record<string, unknown>): void {
    this.db
      .prepare('INSERT INTO eval_runs (id, started_at, config) VALUES (@id, @startedAt, @config)')
      .run({ id: runId, startedAt: isoNow(), config: JSON.stringify(config) });
  }

  recordCell(runId: string, cell: CellResult): void {
    const scored = cell.status === 'scored';
    this.db
      .prepare(
        `INSERT INTO eval_cells
           (run_id, chunk_strategy, retrieval_strategy, query_id, status,
            faithfulness, relevancy, correctness, answer, error, attempts)
         VALUES
           (@runId, @chunk, @retrieval, @queryId, @status,
            @faithfulness, @relevancy, @correctness, @answer, @error, @attempts)`
      )
      .run({
        runId,
        chunk: cell.chunk,
        retrieval: cell.retrieval,
        queryId: cell.queryId,
        status: cell.status,
        faithfulness: scored ? cell.scores.faithfulness : null,
        relevancy: scored ? cell.scores.relevancy : null,
        correctness: scored ? cell.scores.correctness : null,
        answer: scored ? cell.answer : null,
        error: scored ? null : cell.error,
        attempts: cell.attempts,
      });
  }

  completeRun(runId: string, counts: { cellCount: number; failedCount: number }): void {
    this.db
      .prepare(
        'UPDATE eval_runs SET completed_at = @completedAt, cell_count = @cellCount, failed_count = @failedCount WHERE id = @id'
      )
      .run({ id: runId, completedAt: isoNow(), ...counts });
  }

  getRun(runId: string): EvalRunRow | undefined {
    const row = this.db.prepare('SELECT * FROM eval_runs WHERE id = ?').get(runId);
    return row ? validateRow(EvalRunRowSchema, row, `eval_runs.id=${runId}`) : undefined;
  }

  /** Most recent first */
  listRuns(limit = 20): EvalRunRow[] {
    return validateRows(
      EvalRunRowSchema,
      this.db.prepare('SELECT * FROM eval_runs ORDER BY started_at DESC LIMIT ?').all(limit),
      'eval_runs'
    );
  }

  getCells(runId: string): EvalCellRow[] {
    return validateRows(
      EvalCellRowSchema,
      this.db
        .prepare(
          'SELECT * FROM eval_cells WHERE run_id = ? ORDER BY chunk_strategy, retrieval_strategy, query_id'
        )
        .all(runId),
      `eval_cells.run_id=${runId}`
    );
  }
}
