/**
 * Evaluation Aggregator
 *
 * Collapses the filled grid into one summary per (chunk, retrieval) pair and
 * ranks them:
 *
 * - composite descending
 * - ties: lower variance first, then pair name
 * - pairs with no scored cells last, as "insufficient data"
 */

import {
  SCORE_AXES,
  pairName,
  type CellResult,
  type EvalGrid,
  type JudgeScores,
  type PairSummary,
  type ScoredCell,
} from './types.js';

// ============================================================================
// STATISTICS
// ============================================================================

export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function populationVariance(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const mu = mean(values);
  return mean(values.map((value) => (value - mu) ** 2));
}

export function axisMeans(cells: readonly ScoredCell[]): JudgeScores {
  return {
    faithfulness: mean(cells.map((cell) => cell.scores.faithfulness)),
    relevancy: mean(cells.map((cell) => cell.scores.relevancy)),
    correctness: mean(cells.map((cell) => cell.scores.correctness)),
  };
}

export const compositeOf = (scores: JudgeScores): number => mean(SCORE_AXES.map((axis) => scores[axis]));

export const isScored = (cell: CellResult): cell is ScoredCell => cell.status === 'scored';

// ============================================================================
// RANKING
// ============================================================================

type Unranked = Omit<PairSummary, 'rank'>;

function comparePairs(a: Unranked, b: Unranked): number {
  if (a.composite === null || b.composite === null) {
    if (a.composite === b.composite) {
      return a.pair.localeCompare(b.pair);
    }
    return a.composite === null ? 1 : -1;
  }
  return (
    b.composite - a.composite ||
    (a.variance ?? 0) - (b.variance ?? 0) ||
    a.pair.localeCompare(b.pair)
  );
}

/**
 * @example
 * ```typescript
 * const [winner] = summarizePairs(grid);
 * console.log(`${winner.pair}: ${winner.composite?.toFixed(3)}`);
 * ```
 */
export function summarizePairs(grid: EvalGrid): PairSummary[] {
  const cells = grid.results();

  const unranked: Unranked[] = grid.pairs().map(({ chunk, retrieval }) => {
    const scored = cells.filter(
      (cell): cell is ScoredCell => isScored(cell) && cell.chunk === chunk && cell.retrieval === retrieval
    );
    const means = scored.length > 0 ? axisMeans(scored) : null;
    const axisValues = means ? SCORE_AXES.map((axis) => means[axis]) : [];

    return {
      pair: pairName(chunk, retrieval),
      chunk,
      retrieval,
      means,
      composite: means ? compositeOf(means) : null,
      variance: means ? populationVariance(axisValues) : null,
      scoredCount: scored.length,
      totalCount: grid.queries.length,
    };
  });

  return [...unranked].sort(comparePairs).map((summary, index) => ({ ...summary, rank: index + 1 }));
}
