/**
 * Comparison Report
 *
 * Plain-text rendering of a finished run: summary table, winner line, the
 * top three pairs broken down by query, and the cells that failed.
 */

import { formatTable, type Column, type Row } from '../utils/table.js';
import { compositeOf } from './aggregator.js';
import type { CellResult, ComparisonReport, EvalQuery, PairSummary } from './types.js';

export const INSUFFICIENT_DATA = 'insufficient data';
export const BREAKDOWN_PAIRS = 3;

/** Query text shown in the breakdown table */
const QUERY_PREVIEW_CHARS = 48;

const score = (value: number | null | undefined): string => (value == null ? '-' : value.toFixed(3));

const truncate = (text: string, max: number): string =>
  text.length > max ? `${text.slice(0, max - 3)}...` : text;

const SUMMARY_COLUMNS: Column[] = [
  { header: '#', key: 'rank', align: 'right' },
  { header: 'Pair', key: 'pair' },
  { header: 'Faithfulness', key: 'faithfulness', align: 'right' },
  { header: 'Relevancy', key: 'relevancy', align: 'right' },
  { header: 'Correctness', key: 'correctness', align: 'right' },
  { header: 'Composite', key: 'composite', align: 'right' },
  { header: 'Scored', key: 'scored', align: 'right' },
];

function summaryRow(summary: PairSummary): Row {
  return {
    rank: summary.rank,
    pair: summary.pair,
    faithfulness: score(summary.means?.faithfulness),
    relevancy: score(summary.means?.relevancy),
    correctness: score(summary.means?.correctness),
    composite: summary.composite === null ? INSUFFICIENT_DATA : score(summary.composite),
    scored: `${summary.scoredCount}/${summary.totalCount}`,
  };
}

export function formatWinnerLine(pairs: PairSummary[]): string {
  const [winner] = pairs;
  if (!winner || winner.composite === null) {
    return `WINNER: none (${INSUFFICIENT_DATA})`;
  }
  return `WINNER: ${winner.pair} (composite ${score(winner.composite)}, variance ${score(winner.variance)})`;
}

const BREAKDOWN_COLUMNS: Column[] = [
  { header: 'Query', key: 'id' },
  { header: 'Text', key: 'text' },
  { header: 'F', key: 'f', align: 'right' },
  { header: 'R', key: 'r', align: 'right' },
  { header: 'C', key: 'c', align: 'right' },
  { header: 'Avg', key: 'avg', align: 'right' },
];

function breakdownRow(query: EvalQuery, cell: CellResult | undefined): Row {
  const base = { id: query.id, text: truncate(query.query, QUERY_PREVIEW_CHARS) };
  if (!cell || cell.status === 'failed') {
    return { ...base, f: '-', r: '-', c: '-', avg: 'failed' };
  }
  return {
    ...base,
    f: cell.scores.faithfulness.toFixed(2),
    r: cell.scores.relevancy.toFixed(2),
    c: cell.scores.correctness.toFixed(2),
    avg: compositeOf(cell.scores).toFixed(2),
  };
}

function formatBreakdown(report: ComparisonReport, summary: PairSummary): string {
  const rows = report.queries.map((query) =>
    breakdownRow(
      query,
      report.cells.find(
        (cell) => cell.chunk === summary.chunk && cell.retrieval === summary.retrieval && cell.queryId === query.id
      )
    )
  );
  return [`${summary.rank}. ${summary.pair}`, formatTable(BREAKDOWN_COLUMNS, rows)].join('\n');
}

function formatFailures(report: ComparisonReport): string {
  if (report.failedCells.length === 0) {
    return 'FAILED CELLS: none';
  }
  const lines = report.failedCells.map(
    (cell) =>
      `  ${cell.chunk}/${cell.retrieval} ${cell.queryId} after ${cell.attempts} attempt(s): ${cell.error}`
  );
  return [`FAILED CELLS (${report.failedCells.length})`, ...lines].join('\n');
}

/**
 * @example
 * ```typescript
 * writeFileSync(join(outputDir, `comparison-${report.runId}.txt`), formatComparisonReport(report));
 * ```
 */
export function formatComparisonReport(report: ComparisonReport): string {
  const rule = '='.repeat(72);
  const ranked = report.pairs.filter((summary) => summary.composite !== null);

  const sections = [
    rule,
    'RETRIEVAL COMPARISON REPORT',
    `Run ${report.runId} | ${report.startedAt} → ${report.completedAt}`,
    `${report.pairs.length} pairs × ${report.queries.length} queries = ${report.cells.length} cells`,
    rule,
    '',
    'SUMMARY',
    formatTable(SUMMARY_COLUMNS, report.pairs.map(summaryRow)),
    '',
    formatWinnerLine(report.pairs),
    '',
    `TOP ${Math.min(BREAKDOWN_PAIRS, ranked.length)} BY QUERY`,
    ...ranked.slice(0, BREAKDOWN_PAIRS).map((summary) => `${formatBreakdown(report, summary)}\n`),
    formatFailures(report),
  ];
  return sections.join('\n');
}
