/**
 * Table Formatting Utility
 *
 * Box-drawn tables for terminal output and the plain-text evaluation report.
 * Colour is opt-in so the same table can be written to a file.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  header: string;
  /** Key looked up in each row */
  key: string;
  align?: Alignment;
}

export type Row = Record<string, string | number | null | undefined>;

export interface TableOptions {
  /** Bold the header row with ANSI codes (default: false) */
  color?: boolean;
}

// eslint-disable-next-line no-control-regex
const ANSI = /\x1B\[[0-9;]*m/g;

function visibleLength(value: string): number {
  return value.replace(ANSI, '').length;
}

function cellText(row: Row, key: string): string {
  const value = row[key];
  return value == null ? '' : String(value);
}

function pad(value: string, width: number, align: Alignment): string {
  const fill = ' '.repeat(Math.max(0, width - visibleLength(value)));
  return align === 'right' ? fill + value : value + fill;
}

/**
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'Pair', key: 'pair' }, { header: 'Score', key: 'score', align: 'right' }],
 *   [{ pair: 'recursive/direct', score: '0.812' }]
 * );
 * ```
 */
export function formatTable(columns: Column[], rows: Row[], options: TableOptions = {}): string {
  if (columns.length === 0) return '';

  const widths = columns.map((col) =>
    Math.max(visibleLength(col.header), ...rows.map((row) => visibleLength(cellText(row, col.key))))
  );

  const rule = (left: string, mid: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(mid) + right;

  const line = (cells: string[]): string =>
    '│' + cells.map((cell) => ` ${cell} `).join('│') + '│';

  const header = columns.map((col, i) => {
    const padded = pad(col.header, widths[i] ?? 0, col.align ?? 'left');
    return options.color ? chalk.bold(padded) : padded;
  });

  const body = rows.map((row) =>
    line(columns.map((col, i) => pad(cellText(row, col.key), widths[i] ?? 0, col.align ?? 'left')))
  );

  return [rule('┌', '┬', '┐'), line(header), rule('├', '┼', '┤'), ...body, rule('└', '┴', '┘')].join(
    '\n'
  );
}
