/**
 * Eval Exporter
 *
 * Writes a finished run to the output directory:
 *
 * - `comparison-<runId>.txt`: the plain-text report
 * - `results-<runId>.json`: every cell plus the ranked pairs, for scripts
 */

import * as fs from 'node:fs';
import { join } from 'node:path';

import { formatComparisonReport } from './report.js';
import { EvalError, type ComparisonReport } from './types.js';

export interface ExportedFiles {
  textPath: string;
  jsonPath: string;
}

/**
 * JSON shape of an exported run. Stable field names so downstream scripts
 * can read it without this package.
 */
export interface ExportedRun {
  run_id: string;
  started_at: string;
  completed_at: string;
  queries: ComparisonReport['queries'];
  pairs: ComparisonReport['pairs'];
  cells: ComparisonReport['cells'];
}

export function toExportedRun(report: ComparisonReport): ExportedRun {
  return {
    run_id: report.runId,
    started_at: report.startedAt,
    completed_at: report.completedAt,
    queries: report.queries,
    pairs: report.pairs,
    cells: report.cells,
  };
}

function writeFile(path: string, content: string): void {
  try {
    fs.writeFileSync(path, content, 'utf-8');
  } catch (error) {
    throw EvalError.exportFailed(path, error instanceof Error ? error : undefined);
  }
}

/**
 * @throws EvalError EXPORT_FAILED when the directory or a file cannot be written
 */
export function exportReport(report: ComparisonReport, outputDir: string): ExportedFiles {
  try {
    fs.mkdirSync(outputDir, { recursive: true });
  } catch (error) {
    throw EvalError.exportFailed(outputDir, error instanceof Error ? error : undefined);
  }

  const textPath = join(outputDir, `comparison-${report.runId}.txt`);
  const jsonPath = join(outputDir, `results-${report.runId}.json`);

  writeFile(textPath, `${formatComparisonReport(report)}\n`);
  writeFile(jsonPath, `${JSON.stringify(toExportedRun(report), null, 2)}\n`);

  return { textPath, jsonPath };
}
