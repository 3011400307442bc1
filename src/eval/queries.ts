/**
 * Evaluation Query Loader
 *
 * Reads `query | ground truth` lines. Blank lines and `#` comments are
 * skipped; ids are assigned in file order as q01, q02, ...
 *
 * @example queries.txt
 * ```
 * # billing questions
 * What is the late fee? | A $5.00 late fee applies after 15 days.
 * ```
 */

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';

import { EvalError, type EvalQuery } from './types.js';

const QueryLineSchema = z.object({
  query: z.string().min(1, 'query is empty'),
  groundTruth: z.string(),
});

export const formatQueryId = (index: number): string => `q${String(index + 1).padStart(2, '0')}`;

export function parseQueries(content: string): EvalQuery[] {
  const queries: EvalQuery[] = [];

  for (const [lineIndex, rawLine] of content.split(/\r?\n/).entries()) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }

    const separator = line.indexOf('|');
    const candidate =
      separator === -1
        ? { query: line, groundTruth: '' }
        : { query: line.slice(0, separator).trim(), groundTruth: line.slice(separator + 1).trim() };

    const parsed = QueryLineSchema.safeParse(candidate);
    if (!parsed.success) {
      const message = parsed.error.issues[0]?.message ?? 'invalid line';
      throw EvalError.queriesInvalid(`line ${lineIndex + 1}: ${message}`);
    }
    queries.push({ id: formatQueryId(queries.length), ...parsed.data });
  }

  if (queries.length === 0) {
    throw EvalError.queriesInvalid('no queries found');
  }
  return queries;
}

/**
 * @throws EvalError QUERIES_NOT_FOUND or QUERIES_INVALID
 */
export function loadQueries(path: string): EvalQuery[] {
  if (!existsSync(path)) {
    throw EvalError.queriesNotFound(path);
  }
  return parseQueries(readFileSync(path, 'utf-8'));
}
