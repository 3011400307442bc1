/**
 * Corpus Loader
 *
 * Finds the .txt and .md documents under a directory with fast-glob and
 * reads them as SourceDocuments. The document id is the file name without
 * its extension, so `invoice-acc-demo-001.txt` cites as `invoice-acc-demo-001`.
 */

import { readFile, stat } from 'node:fs/promises';
import { basename, extname, relative, resolve } from 'node:path';
import fg from 'fast-glob';

import { CorpusNotFoundError } from '../errors/index.js';
import { MAX_FILE_SIZE } from './chunker/config.js';
import type { SourceDocument } from './chunker/types.js';

export const CORPUS_PATTERNS = ['**/*.txt', '**/*.md'];

export type SkipReason = 'empty' | 'too_large' | 'read_error' | 'duplicate_id';

export interface SkippedFile {
  /** Relative to the corpus root */
  path: string;
  reason: SkipReason;
}

export interface CorpusLoadResult {
  /** Sorted by docId */
  documents: SourceDocument[];
  skipped: SkippedFile[];
}

/**
 * @throws CorpusNotFoundError if `dir` does not exist or is not a directory
 *
 * @example
 * ```typescript
 * const { documents, skipped } = await loadCorpus('fixtures/eval/corpus');
 * ```
 */
export async function loadCorpus(dir: string): Promise<CorpusLoadResult> {
  const root = resolve(dir);
  const info = await stat(root).catch(() => null);
  if (!info?.isDirectory()) {
    throw new CorpusNotFoundError(dir);
  }

  const entries = await fg(CORPUS_PATTERNS, {
    cwd: root,
    absolute: true,
    dot: false,
    onlyFiles: true,
    suppressErrors: true,
  });

  const documents: SourceDocument[] = [];
  const skipped: SkippedFile[] = [];
  const seen = new Set<string>();

  for (const path of entries.sort()) {
    const relativePath = relative(root, path);
    const docId = basename(path, extname(path));

    if (seen.has(docId)) {
      skipped.push({ path: relativePath, reason: 'duplicate_id' });
      continue;
    }

    let text: string;
    try {
      const { size } = await stat(path);
      if (size > MAX_FILE_SIZE) {
        skipped.push({ path: relativePath, reason: 'too_large' });
        continue;
      }
      text = await readFile(path, 'utf-8');
    } catch {
      skipped.push({ path: relativePath, reason: 'read_error' });
      continue;
    }

    if (!text.trim()) {
      skipped.push({ path: relativePath, reason: 'empty' });
      continue;
    }

    seen.add(docId);
    documents.push({ docId, text, source: relativePath });
  }

  documents.sort((a, b) => a.docId.localeCompare(b.docId));
  return { documents, skipped };
}
