/**
 * Citation Helpers
 *
 * Builds citations from retrieved chunks and formats them for the terminal
 * and for JSON output.
 *
 * @example
 * ```typescript
 * const citations = citationsFromChunks(chunks);
 * console.log(formatCitations(citations));
 * // [1] invoice-acc-demo-001#0 (0.89) "Total amount due: $137.14"
 * ```
 */

import type { RetrievedChunk } from '../search/types.js';
import type { Citation } from './types.js';

export const MAX_QUOTE_WORDS = 20;

/**
 * The first `maxWords` words of `text`, whitespace collapsed.
 */
export function truncateQuote(text: string, maxWords: number = MAX_QUOTE_WORDS): string {
  return text.trim().split(/\s+/).filter(Boolean).slice(0, maxWords).join(' ');
}

export function citationFromChunk(chunk: RetrievedChunk): Citation {
  return {
    docId: chunk.docId,
    chunkId: chunk.chunkId,
    quote: truncateQuote(chunk.text),
    score: chunk.score,
  };
}

export function citationsFromChunks(chunks: RetrievedChunk[]): Citation[] {
  return chunks.map(citationFromChunk);
}

/**
 * Retrieval score of the chunk a citation points at, 0 when it points at
 * nothing retrieved.
 */
export function scoreFor(docId: string, chunkId: string, chunks: RetrievedChunk[]): number {
  return chunks.find((chunk) => chunk.docId === docId && chunk.chunkId === chunkId)?.score ?? 0;
}

export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * One line per citation: `[1] docId#chunkId (0.89) "quote"`, the quote cut
 * to its first 20 words.
 */
export function formatCitations(citations: Citation[], options: { showScores?: boolean } = {}): string {
  const showScores = options.showScores ?? true;
  return citations
    .map((citation, i) => {
      const score = showScores ? ` (${formatScore(citation.score)})` : '';
      return `[${i + 1}] ${citation.docId}#${citation.chunkId}${score} "${truncateQuote(citation.quote)}"`;
    })
    .join('\n');
}

/**
 * Flattened for tools like jq.
 */
export interface CitationJSON {
  index: number;
  docId: string;
  chunkId: string;
  quote: string;
  score: number;
}

export function formatCitationsJSON(citations: Citation[]): CitationJSON[] {
  return citations.map((citation, i) => ({ index: i + 1, ...citation }));
}
