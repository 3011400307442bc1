/**
 * Draft Parsing
 *
 * Turns a responder's raw text draft into a typed AgentResponse. The
 * account-specific draft must be the JSON shape its prompt demands; anything
 * else is a ResponseShapeError, never a best-effort guess.
 */

import { z } from 'zod';

import { citationsFromChunks, scoreFor } from './citations.js';
import { ResponseShapeError } from './errors.js';
import { ACCOUNT_NOT_FOUND, GENERAL_NOT_FOUND } from './prompts.js';
import type { AgentResponse, Citation, RawDraft } from './types.js';
import type { RetrievedChunk } from '../search/types.js';
import { parseJsonWith } from '../utils/json.js';

export type TextDraft = Extract<RawDraft, { kind: 'text' }>;

const DraftCitationSchema = z.object({
  doc_id: z.string().min(1),
  chunk_id: z.union([z.string().min(1), z.number().int().nonnegative().transform(String)]),
  quote: z.string().min(1),
});

export const AccountDraftSchema = z.object({
  answer: z.string().min(1),
  citations: z.array(DraftCitationSchema),
  confidence_note: z.string().optional(),
});

export type AccountDraft = z.infer<typeof AccountDraftSchema>;

/**
 * Chunks arrive sorted, so the first score is the top one.
 */
const topScore = (chunks: RetrievedChunk[]): number => chunks[0]?.score ?? 0;

export function parseGeneralDraft(draft: TextDraft): AgentResponse {
  const answer = draft.text.trim();
  if (draft.fallback || !answer) {
    return { answer: GENERAL_NOT_FOUND, citations: [], confidence: 0, responder: draft.responder };
  }
  return {
    answer,
    citations: citationsFromChunks(draft.chunks),
    confidence: topScore(draft.chunks),
    responder: draft.responder,
  };
}

/**
 * @throws ResponseShapeError when the text is not the required JSON shape
 */
export function parseAccountDraft(draft: TextDraft): AgentResponse {
  if (draft.fallback) {
    return { answer: ACCOUNT_NOT_FOUND, citations: [], confidence: 0, responder: draft.responder };
  }

  const parsed = parseJsonWith(AccountDraftSchema, draft.text);
  if (!parsed.success) {
    throw new ResponseShapeError(`Malformed account response: ${parsed.error}`, draft.text);
  }

  const citations: Citation[] = parsed.data.citations.map((citation) => ({
    docId: citation.doc_id,
    chunkId: citation.chunk_id,
    // Verbatim: the validator matches amounts against the full quote
    quote: citation.quote,
    score: scoreFor(citation.doc_id, citation.chunk_id, draft.chunks),
  }));

  return {
    answer: parsed.data.answer.trim(),
    citations,
    confidence: topScore(draft.chunks),
    responder: draft.responder,
  };
}
