/**
 * Answer generation for one evaluation cell: retrieved chunks in, a plain
 * answer out. Deliberately simpler than the concierge responders so that the
 * grid compares chunking and retrieval, not prompt engineering.
 */

import type { GenerationClient } from '../providers/generation.js';
import type { RetrievedChunk } from '../search/types.js';

export const ANSWER_TEMPERATURE = 0;
export const ANSWER_MAX_TOKENS = 400;
export const CONTEXT_SEPARATOR = '\n\n---\n\n';
export const NO_CONTEXT_ANSWER = 'I could not find relevant information to answer this question.';

/** `[docId] text` entries; chunks without text are dropped */
export function buildEvalContext(chunks: RetrievedChunk[]): string {
  return chunks
    .filter((chunk) => chunk.text.trim().length > 0)
    .map((chunk) => `[${chunk.docId}] ${chunk.text}`)
    .join(CONTEXT_SEPARATOR);
}

export async function generateEvalAnswer(
  generation: GenerationClient,
  query: string,
  chunks: RetrievedChunk[]
): Promise<string> {
  const context = buildEvalContext(chunks);
  if (!context) {
    return NO_CONTEXT_ANSWER;
  }

  const answer = await generation.complete({
    system: `You are a billing support assistant. Answer the customer's question using ONLY the provided context. Be concise and factual. If the context doesn't have enough information, say so.

Context:
${context}`,
    prompt: query,
    temperature: ANSWER_TEMPERATURE,
    maxTokens: ANSWER_MAX_TOKENS,
  });
  return answer.trim();
}
