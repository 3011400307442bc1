/**
 * Domain Responders
 *
 * Two variants behind one capability, `draft(context)`. Both receive a
 * RetrievalStrategy chosen at construction and never look at which one it is.
 *
 * - GeneralKnowledgeResponder: plain-text answers from the reference wiki;
 *   escalates as soon as the session is tied to an account
 * - AccountResponder: JSON answers with citations from customer documents
 */

import { sortChunks } from '../search/strategies.js';
import type { RetrievalStrategy, RetrievedChunk } from '../search/types.js';
import type { GenerationClient } from '../providers/generation.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import {
  ACCOUNT_SYSTEM_PROMPT,
  GENERAL_SYSTEM_PROMPT,
  buildAccountPrompt,
  buildGeneralPrompt,
} from './prompts.js';
import type { DomainResponder, DraftContext, RawDraft } from './types.js';

export const GENERAL_TEMPERATURE = 0.3;
export const GENERAL_MAX_TOKENS = 500;
export const ACCOUNT_TEMPERATURE = 0.3;
export const ACCOUNT_MAX_TOKENS = 1000;
export const ACCOUNT_MATCH_BOOST = 0.05;

export interface ResponderDeps {
  retrieval: RetrievalStrategy;
  generation: GenerationClient;
  logger?: Logger;
}

export class GeneralKnowledgeResponder implements DomainResponder {
  readonly tag = 'general_knowledge';
  private readonly logger: Logger;

  constructor(private readonly deps: ResponderDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async draft(context: DraftContext): Promise<RawDraft> {
    const account = context.session.entities.account_id;
    if (account) {
      return {
        kind: 'escalate',
        responder: this.tag,
        reason: `Session is tied to account ${account.value}`,
      };
    }

    const chunks = await this.deps.retrieval.retrieve(context.query, context.namespace, context.topK);
    this.logger.debug(`[GeneralResponder] ${chunks.length} chunk(s) from ${context.namespace}`);
    if (chunks.length === 0) {
      return { kind: 'text', responder: this.tag, text: '', chunks, fallback: true };
    }

    const text = await this.deps.generation.complete({
      system: GENERAL_SYSTEM_PROMPT,
      prompt: buildGeneralPrompt(context.query, chunks),
      temperature: GENERAL_TEMPERATURE,
      maxTokens: GENERAL_MAX_TOKENS,
    });
    return { kind: 'text', responder: this.tag, text, chunks };
  }
}

/**
 * Raise chunks that name the account, capped at 1, and re-sort.
 */
export function boostAccountMatches(chunks: RetrievedChunk[], accountId: string): RetrievedChunk[] {
  const needle = accountId.toLowerCase();
  return sortChunks(
    chunks.map((chunk) =>
      chunk.text.toLowerCase().includes(needle)
        ? { ...chunk, score: Math.min(1, chunk.score + ACCOUNT_MATCH_BOOST) }
        : chunk
    )
  );
}

export class AccountResponder implements DomainResponder {
  readonly tag = 'account_specific';
  private readonly logger: Logger;

  constructor(private readonly deps: ResponderDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async draft(context: DraftContext): Promise<RawDraft> {
    const account = context.session.entities.account_id;
    const searchQuery =
      account && context.sessionSummary ? `${context.sessionSummary} ${context.query}` : context.query;

    let chunks = await this.deps.retrieval.retrieve(searchQuery, context.namespace, context.topK);
    if (account) {
      chunks = boostAccountMatches(chunks, account.value);
    }
    this.logger.debug(
      `[AccountResponder] ${chunks.length} chunk(s) from ${context.namespace}, top score ${(chunks[0]?.score ?? 0).toFixed(3)}`
    );
    if (chunks.length === 0) {
      return { kind: 'text', responder: this.tag, text: '', chunks, fallback: true };
    }

    const text = await this.deps.generation.complete({
      system: ACCOUNT_SYSTEM_PROMPT,
      prompt: buildAccountPrompt(context.query, chunks, context.sessionSummary, context.strict),
      temperature: ACCOUNT_TEMPERATURE,
      maxTokens: ACCOUNT_MAX_TOKENS,
    });
    return { kind: 'text', responder: this.tag, text, chunks };
  }
}
