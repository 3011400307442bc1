/**
 * Guardrails
 *
 * Deterministic check on every draft before it can move on:
 *
 * - general_knowledge: an `escalate` draft, or a currency amount while the
 *   session is tied to an account, is a reroute
 * - account_specific: the draft must parse to a well-formed response;
 *   otherwise ask for one strict regeneration
 *
 * The orchestrator owns the "at most one reroute" budget; this module only
 * returns verdicts.
 */

import { extractCurrencyTokens } from './currency.js';
import { ResponseShapeError } from './errors.js';
import { parseAccountDraft, parseGeneralDraft } from './response-parser.js';
import type { AgentResponse, RawDraft } from './types.js';
import type { Session } from '../memory/types.js';

export type GuardrailVerdict =
  | { action: 'pass'; response: AgentResponse }
  | { action: 'reroute'; reason: string; blockedAmounts: string[] }
  | { action: 'regenerate'; error: ResponseShapeError };

/**
 * Citations with docId/chunkId/quote and a numeric confidence in [0,1].
 *
 * @throws ResponseShapeError
 */
export function assertResponseShape(response: AgentResponse, raw: string): void {
  const badCitation = response.citations.find(
    (citation) => !citation.docId || !citation.chunkId || !citation.quote
  );
  if (badCitation) {
    throw new ResponseShapeError('Citation is missing docId, chunkId or quote', raw);
  }
  if (!Number.isFinite(response.confidence) || response.confidence < 0 || response.confidence > 1) {
    throw new ResponseShapeError(`Confidence ${response.confidence} is outside [0,1]`, raw);
  }
}

function checkGeneral(draft: RawDraft, session: Session): GuardrailVerdict {
  if (draft.kind === 'escalate') {
    return { action: 'reroute', reason: draft.reason, blockedAmounts: [] };
  }

  const response = parseGeneralDraft(draft);
  const account = session.entities.account_id;
  const amounts = extractCurrencyTokens(response.answer);
  if (account && amounts.length > 0) {
    return {
      action: 'reroute',
      reason: `General answer quoted ${amounts.join(', ')} while session is tied to account ${account.value}`,
      blockedAmounts: amounts,
    };
  }
  return { action: 'pass', response };
}

function checkAccount(draft: RawDraft): GuardrailVerdict {
  if (draft.kind === 'escalate') {
    return { action: 'reroute', reason: draft.reason, blockedAmounts: [] };
  }

  try {
    const response = parseAccountDraft(draft);
    assertResponseShape(response, draft.text);
    return { action: 'pass', response };
  } catch (error) {
    if (error instanceof ResponseShapeError) {
      return { action: 'regenerate', error };
    }
    throw error;
  }
}

export function checkDraft(draft: RawDraft, session: Session): GuardrailVerdict {
  return draft.responder === 'general_knowledge' ? checkGeneral(draft, session) : checkAccount(draft);
}
