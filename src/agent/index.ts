/**
 * Agent Module
 *
 * The per-turn pipeline: intent routing, the two domain responders, draft
 * parsing, guardrails, validation and the orchestrator state machine that
 * ties them together.
 *
 * @example
 * ```typescript
 * import { createOrchestrator } from './agent/index.js';
 *
 * const orchestrator = createOrchestrator(config, { generation, embedder, store, memory });
 * const result = await orchestrator.handleTurn(sessionId, 'Why is my bill higher this month?');
 *
 * if (result.state === 'Approved') {
 *   console.log(result.text);
 *   console.log(formatCitations(result.response?.citations ?? []));
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Orchestration
// ============================================================================

export {
  Orchestrator,
  createOrchestrator,
  MAX_REROUTES,
  type OrchestratorDeps,
  type OrchestratorServices,
} from './orchestrator.js';

export { IntentRouter, parseIntentLabel, FALLBACK_INTENT, type IntentRouterDeps } from './router.js';

export {
  GeneralKnowledgeResponder,
  AccountResponder,
  boostAccountMatches,
  type ResponderDeps,
} from './responders.js';

// ============================================================================
// Checks
// ============================================================================

export { checkDraft, assertResponseShape, type GuardrailVerdict } from './guardrails.js';
export {
  validateResponse,
  buildClarifyingResponse,
  DEFAULT_CONFIDENCE_THRESHOLD,
} from './validator.js';
export {
  parseAccountDraft,
  parseGeneralDraft,
  AccountDraftSchema,
  type AccountDraft,
  type TextDraft,
} from './response-parser.js';
export { CURRENCY_PATTERN, extractCurrencyTokens } from './currency.js';

// ============================================================================
// Citations & prompts
// ============================================================================

export {
  citationsFromChunks,
  formatCitations,
  formatCitationsJSON,
  truncateQuote,
  MAX_QUOTE_WORDS,
  type CitationJSON,
} from './citations.js';
export { formatContext, HANDOFF_APOLOGY, SAFE_RESPONSE, CLARIFYING_HEADER } from './prompts.js';

// ============================================================================
// Types & errors
// ============================================================================

export {
  IntentLabelSchema,
  type AgentResponse,
  type Citation,
  type DomainResponder,
  type DraftContext,
  type IntentLabel,
  type RawDraft,
  type ResponderTag,
  type TerminalState,
  type TurnResult,
  type TurnState,
  type ValidationCheck,
  type ValidationReason,
  type ValidationResult,
} from './types.js';

export {
  TurnError,
  ClassificationError,
  RetrievalError,
  GenerationError,
  ValidationFailure,
  GuardrailLoopExceeded,
  ResponseShapeError,
  isTransientError,
  type TurnErrorCode,
} from './errors.js';
