/**
 * Agent Types
 *
 * Shared shapes for one conversational turn: the intent label, responder
 * output, validation result and the orchestrator's state trace.
 */

import { z } from 'zod';
import type { Session } from '../memory/types.js';
import type { RetrievedChunk } from '../search/types.js';

// ============================================================================
// Intent & responder tags
// ============================================================================

export const IntentLabelSchema = z.enum(['general_knowledge', 'account_specific']);

/** Closed set of router outputs */
export type IntentLabel = z.infer<typeof IntentLabelSchema>;

/**
 * Which responder produced an answer. One responder per intent.
 */
export type ResponderTag = IntentLabel;

// ============================================================================
// Responder output
// ============================================================================

export interface Citation {
  docId: string;
  chunkId: string;
  /** Verbatim excerpt; quotes built from chunks keep their first 20 words */
  quote: string;
  /** Retrieval score in [0,1] */
  score: number;
}

export interface AgentResponse {
  answer: string;
  /** Ordered, possibly empty */
  citations: Citation[];
  /** In [0,1] */
  confidence: number;
  responder: ResponderTag;
}

/**
 * What a responder hands back before parsing: generated text plus the chunks
 * it was grounded on, or a request to hand the turn to the other responder.
 */
export type RawDraft =
  | {
      kind: 'text';
      responder: ResponderTag;
      text: string;
      chunks: RetrievedChunk[];
      /** Set when the draft was produced without a model call (no context) */
      fallback?: boolean;
    }
  | { kind: 'escalate'; responder: ResponderTag; reason: string };

export interface DraftContext {
  query: string;
  session: Session;
  /** Rendered entity summary, e.g. "Account: ACC-1 | Period: January 2026" */
  sessionSummary: string;
  namespace: string;
  topK: number;
  /** Ask for stricter output formatting (used on regeneration) */
  strict: boolean;
}

/**
 * One capability shared by both responder variants.
 */
export interface DomainResponder {
  readonly tag: ResponderTag;
  draft(context: DraftContext): Promise<RawDraft>;
}

// ============================================================================
// Validation
// ============================================================================

export type ValidationCheck = 'citations_present' | 'confidence_threshold' | 'amounts_verified';

export interface ValidationReason {
  check: ValidationCheck;
  message: string;
}

export interface ValidationResult {
  approved: boolean;
  /** Empty iff approved */
  reasons: ValidationReason[];
}

// ============================================================================
// Orchestrator
// ============================================================================

export type TurnState =
  | 'Routing'
  | 'MemoryMerge'
  | 'Dispatch'
  | 'GuardrailCheck'
  | 'Reroute'
  | 'Validate'
  | 'Approved'
  | 'Rejected'
  | 'Error';

export type TerminalState = Extract<TurnState, 'Approved' | 'Rejected' | 'Error'>;

export interface TurnResult {
  sessionId: string;
  state: TerminalState;
  /** What the user sees */
  text: string;
  intent: IntentLabel;
  /** Responder whose output (or refusal) produced `text`; null on early errors */
  responder: ResponderTag | null;
  rerouted: boolean;
  /** Every state visited, in order */
  trace: TurnState[];
  validation?: ValidationResult;
  response?: AgentResponse;
  /** Error code when state is 'Error' */
  errorCode?: string;
}
