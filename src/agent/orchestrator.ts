/**
 * Turn Orchestrator
 *
 * Explicit state machine for one conversational turn:
 *
 * ```
 * Routing → MemoryMerge → Dispatch → GuardrailCheck ─┬→ Reroute → Dispatch (at most once)
 *                                                    ├→ Approved              (general path)
 *                                                    └→ Validate → Approved | Rejected
 * any state → Error
 * ```
 *
 * The session lock is held for the whole turn, so turns of one session run
 * one after another while other sessions proceed independently.
 *
 * @example
 * ```typescript
 * const orchestrator = createOrchestrator(config, { generation, embedder, store, memory });
 * const result = await orchestrator.handleTurn('cli_1a2b3c4d', 'What is my bill for January 2026?');
 * console.log(result.state, result.text);
 * ```
 */

import type { Config, RetrievalStrategyName } from '../config/schema.js';
import { extractEntities } from '../memory/entity-extractor.js';
import { summarizeEntities, type SessionHandle, type SessionMemory } from '../memory/session-memory.js';
import type { GenerationClient } from '../providers/generation.js';
import { createRetrievalStrategy } from '../search/strategies.js';
import type { Embedder, VectorStore } from '../search/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { GenerationError, GuardrailLoopExceeded, RetrievalError, TurnError, ValidationFailure } from './errors.js';
import { checkDraft, type GuardrailVerdict } from './guardrails.js';
import { HANDOFF_APOLOGY, ROUTER_HISTORY_TURNS, SAFE_RESPONSE } from './prompts.js';
import { AccountResponder, GeneralKnowledgeResponder } from './responders.js';
import { FALLBACK_INTENT, IntentRouter } from './router.js';
import type {
  AgentResponse,
  DomainResponder,
  IntentLabel,
  RawDraft,
  ResponderTag,
  TerminalState,
  TurnResult,
  TurnState,
  ValidationResult,
} from './types.js';
import { buildClarifyingResponse, validateResponse } from './validator.js';

export const MAX_REROUTES = 1;

export interface OrchestratorDeps {
  memory: SessionMemory;
  router: Pick<IntentRouter, 'classify'>;
  responders: Record<ResponderTag, DomainResponder>;
  /** Namespace each responder retrieves from */
  namespaces: Record<ResponderTag, string>;
  topK: number;
  confidenceThreshold: number;
  logger?: Logger;
  clock?: () => number;
}

type PassVerdict = Exclude<GuardrailVerdict, { action: 'regenerate' }>;

/** Mutable bookkeeping for one turn */
interface TurnProgress {
  readonly sessionId: string;
  readonly query: string;
  readonly trace: TurnState[];
  intent: IntentLabel;
  responder: ResponderTag | null;
  rerouted: boolean;
}

interface Outcome {
  state: TerminalState;
  text: string;
  validation?: ValidationResult;
  response?: AgentResponse;
  errorCode?: string;
}

const otherResponder = (tag: ResponderTag): ResponderTag =>
  tag === 'general_knowledge' ? 'account_specific' : 'general_knowledge';

export class Orchestrator {
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? Date.now;
  }

  handleTurn(sessionId: string, query: string): Promise<TurnResult> {
    return this.deps.memory.withSession(sessionId, (handle) => this.runTurn(handle, query));
  }

  private async runTurn(handle: SessionHandle, query: string): Promise<TurnResult> {
    const progress: TurnProgress = {
      sessionId: handle.id,
      query,
      trace: [],
      intent: FALLBACK_INTENT,
      responder: null,
      rerouted: false,
    };

    const history = handle.session().turns.slice(-ROUTER_HISTORY_TURNS);
    handle.appendTurn({ role: 'user', text: query, timestamp: this.clock(), responder: null });

    let outcome: Outcome;
    try {
      this.enter(progress, 'Routing');
      progress.intent = await this.deps.router.classify(query, history);

      this.enter(progress, 'MemoryMerge');
      handle.mergeEntities(extractEntities(query).entities);

      const response = await this.resolve(handle, progress);
      outcome = this.conclude(progress, response);
    } catch (error) {
      this.enter(progress, 'Error');
      outcome = this.failure(progress, error);
    }

    handle.appendTurn({
      role: 'system',
      text: outcome.text,
      timestamp: this.clock(),
      responder: progress.responder,
    });

    return {
      sessionId: progress.sessionId,
      state: outcome.state,
      text: outcome.text,
      intent: progress.intent,
      responder: progress.responder,
      rerouted: progress.rerouted,
      trace: progress.trace,
      ...(outcome.validation ? { validation: outcome.validation } : {}),
      ...(outcome.response ? { response: outcome.response } : {}),
      ...(outcome.errorCode ? { errorCode: outcome.errorCode } : {}),
    };
  }

  /**
   * Dispatch until a draft passes its guardrail, rerouting at most once.
   */
  private async resolve(handle: SessionHandle, progress: TurnProgress): Promise<AgentResponse> {
    let tag: ResponderTag = progress.intent;
    for (let reroutes = 0; ; reroutes++) {
      progress.responder = tag;
      this.enter(progress, 'Dispatch');
      const verdict = await this.dispatch(handle, progress, tag);
      if (verdict.action === 'pass') {
        return verdict.response;
      }

      if (reroutes >= MAX_REROUTES) {
        throw new GuardrailLoopExceeded(reroutes);
      }
      this.logger.info(`[Orchestrator] Rerouting ${tag} → ${otherResponder(tag)}: ${verdict.reason}`);
      this.enter(progress, 'Reroute');
      progress.rerouted = true;
      tag = otherResponder(tag);
    }
  }

  /**
   * One responder's draft through its guardrail. A malformed draft is
   * regenerated once in strict mode; a second one is a turn error.
   */
  private async dispatch(
    handle: SessionHandle,
    progress: TurnProgress,
    tag: ResponderTag
  ): Promise<PassVerdict> {
    let strict = false;
    for (;;) {
      const draft = await this.draft(handle, progress.query, tag, strict);
      this.enter(progress, 'GuardrailCheck');
      const verdict = checkDraft(draft, handle.session());
      if (verdict.action !== 'regenerate') {
        return verdict;
      }
      if (strict) {
        throw verdict.error;
      }
      this.logger.warn(`[Orchestrator] ${verdict.error.message}; regenerating with strict formatting`);
      strict = true;
      this.enter(progress, 'Dispatch');
    }
  }

  private async draft(
    handle: SessionHandle,
    query: string,
    tag: ResponderTag,
    strict: boolean
  ): Promise<RawDraft> {
    const session = handle.session();
    try {
      return await this.deps.responders[tag].draft({
        query,
        session,
        sessionSummary: summarizeEntities(session.entities),
        namespace: this.deps.namespaces[tag],
        topK: this.deps.topK,
        strict,
      });
    } catch (error) {
      // Account path degrades to an uncited draft, which validation rejects
      if (error instanceof RetrievalError && tag === 'account_specific') {
        this.logger.warn(`[Orchestrator] ${error.message}; continuing with a degraded response`);
        return { kind: 'text', responder: tag, text: '', chunks: [], fallback: true };
      }
      throw error;
    }
  }

  private conclude(progress: TurnProgress, response: AgentResponse): Outcome {
    if (response.responder === 'general_knowledge') {
      this.enter(progress, 'Approved');
      return { state: 'Approved', text: response.answer, response };
    }

    let validation: ValidationResult;
    if (response.citations.length === 0) {
      validation = {
        approved: false,
        reasons: [{ check: 'citations_present', message: 'response has no citations' }],
      };
    } else {
      this.enter(progress, 'Validate');
      validation = validateResponse(response, this.deps.confidenceThreshold);
    }

    if (validation.approved) {
      this.enter(progress, 'Approved');
      return { state: 'Approved', text: response.answer, validation, response };
    }

    const rejection = new ValidationFailure(validation);
    this.logger.info(
      `[Orchestrator] ${rejection.message} (${validation.reasons.map((r) => r.message).join('; ')})`
    );
    this.enter(progress, 'Rejected');
    return { state: 'Rejected', text: buildClarifyingResponse(validation), validation };
  }

  private failure(progress: TurnProgress, error: unknown): Outcome {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`[Orchestrator] Turn failed in session ${progress.sessionId}: ${message}`);

    if (error instanceof GenerationError || error instanceof RetrievalError) {
      return { state: 'Error', text: HANDOFF_APOLOGY, errorCode: error.code };
    }
    return {
      state: 'Error',
      text: SAFE_RESPONSE,
      errorCode: error instanceof TurnError ? error.code : 'UNEXPECTED',
    };
  }

  private enter(progress: TurnProgress, state: TurnState): void {
    progress.trace.push(state);
    this.logger.debug(`[Orchestrator] ${progress.sessionId} → ${state}`);
  }
}

// ============================================================================
// Wiring
// ============================================================================

export interface OrchestratorServices {
  generation: GenerationClient;
  embedder: Embedder;
  store: VectorStore;
  memory: SessionMemory;
  logger?: Logger;
}

/**
 * Build the orchestrator from config. The retrieval strategy is chosen here,
 * once, and shared by both responders.
 */
export function createOrchestrator(
  config: Config,
  services: OrchestratorServices,
  options: { strategy?: RetrievalStrategyName } = {}
): Orchestrator {
  const { generation, embedder, store, memory, logger } = services;
  const retrieval = createRetrievalStrategy(options.strategy ?? config.retrieval.strategy, {
    embedder,
    store,
    generation,
    logger,
  });

  return new Orchestrator({
    memory,
    router: new IntentRouter({ generation, logger }),
    responders: {
      general_knowledge: new GeneralKnowledgeResponder({ retrieval, generation, logger }),
      account_specific: new AccountResponder({ retrieval, generation, logger }),
    },
    namespaces: {
      general_knowledge: config.retrieval.reference_namespace,
      account_specific: config.retrieval.customer_namespace,
    },
    topK: config.retrieval.top_k,
    confidenceThreshold: config.validation.confidence_threshold,
    logger,
  });
}
