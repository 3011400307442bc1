/**
 * Intent Router
 *
 * Classifies a query as `general_knowledge` or `account_specific` with one
 * deterministic model call. Unparsable output is retried once; after that
 * the router falls back to `account_specific`, the path that is validated.
 *
 * @example
 * ```typescript
 * const router = new IntentRouter({ generation, logger });
 * const intent = await router.classify('What is my bill for January 2026?', recentTurns);
 * // 'account_specific'
 * ```
 */

import { ClassificationError, GenerationError } from './errors.js';
import { buildRouterPrompt, ROUTER_SYSTEM_PROMPT } from './prompts.js';
import { IntentLabelSchema, type IntentLabel } from './types.js';
import type { ConversationTurn } from '../memory/types.js';
import type { GenerationClient } from '../providers/generation.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const ROUTER_TEMPERATURE = 0;
export const ROUTER_MAX_TOKENS = 50;
/** Initial attempt plus one retry */
const MAX_ATTEMPTS = 2;
export const FALLBACK_INTENT: IntentLabel = 'account_specific';

const EDGE_NOISE = /^[\s"'`.,:;!?*()[\]]+|[\s"'`.,:;!?*()[\]]+$/g;

/**
 * Normalize raw model output to an intent label.
 *
 * @throws ClassificationError unless the output is exactly one label
 */
export function parseIntentLabel(raw: string): IntentLabel {
  const normalized = raw
    .trim()
    .toLowerCase()
    .replace(EDGE_NOISE, '')
    .replace(/[\s-]+/g, '_');
  const parsed = IntentLabelSchema.safeParse(normalized);
  if (!parsed.success) {
    throw new ClassificationError(`Unrecognized intent label: "${raw.trim().slice(0, 80)}"`, raw);
  }
  return parsed.data;
}

export interface IntentRouterDeps {
  generation: GenerationClient;
  logger?: Logger;
}

export class IntentRouter {
  private readonly generation: GenerationClient;
  private readonly logger: Logger;

  constructor(deps: IntentRouterDeps) {
    this.generation = deps.generation;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Never throws ClassificationError. A GenerationError counts as a
   * classification failure.
   */
  async classify(query: string, recentTurns: ConversationTurn[] = []): Promise<IntentLabel> {
    const prompt = buildRouterPrompt(query, recentTurns);
    let lastError: ClassificationError | GenerationError | undefined;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        const raw = await this.generation.complete({
          prompt,
          system: ROUTER_SYSTEM_PROMPT,
          temperature: ROUTER_TEMPERATURE,
          maxTokens: ROUTER_MAX_TOKENS,
        });
        const label = parseIntentLabel(raw);
        this.logger.debug(`[Router] Classified as ${label} (attempt ${attempt})`);
        return label;
      } catch (error) {
        if (!(error instanceof ClassificationError || error instanceof GenerationError)) {
          throw error;
        }
        lastError = error;
        this.logger.debug(`[Router] Attempt ${attempt} failed: ${error.message}`);
      }
    }

    this.logger.warn(
      `[Router] Could not classify query, defaulting to ${FALLBACK_INTENT}: ${lastError?.message ?? 'unknown error'}`
    );
    return FALLBACK_INTENT;
  }
}
