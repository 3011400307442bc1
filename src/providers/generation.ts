/**
 * Generation Client
 *
 * The one text-completion seam every component calls: the router, both
 * responders, the hypothesis and multi-phrasing strategies, and the eval
 * generator and judge. Wraps an SDK chat provider with a per-call timeout
 * and bounded exponential-backoff retries; anything that still fails
 * surfaces as GenerationError.
 */

import type { LLMProvider } from '@contextaisdk/core';

import { GenerationError } from '../agent/errors.js';
import { withRetry, withTimeout, silentLogger, type Logger } from '../utils/index.js';

export interface GenerationRequest {
  prompt: string;
  temperature: number;
  maxTokens: number;
  /** Optional system message sent before the prompt */
  system?: string;
}

export interface GenerationClient {
  /**
   * @throws GenerationError after the retry budget is spent
   */
  complete(request: GenerationRequest): Promise<string>;
}

export interface LLMGenerationClientOptions {
  /** Retries after the first attempt (default: 2) */
  maxRetries?: number;
  /** Backoff before the first retry, doubled each time (default: 500) */
  retryBaseMs?: number;
  /** Per-attempt timeout (default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

type ChatMessages = Parameters<LLMProvider['chat']>[0];

export class LLMGenerationClient implements GenerationClient {
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly provider: Pick<LLMProvider, 'chat'>,
    options: LLMGenerationClientOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBaseMs = options.retryBaseMs ?? 500;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep;
  }

  async complete(request: GenerationRequest): Promise<string> {
    const messages: ChatMessages = request.system
      ? [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ]
      : [{ role: 'user', content: request.prompt }];

    const { value } = await withRetry(
      async () => {
        try {
          const response = await withTimeout(
            this.provider.chat(messages, {
              maxTokens: request.maxTokens,
              temperature: request.temperature,
            }),
            this.timeoutMs,
            () => new GenerationError(`Generation timed out after ${this.timeoutMs}ms`, true)
          );
          return response.content;
        } catch (error) {
          if (error instanceof GenerationError) {
            throw error;
          }
          throw new GenerationError(
            `Generation failed: ${error instanceof Error ? error.message : String(error)}`,
            false,
            { cause: error }
          );
        }
      },
      {
        maxRetries: this.maxRetries,
        baseDelayMs: this.retryBaseMs,
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(
            `[Generation] Attempt ${attempt} failed (${message}); retrying in ${delayMs}ms`
          );
        },
      }
    );
    return value;
  }
}
