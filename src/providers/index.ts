/**
 * Providers Module
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * const { provider } = createLLMProvider(config.generation);
 * const generation = new LLMGenerationClient(provider, {
 *   maxRetries: config.generation.max_retries,
 *   retryBaseMs: config.generation.retry_base_ms,
 *   timeoutMs: config.generation.timeout_ms,
 * });
 * ```
 */

export { createLLMProvider, type LLMProviderResult } from './llm.js';
export {
  LLMGenerationClient,
  type GenerationClient,
  type GenerationRequest,
  type LLMGenerationClientOptions,
} from './generation.js';
