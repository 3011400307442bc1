/**
 * LLM Provider Factory
 *
 * Creates the SDK chat provider named by `[generation].provider`.
 *
 * USAGE:
 * ```typescript
 * const config = loadConfig();
 * const { provider, name, model } = createLLMProvider(config.generation);
 *
 * const response = await provider.chat([{ role: 'user', content: 'Hello!' }]);
 * ```
 *
 * SECURITY: keys are read from the environment at creation time and never
 * logged or included in error messages.
 */

import type { LLMProvider } from '@contextaisdk/core';
import { AnthropicProvider } from '@contextaisdk/provider-anthropic';
import { OpenAIProvider } from '@contextaisdk/provider-openai';
import { OllamaProvider } from '@contextaisdk/provider-ollama';

import type { Config, LLMProviderType } from '../config/schema.js';
import { getEnv, getOllamaHost } from '../config/env.js';
import { APIKeyError } from '../errors/index.js';

export interface LLMProviderResult {
  provider: LLMProvider;
  /** For logs */
  name: LLMProviderType;
  model: string;
}

function requireKey(
  provider: LLMProviderType,
  envVar: 'ANTHROPIC_API_KEY' | 'OPENAI_API_KEY'
): string {
  const key = getEnv(envVar)?.trim();
  if (!key) {
    throw new APIKeyError(provider, envVar);
  }
  return key;
}

/**
 * Build the configured provider. Retries are disabled in the SDK clients:
 * the generation client owns the retry and timeout policy.
 *
 * @throws APIKeyError if the provider needs a key that is not set
 */
export function createLLMProvider(config: Config['generation']): LLMProviderResult {
  const { model } = config;

  switch (config.provider) {
    case 'anthropic':
      return {
        provider: new AnthropicProvider({
          apiKey: requireKey('anthropic', 'ANTHROPIC_API_KEY'),
          model,
          timeout: config.timeout_ms,
          maxRetries: 0,
        }),
        name: 'anthropic',
        model,
      };

    case 'openai':
      return {
        provider: new OpenAIProvider({
          apiKey: requireKey('openai', 'OPENAI_API_KEY'),
          model,
          timeout: config.timeout_ms,
          maxRetries: 0,
        }),
        name: 'openai',
        model,
      };

    case 'ollama':
      return {
        provider: new OllamaProvider({
          model,
          host: getOllamaHost(),
          timeout: config.timeout_ms,
        }),
        name: 'ollama',
        model,
      };
  }
}
