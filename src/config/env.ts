/**
 * Environment Variable Handler
 *
 * Loads provider credentials and path overrides. Supports a .env file in the
 * working directory via dotenv.
 *
 * Keys are never logged and never included in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { LLMProviderType } from './schema.js';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA
// ============================================================================

/**
 * Keys are optional at load time; only the provider actually configured must
 * have one (checked in startup validation).
 */
export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_HOST: z.string().default('http://localhost:11434'),
  CONCIERGE_HOME: z.string().optional(),
  CONCIERGE_DB_PATH: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables once, then serve from cache.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OLLAMA_HOST: process.env.OLLAMA_HOST || undefined,
    CONCIERGE_HOME: process.env.CONCIERGE_HOME,
    CONCIERGE_DB_PATH: process.env.CONCIERGE_DB_PATH,
  });
  return _envCache;
}

export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Whether the provider has a non-empty key. Ollama needs none.
 */
export function hasApiKey(provider: LLMProviderType): boolean {
  const env = loadEnv();
  switch (provider) {
    case 'anthropic':
      return Boolean(env.ANTHROPIC_API_KEY?.trim());
    case 'openai':
      return Boolean(env.OPENAI_API_KEY?.trim());
    case 'ollama':
      return true;
  }
}

export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * FOR TESTING ONLY
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

export const SETUP_INSTRUCTIONS: Record<LLMProviderType, string> = {
  anthropic: `
To use Anthropic models:

1. Create an API key in the Anthropic console
2. export ANTHROPIC_API_KEY="<your key>"   (or add it to a .env file)
`.trim(),

  openai: `
To use OpenAI models:

1. Create an API key in the OpenAI dashboard
2. export OPENAI_API_KEY="<your key>"   (or add it to a .env file)
`.trim(),

  ollama: `
To use Ollama (local models):

1. Start the server: ollama serve
2. Pull the configured model: ollama pull <model>
3. (Optional) export OLLAMA_HOST="http://localhost:11434"
`.trim(),
};
