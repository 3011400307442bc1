/**
 * Config Module
 *
 * Programmatic config access. CLI users go through `concierge config`.
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  GenerationConfigSchema,
  EmbeddingConfigSchema,
  RetrievalConfigSchema,
  ChunkingConfigSchema,
  EvalConfigSchema,
  LLMProviderTypeSchema,
  RetrievalStrategyNameSchema,
  ChunkStrategyNameSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  LLMProviderType,
  RetrievalStrategyName,
  ChunkStrategyName,
} from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export { loadConfig, getConfigValue, setConfigValue, listConfig } from './loader.js';

export { getHomeDir, getDbPath, getConfigPath, expandHome } from './paths.js';

export {
  loadEnv,
  getEnv,
  hasApiKey,
  getOllamaHost,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';

export {
  validateStartupConfig,
  assertStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_LLM,
} from './startup-validation.js';
export type { StartupValidationResult, StartupValidationOptions } from './startup-validation.js';
