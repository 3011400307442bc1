/**
 * CLI Service Wiring
 *
 * Commands receive a `CliServices` factory instead of reaching for globals,
 * so tests can hand them a temp database and scripted models. Everything
 * that needs credentials or a model download is created lazily: `config`
 * and `session` never touch a provider.
 */

import { randomBytes } from 'node:crypto';
import type Database from 'better-sqlite3';

import type { CommandContext } from './types.js';
import { loadConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { openMigratedDatabase } from '../database/setup.js';
import { createLLMProvider } from '../providers/llm.js';
import { LLMGenerationClient, type GenerationClient } from '../providers/generation.js';
import { createEmbedder } from '../indexer/embedder/index.js';
import { SessionMemory, SqliteSessionRepository } from '../memory/index.js';
import { SqliteVectorStore } from '../search/sqlite-vector-store.js';
import type { Embedder, VectorStore } from '../search/types.js';
import { createConsoleLogger, type Logger } from '../utils/logger.js';

export interface CliServices {
  config: Config;
  logger: Logger;
  database(): Database.Database;
  generation(): GenerationClient;
  embedder(): Promise<Embedder>;
}

export type ServicesFactory = (ctx: CommandContext) => CliServices;

function memoize<T>(create: () => T): () => T {
  let created: { value: T } | undefined;
  return () => {
    if (!created) {
      created = { value: create() };
    }
    return created.value;
  };
}

/**
 * Production wiring: config from ~/.concierge/config.toml, the process-wide
 * SQLite connection and the configured providers.
 */
export function createCliServices(ctx: CommandContext): CliServices {
  const config = loadConfig();
  const logger = createConsoleLogger({ verbose: ctx.options.verbose });

  return {
    config,
    logger,
    database: memoize(() => openMigratedDatabase()),
    generation: memoize(() => {
      const { provider, name, model } = createLLMProvider(config.generation);
      logger.debug(`Generation provider: ${name} (${model})`);
      return new LLMGenerationClient(provider, {
        maxRetries: config.generation.max_retries,
        retryBaseMs: config.generation.retry_base_ms,
        timeoutMs: config.generation.timeout_ms,
        logger,
      });
    }),
    embedder: memoize(() => createEmbedder(config.embedding)),
  };
}

export function sessionMemoryFor(services: CliServices): SessionMemory {
  return new SessionMemory(new SqliteSessionRepository(services.database()), {
    logger: services.logger,
  });
}

export function vectorStoreFor(services: CliServices): VectorStore {
  return new SqliteVectorStore(services.database(), { logger: services.logger });
}

/**
 * `cli_1a2b3c4d`, `interactive_9f8e7d6c`
 */
export function generateSessionId(prefix: 'cli' | 'interactive' | 'demo'): string {
  return `${prefix}_${randomBytes(4).toString('hex')}`;
}
