/**
 * Test Utilities - CLI
 *
 * A CommandContext that captures output, and CliServices backed by a temp
 * SQLite file and scripted models.
 */

import { Command } from 'commander';
import type Database from 'better-sqlite3';

import type { CommandContext } from '../cli/types.js';
import type { CliServices } from '../cli/services.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Config } from '../config/schema.js';
import { openMigratedDatabase } from '../database/setup.js';
import type { GenerationClient } from '../providers/generation.js';
import type { Embedder } from '../search/types.js';
import { silentLogger } from '../utils/logger.js';
import { HashedEmbedder } from './fakes.js';

export interface CapturedContext {
  ctx: CommandContext;
  logs: string[];
  warnings: string[];
  errors: string[];
}

export function createTestContext(options: { json?: boolean; verbose?: boolean } = {}): CapturedContext {
  const logs: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  const ctx: CommandContext = {
    options: { json: options.json ?? false, verbose: options.verbose ?? false },
    log: (message) => logs.push(message),
    debug: () => {},
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
  };
  return { ctx, logs, warnings, errors };
}

export interface TestServices extends CliServices {
  /** Connections opened so far; close them in afterEach */
  opened: Database.Database[];
}

export function createTestServices(options: {
  dbPath: string;
  generation?: GenerationClient;
  embedder?: Embedder;
  config?: Config;
}): TestServices {
  const opened: Database.Database[] = [];
  let db: Database.Database | undefined;
  const embedder = options.embedder ?? new HashedEmbedder();

  return {
    config: options.config ?? DEFAULT_CONFIG,
    logger: silentLogger,
    opened,
    database: () => {
      if (!db) {
        db = openMigratedDatabase(options.dbPath);
        opened.push(db);
      }
      return db;
    },
    generation: () => {
      if (!options.generation) {
        throw new Error('This command should not need a generation client');
      }
      return options.generation;
    },
    embedder: async () => embedder,
  };
}

/**
 * Parse `args` through a throwaway root program holding `command`.
 */
export async function runCommand(command: Command, args: string[]): Promise<void> {
  const program = new Command();
  program.exitOverride();
  program.addCommand(command);
  await program.parseAsync(['node', 'concierge', ...args]);
}
