/**
 * Billing Concierge - Library Entry Point
 *
 * The CLI (`concierge`) covers everyday use:
 * ```bash
 * concierge ingest ./docs/wiki --namespace reference-wiki
 * concierge ask "Why is my bill higher this month? My account is ACC-DEMO-001"
 * concierge chat
 * concierge eval
 * ```
 *
 * This module exports the building blocks for embedding the concierge in
 * another service: the orchestrator, session memory, retrieval and the
 * evaluation harness.
 *
 * @example Answering one turn
 * ```typescript
 * import {
 *   createOrchestrator, loadConfig, openMigratedDatabase,
 *   SessionMemory, SqliteSessionRepository, SqliteVectorStore,
 * } from 'billing-concierge';
 *
 * const config = loadConfig();
 * const db = openMigratedDatabase();
 * const orchestrator = createOrchestrator(config, {
 *   generation,
 *   embedder,
 *   store: new SqliteVectorStore(db),
 *   memory: new SessionMemory(new SqliteSessionRepository(db)),
 * });
 * const result = await orchestrator.handleTurn('cli_1a2b3c4d', 'What is the late fee?');
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './agent/index.js';
export * from './memory/index.js';
export * from './search/index.js';
export * from './indexer/index.js';
export * from './eval/index.js';
export * from './providers/index.js';
export * from './config/index.js';
export * from './database/index.js';
export * from './errors/index.js';
export * from './utils/index.js';
