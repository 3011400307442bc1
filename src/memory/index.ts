/**
 * Memory Module
 *
 * Durable per-session conversation log and entity store.
 */

export {
  SessionMemory,
  shouldReplaceEntity,
  summarizeEntities,
  type SessionHandle,
  type SessionMemoryOptions,
} from './session-memory.js';
export { SqliteSessionRepository } from './sqlite-repository.js';
export { InMemorySessionRepository } from './in-memory-repository.js';
export { extractEntities, type ExtractionResult } from './entity-extractor.js';
export { KeyedLock } from './keyed-lock.js';
export {
  EntityTypeSchema,
  type Entity,
  type EntityMap,
  type EntityType,
  type ConversationTurn,
  type TurnRole,
  type Session,
  type SessionSummary,
  type SessionRepository,
} from './types.js';
