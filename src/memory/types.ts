/**
 * Session memory types
 */

import { z } from 'zod';
import type { ResponderTag } from '../agent/types.js';

export const EntityTypeSchema = z.enum(['account_id', 'customer_name', 'billing_period', 'topic']);
export type EntityType = z.infer<typeof EntityTypeSchema>;

export interface Entity {
  type: EntityType;
  value: string;
  /** Extraction confidence in [0,1] */
  confidence: number;
}

export type EntityMap = Partial<Record<EntityType, Entity>>;

export type TurnRole = 'user' | 'system';

/**
 * Immutable once appended.
 */
export interface ConversationTurn {
  readonly role: TurnRole;
  readonly text: string;
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly responder: ResponderTag | null;
}

export interface Session {
  id: string;
  /** Epoch milliseconds */
  createdAt: number;
  turns: ConversationTurn[];
  entities: EntityMap;
}

export interface SessionSummary {
  id: string;
  createdAt: number;
  turnCount: number;
}

/**
 * Durable backing store for sessions. Implementations are synchronous;
 * SessionMemory layers the per-session locking on top.
 */
export interface SessionRepository {
  getSession(id: string): Session | undefined;
  createSession(id: string, createdAt: number): Session;
  /** Returns the index the turn was stored at */
  appendTurn(sessionId: string, turn: ConversationTurn): number;
  upsertEntity(sessionId: string, entity: Entity): void;
  listSessions(): SessionSummary[];
  /** Returns false when the session did not exist */
  deleteSession(id: string): boolean;
}
