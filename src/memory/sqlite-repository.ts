/**
 * SQLite-backed session repository
 *
 * Turns are keyed by (session_id, turn_index); entities by
 * (session_id, entity_type). State survives process restarts.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import {
  SessionRowSchema,
  TurnRowSchema,
  EntityRowSchema,
  validateRow,
  validateRows,
} from '../database/validation.js';
import { IntentLabelSchema } from '../agent/types.js';
import type {
  ConversationTurn,
  Entity,
  EntityMap,
  Session,
  SessionRepository,
  SessionSummary,
} from './types.js';
import { EntityTypeSchema } from './types.js';

const SummaryRowSchema = z.object({
  id: z.string(),
  created_at: z.number().int(),
  turn_count: z.number().int().nonnegative(),
});

const NextIndexSchema = z.object({ next_index: z.number().int().nonnegative() });

export class SqliteSessionRepository implements SessionRepository {
  constructor(private readonly db: Database.Database) {}

  getSession(id: string): Session | undefined {
    const row = this.db.prepare('SELECT id, created_at FROM sessions WHERE id = ?').get(id);
    if (!row) {
      return undefined;
    }
    const session = validateRow(SessionRowSchema, row, `sessions.id=${id}`);

    const turns = validateRows(
      TurnRowSchema,
      this.db
        .prepare(
          'SELECT session_id, turn_index, role, text, responder, timestamp FROM turns WHERE session_id = ? ORDER BY turn_index'
        )
        .all(id),
      `turns.session_id=${id}`
    ).map(
      (t): ConversationTurn => ({
        role: t.role,
        text: t.text,
        timestamp: t.timestamp,
        responder: t.responder === null ? null : IntentLabelSchema.parse(t.responder),
      })
    );

    const entities: EntityMap = {};
    const entityRows = validateRows(
      EntityRowSchema,
      this.db
        .prepare(
          'SELECT session_id, entity_type, value, confidence, updated_at FROM entities WHERE session_id = ?'
        )
        .all(id),
      `entities.session_id=${id}`
    );
    for (const row of entityRows) {
      const type = EntityTypeSchema.parse(row.entity_type);
      entities[type] = { type, value: row.value, confidence: row.confidence };
    }

    return { id: session.id, createdAt: session.created_at, turns, entities };
  }

  createSession(id: string, createdAt: number): Session {
    this.db
      .prepare('INSERT OR IGNORE INTO sessions (id, created_at) VALUES (@id, @createdAt)')
      .run({ id, createdAt });
    const session = this.getSession(id);
    if (!session) {
      throw new Error(`Session ${id} was not persisted`);
    }
    return session;
  }

  appendTurn(sessionId: string, turn: ConversationTurn): number {
    const append = this.db.transaction((): number => {
      const { next_index } = validateRow(
        NextIndexSchema,
        this.db
          .prepare(
            'SELECT COALESCE(MAX(turn_index) + 1, 0) AS next_index FROM turns WHERE session_id = ?'
          )
          .get(sessionId),
        `turns.session_id=${sessionId}`
      );
      this.db
        .prepare(
          `INSERT INTO turns (session_id, turn_index, role, text, responder, timestamp)
           VALUES (@sessionId, @index, @role, @text, @responder, @timestamp)`
        )
        .run({
          sessionId,
          index: next_index,
          role: turn.role,
          text: turn.text,
          responder: turn.responder,
          timestamp: turn.timestamp,
        });
      return next_index;
    });
    return append();
  }

  upsertEntity(sessionId: string, entity: Entity): void {
    this.db
      .prepare(
        `INSERT INTO entities (session_id, entity_type, value, confidence, updated_at)
         VALUES (@sessionId, @type, @value, @confidence, @updatedAt)
         ON CONFLICT (session_id, entity_type)
         DO UPDATE SET value = excluded.value, confidence = excluded.confidence, updated_at = excluded.updated_at`
      )
      .run({
        sessionId,
        type: entity.type,
        value: entity.value,
        confidence: entity.confidence,
        updatedAt: Date.now(),
      });
  }

  listSessions(): SessionSummary[] {
    return validateRows(
      SummaryRowSchema,
      this.db
        .prepare(
          `SELECT s.id, s.created_at, COUNT(t.turn_index) AS turn_count
           FROM sessions s LEFT JOIN turns t ON t.session_id = s.id
           GROUP BY s.id ORDER BY s.created_at DESC, s.id`
        )
        .all(),
      'sessions'
    ).map((row) => ({ id: row.id, createdAt: row.created_at, turnCount: row.turn_count }));
  }

  deleteSession(id: string): boolean {
    return this.db.prepare('DELETE FROM sessions WHERE id = ?').run(id).changes > 0;
  }
}
