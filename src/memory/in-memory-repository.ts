import type {
  ConversationTurn,
  Entity,
  Session,
  SessionRepository,
  SessionSummary,
} from './types.js';

/**
 * Non-durable repository for tests and one-shot runs. Returns copies so
 * callers cannot mutate stored state.
 */
export class InMemorySessionRepository implements SessionRepository {
  private sessions = new Map<string, Session>();

  getSession(id: string): Session | undefined {
    const session = this.sessions.get(id);
    return session ? structuredClone(session) : undefined;
  }

  createSession(id: string, createdAt: number): Session {
    if (!this.sessions.has(id)) {
      this.sessions.set(id, { id, createdAt, turns: [], entities: {} });
    }
    return this.require(id, true);
  }

  appendTurn(sessionId: string, turn: ConversationTurn): number {
    const session = this.require(sessionId);
    session.turns.push({ ...turn });
    return session.turns.length - 1;
  }

  upsertEntity(sessionId: string, entity: Entity): void {
    this.require(sessionId).entities[entity.type] = { ...entity };
  }

  listSessions(): SessionSummary[] {
    return [...this.sessions.values()]
      .map((s) => ({ id: s.id, createdAt: s.createdAt, turnCount: s.turns.length }))
      .sort((a, b) => b.createdAt - a.createdAt || a.id.localeCompare(b.id));
  }

  deleteSession(id: string): boolean {
    return this.sessions.delete(id);
  }

  private require(id: string, copy = false): Session {
    const session = this.sessions.get(id);
    if (!session) {
      throw new Error(`Unknown session: ${id}`);
    }
    return copy ? structuredClone(session) : session;
  }
}
