/**
 * Session Memory
 *
 * Per-session conversation log and entity store on top of an injected
 * SessionRepository. Every operation for one session id runs through a
 * keyed lock; different sessions never wait on each other.
 */

import { KeyedLock } from './keyed-lock.js';
import type {
  ConversationTurn,
  Entity,
  EntityMap,
  EntityType,
  Session,
  SessionRepository,
  SessionSummary,
} from './types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Keep `existing` only when the incoming value is strictly less confident.
 */
export function shouldReplaceEntity(existing: Entity | undefined, incoming: Entity): boolean {
  return existing === undefined || incoming.confidence >= existing.confidence;
}

const SUMMARY_FIELDS: Array<[EntityType, string]> = [
  ['account_id', 'Account'],
  ['customer_name', 'Customer'],
  ['billing_period', 'Period'],
  ['topic', 'Topic'],
];

/**
 * "Account: ACC-1 | Customer: Dana | Topic: billing", or '' with no entities.
 */
export function summarizeEntities(entities: EntityMap): string {
  return SUMMARY_FIELDS.flatMap(([type, label]) => {
    const entity = entities[type];
    return entity ? [`${label}: ${entity.value}`] : [];
  }).join(' | ');
}

/**
 * Operations bound to one session while its lock is held. Only valid inside
 * `SessionMemory.withSession`.
 */
export interface SessionHandle {
  readonly id: string;
  session(): Session;
  appendTurn(turn: ConversationTurn): void;
  mergeEntities(extracted: Entity[]): EntityMap;
}

export interface SessionMemoryOptions {
  clock?: () => number;
  logger?: Logger;
}

export class SessionMemory {
  private readonly lock = new KeyedLock();
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly repository: SessionRepository,
    options: SessionMemoryOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run `task` with exclusive access to the session, creating it on first
   * reference. The orchestrator holds this for a whole turn.
   */
  withSession<T>(sessionId: string, task: (handle: SessionHandle) => Promise<T> | T): Promise<T> {
    return this.lock.run(sessionId, () => task(this.bind(sessionId)));
  }

  getOrCreate(sessionId: string): Promise<Session> {
    return this.withSession(sessionId, (handle) => handle.session());
  }

  appendTurn(sessionId: string, turn: ConversationTurn): Promise<void> {
    return this.withSession(sessionId, (handle) => handle.appendTurn(turn));
  }

  /**
   * Apply the merge rule for each extracted entity and return the resulting map.
   */
  mergeEntities(sessionId: string, extracted: Entity[]): Promise<EntityMap> {
    return this.withSession(sessionId, (handle) => handle.mergeEntities(extracted));
  }

  recentTurns(sessionId: string, n: number): Promise<ConversationTurn[]> {
    return this.withSession(sessionId, (handle) =>
      n > 0 ? handle.session().turns.slice(-n) : []
    );
  }

  contextSummary(sessionId: string): Promise<string> {
    return this.withSession(sessionId, (handle) => summarizeEntities(handle.session().entities));
  }

  /**
   * Read a session without creating it.
   */
  findSession(sessionId: string): Session | undefined {
    return this.repository.getSession(sessionId);
  }

  listSessions(): SessionSummary[] {
    return this.repository.listSessions();
  }

  deleteSession(sessionId: string): Promise<boolean> {
    return this.lock.run(sessionId, () => this.repository.deleteSession(sessionId));
  }

  private bind(sessionId: string): SessionHandle {
    const repository = this.repository;
    const load = (): Session =>
      repository.getSession(sessionId) ?? this.create(sessionId);

    // Touch the session so it exists before the task runs
    load();

    return {
      id: sessionId,
      session: load,
      appendTurn: (turn) => {
        repository.appendTurn(sessionId, turn);
      },
      mergeEntities: (extracted) => {
        const entities = { ...load().entities };
        for (const incoming of extracted) {
          const existing = entities[incoming.type];
          if (shouldReplaceEntity(existing, incoming)) {
            repository.upsertEntity(sessionId, incoming);
            entities[incoming.type] = incoming;
          } else if (existing) {
            this.logger.debug(
              `Kept ${incoming.type}=${existing.value} (${existing.confidence}) over ${incoming.value} (${incoming.confidence})`
            );
          }
        }
        return entities;
      },
    };
  }

  private create(sessionId: string): Session {
    this.logger.debug(`Creating session ${sessionId}`);
    return this.repository.createSession(sessionId, this.clock());
  }
}
