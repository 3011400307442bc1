/**
 * Session Command
 *
 * Inspect and remove stored conversations:
 *   concierge session list         - All sessions, newest first
 *   concierge session show <id>    - Remembered details and every turn
 *   concierge session delete <id>  - Remove a session with its turns and entities
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createCliServices, sessionMemoryFor, type ServicesFactory } from '../services.js';
import { parseOptions, SessionIdSchema } from '../validation.js';
import { CLIError } from '../../errors/index.js';
import type { Entity, EntityType } from '../../memory/index.js';
import { formatTable } from '../../utils/table.js';

export const ENTITY_LABELS: Record<EntityType, string> = {
  account_id: 'Account',
  customer_name: 'Customer',
  billing_period: 'Billing period',
  topic: 'Topic',
};

/**
 * `2026-01-15 09:30:00` in UTC
 */
export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString().replace('T', ' ').slice(0, 19);
}

function sessionNotFound(id: string): CLIError {
  return new CLIError(`Session not found: ${id}`, 'Run: concierge session list  to see stored sessions');
}

export function createSessionCommand(
  getContext: () => CommandContext,
  getServices: ServicesFactory = createCliServices
): Command {
  const sessionCmd = new Command('session').description('Inspect and delete stored sessions');

  // concierge session list
  sessionCmd
    .command('list')
    .alias('ls')
    .description('List stored sessions')
    .action(() => {
      const ctx = getContext();
      const memory = sessionMemoryFor(getServices(ctx));
      const sessions = memory.listSessions();

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              count: sessions.length,
              sessions: sessions.map((s) => ({
                id: s.id,
                created_at: new Date(s.createdAt).toISOString(),
                turn_count: s.turnCount,
              })),
            },
            null,
            2
          )
        );
        return;
      }

      if (sessions.length === 0) {
        ctx.log('No sessions yet.');
        ctx.log(`Start one with ${chalk.cyan('concierge chat')} or ${chalk.cyan('concierge ask "<question>"')}`);
        return;
      }

      ctx.log(
        formatTable(
          [
            { key: 'id', header: 'Session' },
            { key: 'created', header: 'Created (UTC)' },
            { key: 'turns', header: 'Turns', align: 'right' },
          ],
          sessions.map((s) => ({ id: s.id, created: formatTimestamp(s.createdAt), turns: s.turnCount }))
        )
      );
      ctx.log(chalk.dim(`${sessions.length} session(s)`));
    });

  // concierge session show <id>
  sessionCmd
    .command('show <id>')
    .description('Show remembered details and the conversation for a session')
    .action((rawId: string) => {
      const ctx = getContext();
      const id = parseOptions(SessionIdSchema, rawId);
      const memory = sessionMemoryFor(getServices(ctx));

      const session = memory.findSession(id);
      if (!session) {
        throw sessionNotFound(id);
      }
      const entities = Object.values(session.entities).filter((entity): entity is Entity => entity !== undefined);

      if (ctx.options.json) {
        console.log(JSON.stringify({ ...session, created_at: new Date(session.createdAt).toISOString() }, null, 2));
        return;
      }

      ctx.log(`${chalk.bold('Session:')} ${session.id}`);
      ctx.log(`${chalk.bold('Created:')} ${formatTimestamp(session.createdAt)}`);
      ctx.log('');

      if (entities.length > 0) {
        ctx.log(chalk.bold('Remembered:'));
        for (const entity of entities) {
          ctx.log(`  ${ENTITY_LABELS[entity.type]}: ${entity.value} ${chalk.dim(`(${entity.confidence.toFixed(2)})`)}`);
        }
        ctx.log('');
      }

      ctx.log(chalk.bold(`Turns (${session.turns.length}):`));
      for (const turn of session.turns) {
        const who = turn.role === 'user' ? 'user' : `system/${turn.responder ?? 'none'}`;
        ctx.log(`  ${chalk.dim(formatTimestamp(turn.timestamp))} ${who}: ${turn.text}`);
      }
    });

  // concierge session delete <id>
  sessionCmd
    .command('delete <id>')
    .alias('rm')
    .description('Delete a session and everything stored for it')
    .action(async (rawId: string) => {
      const ctx = getContext();
      const id = parseOptions(SessionIdSchema, rawId);
      const memory = sessionMemoryFor(getServices(ctx));

      if (!(await memory.deleteSession(id))) {
        throw sessionNotFound(id);
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, id }));
      } else {
        ctx.log(`${chalk.green('✓')} Deleted session ${chalk.cyan(id)}`);
      }
    });

  return sessionCmd;
}
