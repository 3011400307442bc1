/**
 * Chat Command
 *
 * Interactive multi-turn support chat. Every line is one concierge turn in
 * the same session, so account numbers and billing periods mentioned early
 * carry over to later questions.
 *
 * REPL commands:
 *   session          - Show the session id and remembered details
 *   history          - Show the conversation so far
 *   exit | quit | q  - Leave
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'node:readline';

import type { CommandContext } from '../types.js';
import {
  createCliServices,
  generateSessionId,
  sessionMemoryFor,
  type ServicesFactory,
} from '../services.js';
import { parseOptions, TurnOptionsSchema } from '../validation.js';
import { buildOrchestrator, renderTurn, strategyOption, toAskOutput } from './ask.js';
import { CLIError } from '../../errors/index.js';
import type { TurnResult } from '../../agent/types.js';
import type { Entity, SessionMemory } from '../../memory/index.js';
import { ENTITY_LABELS, formatTimestamp } from './session.js';

// ============================================================================
// Types
// ============================================================================

export interface ChatState {
  sessionId: string;
  memory: SessionMemory;
  handleTurn: (sessionId: string, query: string) => Promise<TurnResult>;
}

export const EXIT_COMMANDS = new Set(['exit', 'quit', 'q']);

// ============================================================================
// Line Handling
// ============================================================================

async function showSession(state: ChatState, ctx: CommandContext): Promise<void> {
  const session = await state.memory.getOrCreate(state.sessionId);
  const entities = Object.values(session.entities).filter((entity): entity is Entity => entity !== undefined);

  if (ctx.options.json) {
    console.log(JSON.stringify({ session_id: session.id, entities }));
    return;
  }

  ctx.log(`${chalk.bold('Session:')} ${session.id}`);
  if (entities.length === 0) {
    ctx.log(chalk.dim('No details remembered yet.'));
    return;
  }
  for (const entity of entities) {
    ctx.log(`  ${ENTITY_LABELS[entity.type]}: ${chalk.cyan(entity.value)}`);
  }
}

async function showHistory(state: ChatState, ctx: CommandContext): Promise<void> {
  const { turns } = await state.memory.getOrCreate(state.sessionId);

  if (ctx.options.json) {
    console.log(JSON.stringify({ session_id: state.sessionId, turns }));
    return;
  }

  if (turns.length === 0) {
    ctx.log(chalk.dim('No turns yet.'));
    return;
  }
  for (const turn of turns) {
    const speaker = turn.role === 'user' ? chalk.cyan('you') : chalk.green('concierge');
    ctx.log(`${chalk.dim(formatTimestamp(turn.timestamp))} ${speaker}: ${turn.text}`);
  }
}

/**
 * Handle one line of input.
 *
 * @returns false when the user asked to leave
 */
export async function handleChatLine(
  line: string,
  state: ChatState,
  ctx: CommandContext
): Promise<boolean> {
  const input = line.trim();
  if (!input) {
    return true;
  }

  const command = input.toLowerCase();
  if (EXIT_COMMANDS.has(command)) {
    return false;
  }
  if (command === 'session') {
    await showSession(state, ctx);
    return true;
  }
  if (command === 'history') {
    await showHistory(state, ctx);
    return true;
  }

  const result = await state.handleTurn(state.sessionId, input);
  if (ctx.options.json) {
    console.log(JSON.stringify(toAskOutput(result)));
  } else {
    renderTurn(result, ctx);
  }
  return true;
}

// ============================================================================
// REPL
// ============================================================================

function displayWelcome(state: ChatState, ctx: CommandContext): void {
  ctx.log(chalk.bold('Billing concierge'));
  ctx.log(chalk.dim(`Session ${state.sessionId}. Type "history", "session" or "exit".`));
  ctx.log('');
}

/**
 * Main REPL loop using readline.
 *
 * Lines are queued and handled one at a time, so a pasted block of
 * questions runs as consecutive turns.
 */
export function runChatREPL(
  state: ChatState,
  ctx: CommandContext,
  io: { input: NodeJS.ReadableStream; output: NodeJS.WritableStream } = {
    input: process.stdin,
    output: process.stdout,
  }
): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: io.input,
      output: io.output,
      prompt: chalk.cyan('> '),
    });

    let closed = false;
    // Input gone; queued lines still run but no further prompts
    let ended = false;
    const close = (): void => {
      if (!closed) {
        closed = true;
        rl.close();
      }
    };

    const onLine = async (line: string): Promise<void> => {
      if (closed) return;
      try {
        if (!(await handleChatLine(line, state, ctx))) {
          ctx.log(chalk.dim('Goodbye!'));
          close();
          return;
        }
      } catch (error) {
        if (error instanceof CLIError) {
          ctx.error(error.message);
          if (error.hint) {
            ctx.log(chalk.dim(error.hint));
          }
        } else {
          ctx.error(`Failed to process question: ${error instanceof Error ? error.message : String(error)}`);
        }
      }
      if (!closed && !ended) {
        rl.prompt();
      }
    };

    // Register all handlers before the first prompt
    let pending = Promise.resolve();
    rl.on('line', (line) => {
      pending = pending.then(() => onLine(line));
    });

    rl.on('SIGINT', () => {
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      close();
    });

    // EOF, pipe closed, or an exit command. Queued turns finish first.
    rl.on('close', () => {
      ended = true;
      pending = pending.then(() => {
        closed = true;
        resolve();
      });
    });

    displayWelcome(state, ctx);
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

export function createChatCommand(
  getContext: () => CommandContext,
  getServices: ServicesFactory = createCliServices
): Command {
  return new Command('chat')
    .description('Interactive multi-turn support chat')
    .option('-s, --session <id>', 'Resume an existing session')
    .addOption(strategyOption())
    .action(async (rawOptions: unknown) => {
      const ctx = getContext();
      const options = parseOptions(TurnOptionsSchema, rawOptions);
      const services = getServices(ctx);

      const memory = sessionMemoryFor(services);
      const orchestrator = await buildOrchestrator(services, options.strategy, memory);
      const state: ChatState = {
        sessionId: options.session ?? generateSessionId('interactive'),
        memory,
        handleTurn: (sessionId, query) => orchestrator.handleTurn(sessionId, query),
      };

      await runChatREPL(state, ctx);
    });
}
