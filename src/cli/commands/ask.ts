/**
 * Ask Command
 *
 * Answers one support question through the full concierge turn: routing,
 * retrieval, drafting, guardrails and validation.
 *
 *   concierge ask "Why is my bill higher this month?"
 *   concierge ask "What is the late fee?" --session cli_1a2b3c4d
 *   concierge ask "Explain my invoice" --strategy hypothesis --json
 *
 * Without --session every call starts a fresh `cli_<hex8>` session, so
 * follow-up questions need the id printed after the answer.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import {
  createCliServices,
  generateSessionId,
  sessionMemoryFor,
  vectorStoreFor,
  type CliServices,
  type ServicesFactory,
} from '../services.js';
import { parseOptions, TurnOptionsSchema } from '../validation.js';
import { createOrchestrator, type Orchestrator } from '../../agent/orchestrator.js';
import { formatCitations, formatCitationsJSON, type CitationJSON } from '../../agent/citations.js';
import type { TurnResult } from '../../agent/types.js';
import type { RetrievalStrategyName } from '../../config/schema.js';
import type { SessionMemory } from '../../memory/index.js';
import { RETRIEVAL_STRATEGIES } from '../../eval/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * JSON output format for the ask command.
 */
export interface AskOutputJSON {
  session_id: string;
  state: TurnResult['state'];
  intent: TurnResult['intent'];
  responder: TurnResult['responder'];
  rerouted: boolean;
  answer: string;
  confidence: number | null;
  citations: CitationJSON[];
  trace: TurnResult['trace'];
  error_code?: string;
}

// ============================================================================
// Shared with chat
// ============================================================================

export function strategyOption(): Option {
  return new Option('--strategy <name>', 'Retrieval strategy').choices([...RETRIEVAL_STRATEGIES]);
}

export async function buildOrchestrator(
  services: CliServices,
  strategy: RetrievalStrategyName | undefined,
  memory: SessionMemory = sessionMemoryFor(services)
): Promise<Orchestrator> {
  return createOrchestrator(
    services.config,
    {
      generation: services.generation(),
      embedder: await services.embedder(),
      store: vectorStoreFor(services),
      memory,
      logger: services.logger,
    },
    { strategy }
  );
}

export function toAskOutput(result: TurnResult): AskOutputJSON {
  return {
    session_id: result.sessionId,
    state: result.state,
    intent: result.intent,
    responder: result.responder,
    rerouted: result.rerouted,
    answer: result.text,
    confidence: result.response?.confidence ?? null,
    citations: formatCitationsJSON(result.response?.citations ?? []),
    trace: result.trace,
    ...(result.errorCode ? { error_code: result.errorCode } : {}),
  };
}

/**
 * Answer text, then sources, then a dim footer with the state and session.
 */
export function renderTurn(result: TurnResult, ctx: CommandContext): void {
  ctx.log(result.text);

  const citations = result.response?.citations ?? [];
  if (citations.length > 0) {
    ctx.log('');
    ctx.log(chalk.bold('Sources:'));
    ctx.log(formatCitations(citations));
  }

  const stateColor = result.state === 'Approved' ? chalk.green : chalk.yellow;
  ctx.log('');
  ctx.log(
    chalk.dim(`${stateColor(result.state)} · ${result.intent}${result.rerouted ? ' (rerouted)' : ''} · session ${result.sessionId}`)
  );
  ctx.debug(`trace: ${result.trace.join(' → ')}`);
}

// ============================================================================
// Command Factory
// ============================================================================

export function createAskCommand(
  getContext: () => CommandContext,
  getServices: ServicesFactory = createCliServices
): Command {
  return new Command('ask')
    .description('Ask the billing concierge one question')
    .argument('<query>', 'The question to answer')
    .option('-s, --session <id>', 'Continue an existing session')
    .addOption(strategyOption())
    .action(async (query: string, rawOptions: unknown) => {
      const ctx = getContext();
      const options = parseOptions(TurnOptionsSchema, rawOptions);
      const services = getServices(ctx);

      const sessionId = options.session ?? generateSessionId('cli');
      ctx.debug(`Session: ${sessionId}`);

      const orchestrator = await buildOrchestrator(services, options.strategy);
      const result = await orchestrator.handleTurn(sessionId, query);

      if (ctx.options.json) {
        console.log(JSON.stringify(toAskOutput(result), null, 2));
        return;
      }
      renderTurn(result, ctx);
    });
}
