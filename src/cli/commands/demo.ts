/**
 * Demo Command
 *
 * Runs a fixed set of showcase questions, each in its own fresh session,
 * then prints a one-line summary per question.
 *
 *   concierge demo
 *   concierge demo --strategy hypothesis --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createCliServices, generateSessionId, type ServicesFactory } from '../services.js';
import { DemoOptionsSchema, parseOptions } from '../validation.js';
import { buildOrchestrator, renderTurn, strategyOption, toAskOutput, type AskOutputJSON } from './ask.js';
import type { TurnResult } from '../../agent/types.js';

export const DEMO_QUERIES = [
  'How much is my bill for January 2026?',
  'Why is my bill higher this month?',
  'What is the due date and what happens if I pay late?',
] as const;

const SUMMARY_QUERY_WIDTH = 40;

export interface DemoOutputJSON {
  results: Array<AskOutputJSON & { query: string }>;
}

const STATE_MARK: Record<TurnResult['state'], string> = {
  Approved: '[OK]',
  Rejected: '[?]',
  Error: '[X]',
};

/**
 * `1. "How much is my bill for January 2026?"` plus a status line.
 */
export function formatDemoSummary(entries: Array<{ query: string; result: TurnResult }>): string[] {
  return entries.flatMap(({ query, result }, index) => {
    const shown = query.length > SUMMARY_QUERY_WIDTH ? `${query.slice(0, SUMMARY_QUERY_WIDTH)}...` : query;
    const citations = result.response?.citations.length ?? 0;
    return [
      `${index + 1}. "${shown}"`,
      `   ${STATE_MARK[result.state]} ${result.state} | Citations: ${citations} | ${result.trace.slice(0, 3).join(' → ')}`,
    ];
  });
}

export function createDemoCommand(
  getContext: () => CommandContext,
  getServices: ServicesFactory = createCliServices
): Command {
  return new Command('demo')
    .description('Run the showcase questions and summarize the outcomes')
    .addOption(strategyOption())
    .action(async (rawOptions: unknown) => {
      const ctx = getContext();
      const options = parseOptions(DemoOptionsSchema, rawOptions);
      const services = getServices(ctx);
      const orchestrator = await buildOrchestrator(services, options.strategy);

      const entries: Array<{ query: string; result: TurnResult }> = [];
      for (const [index, query] of DEMO_QUERIES.entries()) {
        const result = await orchestrator.handleTurn(generateSessionId('demo'), query);
        entries.push({ query, result });
        if (!ctx.options.json) {
          ctx.log(chalk.bold(`\n── Question ${index + 1}/${DEMO_QUERIES.length}: ${query}`));
          renderTurn(result, ctx);
        }
      }

      if (ctx.options.json) {
        const output: DemoOutputJSON = {
          results: entries.map(({ query, result }) => ({ query, ...toAskOutput(result) })),
        };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      ctx.log(chalk.bold('\nSummary'));
      for (const line of formatDemoSummary(entries)) {
        ctx.log(line);
      }
    });
}
