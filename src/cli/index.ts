#!/usr/bin/env node
/**
 * Billing Concierge CLI Entry Point
 *
 * Sets up commander with the global options and registers all subcommands.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';

import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createDemoCommand } from './commands/demo.js';
import { createEvalCommand } from './commands/eval.js';
import { createIngestCommand } from './commands/ingest.js';
import { createSessionCommand } from './commands/session.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import { assertStartupConfig, loadConfig, printStartupValidation } from '../config/index.js';

const PackageJsonSchema = z.object({ version: z.string() });

// package.json sits two levels up from both src/cli and dist/cli
function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    const parsed = PackageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const VERSION = readVersion();

const program = new Command();

program
  .name('concierge')
  .description('Billing support concierge: routed, grounded and validated answers')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('concierge ingest ./wiki --namespace reference-wiki')}  Load reference documents
  ${chalk.cyan('concierge ask "What is the late fee?"')}              Ask one question
  ${chalk.cyan('concierge chat')}                                     Start a support conversation
  ${chalk.cyan('concierge demo')}                                     Run the showcase questions
  ${chalk.cyan('concierge eval')}                                     Compare retrieval strategies
  ${chalk.cyan('concierge session list')}                             Show stored sessions
  ${chalk.cyan('concierge config set retrieval.top_k 6')}             Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createAskCommand(getContext));
program.addCommand(createChatCommand(getContext));
program.addCommand(createDemoCommand(getContext));
program.addCommand(createIngestCommand(getContext));
program.addCommand(createEvalCommand(getContext));
program.addCommand(createSessionCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: concierge --help  to see available commands');
});

// Fail before any work when the command needs a generation key that is missing
program.hook('preAction', (_thisCommand, actionCommand) => {
  const opts = getGlobalOptions();
  const result = assertStartupConfig(loadConfig(), actionCommand.name());

  if (opts.verbose && result.warnings.length > 0) {
    printStartupValidation(result, opts.verbose);
  }
});

async function main(): Promise<void> {
  const errorOptions = (): GlobalOptions => getGlobalOptions();

  // Errors that escape every action
  const globalHandler = createGlobalErrorHandler(errorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, errorOptions());
  }
}

void main();
