/**
 * Formatting and exit handling for errors that escape a CLI command.
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

export interface ErrorHandlerOptions {
  /** Include stack traces */
  verbose?: boolean;
  /** Emit a JSON object instead of coloured text */
  json?: boolean;
}

/**
 * Shape printed under `--json`.
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

function toOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof CLIError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      stack: verbose ? error.stack : undefined,
    };
  }
  if (error instanceof Error) {
    return {
      error: error.message,
      code: 1,
      hint: verbose ? undefined : 'Run with --verbose for more details',
      stack: verbose ? error.stack : undefined,
    };
  }
  return { error: String(error), code: 1 };
}

/**
 * Render an error for the terminal (or as JSON). Pure, so it can be tested
 * without touching `process.exit`.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = toOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];
  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }
  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }
  return lines.join('\n');
}

/**
 * CLIError carries its own code; anything else exits 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler suitable for `process.on('uncaughtException' | 'unhandledRejection')`.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
