/**
 * Logger Interface for Library Code
 *
 * Components accept a `Logger` through their dependencies. The CLI passes a
 * console-backed logger built from the global `--verbose` flag; tests pass
 * `silentLogger` or a `vi.fn()`-backed object.
 */

import chalk from 'chalk';

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug lines (default: false) */
  verbose?: boolean;
  /** Prefix added after the level tag, e.g. a component name */
  scope?: string;
}

/**
 * Logger that writes to stderr so stdout stays clean for answers and `--json`.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { verbose = false, scope } = options;
  const prefix = scope ? `[${scope}] ` : '';

  return {
    debug: (message) => {
      if (verbose) console.error(chalk.dim(`[debug] ${prefix}${message}`));
    },
    info: (message) => console.error(chalk.blue('[info] ') + prefix + message),
    warn: (message) => console.error(chalk.yellow('[warn] ') + prefix + message),
    error: (message) => console.error(chalk.red('[error] ') + prefix + message),
  };
}

export const consoleLogger: Logger = createConsoleLogger();

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
