/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { formatTable, type Column, type Alignment, type Row, type TableOptions } from './table.js';

export { extractJsonObject, parseJsonWith, parseStoredJson, type JsonParseResult } from './json.js';

export {
  createConsoleLogger,
  consoleLogger,
  silentLogger,
  type Logger,
  type ConsoleLoggerOptions,
} from './logger.js';

export { withRetry, withTimeout, sleep, type RetryOptions, type RetryOutcome } from './retry.js';
