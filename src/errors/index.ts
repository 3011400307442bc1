/**
 * CLI error classes and the formatter/exit handler that renders them.
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: concierge config list');
 */

export {
  EXIT_CODES,
  CLIError,
  CorpusNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
} from './types.js';

export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
