/**
 * Errors that end a `concierge` invocation.
 *
 * Each carries the process exit code and, usually, a one-line hint printed
 * under the message. Failures inside a turn are modelled separately in
 * `src/agent/errors.ts`; the orchestrator turns those into replies.
 */

export const EXIT_CODES = {
  general: 1,
  config: 2,
  notFound: 3,
  apiKey: 4,
  database: 5,
} as const;

export class CLIError extends Error {
  readonly hint?: string;
  readonly code: number;

  constructor(message: string, hint?: string, code: number = EXIT_CODES.general, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.hint = hint;
    this.code = code;
  }
}

/** `ingest` or `eval` pointed at a corpus directory that is not there */
export class CorpusNotFoundError extends CLIError {
  constructor(readonly dir: string) {
    super(
      `Corpus directory not found: ${dir}`,
      'Pass a directory of .txt or .md files, e.g. fixtures/eval/corpus',
      EXIT_CODES.notFound
    );
  }
}

export class ConfigError extends CLIError {
  constructor(message: string, hint = 'Run: concierge config list  to see valid options') {
    super(message, hint, EXIT_CODES.config);
  }
}

/** The configured generation provider needs a key and none is set */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar = `${provider.toUpperCase()}_API_KEY`) {
    super(
      `${provider} API key not configured`,
      `Set ${envVar}, or use a local model: concierge config set generation.provider ollama`,
      EXIT_CODES.apiKey
    );
  }
}

/** Opening, migrating or querying the SQLite file failed */
export class DatabaseError extends CLIError {
  constructor(message: string, cause?: unknown) {
    super(
      message,
      'Check that the database file is writable, or point CONCIERGE_DB_PATH elsewhere',
      EXIT_CODES.database,
      cause === undefined ? undefined : { cause }
    );
  }
}

/** Command options rejected by their zod schema; one issue per field */
export class ValidationError extends CLIError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message, issues.length > 0 ? ['Issues:', ...issues].join('\n  ') : 'Check your input and try again');
  }
}
