/**
 * Tests for CLI error classes and formatting
 */

import { describe, it, expect } from 'vitest';
import {
  CLIError,
  CorpusNotFoundError,
  EXIT_CODES,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  formatError,
  getExitCode,
} from '../index.js';

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('defaults to exit code 1 with no hint', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('keeps instanceof through subclasses', () => {
      const error = new ConfigError('bad');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
      expect(error).toBeInstanceOf(ConfigError);
    });
  });

  it('CorpusNotFoundError names the directory', () => {
    const error = new CorpusNotFoundError('/corpus');

    expect(error.message).toBe('Corpus directory not found: /corpus');
    expect(error.dir).toBe('/corpus');
    expect(error.name).toBe('CorpusNotFoundError');
    expect(error.code).toBe(EXIT_CODES.notFound);
  });

  it('ConfigError points at config list by default', () => {
    const error = new ConfigError('Invalid option');

    expect(error.hint).toBe('Run: concierge config list  to see valid options');
    expect(error.code).toBe(2);
    expect(new ConfigError('x', 'Custom hint').hint).toBe('Custom hint');
  });

  it('APIKeyError derives the env var from the provider', () => {
    const error = new APIKeyError('Anthropic');

    expect(error.message).toBe('Anthropic API key not configured');
    expect(error.hint).toBe('Set ANTHROPIC_API_KEY, or use a local model: concierge config set generation.provider ollama');
    expect(error.code).toBe(4);
    expect(new APIKeyError('OpenAI', 'OPENAI_KEY').hint).toContain('OPENAI_KEY');
  });

  it('DatabaseError keeps its cause', () => {
    const cause = new Error('SQLITE_BUSY');
    const error = new DatabaseError('Database locked', cause);

    expect(error.cause).toBe(cause);
    expect(error.code).toBe(5);
  });

  it('ValidationError lists issues in the hint', () => {
    const error = new ValidationError('Invalid input', ['top_k: Expected number']);

    expect(error.hint).toBe('Issues:\n  top_k: Expected number');
    expect(error.issues).toEqual(['top_k: Expected number']);
    expect(new ValidationError('x').hint).toBe('Check your input and try again');
  });
});

describe('formatError', () => {
  it('shows message and hint for CLIError', () => {
    const output = formatError(new CLIError('Failed', 'Try again'));

    expect(output).toContain('Failed');
    expect(output).toContain('Try again');
    expect(output).not.toContain('Stack trace:');
  });

  it('suggests --verbose for plain errors', () => {
    expect(formatError(new Error('Something broke'))).toContain('--verbose');
  });

  it('includes the stack in verbose mode', () => {
    const output = formatError(new CLIError('Failed'), { verbose: true });

    expect(output).toContain('Stack trace:');
  });

  it('renders JSON output', () => {
    const parsed: unknown = JSON.parse(
      formatError(new ConfigError('Bad config', 'Fix it'), { json: true })
    );

    expect(parsed).toEqual({ error: 'Bad config', code: 2, hint: 'Fix it' });
  });

  it('renders unknown values as JSON', () => {
    const parsed: unknown = JSON.parse(formatError(42, { json: true }));

    expect(parsed).toEqual({ error: '42', code: 1 });
  });
});

describe('getExitCode', () => {
  it('maps CLI errors to their codes', () => {
    expect(getExitCode(new CLIError('test', undefined, 42))).toBe(42);
    expect(getExitCode(new ConfigError('bad'))).toBe(2);
    expect(getExitCode(new APIKeyError('OpenAI'))).toBe(4);
    expect(getExitCode(new DatabaseError('locked'))).toBe(5);
  });

  it('returns 1 for everything else', () => {
    expect(getExitCode(new Error('test'))).toBe(1);
    expect(getExitCode('string')).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});
