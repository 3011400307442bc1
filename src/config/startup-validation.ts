/**
 * Startup Configuration Validation
 *
 * Runs from commander's preAction hook. Commands that never call a model
 * (config, session, ingest) run without credentials; the ones that do fail
 * fast with an APIKeyError before any work starts.
 */

import chalk from 'chalk';
import type { Config } from './schema.js';
import { hasApiKey, SETUP_INSTRUCTIONS } from './env.js';
import { APIKeyError } from '../errors/index.js';

export interface StartupValidationResult {
  valid: boolean;
  /** Non-fatal issues, shown only with --verbose */
  warnings: string[];
  /** Fatal issues for the command being run */
  errors: string[];
  /** Setup instructions matching each error */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Skip the generation key check */
  skipLLM?: boolean;
}

/**
 * Commands that call the generation model
 */
export const COMMANDS_REQUIRING_LLM = ['ask', 'chat', 'demo', 'eval'];

export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  return { skipLLM: !COMMANDS_REQUIRING_LLM.includes(command) };
}

const ENV_VAR_BY_PROVIDER = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
} as const;

export function validateStartupConfig(
  config: Config,
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];
  const provider = config.generation.provider;

  if (!options.skipLLM && !hasApiKey(provider)) {
    errors.push(`${provider} is the configured generation provider but no API key is set`);
    hints.push(SETUP_INSTRUCTIONS[provider]);
  }

  if (config.embedding.provider === 'ollama' || provider === 'ollama') {
    warnings.push('Ollama is configured; make sure `ollama serve` is running');
  }

  return { valid: errors.length === 0, warnings, errors, hints };
}

/**
 * Throw the APIKeyError for a failed validation, so the CLI exits non-zero.
 */
export function assertStartupConfig(config: Config, command: string): StartupValidationResult {
  const result = validateStartupConfig(config, getValidationOptionsForCommand(command));
  if (!result.valid) {
    const provider = config.generation.provider;
    if (provider !== 'ollama') {
      throw new APIKeyError(provider, ENV_VAR_BY_PROVIDER[provider]);
    }
  }
  return result;
}

export function printStartupValidation(result: StartupValidationResult, verbose = false): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }
  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }
  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}
