/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.concierge)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

function isJsonMap(value: unknown): value is TOML.JsonMap {
  return isPlainObject(value);
}

/**
 * Deep merge: objects recurse, everything else in `override` replaces `base`.
 */
function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) {
      result[key] = deepMerge(base[key], value);
    }
  }
  return result;
}

function formatIssues(issues: Array<{ path: (string | number)[]; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function readToml(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides).
 *
 * @param createIfMissing - Write the commented template on first run
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true, configPath = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const userConfig = PartialConfigSchema.safeParse(readToml(configPath));
  if (!userConfig.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(userConfig.error.issues)}`,
      `Fix the values in ${configPath}`
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, userConfig.data));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(merged.error.issues)}`,
      `Fix the values in ${configPath}`
    );
  }
  return merged.data;
}

/**
 * Flatten a config object into dotted keys, e.g. ['retrieval.top_k', 4].
 */
function flatten(obj: Record<string, unknown>, prefix = ''): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value)) {
      entries.push(...flatten(value, fullKey));
    } else {
      entries.push([fullKey, value]);
    }
  }
  return entries;
}

const KNOWN_KEYS = new Set(flatten(DEFAULT_CONFIG).map(([key]) => key));

/**
 * Get a config value by dot-notation path.
 * Example: getConfigValue('retrieval.top_k') => 4
 */
export function getConfigValue(key: string, configPath = getConfigPath()): unknown {
  let current: unknown = loadConfig(true, configPath);
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Parse a CLI string into a boolean, number or string
 */
function parseValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a config value by dot-notation path and write it back to the file.
 * The whole merged config is validated before anything is written.
 */
export function setConfigValue(key: string, value: string, configPath = getConfigPath()): void {
  if (!KNOWN_KEYS.has(key)) {
    throw new ConfigError(
      `Unknown config key: ${key}`,
      'Run: concierge config list  to see available keys'
    );
  }

  const config: TOML.JsonMap = fs.existsSync(configPath) ? readToml(configPath) : {};
  const parts = key.split('.');
  const leaf = parts.pop();
  if (leaf === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[leaf] = parseValue(value);

  const validation = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));
  if (!validation.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validation.error.issues)}`,
      'Run: concierge config list  to see current values and types'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * All config values as dotted-key entries
 */
export function listConfig(configPath = getConfigPath()): Array<[string, unknown]> {
  return flatten(loadConfig(true, configPath));
}
