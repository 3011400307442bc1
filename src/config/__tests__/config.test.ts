/**
 * Config Module Tests
 *
 * Schema validation, TOML loading, merging over defaults, and dotted-key
 * get/set against a config file in a temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from '../defaults.js';
import { loadConfig, getConfigValue, setConfigValue, listConfig } from '../loader.js';
import { ConfigError } from '../../errors/index.js';

describe('Config Schema', () => {
  it('accepts the defaults', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects an unknown generation provider', () => {
    const invalid = {
      ...DEFAULT_CONFIG,
      generation: { ...DEFAULT_CONFIG.generation, provider: 'gpt-api' },
    };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects a confidence threshold above 1', () => {
    const invalid = { ...DEFAULT_CONFIG, validation: { confidence_threshold: 1.5 } };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects overlap that is not smaller than chunk size', () => {
    const invalid = {
      ...DEFAULT_CONFIG,
      chunking: { chunk_size: 100, chunk_overlap: 100, semantic_threshold: 0.78 },
    };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('allows sparse user config', () => {
    expect(PartialConfigSchema.safeParse({ retrieval: { top_k: 6 } }).success).toBe(true);
  });

  it('keeps the template in sync with the defaults', () => {
    expect(CONFIG_TEMPLATE).toContain('top_k = 4');
    expect(CONFIG_TEMPLATE).toContain('confidence_threshold = 0.75');
    expect(CONFIG_TEMPLATE).toContain('chunk_overlap = 75');
  });
});

describe('Config Loader', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'concierge-config-'));
    configPath = path.join(dir, 'config.toml');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults without creating a file when asked not to', () => {
    expect(loadConfig(false, configPath)).toEqual(DEFAULT_CONFIG);
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('writes the template on first run', () => {
    loadConfig(true, configPath);
    expect(fs.readFileSync(configPath, 'utf-8')).toBe(CONFIG_TEMPLATE);
  });

  it('parses the template back to the defaults', () => {
    loadConfig(true, configPath);
    expect(loadConfig(true, configPath)).toEqual(DEFAULT_CONFIG);
  });

  it('merges user values over defaults', () => {
    fs.writeFileSync(configPath, '[retrieval]\ntop_k = 8\n\n[validation]\nconfidence_threshold = 0.6\n');

    const config = loadConfig(true, configPath);

    expect(config.retrieval.top_k).toBe(8);
    expect(config.retrieval.strategy).toBe('direct');
    expect(config.validation.confidence_threshold).toBe(0.6);
    expect(config.generation).toEqual(DEFAULT_CONFIG.generation);
  });

  it('throws ConfigError on invalid TOML', () => {
    fs.writeFileSync(configPath, '[retrieval\ntop_k = ');
    expect(() => loadConfig(true, configPath)).toThrow(ConfigError);
  });

  it('throws ConfigError on out-of-range values', () => {
    fs.writeFileSync(configPath, '[retrieval]\ntop_k = 0\n');
    expect(() => loadConfig(true, configPath)).toThrow(/retrieval\.top_k/);
  });

  it('reads dotted keys', () => {
    expect(getConfigValue('retrieval.top_k', configPath)).toBe(4);
    expect(getConfigValue('retrieval.missing', configPath)).toBeUndefined();
  });

  it('sets and persists typed values', () => {
    setConfigValue('retrieval.top_k', '6', configPath);
    setConfigValue('retrieval.strategy', 'hypothesis', configPath);

    const config = loadConfig(false, configPath);
    expect(config.retrieval.top_k).toBe(6);
    expect(config.retrieval.strategy).toBe('hypothesis');
  });

  it('refuses unknown keys', () => {
    expect(() => setConfigValue('retrieval.depth', '3', configPath)).toThrow('Unknown config key');
  });

  it('refuses values the schema rejects and leaves the file untouched', () => {
    expect(() => setConfigValue('retrieval.strategy', 'fancy', configPath)).toThrow(ConfigError);
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('lists every key in dotted form', () => {
    const keys = listConfig(configPath).map(([key]) => key);

    expect(keys).toContain('generation.provider');
    expect(keys).toContain('chunking.semantic_threshold');
    expect(keys).toContain('eval.output_dir');
    expect(keys).toHaveLength(20);
  });
});
