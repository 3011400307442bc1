/**
 * Tests for config command
 *
 * Runs against a config.toml in a temp directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { createConfigCommand, formatValue } from '../config.js';
import { ConfigError } from '../../../errors/index.js';
import { createTestContext, runCommand, type CapturedContext } from '../../../test-utils/cli.js';

describe('createConfigCommand', () => {
  let dir: string;
  let configPath: string;
  let captured: CapturedContext;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'concierge-config-'));
    configPath = join(dir, 'config.toml');
    captured = createTestContext();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  const command = () => createConfigCommand(() => captured.ctx, () => configPath);

  it('gets a default value', async () => {
    await runCommand(command(), ['config', 'get', 'retrieval.top_k']);

    expect(captured.logs).toEqual(['4']);
  });

  it('sets a value and reads it back', async () => {
    await runCommand(command(), ['config', 'set', 'validation.confidence_threshold', '0.8']);
    await runCommand(command(), ['config', 'get', 'validation.confidence_threshold']);

    expect(captured.logs[1]).toBe('0.8');
    expect(readFileSync(configPath, 'utf-8')).toContain('confidence_threshold = 0.8');
  });

  it('rejects an unknown key', async () => {
    await expect(runCommand(command(), ['config', 'get', 'retrieval.nope'])).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a value that fails validation without writing it', async () => {
    await expect(
      runCommand(command(), ['config', 'set', 'retrieval.strategy', 'keyword'])
    ).rejects.toBeInstanceOf(ConfigError);

    await runCommand(command(), ['config', 'get', 'retrieval.strategy']);
    expect(captured.logs).toEqual(['direct']);
  });

  it('lists every key with the file location', async () => {
    await runCommand(command(), ['config', 'list']);

    const output = captured.logs.join('\n');
    expect(output).toContain('retrieval.customer_namespace');
    expect(output).toContain('eval.concurrency');
    expect(captured.logs[captured.logs.length - 1]).toContain(configPath);
  });

  it('outputs JSON for get', async () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    captured.ctx.options.json = true;

    await runCommand(command(), ['config', 'get', 'chunking.chunk_size']);

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({ key: 'chunking.chunk_size', value: 400 });
  });
});

describe('formatValue', () => {
  it.each([
    ['direct', 'direct'],
    [true, 'true'],
    [0.75, '0.75'],
    [{ a: 1 }, '{"a":1}'],
  ])('formats %j', (value, expected) => {
    expect(formatValue(value)).toBe(expected);
  });
});
