/**
 * Tests for ask command
 *
 * Tests cover:
 * - Command structure and options
 * - One full turn over a temp SQLite database with scripted models
 * - JSON output format
 * - Session id generation and reuse
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { createAskCommand, toAskOutput } from '../ask.js';
import { sessionMemoryFor, vectorStoreFor } from '../../services.js';
import { parseOptions, TurnOptionsSchema } from '../../validation.js';
import { GENERAL_SYSTEM_PROMPT, ROUTER_SYSTEM_PROMPT } from '../../../agent/prompts.js';
import { ValidationError } from '../../../errors/index.js';
import {
  createTestContext,
  createTestServices,
  runCommand,
  type CapturedContext,
  type TestServices,
} from '../../../test-utils/cli.js';
import { HashedEmbedder, ScriptedGeneration, seedDocuments } from '../../../test-utils/index.js';

const ANSWER = 'AT&T was founded in 1885.';

describe('createAskCommand', () => {
  let dir: string;
  let captured: CapturedContext;
  let services: TestServices;
  let generation: ScriptedGeneration;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'concierge-ask-'));
    captured = createTestContext();
    generation = new ScriptedGeneration((request) =>
      request.system === ROUTER_SYSTEM_PROMPT ? 'general_knowledge' : ANSWER
    );
    const embedder = new HashedEmbedder();
    services = createTestServices({ dbPath: join(dir, 'test.db'), generation, embedder });

    await seedDocuments(vectorStoreFor(services), embedder, 'reference-wiki', {
      'company-history': ['AT&T was founded in 1885 in New York.'],
    });
  });

  afterEach(() => {
    for (const db of services.opened) db.close();
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  const command = () => createAskCommand(() => captured.ctx, () => services);

  describe('command structure', () => {
    it('creates command with correct name', () => {
      expect(command().name()).toBe('ask');
    });

    it('offers the three retrieval strategies', () => {
      const strategy = command().options.find((option) => option.long === '--strategy');
      expect(strategy?.argChoices).toEqual(['direct', 'hypothesis', 'multi-phrasing']);
    });
  });

  describe('answering', () => {
    it('prints the answer with its sources', async () => {
      await runCommand(command(), ['ask', 'When was AT&T founded?']);

      expect(captured.logs[0]).toBe(ANSWER);
      expect(captured.logs.join('\n')).toContain('[1] company-history#0 (');
      expect(generation.requests.filter((request) => request.system === GENERAL_SYSTEM_PROMPT)).toHaveLength(1);
    });

    it('stores both turns under the given session', async () => {
      await runCommand(command(), ['ask', 'When was AT&T founded?', '--session', 'cli_0000test']);

      const session = sessionMemoryFor(services).findSession('cli_0000test');
      expect(session?.turns.map((turn) => [turn.role, turn.text])).toEqual([
        ['user', 'When was AT&T founded?'],
        ['system', ANSWER],
      ]);
    });

    it('starts a fresh cli_ session without --session', async () => {
      await runCommand(command(), ['ask', 'When was AT&T founded?']);

      const sessions = sessionMemoryFor(services).listSessions();
      expect(sessions).toHaveLength(1);
      expect(sessions[0]?.id).toMatch(/^cli_[0-9a-f]{8}$/);
    });

    it('writes JSON in --json mode', async () => {
      const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      captured.ctx.options.json = true;

      await runCommand(command(), ['ask', 'When was AT&T founded?', '--session', 'cli_0000json']);

      expect(captured.logs).toEqual([]);
      const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
      expect(output).toMatchObject({
        session_id: 'cli_0000json',
        state: 'Approved',
        intent: 'general_knowledge',
        responder: 'general_knowledge',
        rerouted: false,
        answer: ANSWER,
        citations: [{ index: 1, docId: 'company-history', chunkId: '0' }],
      });
    });
  });
});

describe('toAskOutput', () => {
  it('reports null confidence and no citations when there is no response', () => {
    expect(
      toAskOutput({
        sessionId: 'cli_1',
        state: 'Error',
        text: 'Sorry',
        intent: 'account_specific',
        responder: null,
        rerouted: false,
        trace: ['Routing', 'Error'],
        errorCode: 'GENERATION_FAILED',
      })
    ).toEqual({
      session_id: 'cli_1',
      state: 'Error',
      intent: 'account_specific',
      responder: null,
      rerouted: false,
      answer: 'Sorry',
      confidence: null,
      citations: [],
      trace: ['Routing', 'Error'],
      error_code: 'GENERATION_FAILED',
    });
  });
});

describe('TurnOptionsSchema', () => {
  it('accepts a known strategy and a session id', () => {
    expect(parseOptions(TurnOptionsSchema, { session: 'cli_1a2b3c4d', strategy: 'hypothesis' })).toEqual({
      session: 'cli_1a2b3c4d',
      strategy: 'hypothesis',
    });
  });

  it('rejects a session id with spaces', () => {
    expect(() => parseOptions(TurnOptionsSchema, { session: 'my session' })).toThrow(ValidationError);
  });
});
