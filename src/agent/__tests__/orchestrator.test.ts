/**
 * Orchestrator Tests
 *
 * Whole turns through the state machine with the real router, responders,
 * guardrails and validator over scripted generation and fixed retrieval.
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { Orchestrator } from '../orchestrator.js';
import { AccountResponder, GeneralKnowledgeResponder } from '../responders.js';
import { IntentRouter } from '../router.js';
import { GenerationError, RetrievalError } from '../errors.js';
import {
  ACCOUNT_SYSTEM_PROMPT,
  CLARIFYING_HEADER,
  HANDOFF_APOLOGY,
  ROUTER_SYSTEM_PROMPT,
  SAFE_RESPONSE,
  STRICT_FORMAT_INSTRUCTIONS,
} from '../prompts.js';
import type { DomainResponder, RawDraft, ResponderTag } from '../types.js';
import { SessionMemory } from '../../memory/session-memory.js';
import { InMemorySessionRepository } from '../../memory/in-memory-repository.js';
import { ScriptedGeneration, StaticRetrieval } from '../../test-utils/index.js';
import type { RetrievedChunk } from '../../search/types.js';

const SESSION = 'cli_0badf00d';
const ACCOUNT_ID = 'ACC-DEMO-001';

const chunk = (docId: string, chunkId: string, text: string, score: number): RetrievedChunk => ({
  id: `${docId}:${chunkId}`,
  docId,
  chunkId,
  text,
  score,
});

const INVOICE = chunk(
  'invoice-acc-demo-001',
  '0',
  `Invoice for ${ACCOUNT_ID}, January 2026. Total amount due: $137.14.`,
  0.84
);
const HISTORY = chunk('company-history', '0', 'AT&T was founded in 1885 in New York.', 0.82);
const PLANS = chunk('plans', '0', 'The Pro plan costs $49.99 per month with unlimited data.', 0.8);

const accountJson = (answer: string, quote: string): string =>
  JSON.stringify({
    answer,
    citations: [{ doc_id: 'invoice-acc-demo-001', chunk_id: '0', quote }],
    confidence_note: 'Amount taken from the invoice.',
  });

type Output = string | Error;

interface Script {
  intent?: Output;
  general?: Output;
  /** Replies to successive account prompts; the last one repeats */
  account?: Output[];
}

function scripted(script: Script): ScriptedGeneration {
  let accountCalls = 0;
  const emit = (output: Output | undefined): string => {
    if (output instanceof Error) {
      throw output;
    }
    return output ?? '';
  };
  return new ScriptedGeneration((request) => {
    if (request.system === ROUTER_SYSTEM_PROMPT) {
      return emit(script.intent ?? 'general_knowledge');
    }
    if (request.system === ACCOUNT_SYSTEM_PROMPT) {
      const replies = script.account ?? [];
      const reply = replies[Math.min(accountCalls, replies.length - 1)];
      accountCalls++;
      return emit(reply);
    }
    return emit(script.general);
  });
}

/** Responder that always returns the same draft */
class FixedResponder implements DomainResponder {
  calls = 0;
  constructor(
    readonly tag: ResponderTag,
    private readonly draftOf: (tag: ResponderTag) => RawDraft
  ) {}

  async draft(): Promise<RawDraft> {
    this.calls++;
    return this.draftOf(this.tag);
  }
}

describe('Orchestrator', () => {
  let memory: SessionMemory;
  let retrieval: StaticRetrieval;

  const build = (
    generation: ScriptedGeneration,
    responders: Partial<Record<ResponderTag, DomainResponder>> = {}
  ): Orchestrator =>
    new Orchestrator({
      memory,
      router: new IntentRouter({ generation }),
      responders: {
        general_knowledge:
          responders.general_knowledge ?? new GeneralKnowledgeResponder({ retrieval, generation }),
        account_specific:
          responders.account_specific ?? new AccountResponder({ retrieval, generation }),
      },
      namespaces: { general_knowledge: 'reference-wiki', account_specific: 'customer-docs' },
      topK: 4,
      confidenceThreshold: 0.75,
      clock: () => 1_700_000_000_000,
    });

  const withAccountOnFile = () =>
    memory.mergeEntities(SESSION, [{ type: 'account_id', value: ACCOUNT_ID, confidence: 0.95 }]);

  beforeEach(() => {
    memory = new SessionMemory(new InMemorySessionRepository());
    retrieval = new StaticRetrieval({
      'reference-wiki': [HISTORY, PLANS],
      'customer-docs': [INVOICE],
    });
  });

  it('answers a general question directly without validation', async () => {
    const generation = scripted({ intent: 'general_knowledge', general: 'AT&T was founded in 1885.' });

    const result = await build(generation).handleTurn(SESSION, 'When was AT&T founded?');

    expect(result).toMatchObject({
      state: 'Approved',
      text: 'AT&T was founded in 1885.',
      intent: 'general_knowledge',
      responder: 'general_knowledge',
      rerouted: false,
      trace: ['Routing', 'MemoryMerge', 'Dispatch', 'GuardrailCheck', 'Approved'],
    });
    expect(result.validation).toBeUndefined();
    expect(result.response?.citations.map((c) => c.docId)).toEqual(['company-history', 'plans']);
    expect(result.response?.confidence).toBe(0.82);
    expect(retrieval.calls).toEqual([
      { query: 'When was AT&T founded?', namespace: 'reference-wiki', topK: 4 },
    ]);
  });

  it('approves an account answer whose amount is in a citation', async () => {
    await withAccountOnFile();
    const generation = scripted({
      intent: 'account_specific',
      account: [accountJson('Your bill for January 2026 is $137.14.', 'Total amount due: $137.14.')],
    });

    const result = await build(generation).handleTurn(SESSION, 'What is my bill for January 2026?');

    expect(result.state).toBe('Approved');
    expect(result.text).toBe('Your bill for January 2026 is $137.14.');
    expect(result.trace).toEqual([
      'Routing',
      'MemoryMerge',
      'Dispatch',
      'GuardrailCheck',
      'Validate',
      'Approved',
    ]);
    expect(result.validation).toEqual({ approved: true, reasons: [] });
    expect(result.response?.confidence).toBeCloseTo(0.89, 6);
    expect(result.response?.citations).toHaveLength(1);
    expect(result.response?.citations[0]?.score).toBeCloseTo(0.89, 6);
    expect(retrieval.calls[0]).toEqual({
      query: `Account: ${ACCOUNT_ID} | Period: January 2026 | Topic: billing What is my bill for January 2026?`,
      namespace: 'customer-docs',
      topK: 4,
    });
  });

  it('verifies an amount that sits past the 20th word of a verbatim quote', async () => {
    const invoiceText =
      `Invoice for ${ACCOUNT_ID} covering the January 2026 billing period, including the Plus plan, roaming, ` +
      'device installment, taxes and surcharges. After all credits the total amount due is $137.14 by February 15.';
    retrieval = new StaticRetrieval({ 'customer-docs': [chunk('invoice-acc-demo-001', '0', invoiceText, 0.84)] });
    await withAccountOnFile();
    const generation = scripted({
      intent: 'account_specific',
      account: [accountJson('Your bill for January 2026 is $137.14.', invoiceText)],
    });

    const result = await build(generation).handleTurn(SESSION, 'What is my bill for January 2026?');

    expect(result.state).toBe('Approved');
    expect(result.validation).toEqual({ approved: true, reasons: [] });
    expect(result.response?.citations[0]?.quote).toBe(invoiceText);
    expect(result.response?.confidence).toBeCloseTo(0.89, 6);
  });

  it('replaces an unverified amount with a clarifying question', async () => {
    await withAccountOnFile();
    const generation = scripted({
      intent: 'account_specific',
      account: [accountJson('Your bill is $999.99.', 'Total amount due: $137.14.')],
    });

    const result = await build(generation).handleTurn(SESSION, 'What is my bill for January 2026?');

    expect(result.state).toBe('Rejected');
    expect(result.validation?.reasons).toEqual([
      { check: 'amounts_verified', message: 'unverified amount: $999.99' },
    ]);
    expect(result.text).toBe(
      `${CLARIFYING_HEADER}\n• Could you confirm which charge or statement you are referring to?`
    );
    expect(result.text).not.toContain('$999.99');
    expect(result.response).toBeUndefined();
  });

  it('reroutes a general draft quoting an amount to the account responder', async () => {
    await withAccountOnFile();
    const generalStub = new FixedResponder('general_knowledge', (tag) => ({
      kind: 'text',
      responder: tag,
      text: 'Your plan costs $49.99.',
      chunks: [PLANS],
    }));
    const generation = scripted({
      intent: 'general_knowledge',
      account: [accountJson('Your January 2026 total is $137.14.', 'Total amount due: $137.14.')],
    });

    const result = await build(generation, { general_knowledge: generalStub }).handleTurn(
      SESSION,
      'How much is my plan?'
    );

    expect(result.trace).toEqual([
      'Routing',
      'MemoryMerge',
      'Dispatch',
      'GuardrailCheck',
      'Reroute',
      'Dispatch',
      'GuardrailCheck',
      'Validate',
      'Approved',
    ]);
    expect(result.rerouted).toBe(true);
    expect(result.responder).toBe('account_specific');
    expect(result.text).toBe('Your January 2026 total is $137.14.');
    expect(result.text).not.toContain('$49.99');
    expect(retrieval.calls.map((c) => c.namespace)).toEqual(['customer-docs']);
  });

  it('escalates a general question once the session is tied to an account', async () => {
    await withAccountOnFile();
    const generation = scripted({
      intent: 'general_knowledge',
      account: [accountJson('Your January 2026 total is $137.14.', 'Total amount due: $137.14.')],
    });

    const result = await build(generation).handleTurn(SESSION, 'Tell me about my charges');

    expect(result.rerouted).toBe(true);
    expect(result.state).toBe('Approved');
    expect(generation.requests.filter((r) => r.system === ACCOUNT_SYSTEM_PROMPT)).toHaveLength(1);
    expect(retrieval.calls.map((c) => c.namespace)).toEqual(['customer-docs']);
  });

  it('fails the turn on a second reroute', async () => {
    const escalate = (tag: ResponderTag): RawDraft => ({ kind: 'escalate', responder: tag, reason: 'test' });
    const general = new FixedResponder('general_knowledge', escalate);
    const account = new FixedResponder('account_specific', escalate);

    const result = await build(scripted({ intent: 'general_knowledge' }), {
      general_knowledge: general,
      account_specific: account,
    }).handleTurn(SESSION, 'Loop forever');

    expect(result).toMatchObject({
      state: 'Error',
      text: SAFE_RESPONSE,
      errorCode: 'GUARDRAIL_LOOP',
      rerouted: true,
    });
    expect(result.trace).toEqual([
      'Routing',
      'MemoryMerge',
      'Dispatch',
      'GuardrailCheck',
      'Reroute',
      'Dispatch',
      'GuardrailCheck',
      'Error',
    ]);
    expect(general.calls + account.calls).toBe(2);
  });

  it('regenerates a malformed account draft once in strict mode', async () => {
    await withAccountOnFile();
    const generation = scripted({
      intent: 'account_specific',
      account: [
        'Your bill is $137.14, see invoice.',
        accountJson('Your bill is $137.14.', 'Total amount due: $137.14.'),
      ],
    });

    const result = await build(generation).handleTurn(SESSION, 'What is my bill for January 2026?');
    const accountRequests = generation.requests.filter((r) => r.system === ACCOUNT_SYSTEM_PROMPT);

    expect(result.state).toBe('Approved');
    expect(result.trace).toEqual([
      'Routing',
      'MemoryMerge',
      'Dispatch',
      'GuardrailCheck',
      'Dispatch',
      'GuardrailCheck',
      'Validate',
      'Approved',
    ]);
    expect(accountRequests).toHaveLength(2);
    expect(accountRequests[0]?.prompt).not.toContain(STRICT_FORMAT_INSTRUCTIONS);
    expect(accountRequests[1]?.prompt).toContain(STRICT_FORMAT_INSTRUCTIONS);
  });

  it('fails the turn when the strict regeneration is malformed too', async () => {
    await withAccountOnFile();
    const generation = scripted({ intent: 'account_specific', account: ['not json'] });

    const result = await build(generation).handleTurn(SESSION, 'What is my bill?');

    expect(result).toMatchObject({ state: 'Error', text: SAFE_RESPONSE, errorCode: 'RESPONSE_SHAPE' });
  });

  it('rejects a degraded account response when retrieval is down', async () => {
    await withAccountOnFile();
    retrieval.failOn('customer-docs', new RetrievalError('vector index offline', 'customer-docs'));
    const generation = scripted({ intent: 'account_specific' });

    const result = await build(generation).handleTurn(SESSION, 'What is my bill?');

    expect(result.state).toBe('Rejected');
    expect(result.trace).toEqual(['Routing', 'MemoryMerge', 'Dispatch', 'GuardrailCheck', 'Rejected']);
    expect(result.validation?.reasons.map((r) => r.check)).toEqual(['citations_present']);
    expect(result.text).toBe(
      `${CLARIFYING_HEADER}\n• Could you share your account number so I can look up your records?`
    );
    expect(generation.requests.filter((r) => r.system === ACCOUNT_SYSTEM_PROMPT)).toHaveLength(0);
  });

  it('apologizes when retrieval fails on the general path', async () => {
    retrieval.failOn('reference-wiki', new RetrievalError('vector index offline', 'reference-wiki'));

    const result = await build(scripted({ intent: 'general_knowledge' })).handleTurn(
      SESSION,
      'What plans do you offer?'
    );

    expect(result).toMatchObject({
      state: 'Error',
      text: HANDOFF_APOLOGY,
      errorCode: 'RETRIEVAL_FAILED',
      responder: 'general_knowledge',
    });
  });

  it('apologizes with a handoff offer when generation fails', async () => {
    await withAccountOnFile();
    const generation = scripted({
      intent: 'account_specific',
      account: [new GenerationError('Generation timed out after 30000ms', true)],
    });

    const result = await build(generation).handleTurn(SESSION, 'What is my bill?');

    expect(result).toMatchObject({ state: 'Error', text: HANDOFF_APOLOGY, errorCode: 'GENERATION_FAILED' });
  });

  it('falls back to the account path when the router cannot classify', async () => {
    const generation = scripted({
      intent: 'billing, probably',
      account: [accountJson('Your bill is $137.14.', 'Total amount due: $137.14.')],
    });

    const result = await build(generation).handleTurn(SESSION, 'hmm');

    expect(result.intent).toBe('account_specific');
    expect(generation.requests.filter((r) => r.system === ROUTER_SYSTEM_PROMPT)).toHaveLength(2);
  });

  it('records the user turn and the final reply in every terminal state', async () => {
    retrieval.failOn('reference-wiki', new RetrievalError('down', 'reference-wiki'));

    await build(scripted({ intent: 'general_knowledge' })).handleTurn(SESSION, 'What plans do you offer?');
    const session = await memory.getOrCreate(SESSION);

    expect(session.turns).toEqual([
      { role: 'user', text: 'What plans do you offer?', timestamp: 1_700_000_000_000, responder: null },
      { role: 'system', text: HANDOFF_APOLOGY, timestamp: 1_700_000_000_000, responder: 'general_knowledge' },
    ]);
  });

  it('runs turns of one session one after another', async () => {
    const generation = scripted({ intent: 'general_knowledge', general: 'Answer.' });
    const orchestrator = build(generation);

    await Promise.all([
      orchestrator.handleTurn(SESSION, 'first'),
      orchestrator.handleTurn(SESSION, 'second'),
    ]);
    const session = await memory.getOrCreate(SESSION);

    expect(session.turns.map((t) => `${t.role}:${t.text}`)).toEqual([
      'user:first',
      'system:Answer.',
      'user:second',
      'system:Answer.',
    ]);
  });

  it('passes the earlier turns to the router', async () => {
    const generation = scripted({ intent: 'general_knowledge', general: 'Answer.' });
    const orchestrator = build(generation);

    await orchestrator.handleTurn(SESSION, 'first question');
    await orchestrator.handleTurn(SESSION, 'second question');
    const routerPrompts = generation.requests
      .filter((r) => r.system === ROUTER_SYSTEM_PROMPT)
      .map((r) => r.prompt);

    expect(routerPrompts[0]).toContain('(no earlier messages)');
    expect(routerPrompts[1]).toContain('Customer: first question\nAssistant: Answer.');
  });
});
