import { describe, it, expect } from 'vitest';

import { buildClarifyingResponse, validateResponse } from '../validator.js';
import { CLARIFYING_HEADER } from '../prompts.js';
import type { AgentResponse, Citation } from '../types.js';

const citation = (quote: string, docId = 'invoice-acc-demo-001'): Citation => ({
  docId,
  chunkId: '0',
  quote,
  score: 0.89,
});

const response = (overrides: Partial<AgentResponse> = {}): AgentResponse => ({
  answer: 'Your bill for January 2026 is $137.14.',
  citations: [citation('Total amount due: $137.14')],
  confidence: 0.89,
  responder: 'account_specific',
  ...overrides,
});

describe('validateResponse', () => {
  it('approves a cited, confident answer with verified amounts', () => {
    expect(validateResponse(response())).toEqual({ approved: true, reasons: [] });
  });

  it('accepts confidence exactly at the threshold', () => {
    expect(validateResponse(response({ confidence: 0.75 }), 0.75).approved).toBe(true);
  });

  it('rejects an answer without citations', () => {
    const result = validateResponse(response({ answer: 'No amounts here.', citations: [] }));

    expect(result).toEqual({
      approved: false,
      reasons: [{ check: 'citations_present', message: 'response has no citations' }],
    });
  });

  it('rejects low confidence', () => {
    const result = validateResponse(response({ confidence: 0.6 }));

    expect(result.reasons).toEqual([
      { check: 'confidence_threshold', message: 'confidence 0.60 is below 0.75' },
    ]);
  });

  it('honors a configured threshold', () => {
    expect(validateResponse(response({ confidence: 0.6 }), 0.5).approved).toBe(true);
  });

  it('names each unverified amount once', () => {
    const result = validateResponse(
      response({ answer: 'You owe $999.99 now, $999.99 total, plus $137.14 and $5.' })
    );

    expect(result.reasons).toEqual([
      { check: 'amounts_verified', message: 'unverified amount: $999.99' },
      { check: 'amounts_verified', message: 'unverified amount: $5' },
    ]);
  });

  it('reports every failed check', () => {
    const result = validateResponse(response({ answer: 'It is $1,200.00.', citations: [], confidence: 0.1 }));

    expect(result.reasons.map((r) => r.check)).toEqual([
      'citations_present',
      'confidence_threshold',
      'amounts_verified',
    ]);
  });

  it('does not depend on citation order', () => {
    const citations = [
      citation('Late fee: $5.00', 'late-fee-policy'),
      citation('Total amount due: $137.14'),
      citation('Premium plan at $49.99', 'plans'),
    ];
    const answer = 'Your total is $137.14 including a $5.00 late fee.';

    const outcomes = [citations, [...citations].reverse(), [citations[1], citations[2], citations[0]]].map(
      (order) =>
        validateResponse(
          response({ answer, citations: order.filter((c): c is Citation => c !== undefined) })
        )
    );

    expect(outcomes.every((o) => o.approved)).toBe(true);
  });
});

describe('buildClarifyingResponse', () => {
  it('asks one set of questions per failed check', () => {
    const text = buildClarifyingResponse(
      validateResponse(response({ answer: 'It is $999.99.', confidence: 0.5 }))
    );

    expect(text).toBe(
      [
        CLARIFYING_HEADER,
        '• Which billing period are you asking about?',
        '• Could you add a few more details about your question?',
        '• Could you confirm which charge or statement you are referring to?',
      ].join('\n')
    );
  });

  it('does not repeat questions for repeated checks', () => {
    const text = buildClarifyingResponse({
      approved: false,
      reasons: [
        { check: 'amounts_verified', message: 'unverified amount: $1' },
        { check: 'amounts_verified', message: 'unverified amount: $2' },
      ],
    });

    expect(text.split('\n')).toHaveLength(2);
    expect(text).not.toContain('$1');
  });
});
