/**
 * Response Validator
 *
 * Rule-based cross-check of account-specific responses. No model calls.
 * All checks run on every response, so the reasons list is complete and does
 * not depend on citation order.
 */

import { extractCurrencyTokens } from './currency.js';
import { CLARIFYING_HEADER } from './prompts.js';
import type { AgentResponse, ValidationCheck, ValidationReason, ValidationResult } from './types.js';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.75;

export function validateResponse(
  response: AgentResponse,
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): ValidationResult {
  const reasons: ValidationReason[] = [];

  if (response.citations.length === 0) {
    reasons.push({ check: 'citations_present', message: 'response has no citations' });
  }

  if (response.confidence < threshold) {
    reasons.push({
      check: 'confidence_threshold',
      message: `confidence ${response.confidence.toFixed(2)} is below ${threshold}`,
    });
  }

  const quotes = response.citations.map((citation) => citation.quote);
  const unverified = [...new Set(extractCurrencyTokens(response.answer))].filter(
    (amount) => !quotes.some((quote) => quote.includes(amount))
  );
  for (const amount of unverified) {
    reasons.push({ check: 'amounts_verified', message: `unverified amount: ${amount}` });
  }

  return { approved: reasons.length === 0, reasons };
}

const CLARIFYING_QUESTIONS: Record<ValidationCheck, string[]> = {
  citations_present: ['Could you share your account number so I can look up your records?'],
  confidence_threshold: [
    'Which billing period are you asking about?',
    'Could you add a few more details about your question?',
  ],
  amounts_verified: ['Could you confirm which charge or statement you are referring to?'],
};

/**
 * The reply shown instead of a rejected answer. Never includes the answer.
 */
export function buildClarifyingResponse(result: ValidationResult): string {
  const checks = [...new Set(result.reasons.map((reason) => reason.check))];
  const questions = checks.flatMap((check) => CLARIFYING_QUESTIONS[check]);
  return [CLARIFYING_HEADER, ...questions.map((question) => `• ${question}`)].join('\n');
}
