/**
 * Entity Extractor
 *
 * Rule-based extraction of account identifiers, customer names, billing
 * periods and the conversation topic from a user message. Each pattern
 * carries a fixed confidence: explicit identifiers score high, loose phrasings
 * low, so a vague later mention never overwrites a precise earlier one.
 */

import { extractCurrencyTokens } from '../agent/currency.js';
import type { Entity, EntityType } from './types.js';

interface Rule {
  pattern: RegExp;
  confidence: number;
  /** Build the stored value from the match */
  value: (match: RegExpMatchArray) => string | undefined;
}

const MONTHS =
  'January|February|March|April|May|June|July|August|September|October|November|December';
const MONTH_ABBREVIATIONS = 'Jan|Feb|Mar|Apr|Jun|Jul|Aug|Sep|Oct|Nov|Dec';

const titleCase = (word: string): string =>
  word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();

const ACCOUNT_RULES: Rule[] = [
  // ACC-DEMO-001
  { pattern: /\b(ACC-[A-Z0-9]+-[A-Z0-9]+)\b/i, confidence: 0.95, value: (m) => m[1]?.toUpperCase() },
  // ACC-789456123
  { pattern: /\b(ACC-\d{9,12})\b/i, confidence: 0.9, value: (m) => m[1]?.toUpperCase() },
  // "account number: 55-1234"; the value must contain a digit so "account please" is ignored
  {
    pattern: /\baccount\s*(?:number|#|id)?\s*:?\s*([A-Z0-9-]*\d[A-Z0-9-]*)\b/i,
    confidence: 0.7,
    value: (m) => m[1]?.toUpperCase(),
  },
  {
    pattern: /\baccount\s+is\s+([A-Z0-9-]*\d[A-Z0-9-]*)\b/i,
    confidence: 0.7,
    value: (m) => m[1]?.toUpperCase(),
  },
];

const NAME_RULES: Rule[] = [
  {
    pattern: /(?:\b[Ii]'m|\b[Ii] am|\b[Mm]y name is|\b[Tt]his is)\s+([A-Z][a-z]+)\b/,
    confidence: 0.6,
    value: (m) => m[1],
  },
  { pattern: /^([A-Z][a-z]+)\s+here\b/, confidence: 0.6, value: (m) => m[1] },
];

const PERIOD_RULES: Rule[] = [
  {
    pattern: new RegExp(`\\b(${MONTHS}|${MONTH_ABBREVIATIONS})\\s+(\\d{4})\\b`, 'i'),
    confidence: 0.9,
    value: (m) => (m[1] && m[2] ? `${titleCase(m[1])} ${m[2]}` : undefined),
  },
  {
    pattern: new RegExp(`\\b(${MONTHS})\\s+bill\\b`, 'i'),
    confidence: 0.7,
    value: (m) => (m[1] ? `${titleCase(m[1])} bill` : undefined),
  },
  {
    pattern: /\b(this month|last month|current month|previous month)\b/i,
    confidence: 0.5,
    value: (m) => m[1]?.toLowerCase(),
  },
];

const TOPIC_KEYWORDS: Array<[string, string[]]> = [
  ['billing', ['bill', 'invoice', 'charge', 'payment', 'amount', 'due', 'balance']],
  ['plans', ['plan', 'upgrade', 'downgrade', 'package', 'subscription']],
  ['dispute', ['dispute', 'wrong', 'incorrect', 'error', 'overcharge', 'refund']],
  ['late_fee', ['late', 'fee', 'penalty', 'overdue']],
  ['support', ['help', 'support', 'issue', 'problem', 'question']],
];

const TOPIC_CONFIDENCE = 0.5;

export interface ExtractionResult {
  /** At most one entity per type */
  entities: Entity[];
  /** Currency tokens mentioned by the user; informational, never stored */
  amounts: string[];
}

function firstMatch(type: EntityType, rules: Rule[], text: string): Entity | undefined {
  for (const rule of rules) {
    const match = text.match(rule.pattern);
    const value = match ? rule.value(match) : undefined;
    if (value) {
      return { type, value, confidence: rule.confidence };
    }
  }
  return undefined;
}

/**
 * Highest keyword count wins; ties go to the earlier topic.
 */
function detectTopic(text: string): Entity | undefined {
  const lower = text.toLowerCase();
  let best: { topic: string; score: number } | undefined;
  for (const [topic, keywords] of TOPIC_KEYWORDS) {
    const score = keywords.filter((keyword) => lower.includes(keyword)).length;
    if (score > 0 && (!best || score > best.score)) {
      best = { topic, score };
    }
  }
  return best ? { type: 'topic', value: best.topic, confidence: TOPIC_CONFIDENCE } : undefined;
}

export function extractEntities(text: string): ExtractionResult {
  const candidates = [
    firstMatch('account_id', ACCOUNT_RULES, text),
    firstMatch('customer_name', NAME_RULES, text),
    firstMatch('billing_period', PERIOD_RULES, text),
    detectTopic(text),
  ];
  return {
    entities: candidates.filter((e): e is Entity => e !== undefined),
    amounts: extractCurrencyTokens(text),
  };
}
