import { describe, it, expect } from 'vitest';
import { extractEntities } from '../entity-extractor.js';

const valueOf = (text: string, type: string) =>
  extractEntities(text).entities.find((e) => e.type === type);

describe('extractEntities', () => {
  describe('account identifiers', () => {
    it('recognizes the hyphenated account format with high confidence', () => {
      expect(valueOf('My account is ACC-DEMO-001', 'account_id')).toEqual({
        type: 'account_id',
        value: 'ACC-DEMO-001',
        confidence: 0.95,
      });
    });

    it('upper-cases lower-case identifiers', () => {
      expect(valueOf('check acc-demo-001 please', 'account_id')?.value).toBe('ACC-DEMO-001');
    });

    it('recognizes the numeric format', () => {
      expect(valueOf('ACC-789456123 here', 'account_id')).toEqual({
        type: 'account_id',
        value: 'ACC-789456123',
        confidence: 0.9,
      });
    });

    it('accepts labelled numbers with lower confidence', () => {
      expect(valueOf('account number: 5551234', 'account_id')).toEqual({
        type: 'account_id',
        value: '5551234',
        confidence: 0.7,
      });
    });

    it('ignores the word account followed by an ordinary word', () => {
      expect(valueOf('What is on my account please', 'account_id')).toBeUndefined();
    });
  });

  describe('customer names', () => {
    it('reads self-introductions', () => {
      expect(valueOf("Hi, I'm Dana and I have a question", 'customer_name')?.value).toBe('Dana');
      expect(valueOf('my name is Priya', 'customer_name')?.value).toBe('Priya');
    });

    it('reads "<Name> here" at the start', () => {
      expect(valueOf('Marco here, quick question', 'customer_name')?.value).toBe('Marco');
    });

    it('does not treat lower-case words as names', () => {
      expect(valueOf('i am looking for my invoice', 'customer_name')).toBeUndefined();
    });
  });

  describe('billing periods', () => {
    it('normalizes month and year', () => {
      expect(valueOf('What is my bill for january 2026?', 'billing_period')).toEqual({
        type: 'billing_period',
        value: 'January 2026',
        confidence: 0.9,
      });
    });

    it('accepts abbreviated months', () => {
      expect(valueOf('charges in Feb 2025', 'billing_period')?.value).toBe('Feb 2025');
    });

    it('reads "<Month> bill"', () => {
      expect(valueOf('explain my March bill', 'billing_period')).toEqual({
        type: 'billing_period',
        value: 'March bill',
        confidence: 0.7,
      });
    });

    it('reads relative periods with low confidence', () => {
      expect(valueOf('Why is it higher Last Month?', 'billing_period')).toEqual({
        type: 'billing_period',
        value: 'last month',
        confidence: 0.5,
      });
    });
  });

  describe('topic', () => {
    it('picks the topic with the most keyword hits', () => {
      expect(valueOf('I want a refund, the overcharge is wrong', 'topic')?.value).toBe('dispute');
    });

    it('prefers the earlier topic on a tie', () => {
      expect(valueOf('plan payment', 'topic')?.value).toBe('billing');
    });

    it('returns nothing without keywords', () => {
      expect(valueOf('When was the company founded?', 'topic')).toBeUndefined();
    });
  });

  it('collects currency amounts without storing them as entities', () => {
    const result = extractEntities('I was charged $49.99 and $5 last month');

    expect(result.amounts).toEqual(['$49.99', '$5']);
    expect(result.entities.map((e) => e.type)).toEqual(['billing_period', 'topic']);
  });
});
