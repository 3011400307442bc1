/**
 * Currency-amount tokens: "$137.14", "$5", "$1,200.00".
 */
export const CURRENCY_PATTERN = /\$[\d,]+(?:\.\d{2})?/g;

/**
 * All currency tokens in order of appearance, duplicates included.
 */
export function extractCurrencyTokens(text: string): string[] {
  return text.match(CURRENCY_PATTERN) ?? [];
}
