/**
 * JSON Utilities
 *
 * Model output is rarely bare JSON: it arrives wrapped in markdown fences or
 * with a sentence before the object. These helpers find the object and
 * validate it against a zod schema so callers never handle an unchecked shape.
 */

import type { z } from 'zod';

/**
 * Strip a surrounding ```json fence and return the first `{...}` block, or
 * null when the text holds no object.
 */
export function extractJsonObject(text: string): string | null {
  let body = text.trim();
  if (body.startsWith('```json')) {
    body = body.slice(7);
  } else if (body.startsWith('```')) {
    body = body.slice(3);
  }
  if (body.endsWith('```')) {
    body = body.slice(0, -3);
  }

  const match = body.match(/\{[\s\S]*\}/);
  return match ? match[0] : null;
}

export type JsonParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * Parse model output as JSON and validate it.
 *
 * @example
 * ```typescript
 * const result = parseJsonWith(ScoresSchema, llmText);
 * if (!result.success) throw new Error(result.error);
 * ```
 */
export function parseJsonWith<S extends z.ZodTypeAny>(
  schema: S,
  text: string
): JsonParseResult<z.infer<S>> {
  const raw = extractJsonObject(text);
  if (raw === null) {
    return { success: false, error: 'no JSON object found' };
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    return {
      success: false,
      error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { success: false, error: issues };
  }
  return { success: true, data: parsed.data };
}

/**
 * Parse a stored JSON column, falling back when it is missing or corrupt.
 */
export function parseStoredJson<S extends z.ZodTypeAny, F = z.infer<S>>(
  schema: S,
  json: string | null | undefined,
  fallback: F,
  onError?: (message: string) => void
): z.infer<S> | F {
  if (json === null || json === undefined) {
    return fallback;
  }
  try {
    const parsed = schema.safeParse(JSON.parse(json));
    if (parsed.success) {
      return parsed.data;
    }
    onError?.(parsed.error.message);
  } catch (error) {
    onError?.(error instanceof Error ? error.message : String(error));
  }
  return fallback;
}
