/**
 * Turn-level error taxonomy.
 *
 * These never reach the process exit path: the orchestrator maps each one to
 * a terminal state and a user-visible message.
 */

import type { ValidationResult } from './types.js';

export type TurnErrorCode =
  | 'CLASSIFICATION_FAILED'
  | 'RETRIEVAL_FAILED'
  | 'GENERATION_FAILED'
  | 'VALIDATION_REJECTED'
  | 'GUARDRAIL_LOOP'
  | 'RESPONSE_SHAPE';

export abstract class TurnError extends Error {
  abstract readonly code: TurnErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

/**
 * Router output that does not parse to exactly one intent label.
 */
export class ClassificationError extends TurnError {
  readonly code = 'CLASSIFICATION_FAILED';

  constructor(
    message: string,
    /** The raw model output, for logging */
    public readonly raw: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Embedding or vector-store backend unavailable.
 */
export class RetrievalError extends TurnError {
  readonly code = 'RETRIEVAL_FAILED';

  constructor(
    message: string,
    public readonly namespace: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Model call failed or timed out, after retries when thrown by the adapter.
 */
export class GenerationError extends TurnError {
  readonly code = 'GENERATION_FAILED';

  constructor(
    message: string,
    public readonly timedOut: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Validator rejection. Expected traffic, not a system error.
 */
export class ValidationFailure extends TurnError {
  readonly code = 'VALIDATION_REJECTED';

  constructor(public readonly result: ValidationResult) {
    super(`Response rejected: ${result.reasons.map((r) => r.check).join(', ')}`);
  }
}

/**
 * A second guardrail trigger within one turn.
 */
export class GuardrailLoopExceeded extends TurnError {
  readonly code = 'GUARDRAIL_LOOP';

  constructor(public readonly reroutes: number) {
    super(`Guardrail triggered again after ${reroutes} reroute(s) in one turn`);
  }
}

/**
 * Account responder output that is not the required structured shape.
 */
export class ResponseShapeError extends TurnError {
  readonly code = 'RESPONSE_SHAPE';

  constructor(
    message: string,
    public readonly raw: string
  ) {
    super(message);
  }
}

/**
 * Transient failures worth retrying (backend hiccups), as opposed to
 * logic-level rejections.
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof GenerationError || error instanceof RetrievalError;
}
