/**
 * LLM Judge
 *
 * Grades one answer on faithfulness, relevancy and correctness. Output that
 * is not the scores object is an error, never a row of zeros, so a broken
 * judge cannot drag a pair's average down unnoticed.
 */

import { z } from 'zod';

import type { GenerationClient } from '../providers/generation.js';
import { parseJsonWith } from '../utils/json.js';
import { EvalError, type JudgeScores } from './types.js';

export const JUDGE_TEMPERATURE = 0;
export const JUDGE_MAX_TOKENS = 100;

/** Contexts shown to the judge */
const JUDGE_CONTEXT_LIMIT = 4;

const clamp = (value: number): number => Math.min(1, Math.max(0, value));

// Numbers, or numeric strings such as "0.8"
const ScoreSchema = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .refine(Number.isFinite, 'not a number')
  .transform(clamp);

export const JudgeScoresSchema = z.object({
  faithfulness: ScoreSchema,
  relevancy: ScoreSchema,
  correctness: ScoreSchema,
});

export interface JudgeInput {
  query: string;
  answer: string;
  contexts: string[];
  groundTruth: string;
}

export function buildJudgePrompt(input: JudgeInput): string {
  const context =
    input.contexts.length > 0
      ? input.contexts.slice(0, JUDGE_CONTEXT_LIMIT).join('\n\n')
      : 'No context was retrieved.';

  return `You are evaluating a retrieval-augmented answer. Score it on 3 metrics from 0.0 to 1.0.

QUESTION: ${input.query}

RETRIEVED CONTEXT:
${context}

ANSWER GIVEN:
${input.answer}

GROUND TRUTH:
${input.groundTruth}

Respond with ONLY a JSON object:
{
  "faithfulness": <0.0-1.0, is the answer grounded in the retrieved context only?>,
  "relevancy": <0.0-1.0, does the answer directly address the question?>,
  "correctness": <0.0-1.0, how well does the answer match the ground truth?>
}`;
}

/**
 * @throws EvalError JUDGE_OUTPUT_INVALID
 */
export function parseJudgeScores(output: string): JudgeScores {
  const parsed = parseJsonWith(JudgeScoresSchema, output);
  if (!parsed.success) {
    throw EvalError.judgeOutputInvalid(parsed.error);
  }
  return parsed.data;
}

export async function judgeAnswer(generation: GenerationClient, input: JudgeInput): Promise<JudgeScores> {
  const output = await generation.complete({
    prompt: buildJudgePrompt(input),
    temperature: JUDGE_TEMPERATURE,
    maxTokens: JUDGE_MAX_TOKENS,
  });
  return parseJudgeScores(output);
}
