/**
 * Evaluation Module
 *
 * Chunk strategy × retrieval strategy comparison over a query set, graded by
 * an LLM judge.
 */

export {
  CHUNK_STRATEGIES,
  RETRIEVAL_STRATEGIES,
  EVAL_NAMESPACE_PREFIX,
  SCORE_AXES,
  EvalGrid,
  EvalError,
  EvalErrorCodes,
  cellKey,
  evalNamespaceFor,
  pairName,
  type CellCoordinates,
  type CellKey,
  type CellResult,
  type ComparisonReport,
  type EvalErrorCode,
  type EvalQuery,
  type JudgeScores,
  type PairName,
  type PairSummary,
  type ScoredCell,
} from './types.js';

export { loadQueries, parseQueries, formatQueryId } from './queries.js';
export { judgeAnswer, parseJudgeScores, buildJudgePrompt, type JudgeInput } from './judge.js';
export { generateEvalAnswer, buildEvalContext, NO_CONTEXT_ANSWER } from './answer.js';
export { runPool } from './pool.js';
export { summarizePairs, mean, populationVariance, compositeOf } from './aggregator.js';
export { formatComparisonReport, formatWinnerLine, INSUFFICIENT_DATA } from './report.js';
export { exportReport, toExportedRun, type ExportedFiles, type ExportedRun } from './exporter.js';
export { SqliteEvalRecorder, type EvalRecorder } from './recorder.js';
export {
  runEvaluation,
  assertEvalNamespace,
  createEvalHarnessDeps,
  evalSettings,
  type EvalHarnessDeps,
  type EvalRunOptions,
  type EvalServices,
} from './harness.js';
