/**
 * Evaluation service: golden set → subject → scoring packs → aggregated summary.
 * To add a metric family: implement ScoringPack and register it in buildEvalEngine (context.ts).
 */

export { EvalEngine, isEvalRunError, buildRequestPayload } from "./runEvaluation";
export type { EvalEngineDeps } from "./runEvaluation";
export { RuleBasedPack, nonEmptyAnswer } from "./ruleBasedPack";
export { JudgePack, parseJudgeOutput, stripCodeFences, buildJudgePrompt } from "./llmJudgeEvaluator";
export type { JudgePackOptions, JudgeParseStage, ParsedJudgment } from "./llmJudgeEvaluator";
export { OpenAIJudgeClient, DEFAULT_JUDGE_MODEL } from "./judgeClient";
export type { JudgeClient } from "./judgeClient";
export { aggregateRecords, percentile, p95, mean } from "./aggregate";
export { wantsMetric, TASK_SUCCESS_METRIC, JUDGE_SCORE_METRIC } from "./types";
export type { ScoringPack } from "./types";
