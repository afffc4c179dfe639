/**
 * Scoring pack contract. A pack turns one (testcase, response) pair into zero or more metrics;
 * each metric's details.kind says whether it came from a rule or from the judge.
 */

import type { MetricResult, SubjectResponse, Testcase } from "@evalloop/shared";
import type { SubjectSpec } from "../subject/subjectSpec";

export interface ScoringPack {
  readonly name: string;
  evaluate(testcase: Testcase, response: SubjectResponse, spec: SubjectSpec): Promise<MetricResult[]>;
}

export const TASK_SUCCESS_METRIC = "task_success";
export const JUDGE_SCORE_METRIC = "judge_score";

/**
 * Whether a per-case metric is wanted by the subject's `evaluation.metrics` list.
 * No list: everything. Empty list: nothing. Any `judge_score*` aggregate name enables judge_score.
 */
export function wantsMetric(spec: SubjectSpec, metricName: string): boolean {
  const configured = spec.evaluation.metrics;
  if (configured === undefined) return true;
  if (metricName === JUDGE_SCORE_METRIC) {
    return configured.some((m) => m.startsWith(JUDGE_SCORE_METRIC));
  }
  return configured.includes(metricName);
}
