/**
 * Deterministic checks, no I/O. Currently a single rule: a non-blank answer counts as task success.
 */

import type { MetricResult, SubjectResponse, Testcase } from "@evalloop/shared";
import type { SubjectSpec } from "../subject/subjectSpec";
import { TASK_SUCCESS_METRIC, wantsMetric, type ScoringPack } from "./types";

export function nonEmptyAnswer(answer: string): MetricResult {
  const success = answer.trim() !== "";
  return {
    name: TASK_SUCCESS_METRIC,
    value: success,
    details: { kind: "rule", reason: success ? "non_empty_answer" : "empty_answer" }
  };
}

export class RuleBasedPack implements ScoringPack {
  readonly name = "rule_based";

  async evaluate(_testcase: Testcase, response: SubjectResponse, spec: SubjectSpec): Promise<MetricResult[]> {
    if (!wantsMetric(spec, TASK_SUCCESS_METRIC)) return [];
    return [nonEmptyAnswer(response.answer)];
  }
}
