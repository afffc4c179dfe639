import type { AggregatedSummary } from "@evalloop/shared";
import type { MemoryStore } from "./memoryStore";

export const DEFAULT_SCORE_THRESHOLD = 4;

export type DistillResult = {
  subject_id: string;
  version_id: string;
  records_seen: number;
  best_practices_written: number;
  failure_patterns_written: number;
  /** Appends that failed; each is logged and skipped. */
  write_failures: number;
};

/**
 * Turn judged records into memories: score >= threshold is a best_practice, anything lower a
 * failure_pattern. Records without a judge_score are skipped. A failed write is logged and
 * counted, never thrown: the run it came from has already finished.
 */
export function distillMemories(
  summary: AggregatedSummary,
  store: MemoryStore,
  threshold: number = DEFAULT_SCORE_THRESHOLD
): DistillResult {
  let best_practices_written = 0;
  let failure_patterns_written = 0;
  let write_failures = 0;

  for (const record of summary.records) {
    const judge = record.judge_metrics.find((m) => m.name === "judge_score");
    if (!judge) continue;
    const score = typeof judge.value === "number" ? judge.value : 0;
    const entry = {
      subject_id: record.subject_id,
      version_id: record.version_id,
      testcase_id: record.input.id,
      judge_score: score,
      judge_rationale: judge.details.rationale ?? null,
      rubric_id: judge.details.rubric_id ?? null,
      judge_question: record.input.judge_question,
      expected_behavior: record.input.expected_behavior
    };
    const type = score >= threshold ? "best_practice" : "failure_pattern";
    try {
      store.appendEntry({ type, ...entry });
    } catch (err) {
      console.error(`[distill] Failed to write ${type} for ${record.eval_id}:`, err instanceof Error ? err.message : String(err));
      write_failures++;
      continue;
    }
    if (type === "best_practice") best_practices_written++;
    else failure_patterns_written++;
  }

  return {
    subject_id: summary.subject_id,
    version_id: summary.version_id,
    records_seen: summary.records.length,
    best_practices_written,
    failure_patterns_written,
    write_failures
  };
}
