/**
 * Long-lived memory: eval outcomes, best practices, failure patterns and applied changes.
 * Every entry carries a `type` so planners can pull one kind at a time.
 */

import type { ConfigPatch, EvalRecord, LogRecord, MemoryType } from "@evalloop/shared";
import { JsonlRecordStore } from "./recordStore";

export type MemoryEntryInput = { type: MemoryType } & Record<string, unknown>;

export type MemoryQuery = {
  type?: MemoryType;
  subject_id?: string;
  limit?: number;
};

export type BestPracticeInput = {
  title: string;
  description: string;
  category?: string;
  source?: string;
};

export type PromptTweakInput = {
  subject_id: string;
  base_version: string;
  new_version: string;
  description: string;
  expected_impact: string;
};

export type ConfigChangeInput = {
  subject_id?: string;
  base_config_path: string;
  new_config_path: string;
  golden_set_path: string;
  patches: ConfigPatch[];
  appended_testcase_ids: string[];
};

function firstMetricValue(record: EvalRecord, name: string): number | boolean | null {
  const metric = [...record.rule_metrics, ...record.judge_metrics].find((m) => m.name === name);
  return metric ? metric.value : null;
}

export class MemoryStore extends JsonlRecordStore {
  constructor(filePath: string) {
    super(filePath, "memory_id");
  }

  appendEntry(entry: MemoryEntryInput): string {
    return this.append(entry);
  }

  loadMemories(query: MemoryQuery = {}): LogRecord[] {
    return this.load({
      filters: { type: query.type, subject_id: query.subject_id },
      limit: query.limit
    });
  }

  /** Compact outcome of one evaluated testcase; the full record lives in the run summary. */
  recordEvalOutcome(record: EvalRecord): string {
    return this.appendEntry({
      type: "eval_outcome",
      eval_id: record.eval_id,
      subject_id: record.subject_id,
      version_id: record.version_id,
      testcase_id: record.input.id,
      task_success: firstMetricValue(record, "task_success"),
      judge_score: firstMetricValue(record, "judge_score"),
      latency_ms: record.response_meta.latency_ms
    });
  }

  recordBestPractice(input: BestPracticeInput): string {
    return this.appendEntry({
      type: "best_practice",
      title: input.title,
      description: input.description,
      category: input.category ?? "general",
      source: input.source ?? null
    });
  }

  recordPromptTweak(input: PromptTweakInput): string {
    return this.appendEntry({ type: "prompt_tweak", ...input });
  }

  recordConfigChange(input: ConfigChangeInput): string {
    return this.appendEntry({ type: "config_change", ...input });
  }

  /**
   * Render titled best practices as a prompt block. A later entry with the same title
   * replaces an earlier one. Empty string when there is nothing to show.
   */
  bestPracticesBlock(category?: string): string {
    const byTitle = new Map<string, string>();
    for (const entry of this.loadMemories({ type: "best_practice" })) {
      if (typeof entry.title !== "string" || typeof entry.description !== "string") continue;
      if (category && entry.category !== category) continue;
      byTitle.set(entry.title, entry.description);
    }
    if (byTitle.size === 0) return "";
    const lines = ["Best practices to consider:"];
    for (const [title, description] of byTitle) {
      lines.push(`- ${title}: ${description}`);
    }
    return lines.join("\n");
  }
}
