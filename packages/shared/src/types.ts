/**
 * Shared types for evaluation runs, record logs and changesets.
 * Used by the backend services and by anything reading the ops API; field names are the wire names.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** One golden-set row. `extra` holds any columns beyond the four known ones. */
export interface Testcase {
  id: string;
  input: JsonValue;
  judge_question: string;
  expected_behavior: string;
  extra: Record<string, string>;
}

export type MetricKind = "rule" | "judge";

export type MetricDetails = {
  kind: MetricKind;
  [key: string]: unknown;
};

export interface MetricResult {
  name: string;
  value: number | boolean;
  details: MetricDetails;
}

export type ToolCall = Record<string, unknown>;

/** Normalized subject reply. Missing fields are defaulted when the reply is read, never later. */
export interface SubjectResponse {
  answer: string;
  latency_ms: number | null;
  tool_calls: ToolCall[];
  session_graph: Record<string, unknown>;
  /** Set when the subject call itself failed and the engine substituted an empty reply. */
  error?: string;
}

export interface ResponseMeta {
  latency_ms: number | null;
  tool_calls: ToolCall[];
  session_graph: Record<string, unknown>;
}

export interface EvalRecord {
  eval_id: string;
  subject_id: string;
  version_id: string;
  input: Testcase;
  output: { answer: string; error?: string };
  response_meta: ResponseMeta;
  rule_metrics: MetricResult[];
  judge_metrics: MetricResult[];
}

export interface MetricAggregate {
  avg: number;
  p95: number;
  count: number;
}

export interface AggregatedSummary {
  subject_id: string;
  version_id: string;
  golden_path: string;
  num_testcases: number;
  /** Keyed by numeric metric name, e.g. judge_score. */
  metrics: Record<string, MetricAggregate>;
  latency_ms: { avg: number; p95: number } | null;
  /** Share of task_success metrics that are true; null when none were produced. */
  pass_rate: number | null;
  records: EvalRecord[];
}

export type EvalRunErrorCode = "golden_set_missing" | "golden_set_empty";

export interface EvalRunError {
  error: EvalRunErrorCode;
  message: string;
  context: { golden_path: string | null };
}

export type EvalRunResult = AggregatedSummary | EvalRunError;

// --- Record logs ---

export type MemoryType =
  | "best_practice"
  | "failure_pattern"
  | "config_change"
  | "eval_outcome"
  | "prompt_tweak";

/** A parsed log line: caller fields plus the id field and `timestamp` added on append. */
export type LogRecord = Record<string, unknown>;

/** What `load` yields for a line that is not a JSON object. */
export interface CorruptRecord {
  _raw_line: string;
  error: "failed_to_parse_json";
  [key: string]: unknown;
}

// --- Changesets ---

export type PatchOp = "set";

export interface ConfigPatch {
  path: string;
  op: PatchOp;
  value: JsonValue;
}

/** Rows are loose on purpose: required fields are checked when the changeset is applied. */
export type NewTestcaseRow = Record<string, unknown>;

export interface Changeset {
  base_config_path: string;
  new_config_path: string;
  golden_set_path: string;
  config_patches: ConfigPatch[];
  new_testcases: NewTestcaseRow[];
}

export interface ApplyChangesetResult {
  new_config_path: string;
  golden_set_path: string;
  patches_applied: number;
  appended_ids: string[];
  columns: string[];
}
