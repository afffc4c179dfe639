/**
 * Per-version report over the trace log. Scores come from eval_score, failing means score < 4.
 */

import type { LogRecord } from "@evalloop/shared";
import { mean, percentile } from "../evaluation/aggregate";

export const FAILING_SCORE_THRESHOLD = 4;

export type VersionMetrics = {
  version_id: string;
  traces: number;
  scored: number;
  avg_score: number | null;
  avg_latency_ms: number | null;
  p50_latency_ms: number | null;
  p95_latency_ms: number | null;
  avg_tool_calls: number | null;
  avg_session_graph_size: number | null;
  failing: number;
  /** Over scored traces only. */
  pass_rate: number | null;
  judge_models: Record<string, number>;
};

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function summarizeVersion(version_id: string, traces: LogRecord[]): VersionMetrics {
  const scores: number[] = [];
  const latencies: number[] = [];
  const toolCallCounts: number[] = [];
  const graphSizes: number[] = [];
  const judge_models: Record<string, number> = {};

  for (const trace of traces) {
    const score = toNumber(trace.eval_score);
    if (score !== null) scores.push(score);

    const latency = toNumber(trace.latency_ms);
    if (latency !== null) latencies.push(latency);

    if (Array.isArray(trace.tool_calls)) toolCallCounts.push(trace.tool_calls.length);

    const graph = trace.session_graph;
    if (typeof graph === "object" && graph !== null && !Array.isArray(graph)) {
      graphSizes.push(Object.keys(graph).length);
    }

    const model = trace.judge_model;
    if (typeof model === "string" && model) judge_models[model] = (judge_models[model] ?? 0) + 1;
  }

  const failing = scores.filter((s) => s < FAILING_SCORE_THRESHOLD).length;
  return {
    version_id,
    traces: traces.length,
    scored: scores.length,
    avg_score: mean(scores),
    avg_latency_ms: mean(latencies),
    p50_latency_ms: percentile(latencies, 50),
    p95_latency_ms: percentile(latencies, 95),
    avg_tool_calls: mean(toolCallCounts),
    avg_session_graph_size: mean(graphSizes),
    failing,
    pass_rate: scores.length > 0 ? (scores.length - failing) / scores.length : null,
    judge_models
  };
}

/** Group traces by version_id ("unknown" when absent), in order of first appearance. */
export function summarizeTraces(traces: LogRecord[]): VersionMetrics[] {
  const byVersion = new Map<string, LogRecord[]>();
  for (const trace of traces) {
    const version = typeof trace.version_id === "string" && trace.version_id ? trace.version_id : "unknown";
    const bucket = byVersion.get(version) ?? [];
    bucket.push(trace);
    byVersion.set(version, bucket);
  }
  return [...byVersion].map(([version, bucket]) => summarizeVersion(version, bucket));
}
