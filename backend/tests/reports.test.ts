import { describe, expect, test } from "vitest";
import { summarizeTraces } from "../src/services/reports/metricsSummary";

describe("summarizeTraces", () => {
  test("groups by version and computes the report", () => {
    const report = summarizeTraces([
      { version_id: "v1", eval_score: 5, latency_ms: 100, tool_calls: [{}, {}], session_graph: { a: 1 }, judge_model: "j1" },
      { version_id: "v1", eval_score: "3", latency_ms: 300, tool_calls: [], session_graph: {}, judge_model: "j1" },
      { version_id: "v1", eval_score: null, latency_ms: 200, tool_calls: [] },
      { version_id: "v2", eval_score: 4 },
      { _raw_line: "oops", error: "failed_to_parse_json" }
    ]);

    expect(report.map((v) => v.version_id)).toEqual(["v1", "v2", "unknown"]);
    expect(report[0]).toEqual({
      version_id: "v1",
      traces: 3,
      scored: 2,
      avg_score: 4,
      avg_latency_ms: 200,
      p50_latency_ms: 200,
      p95_latency_ms: 200,
      avg_tool_calls: 2 / 3,
      avg_session_graph_size: 0.5,
      failing: 1,
      pass_rate: 0.5,
      judge_models: { j1: 2 }
    });
    expect(report[1]).toMatchObject({ scored: 1, failing: 0, pass_rate: 1, avg_latency_ms: null });
    expect(report[2]).toMatchObject({ traces: 1, scored: 0, pass_rate: null, avg_score: null });
  });
});
