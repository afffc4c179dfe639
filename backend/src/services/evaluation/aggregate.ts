/**
 * Per-run aggregation over EvalRecords. Percentiles use nearest rank on the sorted values:
 * sorted[floor(p/100 * (n - 1))], so p95 of [1..10] is 9.
 */

import type { EvalRecord, MetricAggregate } from "@evalloop/shared";
import { TASK_SUCCESS_METRIC } from "./types";

export function percentile(values: number[], p: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.floor((p / 100) * (sorted.length - 1));
  return sorted[Math.min(Math.max(rank, 0), sorted.length - 1)];
}

export function p95(values: number[]): number | null {
  return percentile(values, 95);
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export type RecordAggregates = {
  metrics: Record<string, MetricAggregate>;
  latency_ms: { avg: number; p95: number } | null;
  pass_rate: number | null;
};

export function aggregateRecords(records: EvalRecord[]): RecordAggregates {
  const numeric = new Map<string, number[]>();
  const latencies: number[] = [];
  let successTotal = 0;
  let successCount = 0;

  for (const record of records) {
    for (const metric of [...record.rule_metrics, ...record.judge_metrics]) {
      if (metric.name === TASK_SUCCESS_METRIC && typeof metric.value === "boolean") {
        successTotal++;
        if (metric.value) successCount++;
        continue;
      }
      if (!isNumber(metric.value)) continue;
      const bucket = numeric.get(metric.name) ?? [];
      bucket.push(metric.value);
      numeric.set(metric.name, bucket);
    }
    if (isNumber(record.response_meta.latency_ms)) latencies.push(record.response_meta.latency_ms);
  }

  const metrics: Record<string, MetricAggregate> = {};
  for (const [name, values] of numeric) {
    metrics[name] = { avg: mean(values) ?? 0, p95: p95(values) ?? 0, count: values.length };
  }

  const latencyAvg = mean(latencies);
  const latencyP95 = p95(latencies);
  const latency_ms = latencyAvg != null && latencyP95 != null ? { avg: latencyAvg, p95: latencyP95 } : null;

  return {
    metrics,
    latency_ms,
    pass_rate: successTotal > 0 ? successCount / successTotal : null
  };
}
