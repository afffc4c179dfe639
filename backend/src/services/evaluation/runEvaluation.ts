/**
 * Run the golden set against one subject version and aggregate.
 * Testcases run sequentially: subject call, every scoring pack, then one trace line and one
 * eval_outcome memory per record. Missing or empty golden sets come back as an EvalRunError value.
 */

import path from "node:path";
import type {
  EvalRecord,
  EvalRunError,
  EvalRunResult,
  JsonValue,
  MetricResult,
  SubjectResponse,
  Testcase
} from "@evalloop/shared";
import { loadTestcases } from "../golden/goldenSet";
import type { MemoryStore } from "../records/memoryStore";
import type { TraceStore } from "../records/traceStore";
import type { SubjectClient } from "../subject/subjectClient";
import type { SubjectSpec } from "../subject/subjectSpec";
import { aggregateRecords } from "./aggregate";
import { JUDGE_SCORE_METRIC, type ScoringPack } from "./types";

export type EvalEngineDeps = {
  subject: SubjectClient;
  spec: SubjectSpec;
  packs: ScoringPack[];
  traceStore?: TraceStore;
  memoryStore?: MemoryStore;
  /** Overrides spec.evaluation.golden_path. */
  goldenPath?: string;
};

type LoadedGoldenSet = { goldenPath: string; testcases: Testcase[] };

export function isEvalRunError(result: EvalRunResult): result is EvalRunError {
  return "error" in result;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Request payload for the subject. String inputs are JSON-decoded ("" is {});
 * undecodable strings are logged and replaced by {}. Other values pass through.
 */
export function buildRequestPayload(testcase: Testcase): JsonValue {
  const { input } = testcase;
  if (typeof input !== "string") return input;
  const text = input.trim();
  if (!text) return {};
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (err) {
    console.error(`[evalEngine] Testcase ${testcase.id} input is not valid JSON; sending {}:`, errorMessage(err));
    return {};
  }
}

export class EvalEngine {
  constructor(private readonly deps: EvalEngineDeps) {}

  get spec(): SubjectSpec {
    return this.deps.spec;
  }

  async runFullEval(versionId?: string): Promise<EvalRunResult> {
    const { spec } = this.deps;
    const version = versionId ?? spec.version;

    const loaded = this.loadGoldenSet();
    if ("error" in loaded) {
      console.error(`[evalEngine] ${loaded.message}`);
      return loaded;
    }
    const { goldenPath, testcases } = loaded;
    console.log(`[evalEngine] Evaluating ${spec.subject_id}:${version} on ${testcases.length} testcases from ${goldenPath}`);

    const records: EvalRecord[] = [];
    for (const testcase of testcases) {
      const record = await this.evaluateTestcase(testcase, version);
      this.persist(record);
      records.push(record);
    }

    const aggregates = aggregateRecords(records);
    console.log(
      `[evalEngine] Finished ${spec.subject_id}:${version}: ${records.length} records, pass_rate=${aggregates.pass_rate ?? "n/a"}`
    );
    return {
      subject_id: spec.subject_id,
      version_id: version,
      golden_path: goldenPath,
      num_testcases: testcases.length,
      ...aggregates,
      records
    };
  }

  private loadGoldenSet(): LoadedGoldenSet | EvalRunError {
    const configured = this.deps.goldenPath ?? this.deps.spec.evaluation.golden_path;
    if (!configured) {
      return {
        error: "golden_set_missing",
        message: `No golden set configured for subject ${this.deps.spec.subject_id}`,
        context: { golden_path: null }
      };
    }

    const goldenPath = path.resolve(process.cwd(), configured);
    let testcases: Testcase[] | null;
    try {
      testcases = loadTestcases(goldenPath);
    } catch (err) {
      return {
        error: "golden_set_missing",
        message: `Golden set at ${goldenPath} could not be read: ${errorMessage(err)}`,
        context: { golden_path: goldenPath }
      };
    }

    if (testcases === null) {
      return {
        error: "golden_set_missing",
        message: `Golden set not found at ${goldenPath}`,
        context: { golden_path: goldenPath }
      };
    }
    if (testcases.length === 0) {
      return {
        error: "golden_set_empty",
        message: `Golden set at ${goldenPath} has no testcases with an id`,
        context: { golden_path: goldenPath }
      };
    }
    return { goldenPath, testcases };
  }

  private async callSubject(testcase: Testcase, version: string): Promise<SubjectResponse> {
    try {
      return await this.deps.subject.runQuery(buildRequestPayload(testcase), {
        testcase_id: testcase.id,
        version_id: version
      });
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[evalEngine] Subject call failed for testcase ${testcase.id}:`, message);
      return { answer: "", latency_ms: null, tool_calls: [], session_graph: {}, error: message };
    }
  }

  private async evaluateTestcase(testcase: Testcase, version: string): Promise<EvalRecord> {
    const { spec, packs } = this.deps;
    const response = await this.callSubject(testcase, version);

    const metrics: MetricResult[] = [];
    for (const pack of packs) {
      try {
        metrics.push(...(await pack.evaluate(testcase, response, spec)));
      } catch (err) {
        console.error(`[evalEngine] Scoring pack ${pack.name} failed for testcase ${testcase.id}:`, errorMessage(err));
      }
    }

    return {
      eval_id: `${spec.subject_id}:${version}:${testcase.id}`,
      subject_id: spec.subject_id,
      version_id: version,
      input: testcase,
      output: response.error === undefined ? { answer: response.answer } : { answer: response.answer, error: response.error },
      response_meta: {
        latency_ms: response.latency_ms,
        tool_calls: response.tool_calls,
        session_graph: response.session_graph
      },
      rule_metrics: metrics.filter((m) => m.details.kind === "rule"),
      judge_metrics: metrics.filter((m) => m.details.kind === "judge")
    };
  }

  /** Best effort: a failed write is logged and the run carries on. */
  private persist(record: EvalRecord): void {
    const { traceStore, memoryStore } = this.deps;

    if (memoryStore) {
      try {
        memoryStore.recordEvalOutcome(record);
      } catch (err) {
        console.error(`[evalEngine] Failed to record eval outcome ${record.eval_id}:`, errorMessage(err));
      }
    }

    if (traceStore) {
      const judge = record.judge_metrics.find((m) => m.name === JUDGE_SCORE_METRIC);
      try {
        traceStore.append({
          version_id: record.version_id,
          subject_id: record.subject_id,
          testcase_id: record.input.id,
          eval_id: record.eval_id,
          input: record.input.input,
          answer: record.output.answer,
          error: record.output.error ?? null,
          latency_ms: record.response_meta.latency_ms,
          tool_calls: record.response_meta.tool_calls,
          session_graph: record.response_meta.session_graph,
          eval_score: judge ? judge.value : null,
          eval_reasoning: judge ? judge.details.rationale ?? null : null,
          judge_model: judge ? judge.details.model ?? null : null
        });
      } catch (err) {
        console.error(`[evalEngine] Failed to write trace for ${record.eval_id}:`, errorMessage(err));
      }
    }
  }
}
