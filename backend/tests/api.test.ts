import fs from "node:fs";
import path from "node:path";
import jwt from "jsonwebtoken";
import request from "supertest";
import { describe, expect, test } from "vitest";
import { createApp } from "../src/app";
import { env } from "../src/config/env";
import type { AppContext } from "../src/context";
import { ChangesetEngine } from "../src/services/changeset/applyChangeset";
import { JudgePack } from "../src/services/evaluation/llmJudgeEvaluator";
import { RuleBasedPack } from "../src/services/evaluation/ruleBasedPack";
import { EvalEngine } from "../src/services/evaluation/runEvaluation";
import { MemoryStore } from "../src/services/records/memoryStore";
import { TraceStore } from "../src/services/records/traceStore";
import { buildSpec, FakeJudge, FakeSubject, GOLDEN_CSV, makeTempDir, writeFile } from "./helpers";

const adminToken = jwt.sign({ sub: "ops-admin", role: "OPS_ADMIN" }, env.JWT_SECRET);
const reviewerToken = jwt.sign({ sub: "ops-reviewer", role: "OPS_REVIEWER" }, env.JWT_SECRET);

function testContext(golden: string | null = GOLDEN_CSV, memoryFile = "memory.jsonl") {
  const dir = makeTempDir();
  const goldenPath = golden === null ? path.join(dir, "missing.csv") : writeFile(dir, "golden.csv", golden);
  const traceStore = new TraceStore(path.join(dir, "traces.jsonl"));
  const memoryStore = new MemoryStore(path.join(dir, memoryFile));
  const engine = new EvalEngine({
    subject: new FakeSubject([{ answer: "a plan", latency_ms: 10 }]),
    spec: buildSpec({}, { golden_path: goldenPath }),
    packs: [new RuleBasedPack(), new JudgePack({ client: new FakeJudge('{"score": 5, "rationale": "great"}') })],
    traceStore,
    memoryStore
  });
  const context: AppContext = {
    traceStore,
    memoryStore,
    changesetEngine: new ChangesetEngine({ memoryStore }),
    getEvalEngine: () => engine
  };
  return { dir, goldenPath, context };
}

describe("ops API auth", () => {
  test("GET /health is public", async () => {
    const res = await request(createApp(testContext().context)).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  test("401 without or with a bad token", async () => {
    const app = createApp(testContext().context);
    const missing = await request(app).get("/api/traces");
    expect(missing.status).toBe(401);
    expect(missing.body.error).toBe("Missing bearer token");

    const bad = await request(app).get("/api/traces").set("Authorization", "Bearer not-a-jwt");
    expect(bad.status).toBe(401);
    expect(bad.body.error).toBe("Invalid token");
  });

  test("reviewers cannot run evals", async () => {
    const res = await request(createApp(testContext().context))
      .post("/api/evals/run")
      .set("Authorization", `Bearer ${reviewerToken}`)
      .send({});
    expect(res.status).toBe(403);
  });

  test("unknown routes are 404", async () => {
    const res = await request(createApp(testContext().context)).get("/api/nope");
    expect(res.status).toBe(404);
    expect(res.body.error).toBe("Route not found");
  });
});

describe("evals, traces and memories", () => {
  test("run an eval then read back traces, summary and memories", async () => {
    const app = createApp(testContext().context);
    const auth = `Bearer ${adminToken}`;

    const run = await request(app).post("/api/evals/run").set("Authorization", auth).send({ version_id: "v3" });
    expect(run.status).toBe(200);
    expect(run.body.summary.version_id).toBe("v3");
    expect(run.body.summary.num_testcases).toBe(2);
    expect(run.body.summary.pass_rate).toBe(1);
    expect(run.body.summary.metrics).toEqual({ judge_score: { avg: 5, p95: 5, count: 2 } });
    expect(run.body.distilled).toEqual({
      subject_id: "trip_planner",
      version_id: "v3",
      records_seen: 2,
      best_practices_written: 2,
      failure_patterns_written: 0,
      write_failures: 0
    });

    const traces = await request(app).get("/api/traces").query({ version_id: "v3", limit: 1 }).set("Authorization", auth);
    expect(traces.status).toBe(200);
    expect(traces.body.traces).toHaveLength(1);
    expect(traces.body.traces[0].testcase_id).toBe("2");

    const summary = await request(app).get("/api/traces/summary").set("Authorization", `Bearer ${reviewerToken}`);
    expect(summary.status).toBe(200);
    expect(summary.body.versions).toHaveLength(1);
    expect(summary.body.versions[0]).toMatchObject({ version_id: "v3", traces: 2, avg_score: 5, failing: 0 });

    const best = await request(app).get("/api/memories").query({ type: "best_practice" }).set("Authorization", auth);
    expect(best.body.memories).toHaveLength(2);
    const outcomes = await request(app).get("/api/memories").query({ type: "eval_outcome", limit: 5 }).set("Authorization", auth);
    expect(outcomes.body.memories).toHaveLength(2);
  });

  test("record_memories=false skips distillation", async () => {
    const { context } = testContext();
    const res = await request(createApp(context))
      .post("/api/evals/run")
      .set("Authorization", `Bearer ${adminToken}`)
      .send({ record_memories: false });
    expect(res.status).toBe(200);
    expect(res.body.distilled).toBeNull();
    expect(context.memoryStore.loadMemories({ type: "best_practice" })).toEqual([]);
  });

  test("an unwritable memory log still returns the summary", async () => {
    const { dir, context } = testContext(GOLDEN_CSV, path.join("blocker", "memory.jsonl"));
    writeFile(dir, "blocker", "not a directory");

    const res = await request(createApp(context)).post("/api/evals/run").set("Authorization", `Bearer ${adminToken}`).send({});

    expect(res.status).toBe(200);
    expect(res.body.summary.num_testcases).toBe(2);
    expect(res.body.distilled).toMatchObject({ best_practices_written: 0, failure_patterns_written: 0, write_failures: 2 });
  });

  test("missing golden set is 422 with the structured error", async () => {
    const { context, goldenPath } = testContext(null);
    const res = await request(createApp(context)).post("/api/evals/run").set("Authorization", `Bearer ${adminToken}`).send({});
    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      error: "golden_set_missing",
      message: `Golden set not found at ${goldenPath}`,
      context: { golden_path: goldenPath }
    });
  });

  test("invalid memory type is 400", async () => {
    const res = await request(createApp(testContext().context))
      .get("/api/memories")
      .query({ type: "gossip" })
      .set("Authorization", `Bearer ${adminToken}`);
    expect(res.status).toBe(400);
  });
});

describe("POST /api/changesets/apply", () => {
  test("applies a legacy proposal", async () => {
    const { dir, goldenPath, context } = testContext();
    const base = writeFile(dir, "config_v1.json", JSON.stringify({ model: "m1" }));
    const newConfig = path.join(dir, "config_v2.json");

    const res = await request(createApp(context))
      .post("/api/changesets/apply")
      .set("Authorization", `Bearer ${adminToken}`)
      .send({
        base_config_path: base,
        new_config_path: newConfig,
        golden_csv_path: goldenPath,
        config_patch: { model: "m2" },
        new_tests: [{ input: "{}", judge_question: "q", expected_behavior: "e" }]
      });

    expect(res.status).toBe(200);
    expect(res.body.appended_ids).toEqual(["3"]);
    expect(JSON.parse(fs.readFileSync(newConfig, "utf8"))).toEqual({ model: "m2" });
    expect(context.memoryStore.loadMemories({ type: "config_change" })).toHaveLength(1);
  });

  test("schema violations are 400 with the error type", async () => {
    const { dir, goldenPath, context } = testContext();
    const base = writeFile(dir, "config_v1.json", "{}");
    const app = createApp(context);
    const auth = `Bearer ${adminToken}`;
    const paths = { base_config_path: base, new_config_path: path.join(dir, "v2.json"), golden_set_path: goldenPath };

    const badOp = await request(app)
      .post("/api/changesets/apply")
      .set("Authorization", auth)
      .send({ ...paths, config_patches: [{ path: "a", op: "remove", value: 1 }] });
    expect(badOp.status).toBe(400);
    expect(badOp.body.type).toBe("PatchSchemaError");

    const missing = await request(app)
      .post("/api/changesets/apply")
      .set("Authorization", auth)
      .send({ ...paths, new_testcases: [{ input: "x" }] });
    expect(missing.status).toBe(400);
    expect(missing.body.type).toBe("RequiredFieldMissingError");
    expect(fs.existsSync(paths.new_config_path)).toBe(false);
    expect(fs.readFileSync(goldenPath, "utf8")).toBe(GOLDEN_CSV);
  });
});
