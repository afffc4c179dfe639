import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { JsonValue, SubjectResponse } from "@evalloop/shared";
import type { JudgeClient } from "../src/services/evaluation/judgeClient";
import type { SubjectClient } from "../src/services/subject/subjectClient";
import { SubjectSpecSchema, type SubjectSpec } from "../src/services/subject/subjectSpec";

/** Fresh directory under the OS temp dir; tests never touch the repo's data files. */
export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "evalloop-test-"));
}

export function writeFile(dir: string, name: string, content: string): string {
  const filePath = path.join(dir, name);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf8");
  return filePath;
}

export function readLines(filePath: string): string[] {
  return fs.readFileSync(filePath, "utf8").split("\n").filter((line) => line !== "");
}

export function buildSpec(overrides: Record<string, unknown> = {}, evaluation: Record<string, unknown> = {}): SubjectSpec {
  return SubjectSpecSchema.parse({
    subject_id: "trip_planner",
    version: "v1",
    ...overrides,
    evaluation
  });
}

export const GOLDEN_CSV = [
  "id,input,judge_question,expected_behavior",
  '1,"{""city"": ""Lisbon""}",Is it a plan?,A plan for Lisbon.',
  "2,,Is it polite?,A polite reply.",
  ""
].join("\n");

type Reply = Partial<SubjectResponse> | Error;

/** Subject stub: replies in order (last one repeats) and remembers every request. */
export class FakeSubject implements SubjectClient {
  readonly requests: JsonValue[] = [];

  constructor(private readonly replies: Reply[] = [{ answer: "ok" }]) {}

  async runQuery(request: JsonValue): Promise<SubjectResponse> {
    this.requests.push(request);
    const reply = this.replies[Math.min(this.requests.length - 1, this.replies.length - 1)];
    if (reply instanceof Error) throw reply;
    return {
      answer: reply.answer ?? "",
      latency_ms: reply.latency_ms ?? null,
      tool_calls: reply.tool_calls ?? [],
      session_graph: reply.session_graph ?? {}
    };
  }
}

export class FakeJudge implements JudgeClient {
  readonly model = "fake-judge";
  readonly prompts: string[] = [];

  constructor(private readonly output: string) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.output;
  }
}
