import path from "node:path";
import { describe, expect, test } from "vitest";
import { env } from "../src/config/env";
import { buildContext } from "../src/context";
import { makeTempDir, writeFile } from "./helpers";

function contextIn(dir: string, specPath: string) {
  return buildContext({
    ...env,
    SUBJECT_SPEC_PATH: specPath,
    TRACE_LOG_PATH: path.join(dir, "traces.jsonl"),
    MEMORY_LOG_PATH: path.join(dir, "memory", "bank.jsonl")
  });
}

describe("buildContext", () => {
  test("config_change memories carry the subject id", () => {
    const dir = makeTempDir();
    const specPath = writeFile(dir, "subject.json", JSON.stringify({ subject_id: "context_subject" }));
    const context = contextIn(dir, specPath);

    context.changesetEngine.apply({
      base_config_path: writeFile(dir, "config_v1.json", "{}"),
      new_config_path: path.join(dir, "config_v2.json"),
      golden_set_path: path.join(dir, "golden.csv"),
      config_patches: [{ path: "model", op: "set", value: "m2" }],
      new_testcases: []
    });

    const changes = context.memoryStore.loadMemories({ type: "config_change", subject_id: "context_subject" });
    expect(changes).toHaveLength(1);
  });

  test("without a subject spec the change is still recorded", () => {
    const dir = makeTempDir();
    const context = contextIn(dir, path.join(dir, "absent.json"));

    context.changesetEngine.apply({
      base_config_path: writeFile(dir, "config_v1.json", "{}"),
      new_config_path: path.join(dir, "config_v2.json"),
      golden_set_path: path.join(dir, "golden.csv"),
      config_patches: [],
      new_testcases: []
    });

    const [change] = context.memoryStore.loadMemories({ type: "config_change" });
    expect(change.subject_id).toBeUndefined();
  });
});
