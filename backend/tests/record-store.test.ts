import fs from "node:fs";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { JsonlRecordStore } from "../src/services/records/recordStore";
import { TraceStore } from "../src/services/records/traceStore";
import { makeTempDir, readLines } from "./helpers";

const ISO_UTC = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

describe("JsonlRecordStore", () => {
  test("append then load round-trips with id and timestamp", () => {
    const filePath = path.join(makeTempDir(), "nested", "log.jsonl");
    const store = new JsonlRecordStore(filePath, "trace_id");

    const id = store.append({ version_id: "v1", score: 4 });
    const records = store.load();

    expect(records).toHaveLength(1);
    expect(records[0].trace_id).toBe(id);
    expect(records[0].version_id).toBe("v1");
    expect(records[0].score).toBe(4);
    expect(String(records[0].timestamp)).toMatch(ISO_UTC);
    expect(readLines(filePath)).toHaveLength(1);
  });

  test("system fields win over caller fields", () => {
    const store = new JsonlRecordStore(path.join(makeTempDir(), "log.jsonl"), "memory_id");
    const id = store.append({ memory_id: "mine", timestamp: "yesterday" });
    const [record] = store.load();
    expect(record.memory_id).toBe(id);
    expect(record.timestamp).not.toBe("yesterday");
  });

  test("missing file loads as empty", () => {
    const store = new JsonlRecordStore(path.join(makeTempDir(), "absent.jsonl"), "trace_id");
    expect(store.load()).toEqual([]);
  });

  test("corrupt and blank lines", () => {
    const filePath = path.join(makeTempDir(), "log.jsonl");
    fs.writeFileSync(filePath, '{"trace_id":"a","n":1}\n\nnot json\n[1,2]\n{"trace_id":"b","n":2}\n', "utf8");
    const records = new JsonlRecordStore(filePath, "trace_id").load();

    expect(records).toEqual([
      { trace_id: "a", n: 1 },
      { _raw_line: "not json", error: "failed_to_parse_json" },
      { _raw_line: "[1,2]", error: "failed_to_parse_json" },
      { trace_id: "b", n: 2 }
    ]);
  });

  test("one bad line among two good ones gives three entries", () => {
    const filePath = path.join(makeTempDir(), "log.jsonl");
    fs.writeFileSync(filePath, '{"a":1}\n{broken\n{"a":2}\n', "utf8");
    expect(new JsonlRecordStore(filePath, "trace_id").load()).toHaveLength(3);
  });

  test("filters then keeps the last N", () => {
    const store = new JsonlRecordStore(path.join(makeTempDir(), "log.jsonl"), "trace_id");
    for (let i = 1; i <= 5; i++) store.append({ version_id: i % 2 === 0 ? "v2" : "v1", n: i });

    expect(store.load({ filters: { version_id: "v1" } }).map((r) => r.n)).toEqual([1, 3, 5]);
    expect(store.load({ filters: { version_id: "v1" }, limit: 2 }).map((r) => r.n)).toEqual([3, 5]);
    expect(store.load({ limit: 10 })).toHaveLength(5);
    expect(store.load({ limit: 0 })).toEqual([]);
    expect(store.load({ filters: { version_id: undefined } })).toHaveLength(5);
  });
});

describe("TraceStore", () => {
  test("normalizes tool_calls and session_graph", () => {
    const store = new TraceStore(path.join(makeTempDir(), "traces.jsonl"));
    store.append({ version_id: "v1", tool_calls: { name: "search" } });
    store.append({ version_id: "v1", tool_calls: [null, "raw", { name: "book" }], session_graph: "oops" });
    store.append({ version_id: "v1", session_graph: { nodes: 2 } });

    const records = store.load();
    expect(records.map((r) => r.tool_calls)).toEqual([[{ name: "search" }], [{ repr: "raw" }, { name: "book" }], []]);
    expect(records.map((r) => r.session_graph)).toEqual([{}, {}, { nodes: 2 }]);
  });
});
