import { normalizeSessionGraph, normalizeToolCalls } from "../subject/subjectClient";
import { JsonlRecordStore } from "./recordStore";

/** One line per evaluated testcase. tool_calls and session_graph are always present on disk. */
export class TraceStore extends JsonlRecordStore {
  constructor(filePath: string) {
    super(filePath, "trace_id");
  }

  protected override prepare(entry: Record<string, unknown>): Record<string, unknown> {
    return {
      ...entry,
      tool_calls: normalizeToolCalls(entry.tool_calls),
      session_graph: normalizeSessionGraph(entry.session_graph)
    };
  }
}
