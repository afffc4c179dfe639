/**
 * Contract for the system under evaluation. Subject-specific clients implement runQuery;
 * replies pass through normalizeSubjectResponse so every consumer sees the same shape.
 */

import { z } from "zod";
import type { JsonValue, SubjectResponse, ToolCall } from "@evalloop/shared";

export interface SubjectClient {
  runQuery(request: JsonValue, context?: Record<string, unknown>): Promise<SubjectResponse>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** A single object becomes a one-item list; nulls are dropped; non-objects are kept as their string form. */
export function normalizeToolCalls(value: unknown): ToolCall[] {
  if (value == null) return [];
  if (isPlainObject(value)) return [value];
  if (!Array.isArray(value)) return [{ repr: String(value) }];
  const calls: ToolCall[] = [];
  for (const call of value) {
    if (call == null) continue;
    calls.push(isPlainObject(call) ? call : { repr: String(call) });
  }
  return calls;
}

/** Empty or missing graphs become {}; graphs that cannot be serialized are kept as their string form. */
export function normalizeSessionGraph(value: unknown): Record<string, unknown> {
  if (!isPlainObject(value)) return {};
  try {
    JSON.stringify(value);
    return value;
  } catch {
    return { raw: String(value) };
  }
}

const SubjectReplySchema = z.object({
  answer: z.string().catch(""),
  latency_ms: z.number().finite().nullable().catch(null),
  tool_calls: z.unknown().transform(normalizeToolCalls),
  session_graph: z.unknown().transform(normalizeSessionGraph)
});

/**
 * Map whatever the subject returned onto SubjectResponse. A bare string is the answer;
 * anything unreadable becomes an empty answer. `measuredLatencyMs` fills in a missing latency.
 */
export function normalizeSubjectResponse(raw: unknown, measuredLatencyMs?: number): SubjectResponse {
  const reply = SubjectReplySchema.parse(isPlainObject(raw) ? raw : { answer: typeof raw === "string" ? raw : "" });
  return {
    answer: reply.answer,
    latency_ms: reply.latency_ms ?? measuredLatencyMs ?? null,
    tool_calls: reply.tool_calls,
    session_graph: reply.session_graph
  };
}

export type FetchFn = typeof fetch;

export type HttpSubjectClientOptions = {
  url: string | undefined;
  /** Tests inject a stub; production uses the global fetch. */
  fetchImpl?: FetchFn;
};

/**
 * Generic subject reachable over HTTP: POST {request, context} as JSON, reply with
 * {answer, latency_ms?, tool_calls?, session_graph?} or plain text.
 */
export class HttpSubjectClient implements SubjectClient {
  private readonly url: string;
  private readonly fetchImpl: FetchFn;

  constructor(options: HttpSubjectClientOptions) {
    if (!options.url) throw new Error("SUBJECT_URL is required to call the subject");
    this.url = options.url;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async runQuery(request: JsonValue, context?: Record<string, unknown>): Promise<SubjectResponse> {
    const start = Date.now();
    const res = await this.fetchImpl(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ request, context: context ?? {} })
    });
    const text = await res.text();
    const elapsed = Date.now() - start;
    if (!res.ok) {
      throw new Error(`Subject returned ${res.status}: ${text.slice(0, 200)}`);
    }
    let body: unknown;
    try {
      body = text ? JSON.parse(text) : {};
    } catch {
      body = text;
    }
    return normalizeSubjectResponse(body, elapsed);
  }
}
