/**
 * Wiring from environment to services. The eval engine is built on first use: it needs the
 * subject spec, SUBJECT_URL and (unless disabled) judge credentials, which read-only routes
 * and reports do not.
 */

import fs from "node:fs";
import path from "node:path";
import { env, type Env } from "./config/env";
import { ChangesetEngine } from "./services/changeset";
import { EvalEngine, JudgePack, OpenAIJudgeClient, RuleBasedPack } from "./services/evaluation";
import { MemoryStore } from "./services/records/memoryStore";
import { TraceStore } from "./services/records/traceStore";
import { HttpSubjectClient } from "./services/subject/subjectClient";
import { loadSubjectSpec } from "./services/subject/subjectSpec";

export type AppContext = {
  traceStore: TraceStore;
  memoryStore: MemoryStore;
  changesetEngine: ChangesetEngine;
  getEvalEngine: () => EvalEngine;
};

export function buildEvalEngine(
  config: Env,
  stores: { traceStore: TraceStore; memoryStore: MemoryStore }
): EvalEngine {
  const spec = loadSubjectSpec(config.SUBJECT_SPEC_PATH);
  const judgePack = config.DISABLE_LLM_JUDGE
    ? new JudgePack({ disabled: true })
    : new JudgePack({
        client: new OpenAIJudgeClient({
          apiKey: config.OPENAI_API_KEY,
          model: spec.evaluation.judge_model ?? config.OPENAI_MODEL
        })
      });

  return new EvalEngine({
    subject: new HttpSubjectClient({ url: config.SUBJECT_URL }),
    spec,
    packs: [new RuleBasedPack(), judgePack],
    traceStore: stores.traceStore,
    memoryStore: stores.memoryStore
  });
}

export function buildContext(config: Env = env): AppContext {
  const traceStore = new TraceStore(path.resolve(process.cwd(), config.TRACE_LOG_PATH));
  const memoryStore = new MemoryStore(path.resolve(process.cwd(), config.MEMORY_LOG_PATH));

  let engine: EvalEngine | null = null;
  return {
    traceStore,
    memoryStore,
    changesetEngine: new ChangesetEngine({
      memoryStore,
      getSubjectId: () => {
        const specPath = path.resolve(process.cwd(), config.SUBJECT_SPEC_PATH);
        return fs.existsSync(specPath) ? loadSubjectSpec(specPath).subject_id : undefined;
      }
    }),
    getEvalEngine: () => {
      if (!engine) engine = buildEvalEngine(config, { traceStore, memoryStore });
      return engine;
    }
  };
}
