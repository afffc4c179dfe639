/**
 * LLM-judge scoring pack: one judge call per testcase on a fixed 1–5 scale.
 * Judge output is untrusted text. parseJudgeOutput always yields a score:
 * strict JSON → JSON inside a code fence → first standalone digit 1–5 → 0.
 */

import { z } from "zod";
import type { MetricResult, SubjectResponse, Testcase } from "@evalloop/shared";
import type { SubjectSpec } from "../subject/subjectSpec";
import type { JudgeClient } from "./judgeClient";
import { JUDGE_SCORE_METRIC, wantsMetric, type ScoringPack } from "./types";

export type JudgeParseStage = "json" | "fenced_json" | "digit" | "default";

export type ParsedJudgment = {
  score: number;
  rationale: string;
  stage: JudgeParseStage;
};

const JudgmentSchema = z.object({
  score: z.preprocess(
    (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v),
    z.number().min(1).max(5)
  ),
  rationale: z.string().optional(),
  reasoning: z.string().optional()
});

/** Drop a leading ``` / ```json line and a trailing ``` line, whichever are present. */
export function stripCodeFences(text: string): string {
  let lines = text.trim().split("\n");
  if (lines.length > 0 && lines[0].trim().startsWith("```")) lines = lines.slice(1);
  if (lines.length > 0 && lines[lines.length - 1].trim().startsWith("```")) lines = lines.slice(0, -1);
  return lines.join("\n").trim();
}

function tryParseJudgment(candidate: string, raw: string): Omit<ParsedJudgment, "stage"> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }
  const result = JudgmentSchema.safeParse(parsed);
  if (!result.success) return null;
  return {
    score: result.data.score,
    rationale: result.data.rationale ?? result.data.reasoning ?? raw
  };
}

export function parseJudgeOutput(raw: string): ParsedJudgment {
  const text = raw.trim();

  const direct = tryParseJudgment(text, text);
  if (direct) return { ...direct, stage: "json" };

  const unfenced = stripCodeFences(text);
  if (unfenced !== text) {
    const fenced = tryParseJudgment(unfenced, text);
    if (fenced) return { ...fenced, stage: "fenced_json" };
  }

  const digit = /\b([1-5])\b/.exec(text);
  if (digit) return { score: Number(digit[1]), rationale: text, stage: "digit" };

  return { score: 0, rationale: text, stage: "default" };
}

export function buildJudgePrompt(testcase: Testcase, answer: string, rubricId: string): string {
  return `You are an expert evaluator of assistant answers.

Rubric ID: ${rubricId}

GOLDEN TESTCASE:
- Judge question: ${testcase.judge_question}
- Expected behavior: ${testcase.expected_behavior}

MODEL ANSWER:
${answer.trim()}

Score the answer on a scale of 1 to 5, where:
1 = Very poor
2 = Weak
3 = Acceptable
4 = Good
5 = Excellent

Return ONLY a JSON object with:
- "score": number (1-5)
- "rationale": short explanation`;
}

export type JudgePackOptions = {
  client?: JudgeClient;
  /** Kill switch: the pack returns no judge metric at all. */
  disabled?: boolean;
};

export class JudgePack implements ScoringPack {
  readonly name = "llm_judge";

  constructor(private readonly options: JudgePackOptions) {}

  async evaluate(testcase: Testcase, response: SubjectResponse, spec: SubjectSpec): Promise<MetricResult[]> {
    if (!wantsMetric(spec, JUDGE_SCORE_METRIC)) return [];

    const { client, disabled } = this.options;
    if (disabled || !client) {
      console.log(
        `[judgePack] Skipping judge for testcase ${testcase.id} (${disabled ? "disabled" : "no judge client"})`
      );
      return [];
    }

    const rubricId = spec.evaluation.judge_rubric_id;
    const raw = await client.complete(buildJudgePrompt(testcase, response.answer, rubricId));
    const judgment = parseJudgeOutput(raw);
    if (judgment.stage !== "json") {
      console.error(`[judgePack] Judge output for testcase ${testcase.id} was not clean JSON; used ${judgment.stage} fallback`);
    }

    return [
      {
        name: JUDGE_SCORE_METRIC,
        value: judgment.score,
        details: {
          kind: "judge",
          rationale: judgment.rationale,
          model: client.model,
          rubric_id: rubricId,
          parse_stage: judgment.stage
        }
      }
    ];
  }
}
