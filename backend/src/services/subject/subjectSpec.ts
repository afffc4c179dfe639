import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export const SubjectSpecSchema = z.object({
  subject_id: z.string().min(1),
  name: z.string().optional(),
  version: z.string().min(1).default("v1"),
  description: z.string().default(""),
  /** Base config the changeset planner patches for the next version. */
  config_file: z.string().optional(),
  evaluation: z
    .object({
      /** Omitted = compute every metric; [] = compute none. */
      metrics: z.array(z.string()).optional(),
      golden_path: z.string().optional(),
      judge_model: z.string().optional(),
      judge_rubric_id: z.string().default("default_v1")
    })
    .default({})
});

export type SubjectSpec = z.infer<typeof SubjectSpecSchema>;

const specCache = new Map<string, SubjectSpec>();

/**
 * Load a subject spec from a JSON file. Relative paths resolve against the working directory.
 * Caches after first load.
 */
export function loadSubjectSpec(specPath: string): SubjectSpec {
  const filePath = path.resolve(process.cwd(), specPath);
  const cached = specCache.get(filePath);
  if (cached) return cached;

  if (!fs.existsSync(filePath)) {
    throw new Error(`Subject spec not found at ${filePath}`);
  }
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const result = SubjectSpecSchema.safeParse(raw);
  if (!result.success) {
    const issueText = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid subject spec ${filePath}: ${issueText}`);
  }
  specCache.set(filePath, result.data);
  return result.data;
}
