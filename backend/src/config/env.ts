import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({
  path: path.resolve(process.cwd(), ".env")
});

const TRUTHY = ["1", "true", "yes", "on"];

const flag = z
  .string()
  .optional()
  .transform((value) => TRUTHY.includes((value ?? "").trim().toLowerCase()));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(4000),
  JWT_SECRET: z.string().min(1),
  /** Subject spec JSON (subject_id, version, evaluation settings). */
  SUBJECT_SPEC_PATH: z.string().min(1).default("specs/subject.json"),
  /** HTTP endpoint of the subject under test. Required only by commands that call the subject. */
  SUBJECT_URL: z.string().url().optional(),
  TRACE_LOG_PATH: z.string().min(1).default("data/traces.jsonl"),
  MEMORY_LOG_PATH: z.string().min(1).default("data/memory/bank.jsonl"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().optional(),
  /** Kill switch for judge metrics. */
  DISABLE_LLM_JUDGE: flag
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issueText = parsed.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new Error(`Invalid environment variables: ${issueText}`);
}

export const env: Env = parsed.data;
