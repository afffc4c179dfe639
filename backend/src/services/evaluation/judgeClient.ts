/**
 * External judge used by JudgePack. Real OpenAI in production; tests pass a stub JudgeClient.
 */

import OpenAI from "openai";

export const DEFAULT_JUDGE_MODEL = "gpt-4o-mini";

export interface JudgeClient {
  readonly model: string;
  /** Raw judge text; parsing and fallbacks are the caller's job. */
  complete(prompt: string): Promise<string>;
}

export type OpenAIJudgeClientOptions = {
  apiKey: string | undefined;
  model?: string;
};

export class OpenAIJudgeClient implements JudgeClient {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIJudgeClientOptions) {
    if (!options.apiKey) throw new Error("OPENAI_API_KEY is required for LLM judge evaluation");
    this.client = new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_JUDGE_MODEL;
  }

  async complete(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature: 0,
      max_tokens: 500
    });
    return completion.choices[0]?.message?.content?.trim() ?? "";
  }
}
