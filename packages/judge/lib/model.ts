/**
 * lib/model.ts - Judge model seam
 *
 * The orchestrator only needs "rubric + code in, raw text out". LlmJudge
 * is the production implementation over llm-core; tests pass their own.
 */

import { complete } from "@code-judge/llm-core";

export interface JudgeModel {
  judge(rubric: string, code: string): Promise<string>;
}

/** Scoring must be repeatable across runs of the same input. */
export const JUDGE_TEMPERATURE = 0;

export interface LlmJudgeOptions {
  service?: string;
  model?: string;
  apiKey: string | null;
}

export class LlmJudge implements JudgeModel {
  constructor(private readonly options: LlmJudgeOptions) {}

  async judge(rubric: string, code: string): Promise<string> {
    const result = await complete({
      service: this.options.service,
      model: this.options.model,
      apiKey: this.options.apiKey,
      systemPrompt: rubric,
      prompt: code,
      temperature: JUDGE_TEMPERATURE,
    });
    return result.text;
  }
}
