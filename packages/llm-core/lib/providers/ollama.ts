/**
 * lib/providers/ollama.ts - Ollama Generate API adapter
 *
 * Converts AdapterRequest to Ollama's /api/generate endpoint format
 * and normalizes the response into AdapterResponse.
 *
 * Note: Uses /api/generate (prompt + system fields), NOT /api/chat.
 * The generate endpoint maps directly to AdapterRequest's
 * prompt/systemPrompt structure.
 */

import type { AdapterRequest, AdapterResponse, FinishReason } from "../types";
import { countOrZero, isRecord } from "./shape";

export async function complete(req: AdapterRequest): Promise<AdapterResponse> {
  const body = {
    model: req.model,
    prompt: req.prompt,
    stream: false,
    ...(req.systemPrompt ? { system: req.systemPrompt } : {}),
    options: {
      ...(req.temperature !== undefined ? { temperature: req.temperature } : {}),
      ...(req.maxTokens ? { num_predict: req.maxTokens } : {}),
    },
  };

  const response = await fetch(`${req.baseUrl}/api/generate`, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
  });

  if (!response.ok) {
    const error = await response.text();
    throw new Error(`Ollama API error (${response.status}): ${error}`);
  }

  const data: unknown = await response.json();
  if (!isRecord(data) || typeof data.response !== "string") {
    throw new Error("Ollama API error: response has no text");
  }

  let finishReason: FinishReason = "stop";
  if (data.done_reason === "length") {
    finishReason = "max_tokens";
  }

  return {
    text: data.response,
    model: typeof data.model === "string" ? data.model : req.model,
    // cached prompts come back without eval counts
    tokensInput: countOrZero(data.prompt_eval_count),
    tokensOutput: countOrZero(data.eval_count),
    finishReason,
  };
}
