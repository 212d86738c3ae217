/**
 * lib/providers/openai.ts - OpenAI Chat Completions API adapter
 *
 * Converts AdapterRequest to OpenAI's /chat/completions endpoint format
 * and normalizes the response into AdapterResponse.
 */

import type { AdapterRequest, AdapterResponse, FinishReason } from "../types";
import { countOrZero, isRecord } from "./shape";

export async function complete(req: AdapterRequest): Promise<AdapterResponse> {
  const body = {
    model: req.model,
    messages: [
      ...(req.systemPrompt
        ? [{ role: "system", content: req.systemPrompt }]
        : []),
      { role: "user", content: req.prompt },
    ],
    ...(req.maxTokens ? { max_tokens: req.maxTokens } : {}),
    ...(req.temperature !== undefined ? { temperature: req.temperature } : {}),
  };

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };
  if (req.apiKey) {
    headers.Authorization = `Bearer ${req.apiKey}`;
  }

  const response = await fetch(`${req.baseUrl}/chat/completions`, {
    method: "POST",
    headers,
    body: JSON.stringify(body),
  });

  if (!response.ok) {
    const error = await response.text();
    throw new Error(`OpenAI API error (${response.status}): ${error}`);
  }

  const data: unknown = await response.json();
  const choices: unknown[] =
    isRecord(data) && Array.isArray(data.choices) ? data.choices : [];
  const choice = choices[0];
  const message = isRecord(choice) ? choice.message : undefined;
  if (!isRecord(data) || !isRecord(choice) || !isRecord(message)) {
    throw new Error("OpenAI API error: response has no choices");
  }

  // Map finish_reason to normalized finishReason
  let finishReason: FinishReason = "stop";
  if (choice.finish_reason === "length") {
    finishReason = "max_tokens";
  } else if (choice.finish_reason === "content_filter") {
    finishReason = "error";
  }

  const usage = isRecord(data.usage) ? data.usage : {};

  return {
    // verbatim extraction; a null content (refusal, tool call) becomes ""
    text: typeof message.content === "string" ? message.content : "",
    model: typeof data.model === "string" ? data.model : req.model,
    tokensInput: countOrZero(usage.prompt_tokens),
    tokensOutput: countOrZero(usage.completion_tokens),
    finishReason,
  };
}
