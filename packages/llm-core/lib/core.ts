/**
 * lib/core.ts - complete() orchestration
 *
 * Wires together service resolution, credential loading and provider
 * adapters into a single function call. One request per call: callers
 * that want retries wrap it themselves.
 *
 * Usage:
 *   import { complete } from "./core";
 *   const result = await complete({ prompt: "hello", service: "ollama", model: "llama3.2" });
 */

import type { AdapterRequest, CompleteOptions, CompleteResult } from "./types";
import { resolveService } from "./services";
import { loadApiKey } from "./config";
import { getAdapter } from "./providers/index";

export async function complete(
  options: CompleteOptions,
): Promise<CompleteResult> {
  const startTime = Date.now();

  // 1. Resolve service configuration
  const service = resolveService(options.service);

  // 2. Credential: explicit override, else the service's key_env
  const apiKey =
    options.apiKey !== undefined ? options.apiKey : loadApiKey(service);

  // 3. Get provider adapter
  const adapter = getAdapter(service.adapter);

  // 4. Build adapter request — caller model > service default_model
  const model = options.model || service.default_model || "";
  if (!model) {
    throw new Error(
      "Model name required: pass model in CompleteOptions or set default_model in services.toml",
    );
  }

  const adapterRequest: AdapterRequest = {
    baseUrl: service.base_url,
    apiKey,
    model,
    prompt: options.prompt,
    systemPrompt: options.systemPrompt,
    temperature: options.temperature,
    maxTokens: options.maxTokens,
  };

  // 5. Call provider
  const response = await adapter.complete(adapterRequest);

  // 6. Return normalized envelope
  return {
    text: response.text,
    model: response.model,
    provider: service.adapter,
    tokens: {
      input: response.tokensInput,
      output: response.tokensOutput,
    },
    finishReason: response.finishReason,
    durationMs: Date.now() - startTime,
  };
}
