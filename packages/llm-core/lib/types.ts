// Core API surface
export interface CompleteOptions {
  prompt: string;
  service?: string; // Named service from services.toml
  model?: string; // Model name
  systemPrompt?: string; // System instructions
  temperature?: number; // 0-1
  maxTokens?: number; // Max output tokens
  /** Credential override. When omitted, loaded from the service's key_env. */
  apiKey?: string | null;
}

export type FinishReason = "stop" | "max_tokens" | "error";

export interface CompleteResult {
  text: string; // Raw model output — no interpretation
  model: string; // Actual model that ran
  provider: string; // Which adapter handled it
  tokens: { input: number; output: number };
  finishReason: FinishReason;
  durationMs: number;
}

// Service configuration
export interface ServiceConfig {
  adapter: string;
  key_env?: string; // Environment variable holding the API key
  base_url: string;
  default_model?: string;
  key_required?: boolean; // Default true, false for ollama
}

export interface ServiceMap {
  default_service: string;
  services: Record<string, ServiceConfig>;
}

// Provider adapter interface
export interface AdapterRequest {
  baseUrl: string;
  apiKey: string | null;
  model: string;
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface AdapterResponse {
  text: string;
  model: string;
  tokensInput: number;
  tokensOutput: number;
  finishReason: FinishReason;
}

export interface ProviderAdapter {
  complete(request: AdapterRequest): Promise<AdapterResponse>;
}
