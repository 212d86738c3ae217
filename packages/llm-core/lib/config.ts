/**
 * lib/config.ts - API key loading from the environment
 *
 * Each service names the environment variable that holds its key
 * (key_env in services.toml). Missing keys raise MissingCredentialError
 * with the variable name so the caller can tell the user what to set.
 *
 * Usage:
 *   import { loadApiKey } from "./config";
 *   const key = loadApiKey(service);
 */

import type { ServiceConfig } from "./types";

export class MissingCredentialError extends Error {
  readonly variable: string;

  constructor(variable: string) {
    super(
      `${variable} is not set. Export it or add it to a .env file before running.`,
    );
    this.name = "MissingCredentialError";
    this.variable = variable;
  }
}

/**
 * Load the API key for a service from process.env.
 *
 * Returns null if the service does not require a key (e.g., ollama).
 * Blank values count as missing.
 */
export function loadApiKey(
  service: ServiceConfig,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  if (service.key_required === false) {
    return null;
  }

  if (!service.key_env) {
    throw new Error(
      `Service requires an API key but no "key_env" field is configured. ` +
        `Add a "key_env" field naming the environment variable that holds it.`,
    );
  }

  const value = env[service.key_env]?.trim();
  if (!value) {
    throw new MissingCredentialError(service.key_env);
  }
  return value;
}
