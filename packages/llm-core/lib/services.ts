/**
 * lib/services.ts - Service resolution from services.toml
 *
 * Loads service configuration and resolves named services to their config.
 * The file lives at $LLM_CORE_SERVICES, falling back to
 * ~/.config/llm-core/services.toml. When no file exists the built-in
 * defaults are used; nothing is written to disk.
 *
 * Usage:
 *   import { loadServices, resolveService, listServices } from "./services";
 *   const map = loadServices();
 *   const svc = resolveService("openai");
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseToml } from "smol-toml";
import type { ServiceConfig, ServiceMap } from "./types";

export const DEFAULT_SERVICES: ServiceMap = {
  default_service: "openai",
  services: {
    openai: {
      adapter: "openai",
      key_env: "OPENAI_API_KEY",
      base_url: "https://api.openai.com/v1",
      default_model: "gpt-4o-mini",
    },
    ollama: {
      adapter: "ollama",
      base_url: "http://localhost:11434",
      default_model: "llama3.2",
      key_required: false,
    },
  },
};

let cachedServices: { path: string; map: ServiceMap } | null = null;

/** Reset cached services — test use only. */
export function _resetServicesCache(): void {
  cachedServices = null;
}

export function servicesPath(): string {
  return (
    process.env.LLM_CORE_SERVICES ||
    join(homedir(), ".config", "llm-core", "services.toml")
  );
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseService(
  name: string,
  entry: unknown,
  path: string,
): ServiceConfig {
  if (!isTable(entry)) {
    throw new Error(
      `Invalid config: service "${name}" must be a table in ${path}`,
    );
  }
  if (typeof entry.adapter !== "string") {
    throw new Error(
      `Invalid config: service "${name}" missing "adapter" field in ${path}`,
    );
  }
  if (typeof entry.base_url !== "string") {
    throw new Error(
      `Invalid config: service "${name}" missing "base_url" field in ${path}`,
    );
  }

  const service: ServiceConfig = {
    adapter: entry.adapter,
    base_url: entry.base_url.replace(/\/+$/, ""),
  };
  if (typeof entry.key_env === "string") service.key_env = entry.key_env;
  if (typeof entry.default_model === "string") {
    service.default_model = entry.default_model;
  }
  if (typeof entry.key_required === "boolean") {
    service.key_required = entry.key_required;
  }
  return service;
}

/**
 * Load and parse services.toml. Falls back to DEFAULT_SERVICES when the
 * file does not exist. Caches the result per path.
 */
export function loadServices(): ServiceMap {
  const path = servicesPath();
  if (cachedServices && cachedServices.path === path) {
    return cachedServices.map;
  }

  if (!existsSync(path)) {
    cachedServices = { path, map: DEFAULT_SERVICES };
    return DEFAULT_SERVICES;
  }

  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read ${path}: ${message}`);
  }

  let parsed: Record<string, unknown>;
  try {
    parsed = parseToml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse ${path}: ${message}`);
  }

  if (typeof parsed.default_service !== "string") {
    throw new Error(
      `Invalid config: missing or non-string "default_service" in ${path}`,
    );
  }

  if (!isTable(parsed.services)) {
    throw new Error(
      `Invalid config: missing or invalid [services] section in ${path}`,
    );
  }

  const services: Record<string, ServiceConfig> = {};
  for (const [name, entry] of Object.entries(parsed.services)) {
    services[name] = parseService(name, entry, path);
  }

  if (!(parsed.default_service in services)) {
    const available = Object.keys(services).join(", ");
    throw new Error(
      `Invalid config: default_service "${parsed.default_service}" not found in [services]. Available: [${available}]`,
    );
  }

  const map: ServiceMap = {
    default_service: parsed.default_service,
    services,
  };
  cachedServices = { path, map };
  return map;
}

/**
 * Resolve a service by name. If name is undefined, returns the default service.
 */
export function resolveService(name?: string): ServiceConfig {
  const map = loadServices();
  const serviceName = name ?? map.default_service;

  const service = map.services[serviceName];
  if (!service) {
    const available = Object.keys(map.services).join(", ");
    throw new Error(
      `Unknown service: "${serviceName}". Available: [${available}]`,
    );
  }

  return service;
}

/**
 * List all configured service names.
 */
export function listServices(): string[] {
  const map = loadServices();
  return Object.keys(map.services);
}
