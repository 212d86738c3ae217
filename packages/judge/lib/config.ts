/**
 * lib/config.ts - Run configuration
 *
 * Everything the judge reads from the environment is captured once into
 * a frozen JudgeConfig. Paths are anchored at the package directory, not
 * the working directory, unless a baseDir is injected.
 *
 * Environment:
 *   OPENAI_API_KEY   credential for the default service (required)
 *   LLM_PROJECT      project label for status output (default: ai-eval-pipeline)
 *   GITHUB_TOKEN     bearer token for the contents API (optional)
 *   GITHUB_API_URL   contents API base (default: https://api.github.com)
 *   JUDGE_SERVICE    llm-core service name (default: services.toml default)
 *   JUDGE_MODEL      model override
 */

import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadDotenv } from "dotenv";
import { loadApiKey, resolveService } from "@code-judge/llm-core";
import { DEFAULT_API_BASE_URL, DEFAULT_FETCH_TIMEOUT_MS } from "./github";

export const PACKAGE_DIR = resolve(
  dirname(fileURLToPath(import.meta.url)),
  "..",
);

export const DEFAULT_PROJECT = "ai-eval-pipeline";

export interface JudgePaths {
  rubric: string;
  samples: string;
  dataDir: string;
  report: string;
  debugDir: string;
}

export interface JudgeConfig {
  baseDir: string;
  paths: JudgePaths;
  project: string;
  service?: string;
  apiKey: string | null;
  model?: string;
  githubToken?: string;
  githubApiUrl: string;
  fetchTimeoutMs: number;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  baseDir?: string;
}

export function resolvePaths(baseDir: string): JudgePaths {
  const dataDir = join(baseDir, "data");
  return {
    rubric: join(baseDir, ".specify", "agents", "judge.agent.md"),
    samples: join(dataDir, "test_cases", "sample.json"),
    dataDir,
    report: join(dataDir, "evaluation_report.json"),
    debugDir: join(dataDir, "debug"),
  };
}

/**
 * Apply .env files to process.env: the package directory first, then the
 * working directory. Variables already set are never overwritten.
 *
 * @returns the files that were loaded
 */
export function loadEnvFiles(baseDir: string = PACKAGE_DIR): string[] {
  const candidates = [
    ...new Set([join(baseDir, ".env"), join(process.cwd(), ".env")]),
  ];
  const loaded: string[] = [];

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const result = loadDotenv({ path: candidate, override: false });
    if (result.error) {
      throw new Error(`Failed to load ${candidate}: ${result.error.message}`);
    }
    loaded.push(candidate);
  }

  return loaded;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the run configuration. Throws MissingCredentialError when the
 * selected service needs a key that is not set, before any other work.
 */
export function loadConfig(
  options: LoadConfigOptions = {},
): Readonly<JudgeConfig> {
  const env = options.env ?? process.env;
  const baseDir = options.baseDir ?? PACKAGE_DIR;

  const serviceName = optional(env.JUDGE_SERVICE);
  const apiKey = loadApiKey(resolveService(serviceName), env);

  const config: JudgeConfig = {
    baseDir,
    paths: resolvePaths(baseDir),
    project: optional(env.LLM_PROJECT) ?? DEFAULT_PROJECT,
    apiKey,
    githubApiUrl: optional(env.GITHUB_API_URL) ?? DEFAULT_API_BASE_URL,
    fetchTimeoutMs: DEFAULT_FETCH_TIMEOUT_MS,
  };

  // Optional fields are only present when set
  if (serviceName) config.service = serviceName;
  const model = optional(env.JUDGE_MODEL);
  if (model) config.model = model;
  const githubToken = optional(env.GITHUB_TOKEN);
  if (githubToken) config.githubToken = githubToken;

  Object.freeze(config.paths);
  return Object.freeze(config);
}
