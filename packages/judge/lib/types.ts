/**
 * lib/types.ts - All TypeScript types for the judge
 *
 * Evaluation inputs, remote content requests, results and run summaries.
 */

export interface EvaluationCase {
  id: string;
  code: string;
}

export interface RawContentRequest {
  owner: string;
  repo: string;
  branch: string;
  path: string;
}

export interface ContentRequest {
  url: string;
  headers: Record<string, string>;
}

export type ResolveResult =
  | { ok: true; request: RawContentRequest }
  | { ok: false; reason: string };

export type FetchResult =
  | { ok: true; content: string }
  | { ok: false; reason: string };

/** Parsed judge output. Shape is owned by the rubric, not checked here. */
export type EvaluationObject = Record<string, unknown>;

export type EvaluationResult = EvaluationObject & { input_id: string };

export type ParseResult =
  | { ok: true; value: EvaluationObject }
  | { ok: false; reason: string };

export interface Rubric {
  path: string;
  name?: string;
  model?: string;
  prompt: string; // system prompt sent to the judge
}

export type RunMode = "github" | "samples";

export interface RunSummary {
  mode: RunMode;
  reportPath: string | null; // null when the run aborted before writing
  evaluated: number;
  failed: string[]; // input ids whose output did not parse
  debugFiles: string[];
}
