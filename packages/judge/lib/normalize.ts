/**
 * lib/normalize.ts - Model output cleanup and parsing
 *
 * cleanResponse() turns free-form judge output into JSON text by removing
 * a surrounding Markdown fence and a leading "json" tag. It does not check
 * that the result is JSON; parseEvaluation() does that.
 */

import type { ParseResult } from "./types";

const FENCE = "```";

/**
 * Strip formatting artifacts from a model response.
 *
 * 1. trim
 * 2. if fenced at both ends, drop the first and last line and re-trim
 * 3. drop a leading "json" tag (any case) and re-trim
 *
 * A fence opened and closed on a single line leaves nothing behind: the
 * only line is both the first and the last.
 */
export function cleanResponse(raw: string): string {
  let cleaned = raw.trim();

  if (cleaned.startsWith(FENCE) && cleaned.endsWith(FENCE)) {
    const lines = cleaned.split(/\r\n|\r|\n/);
    cleaned = lines.slice(1, -1).join("\n").trim();
  }

  if (cleaned.toLowerCase().startsWith("json")) {
    cleaned = cleaned.slice(4).trim();
  }

  return cleaned;
}

/**
 * Parse cleaned output. Only a JSON object counts as an evaluation:
 * arrays, primitives and null are rejected along with invalid JSON.
 */
export function parseEvaluation(cleaned: string): ParseResult {
  let value: unknown;
  try {
    value = JSON.parse(cleaned);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, reason };
  }

  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    const kind =
      value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
    return { ok: false, reason: `expected a JSON object, got ${kind}` };
  }

  const entries: Array<[string, unknown]> = Object.entries(value);
  return { ok: true, value: Object.fromEntries(entries) };
}
