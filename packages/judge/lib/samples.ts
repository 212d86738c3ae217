/**
 * lib/samples.ts - Batch input loader
 *
 * Reads a JSON array of { id, code } cases. Entries without an id are
 * judged as "unknown"; entries without a string code reject the file.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { InvalidSamplesError, MissingSamplesError } from "./errors";
import type { EvaluationCase } from "./types";

export const UNKNOWN_CASE_ID = "unknown";

function toCase(entry: unknown, index: number, path: string): EvaluationCase {
  if (typeof entry !== "object" || entry === null || Array.isArray(entry)) {
    throw new InvalidSamplesError(path, `entry ${index} is not an object`);
  }

  const code = "code" in entry ? entry.code : undefined;
  if (typeof code !== "string") {
    throw new InvalidSamplesError(path, `entry ${index} has no string "code"`);
  }

  const id = "id" in entry ? entry.id : undefined;
  if (id === undefined || id === null) {
    return { id: UNKNOWN_CASE_ID, code };
  }
  if (typeof id !== "string" && typeof id !== "number") {
    throw new InvalidSamplesError(path, `entry ${index} has a non-string "id"`);
  }
  return { id: String(id), code };
}

/**
 * Load cases in file order.
 *
 * @throws MissingSamplesError when the file does not exist
 * @throws InvalidSamplesError when it is not a JSON array of cases
 */
export async function loadSamples(path: string): Promise<EvaluationCase[]> {
  if (!existsSync(path)) {
    throw new MissingSamplesError(path);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidSamplesError(path, message);
  }

  if (!Array.isArray(raw)) {
    throw new InvalidSamplesError(path, "expected a JSON array of cases");
  }

  return raw.map((entry, index) => toCase(entry, index, path));
}
