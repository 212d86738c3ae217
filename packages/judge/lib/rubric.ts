/**
 * lib/rubric.ts - Judge rubric loader
 *
 * The rubric is a Markdown agent file whose text becomes the system
 * prompt. An optional YAML front-matter block may name the rubric and
 * pick a model:
 *
 *   ---
 *   name: code-quality
 *   model: gpt-4o-mini
 *   ---
 *   You are a strict code reviewer...
 *
 * Front matter is removed from the prompt. Files without it are sent
 * as-is.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { load as loadYaml } from "js-yaml";
import { MissingRubricError } from "./errors";
import type { Rubric } from "./types";

const FRONT_MATTER = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;

function parseFrontMatter(
  text: string,
  path: string,
): { meta: Record<string, unknown>; body: string } {
  const match = text.match(FRONT_MATTER);
  if (!match) {
    return { meta: {}, body: text };
  }

  let raw: unknown;
  try {
    raw = loadYaml(match[1] ?? "");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid front matter in ${path}: ${message}`);
  }

  if (raw === undefined || raw === null) {
    return { meta: {}, body: text.slice(match[0].length) };
  }
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error(`Front matter in ${path} must be a YAML mapping`);
  }

  const entries: Array<[string, unknown]> = Object.entries(raw);
  return {
    meta: Object.fromEntries(entries),
    body: text.slice(match[0].length),
  };
}

/**
 * Load the rubric at path.
 *
 * @throws MissingRubricError when the file does not exist
 */
export async function loadRubric(path: string): Promise<Rubric> {
  if (!existsSync(path)) {
    throw new MissingRubricError(path);
  }

  const text = await readFile(path, "utf-8");
  const { meta, body } = parseFrontMatter(text, path);

  const rubric: Rubric = { path, prompt: body };
  if (typeof meta.name === "string" && meta.name.trim()) {
    rubric.name = meta.name.trim();
  }
  if (typeof meta.model === "string" && meta.model.trim()) {
    rubric.model = meta.model.trim();
  }
  return rubric;
}
