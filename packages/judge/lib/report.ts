/**
 * lib/report.ts - Report and debug artifact writers
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { EvaluationResult } from "./types";

/** Case ids end up in file names; keep them inside the debug directory. */
export function debugFileName(inputId: string): string {
  return `debug_${inputId.replace(/[/\\]/g, "_")}.txt`;
}

export async function writeDebugArtifact(
  debugDir: string,
  inputId: string,
  text: string,
): Promise<string> {
  await mkdir(debugDir, { recursive: true });
  const path = join(debugDir, debugFileName(inputId));
  await writeFile(path, text, "utf-8");
  return path;
}

/** Overwrites any previous report. An empty run still writes "[]". */
export async function writeReport(
  path: string,
  results: EvaluationResult[],
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(results, null, 2), "utf-8");
}
