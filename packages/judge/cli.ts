#!/usr/bin/env tsx
/**
 * code-judge CLI - Thin wrapper around runEvaluation()
 *
 * Usage:
 *   code-judge                                             judge data/test_cases/sample.json
 *   code-judge https://github.com/<owner>/<repo>/blob/<branch>/<path>
 *
 * Output: JSON run summary to stdout, progress to stderr
 * Exit codes: 0 = report written, 1 = remote fetch failed (no report),
 *             2 = error
 */

import { MissingCredentialError } from "@code-judge/llm-core";
import {
  InvalidSamplesError,
  MissingRubricError,
  MissingSamplesError,
  loadConfig,
  loadEnvFiles,
  runEvaluation,
} from "./index";

function isInputError(err: unknown): boolean {
  return (
    err instanceof MissingCredentialError ||
    err instanceof MissingRubricError ||
    err instanceof MissingSamplesError ||
    err instanceof InvalidSamplesError
  );
}

async function main(): Promise<void> {
  // Anything that is not a URL falls through to the samples run
  const source = process.argv[2];

  try {
    loadEnvFiles();
    const config = loadConfig();

    const summary = await runEvaluation(source, {
      config,
      log: (message) => process.stderr.write(`${message}\n`),
    });

    console.log(JSON.stringify(summary, null, 2));
    process.exit(summary.reportPath ? 0 : 1);
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    console.log(JSON.stringify({ error }, null, 2));
    process.stderr.write(`Error: ${error}\n`);
    if (!isInputError(err) && err instanceof Error && err.stack) {
      process.stderr.write(`${err.stack}\n`);
    }
    process.exit(2);
  }
}

void main();
