/**
 * lib/eval.ts - Main evaluation orchestrator
 *
 * Coordinates a judge run: load rubric, pick the input (one GitHub file
 * or the local samples), ask the model once per case, parse, write the
 * report. Single entry point for callers.
 */

import type { JudgeConfig } from "./config";
import { fetchGitHubFile } from "./github";
import { LlmJudge, type JudgeModel } from "./model";
import { cleanResponse, parseEvaluation } from "./normalize";
import { writeDebugArtifact, writeReport } from "./report";
import { loadRubric } from "./rubric";
import { loadSamples } from "./samples";
import type {
  EvaluationCase,
  EvaluationResult,
  RunMode,
  RunSummary,
} from "./types";

export const GITHUB_CASE_ID = "github_audit";

export interface EvaluationDeps {
  config: Readonly<JudgeConfig>;
  /** Defaults to an LlmJudge built from config and rubric. */
  model?: JudgeModel;
  log?: (message: string) => void;
}

export interface CaseOutcome {
  results: EvaluationResult[];
  failed: string[];
  debugFiles: string[];
}

export function isRemoteSource(source: string | undefined): source is string {
  return source !== undefined && source.startsWith("http");
}

/**
 * Judge cases one at a time, in order. Unparseable output is saved to a
 * debug file and the loop moves on; model errors propagate.
 */
export async function evaluateCases(
  cases: EvaluationCase[],
  rubricPrompt: string,
  model: JudgeModel,
  debugDir: string,
  log: (message: string) => void = () => {},
): Promise<CaseOutcome> {
  const outcome: CaseOutcome = { results: [], failed: [], debugFiles: [] };

  for (const testCase of cases) {
    const inputId = testCase.id;
    log(`Judging: ${inputId}`);

    const raw = await model.judge(rubricPrompt, testCase.code);
    const cleaned = cleanResponse(raw);
    const parsed = parseEvaluation(cleaned);

    if (parsed.ok) {
      outcome.results.push({ ...parsed.value, input_id: inputId });
      continue;
    }

    const debugFile = await writeDebugArtifact(debugDir, inputId, cleaned);
    outcome.failed.push(inputId);
    outcome.debugFiles.push(debugFile);
    log(
      `JSON parse failed for ${inputId} (${parsed.reason}). Saved to ${debugFile}`,
    );
  }

  return outcome;
}

/**
 * Run one evaluation.
 *
 * @param source - GitHub blob URL for a remote audit; anything else (or
 *   nothing) judges the local samples
 * @returns summary; reportPath is null when a remote fetch aborted the run
 * @throws MissingRubricError, MissingSamplesError, InvalidSamplesError,
 *   and whatever the model raises
 */
export async function runEvaluation(
  source: string | undefined,
  deps: EvaluationDeps,
): Promise<RunSummary> {
  const { config } = deps;
  const log = deps.log ?? (() => {});
  const { paths } = config;

  // 1. Rubric first: nothing else happens without it
  const rubric = await loadRubric(paths.rubric);
  log(`Project: ${config.project}`);

  // 2. Input selection
  let mode: RunMode;
  let cases: EvaluationCase[];

  if (isRemoteSource(source)) {
    mode = "github";
    log(`Mode: GitHub audit -> ${source}`);
    const fetched = await fetchGitHubFile(source, {
      apiBaseUrl: config.githubApiUrl,
      token: config.githubToken,
      timeoutMs: config.fetchTimeoutMs,
    });

    if (!fetched.ok) {
      log(`Failed to fetch code from GitHub: ${fetched.reason}`);
      return {
        mode,
        reportPath: null,
        evaluated: 0,
        failed: [],
        debugFiles: [],
      };
    }

    cases = [{ id: GITHUB_CASE_ID, code: fetched.content }];
  } else {
    mode = "samples";
    log(`Mode: samples -> ${paths.samples}`);
    cases = await loadSamples(paths.samples);
  }

  // 3. One model per run
  const model =
    deps.model ??
    new LlmJudge({
      service: config.service,
      model: config.model ?? rubric.model,
      apiKey: config.apiKey,
    });

  // 4. Judge
  const outcome = await evaluateCases(
    cases,
    rubric.prompt,
    model,
    paths.debugDir,
    log,
  );

  // 5. Report, exactly once
  await writeReport(paths.report, outcome.results);
  log(`Evaluation complete. Report saved to ${paths.report}`);

  return {
    mode,
    reportPath: paths.report,
    evaluated: outcome.results.length,
    failed: outcome.failed,
    debugFiles: outcome.debugFiles,
  };
}
