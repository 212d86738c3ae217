/**
 * code-judge - LLM rubric judge for source files
 *
 * Sends each sample (or one GitHub file) to a model with the judge rubric
 * as system prompt, at temperature 0, and collects the JSON verdicts into
 * data/evaluation_report.json. Output that does not parse is kept under
 * data/debug/ for inspection.
 *
 * Usage:
 *   import { loadConfig, runEvaluation } from "@code-judge/judge";
 *   const summary = await runEvaluation(process.argv[2], { config: loadConfig() });
 */

export type {
  EvaluationCase,
  RawContentRequest,
  ContentRequest,
  ResolveResult,
  FetchResult,
  EvaluationObject,
  EvaluationResult,
  ParseResult,
  Rubric,
  RunMode,
  RunSummary,
} from "./lib/types";

export type { JudgeConfig, JudgePaths, LoadConfigOptions } from "./lib/config";
export {
  DEFAULT_PROJECT,
  PACKAGE_DIR,
  loadConfig,
  loadEnvFiles,
  resolvePaths,
} from "./lib/config";

export {
  InvalidSamplesError,
  MissingRubricError,
  MissingSamplesError,
} from "./lib/errors";

export {
  DEFAULT_API_BASE_URL,
  DEFAULT_FETCH_TIMEOUT_MS,
  buildContentRequest,
  fetchContent,
  fetchGitHubFile,
  resolveBlobUrl,
} from "./lib/github";

export { cleanResponse, parseEvaluation } from "./lib/normalize";
export { loadRubric } from "./lib/rubric";
export { UNKNOWN_CASE_ID, loadSamples } from "./lib/samples";
export { debugFileName, writeDebugArtifact, writeReport } from "./lib/report";

export type { JudgeModel, LlmJudgeOptions } from "./lib/model";
export { JUDGE_TEMPERATURE, LlmJudge } from "./lib/model";

export type { CaseOutcome, EvaluationDeps } from "./lib/eval";
export {
  GITHUB_CASE_ID,
  evaluateCases,
  isRemoteSource,
  runEvaluation,
} from "./lib/eval";
