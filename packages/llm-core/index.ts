/**
 * llm-core - Shared LLM transport layer
 *
 * Service-based routing to provider APIs with normalized envelope.
 * Pure functions, no process.exit, no stderr output in library.
 *
 * Usage:
 *   import { complete, resolveService } from "@code-judge/llm-core";
 */

export type {
  CompleteOptions,
  CompleteResult,
  FinishReason,
  ServiceConfig,
  ServiceMap,
  AdapterRequest,
  AdapterResponse,
  ProviderAdapter,
} from "./lib/types";

export {
  DEFAULT_SERVICES,
  loadServices,
  resolveService,
  listServices,
  servicesPath,
} from "./lib/services";

export { loadApiKey, MissingCredentialError } from "./lib/config";

export { getAdapter } from "./lib/providers/index";

export { complete } from "./lib/core";
