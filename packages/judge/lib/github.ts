/**
 * lib/github.ts - GitHub blob URL resolution and raw content fetching
 *
 * Turns https://github.com/<owner>/<repo>/blob/<branch>/<path> into a
 * contents API request and fetches the file as raw text. Both steps
 * report failure as { ok: false, reason } instead of throwing.
 *
 * Usage:
 *   const result = await fetchGitHubFile(url, { token: config.githubToken });
 *   if (result.ok) judge(result.content);
 */

import type {
  ContentRequest,
  FetchResult,
  RawContentRequest,
  ResolveResult,
} from "./types";

const HOST_MARKER = "github.com";
const BLOB_MARKER = "/blob/";
const RAW_MEDIA_TYPE = "application/vnd.github.v3.raw";

export const DEFAULT_API_BASE_URL = "https://api.github.com";
export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;

export interface ContentRequestOptions {
  apiBaseUrl?: string;
  token?: string;
}

export interface FetchOptions {
  timeoutMs?: number;
}

function invalid(reason: string): ResolveResult {
  return { ok: false, reason: `Invalid GitHub URL: ${reason}` };
}

/**
 * Split a blob URL into owner, repo, branch and file path.
 *
 * Only the first two components before /blob/ are owner and repo; the
 * first component after it is the branch and the rest is the path, so a
 * branch containing "/" is read as a shorter branch plus a longer path.
 */
export function resolveBlobUrl(url: string): ResolveResult {
  if (!url.includes(HOST_MARKER) || !url.includes(BLOB_MARKER)) {
    return invalid("must be a blob URL (github.com/<owner>/<repo>/blob/...)");
  }

  // ?plain=1, #L10-L20 and the like are view options, not part of the path
  const bare = url.split(/[?#]/, 1)[0] ?? "";

  const parts = bare.split(BLOB_MARKER);
  if (parts.length !== 2) {
    return invalid(`expected exactly one "${BLOB_MARKER}" segment`);
  }
  const [base = "", tail = ""] = parts;

  const hostAt = base.indexOf(`${HOST_MARKER}/`);
  if (hostAt < 0) {
    return invalid(`no owner/repo after ${HOST_MARKER}`);
  }
  const [owner, repo] = base.slice(hostAt + HOST_MARKER.length + 1).split("/");
  if (!owner || !repo) {
    return invalid("missing owner or repository");
  }

  const [branch, ...fileParts] = tail.split("/");
  const path = fileParts.join("/");
  if (!branch || !path) {
    return invalid("missing branch or file path");
  }

  return { ok: true, request: { owner, repo, branch, path } };
}

/**
 * Build the contents API request for a resolved blob.
 * The raw media type makes the API return file bytes instead of JSON.
 */
export function buildContentRequest(
  raw: RawContentRequest,
  options: ContentRequestOptions = {},
): ContentRequest {
  const apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(
    /\/+$/,
    "",
  );

  const headers: Record<string, string> = { Accept: RAW_MEDIA_TYPE };
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }

  return {
    url: `${apiBaseUrl}/repos/${raw.owner}/${raw.repo}/contents/${raw.path}?ref=${raw.branch}`,
    headers,
  };
}

/**
 * Single GET with a timeout. Any failure, including non-2xx, comes back
 * as { ok: false } with a reason; nothing is retried.
 */
export async function fetchContent(
  request: ContentRequest,
  options: FetchOptions = {},
): Promise<FetchResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(request.url, {
      method: "GET",
      headers: request.headers,
      signal: controller.signal,
    });

    if (!response.ok) {
      return {
        ok: false,
        reason: `GitHub fetch error (${response.status}): ${response.statusText || "request failed"}`,
      };
    }

    return { ok: true, content: await response.text() };
  } catch (err) {
    if (controller.signal.aborted) {
      return { ok: false, reason: `GitHub fetch timed out after ${timeoutMs}ms` };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: `GitHub fetch error: ${message}` };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Resolve, build and fetch in one call.
 */
export async function fetchGitHubFile(
  url: string,
  options: ContentRequestOptions & FetchOptions = {},
): Promise<FetchResult> {
  const resolved = resolveBlobUrl(url);
  if (!resolved.ok) {
    return resolved;
  }
  return fetchContent(buildContentRequest(resolved.request, options), options);
}
