import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  buildContentRequest,
  fetchContent,
  fetchGitHubFile,
  resolveBlobUrl,
} from "../../lib/github";

describe("resolveBlobUrl", () => {
  test("splits owner, repo, branch and nested path", () => {
    expect(
      resolveBlobUrl("https://github.com/acme/widgets/blob/main/src/lib/util.py"),
    ).toEqual({
      ok: true,
      request: {
        owner: "acme",
        repo: "widgets",
        branch: "main",
        path: "src/lib/util.py",
      },
    });
  });

  test("reads only the first segment after /blob/ as branch", () => {
    const result = resolveBlobUrl(
      "https://github.com/acme/widgets/blob/feature/login/app.ts",
    );
    expect(result).toEqual({
      ok: true,
      request: {
        owner: "acme",
        repo: "widgets",
        branch: "feature",
        path: "login/app.ts",
      },
    });
  });

  test("ignores query strings and line anchors", () => {
    const result = resolveBlobUrl(
      "https://github.com/acme/widgets/blob/v1.2.0/README.md?plain=1#L10-L20",
    );
    expect(result.ok && result.request.path).toBe("README.md");
  });

  test.each([
    ["no host marker", "https://gitlab.com/acme/widgets/blob/main/a.py"],
    ["no blob segment", "https://github.com/acme/widgets/tree/main/src"],
    ["missing repo", "https://github.com/acme/blob/main/a.py"],
    ["missing path", "https://github.com/acme/widgets/blob/main"],
    ["two blob segments", "https://github.com/acme/widgets/blob/main/blob/x.py"],
    ["not a URL", "hello"],
  ])("rejects %s without throwing", (_label, url) => {
    const result = resolveBlobUrl(url);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.reason).toMatch(/^Invalid GitHub URL: /);
  });
});

describe("buildContentRequest", () => {
  const raw = {
    owner: "acme",
    repo: "widgets",
    branch: "main",
    path: "src/util.py",
  };

  test("points at contents/<path>?ref=<branch> with the raw media type", () => {
    expect(buildContentRequest(raw)).toEqual({
      url: "https://api.github.com/repos/acme/widgets/contents/src/util.py?ref=main",
      headers: { Accept: "application/vnd.github.v3.raw" },
    });
  });

  test("adds a bearer token and honors a custom API base", () => {
    expect(
      buildContentRequest(raw, {
        apiBaseUrl: "https://ghe.example.com/api/v3/",
        token: "test-token",
      }),
    ).toEqual({
      url: "https://ghe.example.com/api/v3/repos/acme/widgets/contents/src/util.py?ref=main",
      headers: {
        Accept: "application/vnd.github.v3.raw",
        Authorization: "Bearer test-token",
      },
    });
  });
});

describe("fetchContent", () => {
  let originalFetch: typeof globalThis.fetch;
  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });
  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  const request = {
    url: "https://api.github.com/repos/acme/widgets/contents/a.py?ref=main",
    headers: { Accept: "application/vnd.github.v3.raw" },
  };

  test("returns the body verbatim on success", async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response("x = 1\n\n", { status: 200 }),
    );
    globalThis.fetch = fetchMock;

    expect(await fetchContent(request)).toEqual({ ok: true, content: "x = 1\n\n" });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(request.url);
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual(request.headers);
  });

  test("reports non-2xx status as failure", async () => {
    globalThis.fetch = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response("Not Found", { status: 404, statusText: "Not Found" }),
    );

    expect(await fetchContent(request)).toEqual({
      ok: false,
      reason: "GitHub fetch error (404): Not Found",
    });
  });

  test("reports transport errors as failure", async () => {
    globalThis.fetch = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
        throw new TypeError("fetch failed");
      },
    );

    expect(await fetchContent(request)).toEqual({
      ok: false,
      reason: "GitHub fetch error: fetch failed",
    });
  });

  test("aborts after the timeout", async () => {
    globalThis.fetch = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () =>
            reject(new Error("This operation was aborted")),
          );
        }),
    );

    expect(await fetchContent(request, { timeoutMs: 10 })).toEqual({
      ok: false,
      reason: "GitHub fetch timed out after 10ms",
    });
  });
});

describe("fetchGitHubFile", () => {
  let originalFetch: typeof globalThis.fetch;
  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });
  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  test("returns the resolver failure without calling fetch", async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response("", { status: 200 }),
    );
    globalThis.fetch = fetchMock;

    const result = await fetchGitHubFile("https://github.com/acme/widgets");

    expect(result.ok).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  test("fetches the resolved contents URL with the token", async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response("print('hi')", { status: 200 }),
    );
    globalThis.fetch = fetchMock;

    const result = await fetchGitHubFile(
      "https://github.com/acme/widgets/blob/dev/tools/run.py",
      { token: "test-token" },
    );

    expect(result).toEqual({ ok: true, content: "print('hi')" });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(
      "https://api.github.com/repos/acme/widgets/contents/tools/run.py?ref=dev",
    );
    expect(init?.headers).toEqual({
      Accept: "application/vnd.github.v3.raw",
      Authorization: "Bearer test-token",
    });
  });
});
