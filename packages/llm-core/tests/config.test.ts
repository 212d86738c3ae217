/**
 * tests/config.test.ts
 *
 * Tests for loadApiKey() — the credential loading layer.
 *
 * loadApiKey() takes an explicit env object, so no process.env mutation
 * is needed.
 */

import { describe, expect, it } from "vitest";
import { MissingCredentialError, loadApiKey } from "../lib/config";
import type { ServiceConfig } from "../lib/types";

const OPENAI: ServiceConfig = {
  adapter: "openai",
  key_env: "OPENAI_API_KEY",
  base_url: "https://api.openai.com/v1",
};

describe("loadApiKey()", () => {
  it("returns null when key_required is false (ollama pattern)", () => {
    const service: ServiceConfig = {
      adapter: "ollama",
      base_url: "http://localhost:11434",
      key_required: false,
    };

    expect(loadApiKey(service, {})).toBeNull();
  });

  it("returns the trimmed value of the key_env variable", () => {
    expect(loadApiKey(OPENAI, { OPENAI_API_KEY: "  test-secret\n" })).toBe(
      "test-secret",
    );
  });

  it("throws MissingCredentialError naming the variable when unset", () => {
    let caught: unknown;
    try {
      loadApiKey(OPENAI, {});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(MissingCredentialError);
    expect(caught).toMatchObject({ variable: "OPENAI_API_KEY" });
    expect(String(caught)).toContain("OPENAI_API_KEY is not set");
  });

  it("treats a blank value as missing", () => {
    expect(() => loadApiKey(OPENAI, { OPENAI_API_KEY: "   " })).toThrow(
      MissingCredentialError,
    );
  });

  it("throws with clear message when key_env is missing but required", () => {
    const service: ServiceConfig = {
      adapter: "openai",
      base_url: "https://api.openai.com/v1",
    };

    expect(() => loadApiKey(service, {})).toThrow(
      'Service requires an API key but no "key_env" field is configured',
    );
  });
});
