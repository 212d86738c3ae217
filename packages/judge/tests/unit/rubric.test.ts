import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, describe, expect, test } from "vitest";
import { MissingRubricError } from "../../lib/errors";
import { loadRubric } from "../../lib/rubric";
import { PACKAGE_DIR, resolvePaths } from "../../lib/config";

const tempDir = mkdtempSync(join(tmpdir(), "judge-rubric-"));

function writeRubric(name: string, text: string): string {
  const path = join(tempDir, name);
  writeFileSync(path, text, "utf-8");
  return path;
}

afterAll(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe("loadRubric", () => {
  test("uses the whole file as prompt when there is no front matter", async () => {
    const path = writeRubric("plain.md", "Score the code 1-5.\nReturn JSON.\n");

    expect(await loadRubric(path)).toEqual({
      path,
      prompt: "Score the code 1-5.\nReturn JSON.\n",
    });
  });

  test("reads name and model from front matter and strips it", async () => {
    const path = writeRubric(
      "front.md",
      "---\nname: strict-judge\nmodel: gpt-4o\n---\nYou are a judge.\n",
    );

    expect(await loadRubric(path)).toEqual({
      path,
      name: "strict-judge",
      model: "gpt-4o",
      prompt: "You are a judge.\n",
    });
  });

  test("ignores non-string front matter fields", async () => {
    const path = writeRubric("typed.md", "---\nname: 42\n---\nBody");
    const rubric = await loadRubric(path);

    expect(rubric.name).toBeUndefined();
    expect(rubric.prompt).toBe("Body");
  });

  test("rejects front matter that is not a mapping", async () => {
    const path = writeRubric("list.md", "---\n- a\n- b\n---\nBody");

    await expect(loadRubric(path)).rejects.toThrow(
      `Front matter in ${path} must be a YAML mapping`,
    );
  });

  test("throws MissingRubricError with the path", async () => {
    const path = join(tempDir, "nonexistent.agent.md");

    await expect(loadRubric(path)).rejects.toThrow(MissingRubricError);
    await expect(loadRubric(path)).rejects.toThrow(`Missing judge file: ${path}`);
  });

  test("loads the bundled judge rubric", async () => {
    const rubric = await loadRubric(resolvePaths(PACKAGE_DIR).rubric);

    expect(rubric.name).toBe("code-quality-judge");
    expect(rubric.prompt.startsWith("You are a senior code reviewer")).toBe(true);
  });
});
