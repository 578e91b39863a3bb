import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { readInputText, readPromptLines, resolvePromptInput, resolveRubric } from "../task-input";

function makeTty() {
  return Object.assign(Readable.from([]), { isTTY: true });
}

describe("task input", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "task-input-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("resolvePromptInput", () => {
    it("uses literal text", async () => {
      expect(await resolvePromptInput("  Explain tides  ")).toEqual({
        text: "Explain tides",
        source: "cli",
      });
    });

    it("reads a markdown file", async () => {
      const path = join(dir, "request.md");
      await writeFile(path, "# Task\nExplain tides\n");

      expect(await resolvePromptInput(path)).toEqual({
        text: "# Task\nExplain tides",
        source: "file",
        filePath: path,
      });
    });

    it("reads the first prompt field of a JSON file", async () => {
      const path = join(dir, "request.json");
      await writeFile(path, JSON.stringify({ prompt: " ", task: "Explain tides" }));

      const result = await resolvePromptInput(path);

      expect(result.text).toBe("Explain tides");
    });

    it("treats a missing file name as literal text", async () => {
      const result = await resolvePromptInput(join(dir, "missing.md"));
      expect(result.source).toBe("cli");
    });

    it("reads piped stdin", async () => {
      const result = await resolvePromptInput(undefined, Readable.from(["piped text\n"]));
      expect(result).toEqual({ text: "piped text", source: "stdin" });
    });

    it("requires a prompt when stdin is a terminal", async () => {
      await expect(resolvePromptInput(undefined, makeTty())).rejects.toThrow(
        "Prompt is required (use --prompt or pipe to stdin)."
      );
    });

    it("rejects empty stdin", async () => {
      await expect(resolvePromptInput(undefined, Readable.from([]))).rejects.toThrow(
        "Prompt read from stdin is empty."
      );
    });

    it("rejects an empty literal", async () => {
      await expect(resolvePromptInput("   ")).rejects.toThrow("Prompt must not be empty.");
    });
  });

  describe("readInputText", () => {
    it("reads a file untrimmed", async () => {
      const path = join(dir, "input.txt");
      await writeFile(path, "one\ntwo\n");
      expect(await readInputText(path)).toBe("one\ntwo\n");
    });

    it("returns nothing for a terminal", async () => {
      expect(await readInputText(undefined, makeTty())).toBe("");
    });

    it("reads stdin", async () => {
      expect(await readInputText(undefined, Readable.from(["a", "b"]))).toBe("ab");
    });
  });

  describe("readPromptLines", () => {
    it("keeps non-blank trimmed lines", async () => {
      const path = join(dir, "prompts.txt");
      await writeFile(path, "Summarize\n\n  Translate  \n");
      expect(await readPromptLines(path)).toEqual(["Summarize", "Translate"]);
    });
  });

  describe("resolveRubric", () => {
    it("returns undefined without a value", async () => {
      expect(await resolveRubric(undefined)).toBeUndefined();
    });

    it("uses literal text when no such file exists", async () => {
      expect(await resolveRubric("Be concise.")).toBe("Be concise.");
    });

    it("reads a rubric file", async () => {
      const path = join(dir, "rubric.md");
      await writeFile(path, "Score accuracy.\n");
      expect(await resolveRubric(path)).toBe("Score accuracy.");
    });
  });
});
