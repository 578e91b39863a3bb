import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { buildClassifierPrompt } from "../router.agent";
import { fillTemplate, loadRoutes, validateRoutes } from "../router.validators";

describe("fillTemplate", () => {
  it("replaces known placeholders and keeps unknown ones", () => {
    expect(fillTemplate("{input} and {other}", { input: "x" })).toBe("x and {other}");
  });
});

describe("buildClassifierPrompt", () => {
  it("lists the labels before the input", () => {
    expect(buildClassifierPrompt("hello", ["greeting", "question"])).toBe(
      "Classify the following input into one of these categories: greeting, question\n\nInput: hello"
    );
  });

  it("fills a custom template", () => {
    expect(buildClassifierPrompt("hello", ["a", "b"], "{labels} | {input}")).toBe("a, b | hello");
  });
});

describe("validateRoutes", () => {
  it("requires at least one route", () => {
    expect(validateRoutes({})).toEqual({
      ok: false,
      errors: ["Routes file must define at least one route."],
    });
  });

  it("requires a template", () => {
    expect(validateRoutes({ tech: { system: "x" } })).toEqual({
      ok: false,
      errors: ["tech.template: Required"],
    });
  });
});

describe("loadRoutes", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "routes-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a YAML routes file", async () => {
    const path = join(dir, "routes.yaml");
    await writeFile(
      path,
      [
        "billing:",
        '  template: "Billing: {input}"',
        "  system: You handle billing.",
        "tech:",
        '  template: "Tech: {input}"',
        "  model: tech-model",
        "",
      ].join("\n")
    );

    expect(await loadRoutes(path)).toEqual({
      billing: { template: "Billing: {input}", system: "You handle billing." },
      tech: { template: "Tech: {input}", model: "tech-model" },
    });
  });

  it("reads a JSON routes file", async () => {
    const path = join(dir, "routes.json");
    await writeFile(path, JSON.stringify({ faq: { template: "FAQ: {input}" } }));

    expect(await loadRoutes(path)).toEqual({ faq: { template: "FAQ: {input}" } });
  });

  it("reports a file that does not parse", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ not json");

    await expect(loadRoutes(path)).rejects.toThrow(`Unable to parse routes file ${path}:`);
  });

  it("reports a file with no routes", async () => {
    const path = join(dir, "empty.json");
    await writeFile(path, "{}");

    await expect(loadRoutes(path)).rejects.toThrow(
      `Invalid routes file ${path}: Routes file must define at least one route.`
    );
  });
});
