import { describe, it, expect } from "vitest";
import { unwrapCodeFence } from "../../shared";
import { parsePlan, planDirectText } from "../planner.validators";

describe("parsePlan", () => {
  it("parses tasks and the synthesis instruction", () => {
    const raw = JSON.stringify({
      tasks: [
        { id: 1, prompt: "moon" },
        { id: "b", prompt: "sun" },
      ],
      aggregate_prompt: "Combine",
    });

    expect(parsePlan(raw)).toEqual({
      ok: true,
      value: {
        tasks: [
          { id: 1, prompt: "moon" },
          { id: "b", prompt: "sun" },
        ],
        aggregatePrompt: "Combine",
        answer: undefined,
      },
    });
  });

  it("defaults a missing or null synthesis instruction", () => {
    const missing = parsePlan('{"tasks": []}');
    const nulled = parsePlan('{"tasks": [], "aggregate_prompt": null}');

    expect(missing.ok && missing.value.aggregatePrompt).toBe("");
    expect(nulled.ok && nulled.value.aggregatePrompt).toBe("");
  });

  it("reports invalid JSON", () => {
    const result = parsePlan("Sure! Here is a plan.");
    expect(result.ok).toBe(false);
    expect(!result.ok && result.errors[0]).toMatch(/^Output is not valid JSON: /);
  });

  it("reports schema issues with their path", () => {
    const result = parsePlan('{"tasks": [{"id": 1}]}');
    expect(!result.ok && result.errors).toEqual(["tasks.0.prompt: Required"]);
  });
});

describe("planDirectText", () => {
  it("prefers the plan's answer", () => {
    expect(planDirectText({ tasks: [], aggregatePrompt: "", answer: " Paris " }, "raw")).toBe("Paris");
  });

  it("falls back to the raw output", () => {
    expect(planDirectText({ tasks: [], aggregatePrompt: "", answer: "  " }, "raw")).toBe("raw");
  });
});

describe("unwrapCodeFence", () => {
  it("strips a fenced block", () => {
    expect(unwrapCodeFence('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it("leaves plain text alone", () => {
    expect(unwrapCodeFence('  {"a": 1} ')).toBe('{"a": 1}');
  });
});
