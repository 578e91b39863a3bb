import { describe, it, expect } from "vitest";
import {
  DEFAULT_MODEL,
  MAX_TIMEOUT_MS,
  createWorkflowConfig,
  defaultParallelWorkers,
  resolveModel,
} from "../config";

describe("resolveModel", () => {
  it("prefers the explicit model", () => {
    expect(resolveModel("cli-model", { LLM_MODEL: "env-model" })).toBe("cli-model");
  });

  it("falls back to LLM_MODEL, then OPENAI_MODEL", () => {
    expect(resolveModel("  ", { LLM_MODEL: "llm", OPENAI_MODEL: "openai" })).toBe("llm");
    expect(resolveModel(undefined, { OPENAI_MODEL: "openai" })).toBe("openai");
  });

  it("uses the default model last", () => {
    expect(resolveModel(undefined, {})).toBe(DEFAULT_MODEL);
    expect(DEFAULT_MODEL).toBe("gpt-4.1-mini");
  });
});

describe("createWorkflowConfig", () => {
  it("fills defaults and freezes the result", () => {
    const config = createWorkflowConfig({}, { maxWorkers: 5 }, {});

    expect(config).toEqual({
      model: "gpt-4.1-mini",
      stream: true,
      verbose: false,
      maxWorkers: 5,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("converts the timeout from seconds", () => {
    const config = createWorkflowConfig({ timeout: 2.5, maxWorkers: 3 }, { maxWorkers: 5 }, {});

    expect(config.timeoutMs).toBe(2500);
    expect(config.maxWorkers).toBe(3);
  });

  it("keeps the log file and token ceiling", () => {
    const config = createWorkflowConfig(
      { log: "run.jsonl", maxInputTokens: 200, stream: false },
      { maxWorkers: 5 },
      {}
    );

    expect(config.logFile).toBe("run.jsonl");
    expect(config.maxInputTokens).toBe(200);
    expect(config.stream).toBe(false);
  });

  it("accepts the largest timer delay", () => {
    const config = createWorkflowConfig({ timeout: 2_147_483 }, { maxWorkers: 5 }, {});
    expect(config.timeoutMs).toBe(2_147_483_000);
  });

  it("rejects a timeout beyond the timer limit", () => {
    expect(MAX_TIMEOUT_MS).toBe(2_147_483_647);
    expect(() => createWorkflowConfig({ timeout: 2_200_000 }, { maxWorkers: 5 }, {})).toThrow();
  });

  it("rejects an invalid worker count", () => {
    expect(() => createWorkflowConfig({ maxWorkers: 0 }, { maxWorkers: 5 }, {})).toThrow();
  });
});

describe("defaultParallelWorkers", () => {
  it("stays between 5 and 32", () => {
    const workers = defaultParallelWorkers();
    expect(workers).toBeGreaterThanOrEqual(5);
    expect(workers).toBeLessThanOrEqual(32);
  });
});
