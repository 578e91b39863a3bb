import { describe, it, expect } from "vitest";
import type { Routes } from "../../agents/router/router.types";
import { runRoute } from "../router";
import { makeDeps, makePromptClient } from "./helpers";

const INPUT = "My card was charged twice";

const CLASSIFIER_PROMPT = `Classify the following input into one of these categories: billing, tech\n\nInput: ${INPUT}`;

const routes: Routes = {
  billing: { template: "Billing question: {input}", system: "You handle billing.", model: "billing-model" },
  tech: { template: "Tech question: {input}" },
};

describe("runRoute", () => {
  it("classifies the input and runs the matching route", async () => {
    const client = makePromptClient({
      [CLASSIFIER_PROMPT]: "billing",
      [`Billing question: ${INPUT}`]: "Refund issued",
    });
    const deps = makeDeps(client);

    const result = await runRoute(deps, { input: INPUT, routes, model: "base-model" });

    expect(result).toEqual({
      ok: true,
      step: "handle",
      value: { label: "billing", answer: "Refund issued" },
    });
    expect(client.calls[0]?.stream).toBe(false);
    expect(client.calls[1]?.system).toBe("You handle billing.");
    expect(client.calls[1]?.model).toBe("billing-model");
    expect(deps.log.records.map((record) => [record.step_kind, record.status, record.detail])).toEqual([
      ["classify", "ok", "billing"],
      ["handle", "ok", "billing"],
    ]);
  });

  it("trims the label and falls back to the workflow model", async () => {
    const client = makePromptClient({
      [CLASSIFIER_PROMPT]: "  tech\n",
      [`Tech question: ${INPUT}`]: "Restart it",
    });
    const deps = makeDeps(client);

    const result = await runRoute(deps, { input: INPUT, routes, model: "base-model" });

    expect(result.ok && result.value.label).toBe("tech");
    expect(client.calls[1]?.model).toBe("base-model");
    expect(client.calls[1]?.system).toBeUndefined();
  });

  it("fails on a label with no route", async () => {
    const deps = makeDeps(makePromptClient({ [CLASSIFIER_PROMPT]: "sales" }));

    const result = await runRoute(deps, { input: INPUT, routes });

    expect(result).toEqual({
      ok: false,
      kind: "classification",
      step: "classify",
      error: "Classifier returned invalid label: sales",
    });
  });

  it("uses a custom classifier prompt and system", async () => {
    const client = makePromptClient({
      [`Pick one of billing, tech for: ${INPUT}`]: "tech",
      [`Tech question: ${INPUT}`]: "Restart it",
    });
    const deps = makeDeps(client);

    await runRoute(deps, {
      input: INPUT,
      routes,
      classifierPrompt: "Pick one of {labels} for: {input}",
      classifierSystem: "Answer with one word.",
    });

    expect(client.calls[0]?.system).toBe("Answer with one word.");
  });

  it("reports a failed handler call", async () => {
    const deps = makeDeps(makePromptClient({ [CLASSIFIER_PROMPT]: "tech" }));

    const result = await runRoute(deps, { input: INPUT, routes });

    expect(!result.ok && result.step).toBe("handle");
    expect(!result.ok && result.kind).toBe("generation");
  });
});
