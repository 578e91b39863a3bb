import { readFile } from "node:fs/promises";
import { z } from "zod";
import { describeError, failure } from "./orchestrator.types";
import type { OrchestratorResult, WorkflowDeps } from "./orchestrator.types";

const gateSchemaSchema = z
  .object({
    type: z.enum(["object", "array", "string", "number", "boolean"]).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

type GateSchema = z.infer<typeof gateSchemaSchema>;

interface ChainOptions {
  prompts: string[];
  model?: string;
  stream?: boolean;
  gate?: GateSchema;
  onToken?: (chunk: string) => void;
}

interface ChainOutcome {
  answer: string;
  steps: string[];
}

const MIN_PROMPTS = 2;

const loadGateSchema = async (path: string): Promise<GateSchema> => {
  const text = await readFile(path, "utf-8");
  return gateSchemaSchema.parse(JSON.parse(text));
};

const jsonTypeOf = (value: unknown) => {
  if (Array.isArray(value)) {
    return "array";
  }
  if (value === null) {
    return "null";
  }
  return typeof value;
};

// Checks the top-level type and required keys only.
const checkGate = (output: string, gate: GateSchema): string[] => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch (error) {
    return [`Output is not valid JSON: ${describeError(error)}`];
  }

  const errors: string[] = [];
  const actualType = jsonTypeOf(parsed);
  if (gate.type && gate.type !== actualType) {
    errors.push(`Expected ${gate.type}, got ${actualType}.`);
  }

  const required = gate.required ?? [];
  if (required.length > 0) {
    if (actualType !== "object" || typeof parsed !== "object" || parsed === null) {
      errors.push("Required keys need a JSON object.");
    } else {
      const missing = required.filter((key) => !Object.prototype.hasOwnProperty.call(parsed, key));
      if (missing.length > 0) {
        errors.push(`Missing required keys: ${missing.join(", ")}.`);
      }
    }
  }
  return errors;
};

const buildStepPrompt = (prompt: string, previous: string) =>
  previous.length > 0 ? `${prompt}\n\n${previous}` : prompt;

const runChain = async (
  deps: WorkflowDeps,
  options: ChainOptions
): Promise<OrchestratorResult<ChainOutcome>> => {
  if (options.prompts.length < MIN_PROMPTS) {
    return failure(
      "invalid-input",
      "chain",
      `At least ${MIN_PROMPTS} prompts are required, got ${options.prompts.length}.`
    );
  }

  const steps: string[] = [];
  let previous = "";

  for (const [index, prompt] of options.prompts.entries()) {
    const step = index + 1;
    const stepPrompt = buildStepPrompt(prompt, previous);

    let result: string;
    try {
      result = await deps.client.generate({
        prompt: stepPrompt,
        model: options.model,
        stream: options.stream ?? false,
        onToken: options.onToken,
      });
    } catch (error) {
      deps.log.record({
        step_kind: "chain",
        task_id: step,
        status: "error",
        detail: describeError(error),
      });
      return failure("generation", `chain_step_${step}`, describeError(error));
    }

    deps.log.record({
      step_kind: "chain",
      task_id: step,
      status: "ok",
      data: { prompt: stepPrompt, result },
    });
    steps.push(result);
    previous = result;

    if (step < options.prompts.length) {
      deps.logger.info(`--- Step ${step} Result ---`, { scope: "chain", data: result });
    }

    if (options.gate) {
      const gateErrors = checkGate(result, options.gate);
      if (gateErrors.length > 0) {
        return failure(
          "gate",
          `chain_step_${step}`,
          `Step ${step} output failed the gate schema: ${gateErrors.join(" ")}`
        );
      }
    }
  }

  return { ok: true, step: "chain", value: { answer: previous, steps } };
};

export { buildStepPrompt, checkGate, loadGateSchema, runChain };
export type { ChainOptions, ChainOutcome, GateSchema };
