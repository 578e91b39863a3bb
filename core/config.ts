import { availableParallelism } from "node:os";
import { z } from "zod";

const DEFAULT_MODEL = "gpt-4.1-mini";
const ORCHESTRATE_DEFAULT_WORKERS = 5;
// Largest delay setTimeout honours; anything above fires after 1 ms.
const MAX_TIMEOUT_MS = 2_147_483_647;

const workflowConfigSchema = z.object({
  model: z.string().min(1),
  stream: z.boolean(),
  verbose: z.boolean(),
  logFile: z.string().min(1).optional(),
  maxWorkers: z.number().int().positive(),
  timeoutMs: z.number().positive().max(MAX_TIMEOUT_MS).optional(),
  maxInputTokens: z.number().int().positive().optional(),
});

type WorkflowConfig = Readonly<z.infer<typeof workflowConfigSchema>>;

interface WorkflowConfigInput {
  model?: string;
  stream?: boolean;
  verbose?: boolean;
  log?: string;
  maxWorkers?: number;
  timeout?: number;
  maxInputTokens?: number;
}

type Environment = Record<string, string | undefined>;

const resolveModel = (model?: string, env: Environment = process.env) => {
  const candidates = [model, env.LLM_MODEL, env.OPENAI_MODEL];
  for (const candidate of candidates) {
    if (candidate && candidate.trim().length > 0) {
      return candidate.trim();
    }
  }
  return DEFAULT_MODEL;
};

const defaultParallelWorkers = () => Math.min(32, availableParallelism() + 4);

const createWorkflowConfig = (
  input: WorkflowConfigInput,
  defaults: { maxWorkers: number },
  env: Environment = process.env
): WorkflowConfig => {
  const config = workflowConfigSchema.parse({
    model: resolveModel(input.model, env),
    stream: input.stream ?? true,
    verbose: input.verbose ?? false,
    logFile: input.log,
    maxWorkers: input.maxWorkers ?? defaults.maxWorkers,
    timeoutMs: input.timeout === undefined ? undefined : input.timeout * 1000,
    maxInputTokens: input.maxInputTokens,
  });
  return Object.freeze(config);
};

export {
  DEFAULT_MODEL,
  MAX_TIMEOUT_MS,
  ORCHESTRATE_DEFAULT_WORKERS,
  createWorkflowConfig,
  defaultParallelWorkers,
  resolveModel,
};
export type { Environment, WorkflowConfig, WorkflowConfigInput };
