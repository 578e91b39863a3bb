import { InvalidArgumentError } from "commander";
import { MAX_TIMEOUT_MS, createWorkflowConfig } from "../core/config";
import type { WorkflowConfig, WorkflowConfigInput } from "../core/config";
import { createLogger } from "../core/logger";
import type { Logger } from "../core/logger";
import type { GenerationClient } from "../llm/generation.types";
import { createOpenAIGenerationClient } from "../llm/openai-client";
import { createExecutionLog } from "../orchestrator/execution-log";
import type { ErrorKind, OrchestratorResult, WorkflowDeps } from "../orchestrator/orchestrator.types";

const EXIT_CODES = {
  success: 0,
  planParse: 10,
  execution: 20,
  targetNotReached: 30,
} as const;

interface CommonOptions {
  model?: string;
  stream?: boolean;
  log?: string;
  verbose?: boolean;
}

interface WorkflowRuntime {
  config: WorkflowConfig;
  deps: WorkflowDeps;
  onToken?: (chunk: string) => void;
}

const exitCodeFor = (kind: ErrorKind) =>
  kind === "plan-parse" ? EXIT_CODES.planParse : EXIT_CODES.execution;

const parseInteger = (value: string) => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
};

const parsePositiveInteger = (value: string) => {
  const parsed = parseInteger(value);
  if (parsed < 1) {
    throw new InvalidArgumentError("Must be at least 1.");
  }
  return parsed;
};

const parseNonNegativeInteger = (value: string) => {
  const parsed = parseInteger(value);
  if (parsed < 0) {
    throw new InvalidArgumentError("Must not be negative.");
  }
  return parsed;
};

const parsePositiveNumber = (value: string) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number.");
  }
  return parsed;
};

const parseTimeoutSeconds = (value: string) => {
  const parsed = parsePositiveNumber(value);
  if (parsed * 1000 > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Must be at most ${Math.floor(MAX_TIMEOUT_MS / 1000)} seconds.`);
  }
  return parsed;
};

const parseScore = (value: string) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError("Must be a number between 0 and 1.");
  }
  return parsed;
};

const streamToStderr = (chunk: string) => {
  process.stderr.write(chunk);
};

const createWorkflowRuntime = (
  input: WorkflowConfigInput,
  defaults: { maxWorkers: number },
  client?: GenerationClient
): WorkflowRuntime => {
  const config = createWorkflowConfig(input, defaults);
  const logger = createLogger({ verbose: config.verbose });
  return {
    config,
    deps: {
      client: client ?? createOpenAIGenerationClient({ defaultModel: config.model }),
      log: createExecutionLog(config.logFile, logger),
      logger,
    },
    onToken: config.stream && config.verbose ? streamToStderr : undefined,
  };
};

const writeAnswer = (answer: string) => {
  process.stdout.write(`${answer}\n`);
};

// Reports a hard failure on stderr and sets the exit code; returns the value on success.
const settleResult = <T>(result: OrchestratorResult<T>, logger: Logger): T | undefined => {
  if (result.ok) {
    return result.value;
  }
  logger.error(result.error, { scope: result.step });
  process.exitCode = exitCodeFor(result.kind);
  return undefined;
};

export {
  EXIT_CODES,
  createWorkflowRuntime,
  exitCodeFor,
  parseInteger,
  parseNonNegativeInteger,
  parsePositiveInteger,
  parsePositiveNumber,
  parseScore,
  parseTimeoutSeconds,
  settleResult,
  writeAnswer,
};
export type { CommonOptions, WorkflowRuntime };
