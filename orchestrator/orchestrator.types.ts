import type { Logger } from "../core/logger";
import type { GenerationClient } from "../llm/generation.types";
import type { ExecutionLog } from "./execution-log";

type ErrorKind =
  | "generation"
  | "plan-parse"
  | "aggregation"
  | "invalid-input"
  | "classification"
  | "gate";

interface WorkflowTask {
  readonly id: number;
  readonly prompt: string;
  readonly system?: string;
  readonly model?: string;
}

type DropReason = "timeout" | "token-budget";

interface SuccessOutcome {
  kind: "success";
  text: string;
  tokenCount: number;
}

interface FailureOutcome {
  kind: "failure";
  reason: ErrorKind;
  detail: string;
}

interface DroppedOutcome {
  kind: "dropped";
  reason: DropReason;
}

type TaskOutcome = SuccessOutcome | FailureOutcome | DroppedOutcome;

interface TaskResult {
  task: WorkflowTask;
  outcome: TaskOutcome;
}

// Ordered by input task order, never by completion order.
type RoundResult = TaskResult[];

type AggregationPolicy = "concat" | "json" | "majority" | "max-tokens";

interface OrchestrationState {
  iteration: number;
  history: RoundResult[];
  lastSynthesis: string;
}

interface RefinementState {
  iteration: number;
  currentAnswer: string;
  lastScore?: number;
  lastFeedback?: string;
}

type OrchestratorResult<T> =
  | { ok: true; value: T; step: string }
  | { ok: false; error: string; kind: ErrorKind; step: string };

interface WorkflowDeps {
  client: GenerationClient;
  log: ExecutionLog;
  logger: Logger;
}

const failure = <T>(
  kind: ErrorKind,
  step: string,
  error: string
): OrchestratorResult<T> => ({ ok: false, kind, step, error });

const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export { describeError, failure };
export type {
  AggregationPolicy,
  DropReason,
  DroppedOutcome,
  ErrorKind,
  FailureOutcome,
  OrchestrationState,
  OrchestratorResult,
  RefinementState,
  RoundResult,
  SuccessOutcome,
  TaskOutcome,
  TaskResult,
  WorkflowDeps,
  WorkflowTask,
};
