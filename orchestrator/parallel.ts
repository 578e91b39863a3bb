import { aggregate } from "./aggregator";
import { failure } from "./orchestrator.types";
import type {
  AggregationPolicy,
  OrchestratorResult,
  RoundResult,
  WorkflowDeps,
  WorkflowTask,
} from "./orchestrator.types";
import { createWorkerPool, hasSuccess } from "./worker-pool";

type SectionAggregate = Extract<AggregationPolicy, "concat" | "json">;
type VoteMode = Extract<AggregationPolicy, "majority" | "max-tokens">;

type ParallelMode =
  | { kind: "section"; sections: string[]; aggregate: SectionAggregate }
  | { kind: "vote"; count: number; voteMode: VoteMode; dedupe: boolean };

interface ParallelOptions {
  prompt: string;
  mode: ParallelMode;
  maxConcurrency: number;
  system?: string;
  model?: string;
  perTaskTimeoutMs?: number;
  maxInputTokens?: number;
  stream?: boolean;
  onToken?: (taskId: number, chunk: string) => void;
}

interface ParallelOutcome {
  answer: string;
  round: RoundResult;
}

const MIN_VOTES = 2;

const buildParallelPrompts = (prompt: string, mode: ParallelMode) =>
  mode.kind === "section"
    ? mode.sections.map((section) => `${prompt}\n\n${section}`)
    : Array.from({ length: mode.count }, () => prompt);

const resolvePolicy = (mode: ParallelMode): AggregationPolicy =>
  mode.kind === "section" ? mode.aggregate : mode.voteMode;

const runParallel = async (
  deps: WorkflowDeps,
  options: ParallelOptions
): Promise<OrchestratorResult<ParallelOutcome>> => {
  const { mode } = options;
  if (mode.kind === "vote" && (!Number.isInteger(mode.count) || mode.count < MIN_VOTES)) {
    return failure(
      "invalid-input",
      "dispatch",
      `Vote count must be at least ${MIN_VOTES}, got ${mode.count}.`
    );
  }
  if (mode.kind === "section" && mode.sections.length === 0) {
    return failure("invalid-input", "dispatch", "No sections found in input.");
  }

  const tasks: WorkflowTask[] = buildParallelPrompts(options.prompt, mode).map(
    (prompt, index) => ({
      id: index + 1,
      prompt,
      system: options.system,
      model: options.model,
    })
  );

  deps.log.record({
    step_kind: "dispatch",
    status: "ok",
    detail: `${tasks.length} ${mode.kind === "section" ? "sections" : "votes"}`,
  });
  deps.logger.debug(`Running ${tasks.length} tasks (max ${options.maxConcurrency} at once).`, {
    scope: "parallel",
  });

  const pool = createWorkerPool(deps.client, {
    maxConcurrency: options.maxConcurrency,
    perTaskTimeoutMs: options.perTaskTimeoutMs,
    maxInputTokens: options.maxInputTokens,
    stream: options.stream,
    log: deps.log,
    onToken: options.onToken,
  });
  const round = await pool.run(tasks);

  if (!hasSuccess(round)) {
    deps.log.record({ step_kind: "aggregate", status: "error", detail: "NoSuccessfulOutcomes" });
    return failure(
      "aggregation",
      "aggregate",
      "NoSuccessfulOutcomes: every task failed or was dropped."
    );
  }

  const policy = resolvePolicy(mode);
  const aggregated = aggregate(round, policy, mode.kind === "vote" && mode.dedupe);
  if (!aggregated.ok) {
    deps.log.record({ step_kind: "aggregate", status: "error", detail: aggregated.error });
    return failure("aggregation", "aggregate", aggregated.error);
  }

  deps.log.record({ step_kind: "aggregate", status: "ok", detail: policy });
  return { ok: true, step: "aggregate", value: { answer: aggregated.value, round } };
};

export { buildParallelPrompts, runParallel };
export type { ParallelMode, ParallelOptions, ParallelOutcome, SectionAggregate, VoteMode };
