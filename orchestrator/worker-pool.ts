import { countTokens } from "../core/tokens";
import type { GenerationClient } from "../llm/generation.types";
import type { ExecutionLog } from "./execution-log";
import { describeError } from "./orchestrator.types";
import type {
  RoundResult,
  TaskOutcome,
  WorkflowTask,
} from "./orchestrator.types";

interface WorkerPoolOptions {
  maxConcurrency: number;
  perTaskTimeoutMs?: number;
  maxInputTokens?: number;
  stream?: boolean;
  log?: ExecutionLog;
  onToken?: (taskId: number, chunk: string) => void;
}

interface WorkerPool {
  run: (tasks: WorkflowTask[]) => Promise<RoundResult>;
}

const applyTokenBudget = (
  outcome: TaskOutcome,
  maxInputTokens: number | undefined
): TaskOutcome => {
  if (
    outcome.kind === "success" &&
    maxInputTokens !== undefined &&
    outcome.tokenCount > maxInputTokens
  ) {
    return { kind: "dropped", reason: "token-budget" };
  }
  return outcome;
};

const describeOutcome = (outcome: TaskOutcome) => {
  if (outcome.kind === "success") {
    return { status: "ok" as const, detail: `${outcome.tokenCount} tokens` };
  }
  if (outcome.kind === "failure") {
    return { status: "error" as const, detail: outcome.detail };
  }
  return { status: "dropped" as const, detail: outcome.reason };
};

const createWorkerPool = (
  client: GenerationClient,
  options: WorkerPoolOptions
): WorkerPool => {
  if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
    throw new Error(
      `maxConcurrency must be a positive integer, got ${options.maxConcurrency}.`
    );
  }

  const callTask = async (
    task: WorkflowTask,
    signal: AbortSignal
  ): Promise<TaskOutcome> => {
    try {
      const text = await client.generate({
        prompt: task.prompt,
        system: task.system,
        model: task.model,
        stream: options.stream ?? false,
        signal,
        onToken: options.onToken
          ? (chunk) => options.onToken?.(task.id, chunk)
          : undefined,
      });
      return { kind: "success", text, tokenCount: countTokens(text) };
    } catch (error) {
      return { kind: "failure", reason: "generation", detail: describeError(error) };
    }
  };

  const runTask = async (task: WorkflowTask): Promise<TaskOutcome> => {
    const controller = new AbortController();
    const call = callTask(task, controller.signal);
    const timeoutMs = options.perTaskTimeoutMs;

    if (timeoutMs === undefined) {
      return applyTokenBudget(await call, options.maxInputTokens);
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<TaskOutcome>((resolveTimeout) => {
      timer = setTimeout(() => {
        // Settle first so a rejection caused by the abort cannot win the race.
        resolveTimeout({ kind: "dropped", reason: "timeout" });
        controller.abort();
      }, timeoutMs);
    });

    try {
      const outcome = await Promise.race([call, timeout]);
      if (controller.signal.aborted) {
        // The lane keeps its slot until the cancelled call has settled.
        await call;
      }
      return applyTokenBudget(outcome, options.maxInputTokens);
    } finally {
      clearTimeout(timer);
    }
  };

  const run = async (tasks: WorkflowTask[]): Promise<RoundResult> => {
    const seen = new Set<number>();
    for (const task of tasks) {
      if (seen.has(task.id)) {
        throw new Error(`Duplicate task id ${task.id} in one round.`);
      }
      seen.add(task.id);
    }

    const settled: { index: number; task: WorkflowTask; outcome: TaskOutcome }[] =
      [];
    let nextIndex = 0;

    // Each lane pulls the next unclaimed task, so at most maxConcurrency calls are in flight.
    const runLane = async () => {
      while (nextIndex < tasks.length) {
        const index = nextIndex;
        nextIndex += 1;
        const task = tasks[index];
        const outcome = await runTask(task);
        settled.push({ index, task, outcome });
        options.log?.record({
          step_kind: "worker",
          task_id: task.id,
          ...describeOutcome(outcome),
        });
      }
    };

    const laneCount = Math.min(options.maxConcurrency, tasks.length);
    await Promise.all(Array.from({ length: laneCount }, () => runLane()));

    return settled
      .sort((left, right) => left.index - right.index)
      .map(({ task, outcome }) => ({ task, outcome }));
  };

  return { run };
};

const successTexts = (round: RoundResult) =>
  round.flatMap((entry) =>
    entry.outcome.kind === "success" ? [entry.outcome.text] : []
  );

const hasSuccess = (round: RoundResult) =>
  round.some((entry) => entry.outcome.kind === "success");

export { createWorkerPool, hasSuccess, successTexts };
export type { WorkerPool, WorkerPoolOptions };
