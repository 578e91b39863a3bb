import { createPlannerAgent } from "../agents/planner/planner.agent";
import type { PlannerOutput } from "../agents/planner/planner.agent";
import { planDirectText } from "../agents/planner/planner.validators";
import { createSynthesizerAgent } from "../agents/synthesizer/synthesizer.agent";
import { describeError, failure } from "./orchestrator.types";
import type {
  OrchestrationState,
  OrchestratorResult,
  WorkflowDeps,
  WorkflowTask,
} from "./orchestrator.types";
import { createWorkerPool, successTexts } from "./worker-pool";

interface OrchestrationOptions {
  request: string;
  iterations: number;
  maxConcurrency: number;
  perTaskTimeoutMs?: number;
  maxInputTokens?: number;
  model?: string;
  stream?: boolean;
  onToken?: (chunk: string, taskId?: number) => void;
}

interface OrchestrationOutcome {
  answer: string;
  state: OrchestrationState;
}

const buildFollowUpRequest = (request: string, synthesis: string) =>
  `${request}\n\nPrevious synthesis:\n${synthesis}`;

/**
 * Plans sub-tasks, runs them through a fresh worker pool and synthesizes the
 * surviving results, for at most `iterations` rounds. An empty plan ends the
 * loop early; the answer is then the last synthesis, or the plan's own text
 * when no round was dispatched.
 */
const runOrchestration = async (
  deps: WorkflowDeps,
  options: OrchestrationOptions
): Promise<OrchestratorResult<OrchestrationOutcome>> => {
  if (!Number.isInteger(options.iterations) || options.iterations < 1) {
    return failure(
      "invalid-input",
      "plan",
      `iterations must be a positive integer, got ${options.iterations}.`
    );
  }

  const onToken = options.onToken;
  const planner = createPlannerAgent(deps.client, {
    model: options.model,
    stream: options.stream,
    onToken,
  });
  const synthesizer = createSynthesizerAgent(deps.client, {
    model: options.model,
    stream: options.stream,
    onToken,
  });
  const pool = createWorkerPool(deps.client, {
    maxConcurrency: options.maxConcurrency,
    perTaskTimeoutMs: options.perTaskTimeoutMs,
    maxInputTokens: options.maxInputTokens,
    stream: options.stream,
    log: deps.log,
    onToken: onToken ? (taskId, chunk) => onToken(chunk, taskId) : undefined,
  });

  let state: OrchestrationState = { iteration: 0, history: [], lastSynthesis: "" };
  let planningRequest = options.request;
  let directText = "";

  while (state.iteration < options.iterations) {
    const round = state.iteration + 1;
    deps.logger.debug(`Step: plan - round ${round} of ${options.iterations}`, {
      scope: "orchestrate",
    });

    let planned: PlannerOutput;
    try {
      planned = await planner.plan(planningRequest);
    } catch (error) {
      deps.log.record({
        step_kind: "plan",
        iteration: round,
        status: "error",
        detail: describeError(error),
      });
      return failure("generation", "plan", `Planner call failed: ${describeError(error)}`);
    }

    if (!planned.parsed.ok) {
      const detail = planned.parsed.errors.join(" ");
      deps.log.record({
        step_kind: "plan",
        iteration: round,
        status: "error",
        detail: `PlanParseError: ${detail}`,
        data: { raw: planned.raw },
      });
      return failure("plan-parse", "plan", `Invalid orchestrator output: ${detail}`);
    }

    const plan = planned.parsed.value;
    deps.log.record({
      step_kind: "plan",
      iteration: round,
      status: "ok",
      detail: `${plan.tasks.length} tasks`,
      data: { tasks: plan.tasks, aggregate_prompt: plan.aggregatePrompt },
    });

    if (plan.tasks.length === 0) {
      deps.logger.debug("No tasks returned, finishing.", { scope: "orchestrate" });
      directText = planDirectText(plan, planned.raw);
      break;
    }

    const tasks: WorkflowTask[] = plan.tasks.map((planTask, index) => ({
      id: index + 1,
      prompt: planTask.prompt,
      model: options.model,
    }));
    deps.log.record({
      step_kind: "dispatch",
      iteration: round,
      status: "ok",
      detail: `${tasks.length} tasks`,
    });

    const roundResult = await pool.run(tasks);
    state = { ...state, history: [...state.history, roundResult] };

    const texts = successTexts(roundResult);
    if (texts.length === 0) {
      deps.log.record({
        step_kind: "dispatch",
        iteration: round,
        status: "error",
        detail: "NoSuccessfulOutcomes",
      });
      return failure(
        "aggregation",
        "dispatch",
        "All worker outputs were dropped or failed."
      );
    }

    let synthesis: string;
    try {
      synthesis = await synthesizer.synthesize(plan.aggregatePrompt, texts);
    } catch (error) {
      deps.log.record({
        step_kind: "synthesize",
        iteration: round,
        status: "error",
        detail: describeError(error),
      });
      return failure(
        "generation",
        "synthesize",
        `Synthesis call failed: ${describeError(error)}`
      );
    }

    deps.log.record({
      step_kind: "synthesize",
      iteration: round,
      status: "ok",
      detail: `${texts.length} of ${tasks.length} results`,
    });
    state = { ...state, iteration: round, lastSynthesis: synthesis };
    planningRequest = buildFollowUpRequest(options.request, synthesis);
  }

  const answer = state.lastSynthesis.length > 0 ? state.lastSynthesis : directText;
  return { ok: true, step: "complete", value: { answer, state } };
};

export { buildFollowUpRequest, runOrchestration };
export type { OrchestrationOptions, OrchestrationOutcome };
