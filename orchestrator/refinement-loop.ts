import { createEvaluatorAgent } from "../agents/evaluator/evaluator.agent";
import type { EvaluatorOutput } from "../agents/evaluator/evaluator.types";
import { createReviserAgent } from "../agents/reviser/reviser.agent";
import { describeError, failure } from "./orchestrator.types";
import type {
  OrchestratorResult,
  RefinementState,
  WorkflowDeps,
} from "./orchestrator.types";

type RefinementStatus = "accepted" | "cap-reached";

interface RefinementOptions {
  prompt: string;
  target: number;
  maxIters: number;
  rubric?: string;
  model?: string;
  stream?: boolean;
  onToken?: (chunk: string) => void;
}

interface RefinementOutcome {
  status: RefinementStatus;
  answer: string;
  state: RefinementState;
}

const validateRefinementOptions = (options: RefinementOptions) => {
  if (!Number.isFinite(options.target) || options.target < 0 || options.target > 1) {
    return `target must be between 0 and 1, got ${options.target}.`;
  }
  if (!Number.isInteger(options.maxIters) || options.maxIters < 0) {
    return `maxIters must be a non-negative integer, got ${options.maxIters}.`;
  }
  return null;
};

const runRefinement = async (
  deps: WorkflowDeps,
  options: RefinementOptions
): Promise<OrchestratorResult<RefinementOutcome>> => {
  const invalid = validateRefinementOptions(options);
  if (invalid) {
    return failure("invalid-input", "generate", invalid);
  }

  const evaluator = createEvaluatorAgent(deps.client, {
    model: options.model,
    rubric: options.rubric,
  });
  const reviser = createReviserAgent(deps.client, {
    model: options.model,
    stream: options.stream,
    onToken: options.onToken,
  });

  let initialAnswer: string;
  try {
    initialAnswer = await deps.client.generate({
      prompt: options.prompt,
      model: options.model,
      stream: options.stream ?? false,
      onToken: options.onToken,
    });
  } catch (error) {
    deps.log.record({ step_kind: "generate", status: "error", detail: describeError(error) });
    return failure("generation", "generate", `Generation failed: ${describeError(error)}`);
  }
  deps.log.record({ step_kind: "generate", status: "ok" });
  deps.logger.debug(`[generate] Output:\n${initialAnswer}`, { scope: "optimize" });

  let state: RefinementState = { iteration: 0, currentAnswer: initialAnswer };

  while (state.iteration < options.maxIters) {
    const iteration = state.iteration + 1;

    let evaluated: EvaluatorOutput;
    try {
      evaluated = await evaluator.evaluate(state.currentAnswer);
    } catch (error) {
      deps.log.record({
        step_kind: "evaluate",
        iteration,
        status: "error",
        detail: describeError(error),
      });
      return failure("generation", "evaluate", `Evaluation failed: ${describeError(error)}`);
    }

    const { score, feedback } = evaluated.evaluation;
    deps.log.record({
      step_kind: "evaluate",
      iteration,
      status: evaluated.parseable ? "ok" : "error",
      detail: evaluated.parseable ? `score=${score}` : "unparseable",
      data: { score, feedback, raw: evaluated.raw },
    });
    if (!evaluated.parseable) {
      deps.logger.warn(`Invalid evaluator output, scoring 0: ${evaluated.raw}`, {
        scope: "optimize",
      });
    }
    deps.logger.debug(`[evaluate] Iter ${iteration}: score=${score}, feedback=${feedback}`, {
      scope: "optimize",
    });

    state = { ...state, iteration, lastScore: score, lastFeedback: feedback };

    if (score >= options.target) {
      return {
        ok: true,
        step: "evaluate",
        value: { status: "accepted", answer: state.currentAnswer, state },
      };
    }
    if (iteration >= options.maxIters) {
      break;
    }

    let revised: string;
    try {
      revised = await reviser.revise(state.currentAnswer, feedback);
    } catch (error) {
      deps.log.record({
        step_kind: "revise",
        iteration,
        status: "error",
        detail: describeError(error),
      });
      return failure("generation", "revise", `Revision failed: ${describeError(error)}`);
    }
    deps.log.record({ step_kind: "revise", iteration, status: "ok" });
    deps.logger.debug(`[revise] Iter ${iteration}: revised output:\n${revised}`, {
      scope: "optimize",
    });
    state = { ...state, currentAnswer: revised };
  }

  return {
    ok: true,
    step: "evaluate",
    value: { status: "cap-reached", answer: state.currentAnswer, state },
  };
};

export { runRefinement };
export type { RefinementOptions, RefinementOutcome, RefinementStatus };
