import type { Command } from "commander";
import { ORCHESTRATE_DEFAULT_WORKERS } from "../core/config";
import { resolvePromptInput, resolveRubric } from "../core/task-input";
import { runRefinement } from "../orchestrator/refinement-loop";
import {
  EXIT_CODES,
  createWorkflowRuntime,
  parseNonNegativeInteger,
  parseScore,
  settleResult,
  writeAnswer,
} from "./shared";
import type { CommonOptions } from "./shared";

interface OptimizeOptions extends CommonOptions {
  prompt?: string;
  target: number;
  maxIters: number;
  evaluatorSystem?: string;
}

export const registerOptimizeCommand = (program: Command) => {
  program
    .command("optimize")
    .description("Generate an answer, then evaluate and revise it until it reaches a target score.")
    .option("-p, --prompt <text>", "Prompt text, or a .md/.txt/.json file (default: stdin).")
    .option("--target <score>", "Score in [0, 1] that accepts the answer.", parseScore, 0.9)
    .option("--max-iters <n>", "Maximum evaluation rounds.", parseNonNegativeInteger, 5)
    .option("--evaluator-system <rubric>", "Rubric text, or a file containing it.")
    .option("-m, --model <name>", "Model name.")
    .option("--stream", "Stream generation output (default).")
    .option("--no-stream", "Disable streaming.")
    .option("--log <file>", "Append JSONL execution records to this file.")
    .option("-v, --verbose", "Print debug output and streamed tokens to stderr.")
    .action(async (options: OptimizeOptions) => {
      const input = await resolvePromptInput(options.prompt);
      const rubric = await resolveRubric(options.evaluatorSystem);
      const runtime = createWorkflowRuntime(options, {
        maxWorkers: ORCHESTRATE_DEFAULT_WORKERS,
      });
      const { config, deps } = runtime;

      const result = await runRefinement(deps, {
        prompt: input.text,
        target: options.target,
        maxIters: options.maxIters,
        rubric,
        model: config.model,
        stream: config.stream,
        onToken: runtime.onToken,
      });
      await deps.log.flush();

      const outcome = settleResult(result, deps.logger);
      if (!outcome) {
        return;
      }

      writeAnswer(outcome.answer);
      if (outcome.status === "cap-reached") {
        const score = outcome.state.lastScore;
        deps.logger.warn(
          `Target ${options.target} not reached after ${outcome.state.iteration} iterations` +
            (score === undefined ? "." : ` (last score ${score}).`),
          { scope: "optimize" }
        );
        process.exitCode = EXIT_CODES.targetNotReached;
        return;
      }
      deps.logger.success(
        `Accepted at iteration ${outcome.state.iteration} with score ${outcome.state.lastScore}.`,
        { scope: "optimize" }
      );
    });
};
