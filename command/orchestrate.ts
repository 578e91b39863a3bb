import type { Command } from "commander";
import { ORCHESTRATE_DEFAULT_WORKERS } from "../core/config";
import { resolvePromptInput } from "../core/task-input";
import { runOrchestration } from "../orchestrator/orchestration-loop";
import {
  createWorkflowRuntime,
  parsePositiveInteger,
  parseTimeoutSeconds,
  settleResult,
  writeAnswer,
} from "./shared";
import type { CommonOptions } from "./shared";

interface OrchestrateOptions extends CommonOptions {
  prompt?: string;
  maxWorkers?: number;
  iterations: number;
  maxInputTokens?: number;
  timeout?: number;
}

export const registerOrchestrateCommand = (program: Command) => {
  program
    .command("orchestrate")
    .description("Plan sub-tasks, run them in parallel and synthesize the results.")
    .option("-p, --prompt <text>", "Request text, or a .md/.txt/.json file (default: stdin).")
    .option("-m, --model <name>", "Model name.")
    .option("--stream", "Stream generation output (default).")
    .option("--no-stream", "Disable streaming.")
    .option("--max-workers <n>", "Concurrent worker calls.", parsePositiveInteger)
    .option("--iterations <n>", "Maximum plan/dispatch/synthesize rounds.", parsePositiveInteger, 1)
    .option("--max-input-tokens <n>", "Drop worker outputs above this many tokens.", parsePositiveInteger)
    .option("--timeout <seconds>", "Per-task timeout in seconds.", parseTimeoutSeconds)
    .option("--log <file>", "Append JSONL execution records to this file.")
    .option("-v, --verbose", "Print debug output and streamed tokens to stderr.")
    .action(async (options: OrchestrateOptions) => {
      const input = await resolvePromptInput(options.prompt);
      const runtime = createWorkflowRuntime(options, {
        maxWorkers: ORCHESTRATE_DEFAULT_WORKERS,
      });
      const { config, deps } = runtime;
      if (input.filePath) {
        deps.logger.info(`Loaded request from ${input.filePath}`);
      }

      const result = await runOrchestration(deps, {
        request: input.text,
        iterations: options.iterations,
        maxConcurrency: config.maxWorkers,
        perTaskTimeoutMs: config.timeoutMs,
        maxInputTokens: config.maxInputTokens,
        model: config.model,
        stream: config.stream,
        onToken: runtime.onToken,
      });
      await deps.log.flush();

      const outcome = settleResult(result, deps.logger);
      if (outcome) {
        writeAnswer(outcome.answer);
      }
    });
};
