import type { Command } from "commander";
import { loadRoutes } from "../agents/router/router.validators";
import { ORCHESTRATE_DEFAULT_WORKERS } from "../core/config";
import { resolvePromptInput } from "../core/task-input";
import { runRoute } from "../orchestrator/router";
import { createWorkflowRuntime, settleResult, writeAnswer } from "./shared";
import type { CommonOptions } from "./shared";

interface RouteCommandOptions extends CommonOptions {
  routesFile: string;
  classifierPrompt?: string;
  classifierSystem?: string;
  printLabel?: boolean;
}

const formatRouteAnswer = (label: string, answer: string, printLabel: boolean) =>
  printLabel ? `[${label}] ${answer}` : answer;

export const registerRouteCommand = (program: Command) => {
  program
    .command("route [input]")
    .description("Classify the input and hand it to the matching route's prompt.")
    .requiredOption("-r, --routes-file <file>", "YAML or JSON file mapping labels to routes.")
    .option("--classifier-prompt <template>", "Classifier prompt with {labels} and {input}.")
    .option("--classifier-system <text>", "System prompt for the classifier.")
    .option("--print-label", "Prefix the answer with the chosen label.")
    .option("-m, --model <name>", "Model name.")
    .option("--stream", "Stream generation output (default).")
    .option("--no-stream", "Disable streaming.")
    .option("--log <file>", "Append JSONL execution records to this file.")
    .option("-v, --verbose", "Print debug output and streamed tokens to stderr.")
    .action(async (inputArg: string | undefined, options: RouteCommandOptions) => {
      const input = await resolvePromptInput(inputArg);
      const routes = await loadRoutes(options.routesFile);
      const runtime = createWorkflowRuntime(options, {
        maxWorkers: ORCHESTRATE_DEFAULT_WORKERS,
      });
      const { config, deps } = runtime;

      const result = await runRoute(deps, {
        input: input.text,
        routes,
        classifierPrompt: options.classifierPrompt,
        classifierSystem: options.classifierSystem,
        model: config.model,
        stream: config.stream,
        onToken: runtime.onToken,
      });
      await deps.log.flush();

      const outcome = settleResult(result, deps.logger);
      if (outcome) {
        deps.logger.debug(`Routed to ${outcome.label}`, { scope: "route" });
        writeAnswer(formatRouteAnswer(outcome.label, outcome.answer, options.printLabel ?? false));
      }
    });
};
