import type { Command } from "commander";
import { ORCHESTRATE_DEFAULT_WORKERS } from "../core/config";
import { readPromptLines } from "../core/task-input";
import { loadGateSchema, runChain } from "../orchestrator/chain";
import { createWorkflowRuntime, settleResult, writeAnswer } from "./shared";
import type { CommonOptions } from "./shared";

interface ChainCommandOptions extends CommonOptions {
  prompt: string[];
  promptsFile?: string;
  gateSchema?: string;
}

const collectPrompt = (value: string, previous: string[]) => [...previous, value];

export const registerChainCommand = (program: Command) => {
  program
    .command("chain")
    .description("Run prompts in sequence, feeding each result into the next prompt.")
    .option("-p, --prompt <text>", "Prompt step (repeat for each step).", collectPrompt, [])
    .option("--prompts-file <file>", "File with one prompt per line.")
    .option("--gate-schema <file>", "JSON schema every step's output must satisfy.")
    .option("-m, --model <name>", "Model name.")
    .option("--stream", "Stream generation output (default).")
    .option("--no-stream", "Disable streaming.")
    .option("--log <file>", "Append JSONL execution records to this file.")
    .option("-v, --verbose", "Print debug output and streamed tokens to stderr.")
    .action(async (options: ChainCommandOptions) => {
      const prompts = options.promptsFile
        ? [...options.prompt, ...(await readPromptLines(options.promptsFile))]
        : options.prompt;
      const gate = options.gateSchema ? await loadGateSchema(options.gateSchema) : undefined;
      const runtime = createWorkflowRuntime(options, {
        maxWorkers: ORCHESTRATE_DEFAULT_WORKERS,
      });
      const { config, deps } = runtime;

      const result = await runChain(deps, {
        prompts,
        gate,
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
