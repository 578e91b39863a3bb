import { InvalidArgumentError } from "commander";
import type { Command } from "commander";
import { defaultParallelWorkers } from "../core/config";
import { sectionByRegex, sectionBySize } from "../core/sectioning";
import { readInputText } from "../core/task-input";
import { runParallel } from "../orchestrator/parallel";
import type { ParallelMode, SectionAggregate, VoteMode } from "../orchestrator/parallel";
import {
  createWorkflowRuntime,
  parsePositiveInteger,
  parseTimeoutSeconds,
  settleResult,
  writeAnswer,
} from "./shared";
import type { CommonOptions } from "./shared";

interface ParallelCommandOptions extends CommonOptions {
  prompt: string;
  system?: string;
  input?: string;
  maxWorkers?: number;
  timeout?: number;
  maxInputTokens?: number;
  section?: number;
  sectionRegex?: string;
  aggregate?: SectionAggregate;
  vote?: number;
  voteMode: VoteMode;
  dedupe?: boolean;
}

const SECTION_AGGREGATES: readonly SectionAggregate[] = ["concat", "json"];
const VOTE_MODES: readonly VoteMode[] = ["majority", "max-tokens"];

const parseChoice =
  <T extends string>(choices: readonly T[]) =>
  (value: string): T => {
    const match = choices.find((choice) => choice === value);
    if (!match) {
      throw new InvalidArgumentError(`Allowed choices are ${choices.join(", ")}.`);
    }
    return match;
  };

const splitInput = (text: string, options: ParallelCommandOptions) => {
  if (options.section !== undefined) {
    return sectionBySize(text, options.section);
  }
  if (options.sectionRegex !== undefined) {
    return sectionByRegex(text, options.sectionRegex);
  }
  return [];
};

// Returns a usage message when the flags do not select exactly one mode.
const resolveMode = (
  options: ParallelCommandOptions,
  input: string
): ParallelMode | string => {
  const sectioning = options.section !== undefined || options.sectionRegex !== undefined;
  if (options.section !== undefined && options.sectionRegex !== undefined) {
    return "Use either --section or --section-regex, not both.";
  }
  if (sectioning && options.vote !== undefined) {
    return "Sectioning and --vote cannot be combined.";
  }
  if (sectioning) {
    if (!options.aggregate) {
      return "Sectioning requires --aggregate concat|json.";
    }
    return { kind: "section", sections: splitInput(input, options), aggregate: options.aggregate };
  }
  if (options.vote !== undefined) {
    return {
      kind: "vote",
      count: options.vote,
      voteMode: options.voteMode,
      dedupe: options.dedupe ?? false,
    };
  }
  return "Choose a mode: --section, --section-regex or --vote.";
};

export const registerParallelCommand = (program: Command) => {
  program
    .command("parallel")
    .description("Run one prompt over input sections, or several times and vote.")
    .requiredOption("-p, --prompt <text>", "Prompt applied to every task.")
    .option("--system <text>", "System prompt for every task.")
    .option("-i, --input <file>", "Input text to section (default: stdin).")
    .option("-m, --model <name>", "Model name.")
    .option("--stream", "Stream generation output (default).")
    .option("--no-stream", "Disable streaming.")
    .option("--max-workers <n>", "Concurrent worker calls.", parsePositiveInteger)
    .option("--timeout <seconds>", "Per-task timeout in seconds.", parseTimeoutSeconds)
    .option("--max-input-tokens <n>", "Drop outputs above this many tokens.", parsePositiveInteger)
    .option("--section <size>", "Split input into chunks of this many characters.", parsePositiveInteger)
    .option("--section-regex <pattern>", "Split input before each match of this pattern.")
    .option("--aggregate <policy>", "concat or json (sectioning).", parseChoice(SECTION_AGGREGATES))
    .option("--vote <n>", "Run the prompt n times and pick one answer.", parsePositiveInteger)
    .option("--vote-mode <mode>", "majority or max-tokens.", parseChoice(VOTE_MODES), "majority")
    .option("--dedupe", "Collapse identical answers before voting.")
    .option("--log <file>", "Append JSONL execution records to this file.")
    .option("-v, --verbose", "Print debug output and streamed tokens to stderr.")
    .action(async (options: ParallelCommandOptions, command: Command) => {
      const needsInput = options.vote === undefined;
      const input = needsInput ? await readInputText(options.input) : "";
      const mode = resolveMode(options, input);
      if (typeof mode === "string") {
        command.error(mode);
      }

      const runtime = createWorkflowRuntime(options, { maxWorkers: defaultParallelWorkers() });
      const { config, deps } = runtime;
      const onToken = runtime.onToken;

      const result = await runParallel(deps, {
        prompt: options.prompt,
        system: options.system,
        mode,
        maxConcurrency: config.maxWorkers,
        perTaskTimeoutMs: config.timeoutMs,
        maxInputTokens: config.maxInputTokens,
        model: config.model,
        stream: config.stream,
        onToken: onToken ? (_taskId, chunk) => onToken(chunk) : undefined,
      });
      await deps.log.flush();

      const outcome = settleResult(result, deps.logger);
      if (outcome) {
        writeAnswer(outcome.answer);
      }
    });
};
