import type { GenerationClient } from "../../llm/generation.types";
import { readPrompt } from "../shared";
import type {
  EvaluatorAgent,
  EvaluatorAgentOptions,
  EvaluatorOutput,
} from "./evaluator.types";
import { parseEvaluation, unparseableEvaluation } from "./evaluator.validators";

const SYSTEM_PROMPT_URL = new URL("./evaluator.system.md", import.meta.url);

const DEFAULT_RUBRIC =
  "Evaluate the quality, clarity, and completeness of the output.";

const buildEvaluationPrompt = (answer: string, rubric: string) =>
  `Output to evaluate:\n${answer}\n\nRubric:\n${rubric}`;

const createEvaluatorAgent = (
  client: GenerationClient,
  options: EvaluatorAgentOptions = {}
): EvaluatorAgent => {
  const rubric = options.rubric ?? DEFAULT_RUBRIC;

  const evaluate = async (answer: string): Promise<EvaluatorOutput> => {
    const system = await readPrompt(SYSTEM_PROMPT_URL);
    // Evaluator output is JSON and is never streamed.
    const raw = await client.generate({
      prompt: buildEvaluationPrompt(answer, rubric),
      system,
      model: options.model,
      stream: false,
    });

    const parsed = parseEvaluation(raw);
    if (!parsed.ok) {
      return {
        raw,
        evaluation: unparseableEvaluation(),
        parseable: false,
        errors: parsed.errors,
      };
    }
    return { raw, evaluation: parsed.value, parseable: true, errors: [] };
  };

  return { evaluate };
};

export { DEFAULT_RUBRIC, buildEvaluationPrompt, createEvaluatorAgent };
