import type { GenerationClient } from "../../llm/generation.types";
import { readPrompt } from "../shared";
import type { RouterAgent, RouterAgentOptions } from "./router.types";
import { fillTemplate } from "./router.validators";

const SYSTEM_PROMPT_URL = new URL("./router.system.md", import.meta.url);

const buildClassifierPrompt = (
  input: string,
  labels: string[],
  template?: string
) => {
  if (template) {
    return fillTemplate(template, { labels: labels.join(", "), input });
  }
  return `Classify the following input into one of these categories: ${labels.join(
    ", "
  )}\n\nInput: ${input}`;
};

const createRouterAgent = (
  client: GenerationClient,
  options: RouterAgentOptions = {}
): RouterAgent => {
  const classify = async (input: string, labels: string[]) => {
    const system = options.classifierSystem ?? (await readPrompt(SYSTEM_PROMPT_URL));
    const label = await client.generate({
      prompt: buildClassifierPrompt(input, labels, options.classifierPrompt),
      system,
      model: options.model,
      stream: false,
    });
    return label.trim();
  };

  return { classify };
};

export { buildClassifierPrompt, createRouterAgent };
