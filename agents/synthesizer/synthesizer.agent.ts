import type { GenerationClient } from "../../llm/generation.types";
import { readPrompt } from "../shared";

const SYSTEM_PROMPT_URL = new URL("./synthesizer.system.md", import.meta.url);

interface SynthesizerAgentOptions {
  model?: string;
  stream?: boolean;
  onToken?: (chunk: string) => void;
}

interface SynthesizerAgent {
  synthesize: (aggregatePrompt: string, results: string[]) => Promise<string>;
}

const buildSynthesisPrompt = (aggregatePrompt: string, results: string[]) => {
  const body = results.join("\n\n");
  const instruction = aggregatePrompt.trim();
  return instruction.length > 0 ? `${instruction}\n\n${body}` : body;
};

const createSynthesizerAgent = (
  client: GenerationClient,
  options: SynthesizerAgentOptions = {}
): SynthesizerAgent => {
  const synthesize = async (aggregatePrompt: string, results: string[]) => {
    const system = await readPrompt(SYSTEM_PROMPT_URL);
    return client.generate({
      prompt: buildSynthesisPrompt(aggregatePrompt, results),
      system,
      model: options.model,
      stream: options.stream ?? false,
      onToken: options.onToken,
    });
  };

  return { synthesize };
};

export { buildSynthesisPrompt, createSynthesizerAgent };
export type { SynthesizerAgent, SynthesizerAgentOptions };
