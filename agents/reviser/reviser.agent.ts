import type { GenerationClient } from "../../llm/generation.types";

interface ReviserAgentOptions {
  model?: string;
  stream?: boolean;
  onToken?: (chunk: string) => void;
}

interface ReviserAgent {
  revise: (answer: string, feedback: string) => Promise<string>;
}

const buildRevisionPrompt = (answer: string, feedback: string) =>
  [
    "Revise the following output based on this feedback.",
    `Output:\n${answer}`,
    `Feedback:\n${feedback}`,
    "Return the improved output only.",
  ].join("\n\n");

const createReviserAgent = (
  client: GenerationClient,
  options: ReviserAgentOptions = {}
): ReviserAgent => {
  const revise = (answer: string, feedback: string) =>
    client.generate({
      prompt: buildRevisionPrompt(answer, feedback),
      model: options.model,
      stream: options.stream ?? false,
      onToken: options.onToken,
    });

  return { revise };
};

export { buildRevisionPrompt, createReviserAgent };
export type { ReviserAgent, ReviserAgentOptions };
