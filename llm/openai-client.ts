import OpenAI from "openai";
import type {
  GenerateRequest,
  GenerationClient,
  GenerationClientOptions,
} from "./generation.types";

const createOpenAIGenerationClient = (
  options: GenerationClientOptions
): GenerationClient => {
  const openai = new OpenAI({
    apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
    baseURL: options.baseURL ?? process.env.OPENAI_BASE_URL,
  });

  const generateOnce = async (request: GenerateRequest, model: string) => {
    const response = await openai.responses.create(
      {
        model,
        instructions: request.system,
        input: request.prompt,
      },
      { signal: request.signal }
    );
    return response.output_text;
  };

  const generateStreamed = async (request: GenerateRequest, model: string) => {
    const stream = await openai.responses.create(
      {
        model,
        instructions: request.system,
        input: request.prompt,
        stream: true,
      },
      { signal: request.signal }
    );

    const chunks: string[] = [];
    for await (const event of stream) {
      if (event.type === "response.output_text.delta") {
        chunks.push(event.delta);
        request.onToken?.(event.delta);
      }
    }
    return chunks.join("");
  };

  const generate = async (request: GenerateRequest): Promise<string> => {
    const model = request.model ?? options.defaultModel;
    const outputText = request.stream
      ? await generateStreamed(request, model)
      : await generateOnce(request, model);

    const trimmed = outputText.trim();
    if (trimmed.length === 0) {
      throw new Error(`Model ${model} returned empty output.`);
    }
    return trimmed;
  };

  return { generate };
};

export { createOpenAIGenerationClient };
