interface GenerateRequest {
  prompt: string;
  system?: string;
  model?: string;
  stream?: boolean;
  signal?: AbortSignal;
  onToken?: (chunk: string) => void;
}

interface GenerationClient {
  generate: (request: GenerateRequest) => Promise<string>;
}

interface GenerationClientOptions {
  apiKey?: string;
  baseURL?: string;
  defaultModel: string;
}

export type { GenerateRequest, GenerationClient, GenerationClientOptions };
