interface RouteConfig {
  template: string;
  system?: string;
  model?: string;
}

type Routes = Record<string, RouteConfig>;

interface RouterAgentOptions {
  model?: string;
  classifierPrompt?: string;
  classifierSystem?: string;
}

interface RouterAgent {
  classify: (input: string, labels: string[]) => Promise<string>;
}

export type { RouteConfig, RouterAgent, RouterAgentOptions, Routes };
