import type { ValidationResult } from "../shared";

interface PlanTask {
  id: string | number;
  prompt: string;
}

interface Plan {
  tasks: PlanTask[];
  aggregatePrompt: string;
  answer?: string;
}

interface PlannerOutput {
  raw: string;
  parsed: ValidationResult<Plan>;
}

interface PlannerAgentOptions {
  model?: string;
  stream?: boolean;
  onToken?: (chunk: string) => void;
}

interface PlannerAgent {
  plan: (request: string) => Promise<PlannerOutput>;
}

export type { Plan, PlanTask, PlannerAgent, PlannerAgentOptions, PlannerOutput };
