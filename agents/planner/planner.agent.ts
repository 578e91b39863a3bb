import type { GenerationClient } from "../../llm/generation.types";
import { readPrompt } from "../shared";
import type {
  PlannerAgent,
  PlannerAgentOptions,
  PlannerOutput,
} from "./planner.types";
import { parsePlan } from "./planner.validators";

const SYSTEM_PROMPT_URL = new URL("./planner.system.md", import.meta.url);

const createPlannerAgent = (
  client: GenerationClient,
  options: PlannerAgentOptions = {}
): PlannerAgent => {
  const plan = async (request: string): Promise<PlannerOutput> => {
    const system = await readPrompt(SYSTEM_PROMPT_URL);
    const raw = await client.generate({
      prompt: request,
      system,
      model: options.model,
      stream: options.stream ?? false,
      onToken: options.onToken,
    });
    return { raw, parsed: parsePlan(raw) };
  };

  return { plan };
};

export { createPlannerAgent };
export type { PlannerAgent, PlannerOutput };
