import { z } from "zod";
import { parseJsonWith } from "../shared";
import type { ValidationResult } from "../shared";
import type { Plan } from "./planner.types";

const planSchema = z
  .object({
    tasks: z.array(
      z.object({
        id: z.union([z.string().min(1), z.number()]),
        prompt: z.string().trim().min(1),
      })
    ),
    aggregate_prompt: z.string().nullish(),
    answer: z.string().nullish(),
  })
  .transform(
    (value): Plan => ({
      tasks: value.tasks,
      aggregatePrompt: value.aggregate_prompt ?? "",
      answer: value.answer ?? undefined,
    })
  );

const parsePlan = (outputText: string): ValidationResult<Plan> =>
  parseJsonWith(outputText, planSchema);

// With no tasks the plan answers the request itself.
const planDirectText = (plan: Plan, raw: string) => {
  const answer = plan.answer?.trim();
  return answer && answer.length > 0 ? answer : raw;
};

export { parsePlan, planDirectText, planSchema };
