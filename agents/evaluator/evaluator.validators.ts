import { z } from "zod";
import { parseJsonWith } from "../shared";
import type { ValidationResult } from "../shared";
import type { Evaluation } from "./evaluator.types";

const UNPARSEABLE_FEEDBACK = "<unparseable evaluator output>";

const scoreSchema = z.preprocess(
  (value) =>
    typeof value === "string" && value.trim().length > 0 ? Number(value) : value,
  z.number().finite()
);

const evaluationSchema = z.object({
  score: scoreSchema.transform((score) => Math.min(1, Math.max(0, score))),
  feedback: z.string().default(""),
});

const parseEvaluation = (outputText: string): ValidationResult<Evaluation> =>
  parseJsonWith(outputText, evaluationSchema);

const unparseableEvaluation = (): Evaluation => ({
  score: 0,
  feedback: UNPARSEABLE_FEEDBACK,
});

export {
  UNPARSEABLE_FEEDBACK,
  evaluationSchema,
  parseEvaluation,
  unparseableEvaluation,
};
