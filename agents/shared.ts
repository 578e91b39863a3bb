import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { ZodType, ZodTypeDef } from "zod";

type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[] };

const buildOkResult = <T>(value: T): ValidationResult<T> => ({
  ok: true,
  value,
});

const buildErrorResult = <T>(errors: string[]): ValidationResult<T> => ({
  ok: false,
  errors,
});

const readPrompt = async (url: URL) => {
  try {
    return (await readFile(url, "utf-8")).trim();
  } catch {
    throw new Error(`Prompt file not found: ${fileURLToPath(url)}`);
  }
};

const FENCED_BLOCK = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/;

// Models often wrap JSON answers in a Markdown code fence.
const unwrapCodeFence = (text: string) => {
  const trimmed = text.trim();
  const match = FENCED_BLOCK.exec(trimmed);
  return match ? (match[1] ?? "").trim() : trimmed;
};

const parseJsonWith = <T>(
  text: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): ValidationResult<T> => {
  let raw: unknown;
  try {
    raw = JSON.parse(unwrapCodeFence(text));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid JSON.";
    return buildErrorResult([`Output is not valid JSON: ${message}`]);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return buildErrorResult(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return buildOkResult(parsed.data);
};

export { buildErrorResult, buildOkResult, parseJsonWith, readPrompt, unwrapCodeFence };
export type { ValidationResult };
