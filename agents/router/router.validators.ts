import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { ValidationResult } from "../shared";
import { buildErrorResult, buildOkResult } from "../shared";
import type { Routes } from "./router.types";

const routesSchema = z
  .record(
    z.string().min(1),
    z.object({
      template: z.string().min(1),
      system: z.string().min(1).optional(),
      model: z.string().min(1).optional(),
    })
  )
  .refine((routes) => Object.keys(routes).length > 0, {
    message: "Routes file must define at least one route.",
  });

const validateRoutes = (value: unknown): ValidationResult<Routes> => {
  const parsed = routesSchema.safeParse(value);
  if (!parsed.success) {
    return buildErrorResult(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return buildOkResult(parsed.data);
};

const parseRoutesText = (text: string, format: "json" | "yaml"): unknown =>
  format === "json" ? JSON.parse(text) : parseYaml(text);

const loadRoutes = async (path: string): Promise<Routes> => {
  const text = await readFile(path, "utf-8");
  const format = extname(path).toLowerCase() === ".json" ? "json" : "yaml";
  let raw: unknown;
  try {
    raw = parseRoutesText(text, format);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unreadable routes file.";
    throw new Error(`Unable to parse routes file ${path}: ${message}`);
  }

  const validated = validateRoutes(raw);
  if (!validated.ok) {
    throw new Error(`Invalid routes file ${path}: ${validated.errors.join(" ")}`);
  }
  return validated.value;
};

const fillTemplate = (template: string, values: Record<string, string>) =>
  template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] ?? "" : placeholder
  );

export { fillTemplate, loadRoutes, parseRoutesText, routesSchema, validateRoutes };
