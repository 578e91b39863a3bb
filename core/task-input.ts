import { access, readFile } from "node:fs/promises";
import { extname, resolve } from "node:path";

interface PromptInputResult {
  text: string;
  source: "cli" | "file" | "stdin";
  filePath?: string;
}

type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

interface StringMap {
  [key: string]: unknown;
}

const PROMPT_FILE_EXTENSIONS = new Set([".md", ".txt", ".json"]);

const isRecord = (value: unknown): value is StringMap =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const fileExists = async (path: string) => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

const findStringField = (value: StringMap, keys: string[]) => {
  for (const key of keys) {
    const candidate = value[key];
    if (typeof candidate === "string" && candidate.trim().length > 0) {
      return candidate.trim();
    }
  }
  return "";
};

const readPromptFromJson = async (filePath: string) => {
  const text = await readFile(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid JSON.";
    throw new Error(`Unable to parse JSON prompt file: ${message}`);
  }

  if (typeof parsed === "string") {
    const trimmed = parsed.trim();
    if (trimmed.length === 0) {
      throw new Error("JSON prompt file is an empty string.");
    }
    return trimmed;
  }

  if (!isRecord(parsed)) {
    throw new Error("JSON prompt file must be a string or object.");
  }

  const direct = findStringField(parsed, ["prompt", "task", "description"]);
  if (direct.length > 0) {
    return direct;
  }

  throw new Error(
    "JSON prompt file must include a string field named prompt, task, or description."
  );
};

const readStream = async (stream: NodeJS.ReadableStream) => {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf-8"));
  }
  return chunks.join("");
};

const resolvePromptInput = async (
  input: string | undefined,
  stdin: InputStream = process.stdin
): Promise<PromptInputResult> => {
  if (input !== undefined) {
    const ext = extname(input).toLowerCase();
    const filePath = resolve(process.cwd(), input);
    if (PROMPT_FILE_EXTENSIONS.has(ext) && (await fileExists(filePath))) {
      if (ext === ".json") {
        return { text: await readPromptFromJson(filePath), source: "file", filePath };
      }
      const trimmed = (await readFile(filePath, "utf-8")).trim();
      if (trimmed.length === 0) {
        throw new Error(`Prompt file is empty: ${filePath}`);
      }
      return { text: trimmed, source: "file", filePath };
    }

    const trimmed = input.trim();
    if (trimmed.length === 0) {
      throw new Error("Prompt must not be empty.");
    }
    return { text: trimmed, source: "cli" };
  }

  if (stdin.isTTY) {
    throw new Error("Prompt is required (use --prompt or pipe to stdin).");
  }

  const piped = (await readStream(stdin)).trim();
  if (piped.length === 0) {
    throw new Error("Prompt read from stdin is empty.");
  }
  return { text: piped, source: "stdin" };
};

const readInputText = async (
  inputFile: string | undefined,
  stdin: InputStream = process.stdin
) => {
  if (inputFile !== undefined) {
    return readFile(resolve(process.cwd(), inputFile), "utf-8");
  }
  if (stdin.isTTY) {
    return "";
  }
  return readStream(stdin);
};

const readPromptLines = async (filePath: string) => {
  const text = await readFile(resolve(process.cwd(), filePath), "utf-8");
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
};

// A rubric flag names a file when one exists at that path, otherwise it is the rubric itself.
const resolveRubric = async (value: string | undefined) => {
  if (value === undefined) {
    return undefined;
  }
  const filePath = resolve(process.cwd(), value);
  if (await fileExists(filePath)) {
    return (await readFile(filePath, "utf-8")).trim();
  }
  return value;
};

export {
  fileExists,
  readInputText,
  readPromptLines,
  readStream,
  resolvePromptInput,
  resolveRubric,
};
export type { InputStream, PromptInputResult };
