import { vi } from "vitest";
import { createLogger } from "../../core/logger";
import type { GenerateRequest, GenerationClient } from "../../llm/generation.types";
import { createMemoryExecutionLog } from "../execution-log";
import type { MemoryExecutionLog } from "../execution-log";
import type { WorkflowDeps } from "../orchestrator.types";

// ─── Scripted generation client ──────────────────────────────────────────────

interface ScriptedReply {
  text?: string;
  error?: Error;
  delayMs?: number;
  chunks?: string[];
  ignoreAbort?: boolean;
}

type Reply = string | Error | ScriptedReply;

interface FakeClient extends GenerationClient {
  calls: GenerateRequest[];
  peakInFlight: () => number;
}

const normalizeReply = (reply: Reply): ScriptedReply => {
  if (typeof reply === "string") {
    return { text: reply };
  }
  if (reply instanceof Error) {
    return { error: reply };
  }
  return reply;
};

const wait = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("aborted"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

function makeClient(respond: (request: GenerateRequest, callIndex: number) => Reply): FakeClient {
  const calls: GenerateRequest[] = [];
  let inFlight = 0;
  let peak = 0;

  const generate = vi.fn(async (request: GenerateRequest): Promise<string> => {
    const reply = normalizeReply(respond(request, calls.length));
    calls.push(request);
    inFlight += 1;
    peak = Math.max(peak, inFlight);
    try {
      if (reply.delayMs !== undefined) {
        await wait(reply.delayMs, reply.ignoreAbort ? undefined : request.signal);
      }
      if (reply.error) {
        throw reply.error;
      }
      if (request.stream) {
        for (const chunk of reply.chunks ?? []) {
          request.onToken?.(chunk);
        }
      }
      return reply.text ?? "";
    } finally {
      inFlight -= 1;
    }
  });

  return { generate, calls, peakInFlight: () => peak };
}

// Replies in call order; use only where calls are sequential.
function makeSequenceClient(replies: Reply[]): FakeClient {
  return makeClient((_request, index) => replies[index] ?? new Error(`No reply for call ${index + 1}`));
}

// Replies by exact prompt text.
function makePromptClient(replies: Record<string, Reply>): FakeClient {
  return makeClient((request) => {
    const reply = replies[request.prompt];
    return reply ?? new Error(`No reply for prompt: ${request.prompt}`);
  });
}

// ─── Workflow dependencies ───────────────────────────────────────────────────

interface TestDeps extends WorkflowDeps {
  log: MemoryExecutionLog;
  lines: string[];
}

function makeDeps(client: GenerationClient, verbose = false): TestDeps {
  const lines: string[] = [];
  return {
    client,
    log: createMemoryExecutionLog(),
    logger: createLogger({ verbose, write: (line) => lines.push(line) }),
    lines,
  };
}

export { makeClient, makeDeps, makePromptClient, makeSequenceClient };
export type { FakeClient, Reply, ScriptedReply, TestDeps };
