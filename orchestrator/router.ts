import { createRouterAgent } from "../agents/router/router.agent";
import type { Routes } from "../agents/router/router.types";
import { fillTemplate } from "../agents/router/router.validators";
import { describeError, failure } from "./orchestrator.types";
import type { OrchestratorResult, WorkflowDeps } from "./orchestrator.types";

interface RouteOptions {
  input: string;
  routes: Routes;
  model?: string;
  stream?: boolean;
  classifierPrompt?: string;
  classifierSystem?: string;
  onToken?: (chunk: string) => void;
}

interface RouteOutcome {
  label: string;
  answer: string;
}

const runRoute = async (
  deps: WorkflowDeps,
  options: RouteOptions
): Promise<OrchestratorResult<RouteOutcome>> => {
  const labels = Object.keys(options.routes);
  const router = createRouterAgent(deps.client, {
    model: options.model,
    classifierPrompt: options.classifierPrompt,
    classifierSystem: options.classifierSystem,
  });

  let label: string;
  try {
    label = await router.classify(options.input, labels);
  } catch (error) {
    deps.log.record({ step_kind: "classify", status: "error", detail: describeError(error) });
    return failure("generation", "classify", `Classifier call failed: ${describeError(error)}`);
  }

  const route = Object.prototype.hasOwnProperty.call(options.routes, label)
    ? options.routes[label]
    : undefined;
  if (!route) {
    deps.log.record({ step_kind: "classify", status: "error", detail: `invalid label: ${label}` });
    return failure("classification", "classify", `Classifier returned invalid label: ${label}`);
  }
  deps.log.record({ step_kind: "classify", status: "ok", detail: label, data: { labels } });

  const prompt = fillTemplate(route.template, { input: options.input });
  let answer: string;
  try {
    answer = await deps.client.generate({
      prompt,
      system: route.system,
      model: route.model ?? options.model,
      stream: options.stream ?? false,
      onToken: options.onToken,
    });
  } catch (error) {
    deps.log.record({ step_kind: "handle", status: "error", detail: describeError(error) });
    return failure("generation", "handle", `Route handler failed: ${describeError(error)}`);
  }

  deps.log.record({ step_kind: "handle", status: "ok", detail: label, data: { prompt } });
  return { ok: true, step: "handle", value: { label, answer } };
};

export { runRoute };
export type { RouteOptions, RouteOutcome };
