interface Evaluation {
  score: number;
  feedback: string;
}

interface EvaluatorOutput {
  raw: string;
  evaluation: Evaluation;
  parseable: boolean;
  errors: string[];
}

interface EvaluatorAgentOptions {
  model?: string;
  rubric?: string;
}

interface EvaluatorAgent {
  evaluate: (answer: string) => Promise<EvaluatorOutput>;
}

export type { Evaluation, EvaluatorAgent, EvaluatorAgentOptions, EvaluatorOutput };
