import type {
  AggregationPolicy,
  RoundResult,
  SuccessOutcome,
} from "./orchestrator.types";

const NO_SUCCESSFUL_OUTCOMES = "NoSuccessfulOutcomes";

type AggregationResult =
  | { ok: true; value: string }
  | { ok: false; error: typeof NO_SUCCESSFUL_OUTCOMES };

interface JsonEntry {
  index: number;
  text: string | null;
  status: "ok" | "error" | "dropped";
}

interface Candidate {
  index: number;
  outcome: SuccessOutcome;
}

const noSuccessfulOutcomes = (): AggregationResult => ({
  ok: false,
  error: NO_SUCCESSFUL_OUTCOMES,
});

const collectSuccesses = (round: RoundResult): Candidate[] =>
  round.flatMap((entry, index) =>
    entry.outcome.kind === "success" ? [{ index, outcome: entry.outcome }] : []
  );

// Keeps the first occurrence of each trimmed text.
const dedupeCandidates = (candidates: Candidate[]): Candidate[] => {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    const key = candidate.outcome.text.trim();
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
};

const buildJsonEntries = (round: RoundResult): JsonEntry[] =>
  round.map((entry, index) => {
    if (entry.outcome.kind === "success") {
      return { index, text: entry.outcome.text, status: "ok" };
    }
    if (entry.outcome.kind === "failure") {
      return { index, text: null, status: "error" };
    }
    return { index, text: null, status: "dropped" };
  });

const aggregateConcat = (candidates: Candidate[]): AggregationResult => {
  if (candidates.length === 0) {
    return noSuccessfulOutcomes();
  }
  return {
    ok: true,
    value: candidates.map((candidate) => candidate.outcome.text).join("\n\n"),
  };
};

const aggregateMajority = (candidates: Candidate[]): AggregationResult => {
  const groups = new Map<string, { first: Candidate; size: number }>();
  for (const candidate of candidates) {
    const key = candidate.outcome.text.trim();
    const group = groups.get(key);
    if (group) {
      group.size += 1;
    } else {
      groups.set(key, { first: candidate, size: 1 });
    }
  }

  let winner: { first: Candidate; size: number } | undefined;
  for (const group of groups.values()) {
    if (
      !winner ||
      group.size > winner.size ||
      (group.size === winner.size && group.first.index < winner.first.index)
    ) {
      winner = group;
    }
  }

  if (!winner) {
    return noSuccessfulOutcomes();
  }
  return { ok: true, value: winner.first.outcome.text };
};

const aggregateMaxTokens = (candidates: Candidate[]): AggregationResult => {
  let winner: Candidate | undefined;
  for (const candidate of candidates) {
    if (!winner || candidate.outcome.tokenCount > winner.outcome.tokenCount) {
      winner = candidate;
    }
  }

  if (!winner) {
    return noSuccessfulOutcomes();
  }
  return { ok: true, value: winner.outcome.text };
};

const aggregate = (
  round: RoundResult,
  policy: AggregationPolicy,
  dedupe = false
): AggregationResult => {
  if (policy === "json") {
    return { ok: true, value: JSON.stringify(buildJsonEntries(round), null, 2) };
  }

  const successes = collectSuccesses(round);
  if (policy === "concat") {
    return aggregateConcat(successes);
  }

  const candidates = dedupe ? dedupeCandidates(successes) : successes;
  if (policy === "majority") {
    return aggregateMajority(candidates);
  }
  return aggregateMaxTokens(candidates);
};

export { NO_SUCCESSFUL_OUTCOMES, aggregate, buildJsonEntries };
export type { AggregationResult, JsonEntry };
