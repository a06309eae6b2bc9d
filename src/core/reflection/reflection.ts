import type { KnowledgeSnippet, TurnPatch, TurnState } from "../turn/turn.types";
import type { LongTermMemoryStore } from "../memory/memory.types";
import { REINFORCEMENT_MIN_SESSIONS } from "../memory/memory.types";

export const CONFIDENCE_WEIGHTS = Object.freeze({
  base: 0.4,
  knowledge: 0.2,
  tools: 0.3,
  cancelPenalty: 0.5,
} as const);

export const RERANK_THRESHOLD = 0.7;
export const RERANK_WORD_BONUS = 0.1;
export const RERANK_TOP_K = 3;

export interface ConfidenceInputs {
  readonly hasKnowledge: boolean;
  readonly successfulTools: number;
  readonly failedTools: number;
  readonly cancelled: boolean;
}

export function confidenceInputs(
  state: Pick<TurnState, "retrievedKnowledge" | "toolResults" | "interrupt">
): ConfidenceInputs {
  let successfulTools = 0;
  let failedTools = 0;
  for (const outcome of Object.values(state.toolResults)) {
    if (outcome.kind === "ok") {
      successfulTools += 1;
    } else {
      failedTools += 1;
    }
  }
  return {
    hasKnowledge: state.retrievedKnowledge.length > 0,
    successfulTools,
    failedTools,
    cancelled: state.interrupt.status === "RESOLVED" && state.interrupt.choice === "CANCEL",
  };
}

// Non-decreasing in successes, non-increasing in failures, always within [0, 1].
export function computeConfidence(inputs: ConfidenceInputs): number {
  const s = inputs.successfulTools;
  const f = inputs.failedTools;
  const raw =
    CONFIDENCE_WEIGHTS.base +
    (inputs.hasKnowledge ? CONFIDENCE_WEIGHTS.knowledge : 0) +
    CONFIDENCE_WEIGHTS.tools * (s / (s + f + 1));
  const scaled = inputs.cancelled ? raw * CONFIDENCE_WEIGHTS.cancelPenalty : raw;
  return Math.min(1, Math.max(0, scaled));
}

/**
 * Boosts each snippet by the number of query words it contains and keeps the best few.
 * Ties keep retrieval order.
 */
export function rerankKnowledge(
  snippets: readonly KnowledgeSnippet[],
  query: string
): readonly KnowledgeSnippet[] {
  const words = query.normalize("NFC").split(/\s+/).filter((word) => word !== "");
  return snippets
    .map((snippet) => {
      const matches = words.filter((word) => snippet.text.includes(word)).length;
      return { text: snippet.text, score: snippet.score + RERANK_WORD_BONUS * matches };
    })
    .sort((a, b) => b.score - a.score)
    .slice(0, RERANK_TOP_K);
}

export async function reflectOnTurn(
  state: TurnState,
  store: LongTermMemoryStore
): Promise<TurnPatch> {
  const confidence = computeConfidence(confidenceInputs(state));
  const longTermFacts = await store.consolidate(state.userId, REINFORCEMENT_MIN_SESSIONS);
  if (confidence < RERANK_THRESHOLD && state.retrievedKnowledge.length > 0) {
    return {
      confidence,
      longTermFacts,
      retrievedKnowledge: rerankKnowledge(state.retrievedKnowledge, state.turnInput),
    };
  }
  return { confidence, longTermFacts };
}
