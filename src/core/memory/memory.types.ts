import type { FactKind, LongTermFact } from "../turn/turn.types";

export const SHORT_TERM_LIMIT = 10;
export const REINFORCEMENT_MIN_SESSIONS = 2;

export interface ExtractedFact {
  readonly key: string;
  readonly kind: FactKind;
  readonly subject: string;
  readonly text: string;
}

/**
 * Per-user durable facts. Union only: no operation removes a fact or a recorded session.
 * Implementations serialize writes per user id.
 */
export interface LongTermMemoryStore {
  loadFacts(userId: string): Promise<readonly LongTermFact[]>;
  recordFacts(userId: string, sessionId: string, facts: readonly ExtractedFact[]): Promise<void>;
  consolidate(userId: string, minSessions?: number): Promise<readonly LongTermFact[]>;
}

export function rankFacts(facts: readonly LongTermFact[]): readonly LongTermFact[] {
  return [...facts.filter((fact) => fact.reinforced), ...facts.filter((fact) => !fact.reinforced)];
}
