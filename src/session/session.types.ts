import type { ConversationTurn } from "../core/turn/turn.types";

/**
 * What survives between turns of one session. Everything else in the turn state is
 * rebuilt at the start of the next turn.
 */
export interface SessionRecord {
  readonly sessionId: string;
  readonly userId: string;
  readonly conversationHistory: readonly ConversationTurn[];
  readonly shortTermMemory: readonly ConversationTurn[];
  readonly budget: number;
  readonly spentEstimate: number;
  readonly updatedAt: string;
}

export interface SessionStore {
  load(sessionId: string): SessionRecord | null;
  save(next: SessionRecord): void;
  prepareFreshSession(sessionId: string): void;
}
