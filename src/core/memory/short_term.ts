import type { ConversationTurn } from "../turn/turn.types";
import { SHORT_TERM_LIMIT } from "./memory.types";

export function appendShortTerm(
  memory: readonly ConversationTurn[],
  turn: ConversationTurn,
  limit: number = SHORT_TERM_LIMIT
): readonly ConversationTurn[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`SHORT_TERM_MEMORY_ERROR limit must be >= 1, got ${String(limit)}`);
  }
  const next = [...memory, turn];
  return next.length > limit ? next.slice(next.length - limit) : next;
}
