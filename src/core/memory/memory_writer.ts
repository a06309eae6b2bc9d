import type { TurnPatch, TurnState } from "../turn/turn.types";
import { TurnStateError } from "../turn/errors";
import { extractFacts } from "./fact_extractor";
import type { LongTermMemoryStore } from "./memory.types";
import { appendShortTerm } from "./short_term";

/**
 * Runs once per completed turn, cancellations included. History and short-term memory are
 * appended; extracted facts are unioned into the user's long-term memory.
 */
export async function writeTurnMemory(
  state: TurnState,
  store: LongTermMemoryStore
): Promise<TurnPatch> {
  if (state.memoryWritten) {
    return {};
  }
  if (state.finalAnswer === null) {
    throw new TurnStateError("MEMORY_WRITE_ERROR finalAnswer must be set before memory write");
  }

  const turn = { user: state.turnInput, answer: state.finalAnswer };
  const facts = extractFacts(state.turnInput);
  if (facts.length > 0) {
    await store.recordFacts(state.userId, state.sessionId, facts);
    console.log(`[memory] user=${state.userId} recorded ${facts.length} fact(s)`);
  }

  return {
    conversationHistory: [...state.conversationHistory, turn],
    shortTermMemory: appendShortTerm(state.shortTermMemory, turn),
    memoryWritten: true,
  };
}
