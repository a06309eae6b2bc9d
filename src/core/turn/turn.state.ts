import { TurnStateError } from "./errors";
import type {
  ConversationTurn,
  LongTermFact,
  TurnPatch,
  TurnState,
  UserConstraints,
} from "./turn.types";

export interface BeginTurnInput {
  readonly sessionId: string;
  readonly userId: string;
  readonly turnInput: string;
  readonly constraints?: UserConstraints;
  readonly conversationHistory: readonly ConversationTurn[];
  readonly shortTermMemory: readonly ConversationTurn[];
  readonly longTermFacts: readonly LongTermFact[];
  readonly budgetCeiling: number;
}

/**
 * The only place per-turn fields are (re)initialized. Persisted fields are carried over
 * from the session record unchanged.
 */
export function beginTurn(input: BeginTurnInput): TurnState {
  if (!Number.isFinite(input.budgetCeiling) || input.budgetCeiling < 0) {
    throw new TurnStateError(`TURN_STATE_ERROR budget ceiling must be >= 0, got ${String(input.budgetCeiling)}`);
  }

  return {
    sessionId: input.sessionId,
    userId: input.userId,
    turnInput: input.turnInput,
    constraints: input.constraints ?? {},
    conversationHistory: [...input.conversationHistory],
    shortTermMemory: [...input.shortTermMemory],
    longTermFacts: [...input.longTermFacts],
    route: null,
    retrievedKnowledge: [],
    modification: [],
    draftAnswer: null,
    pendingToolCalls: [],
    toolResults: {},
    nextCallSeq: 1,
    budget: {
      ceiling: input.budgetCeiling,
      spentEstimate: 0,
      overageTolerated: false,
    },
    interrupt: { status: "NONE" },
    finalAnswer: null,
    confidence: null,
    memoryWritten: false,
  };
}

export function applyPatch(state: TurnState, patch: TurnPatch | void): TurnState {
  if (!patch) {
    return state;
  }

  return {
    ...state,
    ...patch,
  };
}

export function previousAnswer(state: Pick<TurnState, "conversationHistory">): string | null {
  const last = state.conversationHistory[state.conversationHistory.length - 1];
  return last ? last.answer : null;
}
