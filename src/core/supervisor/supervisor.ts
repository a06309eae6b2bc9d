import type { ConversationTurn, Route } from "../turn/turn.types";
import type { CueMatch, TurnClassifier } from "./turn.classifier";

export interface RouteDecision {
  readonly route: Route;
  readonly cue: CueMatch | null;
}

export const CLARIFICATION_MESSAGE =
  "요청을 이해하지 못했어요. 어떤 요리나 장보기를 도와드릴지 조금 더 자세히 말씀해 주세요.";

function hasWordCharacter(text: string): boolean {
  return /[\p{L}\p{N}]/u.test(text);
}

export function routeTurn(
  input: {
    readonly turnInput: string;
    readonly conversationHistory: readonly ConversationTurn[];
  },
  classifier: TurnClassifier
): RouteDecision {
  const text = input.turnInput.trim();
  if (text === "" || !hasWordCharacter(text)) {
    return { route: "UNROUTABLE", cue: null };
  }

  if (input.conversationHistory.length === 0) {
    return { route: "NEW", cue: null };
  }

  const cue = classifier.detectModificationCue(text);
  if (cue === null) {
    return { route: "NEW", cue: null };
  }

  return { route: "MODIFY", cue };
}
