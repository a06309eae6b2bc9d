export type Route = "NEW" | "MODIFY" | "UNROUTABLE";

export const ROUTES = Object.freeze(["NEW", "MODIFY", "UNROUTABLE"] as const satisfies readonly Route[]);

export interface ConversationTurn {
  readonly user: string;
  readonly answer: string;
}

export interface KnowledgeSnippet {
  readonly text: string;
  readonly score: number;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export type ToolArguments = Readonly<Record<string, JsonValue>>;

export interface ToolCall {
  readonly id: string;
  readonly tool: string;
  readonly arguments: ToolArguments;
}

export type ToolFailureCode =
  | "TOOL_NOT_FOUND"
  | "INVALID_ARGUMENTS"
  | "NO_MATCH"
  | "TOOL_TIMEOUT"
  | "TOOL_ERROR";

export type ToolOutcome =
  | {
      readonly kind: "ok";
      readonly tool: string;
      readonly value: JsonValue;
      readonly costEstimate: number;
    }
  | {
      readonly kind: "failure";
      readonly tool: string;
      readonly code: ToolFailureCode;
      readonly reason: string;
    };

export interface BudgetLedger {
  readonly ceiling: number;
  readonly spentEstimate: number;
  readonly overageTolerated: boolean;
}

export type BudgetChoice = "CONTINUE" | "SUBSTITUTE" | "CANCEL";

export const BUDGET_CHOICES = Object.freeze([
  "CONTINUE",
  "SUBSTITUTE",
  "CANCEL",
] as const satisfies readonly BudgetChoice[]);

export interface SubstituteData {
  readonly value: JsonValue;
  readonly costEstimate: number;
}

export type BudgetInterrupt =
  | { readonly status: "NONE" }
  | {
      readonly status: "AWAITING_USER_CHOICE";
      readonly interruptId: number;
      readonly triggeredBy: ToolCall;
      readonly spentEstimate: number;
      readonly ceiling: number;
    }
  | {
      readonly status: "RESOLVED";
      readonly interruptId: number;
      readonly triggeredBy: ToolCall;
      readonly choice: BudgetChoice;
      readonly substitute: SubstituteData | null;
      readonly applied: boolean;
    };

export interface UserConstraints {
  readonly servings?: number;
  readonly healthConditions?: readonly string[];
  readonly goal?: string;
  readonly availableIngredients?: readonly string[];
}

export type FactKind = "allergy" | "restriction" | "diet" | "like" | "dislike";

export interface LongTermFact {
  readonly key: string;
  readonly kind: FactKind;
  readonly subject: string;
  readonly text: string;
  readonly reinforced: boolean;
  readonly sessionIds: readonly string[];
}

export type ModificationDelta =
  | { readonly kind: "servings"; readonly servings: number }
  | { readonly kind: "scale"; readonly factor: number }
  | { readonly kind: "substitute"; readonly from: string; readonly to: string }
  | { readonly kind: "dietary"; readonly note: string }
  | { readonly kind: "budget"; readonly note: string }
  | { readonly kind: "general"; readonly note: string };

export interface TurnState {
  readonly sessionId: string;
  readonly userId: string;
  readonly turnInput: string;
  readonly constraints: UserConstraints;
  readonly conversationHistory: readonly ConversationTurn[];
  readonly shortTermMemory: readonly ConversationTurn[];
  readonly longTermFacts: readonly LongTermFact[];
  readonly route: Route | null;
  readonly retrievedKnowledge: readonly KnowledgeSnippet[];
  readonly modification: readonly ModificationDelta[];
  readonly draftAnswer: string | null;
  readonly pendingToolCalls: readonly ToolCall[];
  readonly toolResults: Readonly<Record<string, ToolOutcome>>;
  readonly nextCallSeq: number;
  readonly budget: BudgetLedger;
  readonly interrupt: BudgetInterrupt;
  readonly finalAnswer: string | null;
  readonly confidence: number | null;
  readonly memoryWritten: boolean;
}

export type TurnPatch = Partial<
  Omit<TurnState, "sessionId" | "userId" | "turnInput" | "constraints">
>;
