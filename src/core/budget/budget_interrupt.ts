import { TurnStateError } from "../turn/errors";
import type {
  BudgetChoice,
  BudgetInterrupt,
  BudgetLedger,
  SubstituteData,
  ToolCall,
  ToolOutcome,
  TurnPatch,
  TurnState,
} from "../turn/turn.types";
import { BUDGET_CHOICES } from "../turn/turn.types";

export const CANCELLATION_NOTICE =
  "예산 초과로 이번 요청을 취소했어요. 예산을 조정하거나 다른 메뉴로 다시 요청해 주세요.";

export interface InterruptPrompt {
  readonly interruptId: number;
  readonly message: string;
  readonly options: readonly BudgetChoice[];
  readonly spentEstimate: number;
  readonly ceiling: number;
}

export function formatWon(amount: number): string {
  const rounded = Math.round(amount);
  const sign = rounded < 0 ? "-" : "";
  return `${sign}${String(Math.abs(rounded)).replace(/\B(?=(\d{3})+(?!\d))/g, ",")}원`;
}

function lastInterruptId(interrupt: BudgetInterrupt): number {
  return interrupt.status === "NONE" ? 0 : interrupt.interruptId;
}

export function isSuspended(interrupt: BudgetInterrupt): boolean {
  return interrupt.status === "AWAITING_USER_CHOICE";
}

/**
 * Adds a reported cost to the ledger. Moves the interrupt to AWAITING_USER_CHOICE exactly
 * when spend now exceeds the ceiling and no CONTINUE has tolerated overage this turn.
 */
export function recordCost(
  current: { readonly budget: BudgetLedger; readonly interrupt: BudgetInterrupt },
  call: ToolCall,
  cost: number
): { readonly budget: BudgetLedger; readonly interrupt: BudgetInterrupt } {
  const budget: BudgetLedger = {
    ...current.budget,
    spentEstimate: current.budget.spentEstimate + cost,
  };

  const exceeded = cost > 0 && budget.spentEstimate > budget.ceiling;
  if (!exceeded || budget.overageTolerated || isSuspended(current.interrupt)) {
    return { budget, interrupt: current.interrupt };
  }

  return {
    budget,
    interrupt: {
      status: "AWAITING_USER_CHOICE",
      interruptId: lastInterruptId(current.interrupt) + 1,
      triggeredBy: call,
      spentEstimate: budget.spentEstimate,
      ceiling: budget.ceiling,
    },
  };
}

export function isBudgetChoice(value: unknown): value is BudgetChoice {
  return BUDGET_CHOICES.some((choice) => choice === value);
}

/**
 * Accepts one resolution per interrupt instance. A RESOLVED interrupt is returned as-is
 * with `changed: false`.
 */
export function resolveBudgetInterrupt(
  interrupt: BudgetInterrupt,
  choice: BudgetChoice,
  substitute: SubstituteData | null = null
): { readonly interrupt: BudgetInterrupt; readonly changed: boolean } {
  if (interrupt.status === "NONE") {
    throw new TurnStateError("BUDGET_INTERRUPT_ERROR no interrupt is awaiting a choice");
  }
  if (interrupt.status === "RESOLVED") {
    return { interrupt, changed: false };
  }

  return {
    changed: true,
    interrupt: {
      status: "RESOLVED",
      interruptId: interrupt.interruptId,
      triggeredBy: interrupt.triggeredBy,
      choice,
      substitute: choice === "SUBSTITUTE" ? substitute : null,
      applied: false,
    },
  };
}

export function needsResolutionApplied(interrupt: BudgetInterrupt): boolean {
  return interrupt.status === "RESOLVED" && !interrupt.applied;
}

function costOf(outcome: ToolOutcome | undefined): number {
  return outcome?.kind === "ok" ? outcome.costEstimate : 0;
}

/**
 * Turns a freshly resolved interrupt into the state changes it implies. Called once per
 * resolution; afterwards the interrupt is marked applied.
 */
export function applyResolution(state: TurnState): TurnPatch {
  const interrupt = state.interrupt;
  if (interrupt.status !== "RESOLVED" || interrupt.applied) {
    return {};
  }
  const applied: BudgetInterrupt = { ...interrupt, applied: true };

  switch (interrupt.choice) {
    case "CANCEL":
      return {
        interrupt: applied,
        pendingToolCalls: [],
        finalAnswer: CANCELLATION_NOTICE,
      };
    case "CONTINUE":
      return {
        interrupt: applied,
        budget: { ...state.budget, overageTolerated: true },
      };
    case "SUBSTITUTE": {
      const trigger = interrupt.triggeredBy;
      const toolResults = { ...state.toolResults };
      const droppedCost = costOf(toolResults[trigger.id]);
      delete toolResults[trigger.id];
      const budget: BudgetLedger = {
        ...state.budget,
        spentEstimate: state.budget.spentEstimate - droppedCost,
      };

      if (interrupt.substitute !== null) {
        const substituteCall: ToolCall = { ...trigger, id: `${trigger.id}-substitute` };
        toolResults[substituteCall.id] = {
          kind: "ok",
          tool: trigger.tool,
          value: interrupt.substitute.value,
          costEstimate: interrupt.substitute.costEstimate,
        };
        const next = recordCost(
          { budget, interrupt: applied },
          substituteCall,
          interrupt.substitute.costEstimate
        );
        return { toolResults, budget: next.budget, interrupt: next.interrupt };
      }

      const cheaperCall: ToolCall = {
        id: `${trigger.id}-cheaper`,
        tool: trigger.tool,
        arguments: { ...trigger.arguments, cheaper: true },
      };
      return {
        interrupt: applied,
        toolResults,
        budget,
        pendingToolCalls: [cheaperCall, ...state.pendingToolCalls],
      };
    }
  }
}

export function buildInterruptPrompt(interrupt: BudgetInterrupt): InterruptPrompt | null {
  if (interrupt.status !== "AWAITING_USER_CHOICE") {
    return null;
  }
  const overBy = interrupt.spentEstimate - interrupt.ceiling;
  return {
    interruptId: interrupt.interruptId,
    message: `예상 비용이 예산(${formatWon(interrupt.ceiling)})을 ${formatWon(overBy)} 초과합니다. 어떻게 할까요?`,
    options: BUDGET_CHOICES,
    spentEstimate: interrupt.spentEstimate,
    ceiling: interrupt.ceiling,
  };
}
