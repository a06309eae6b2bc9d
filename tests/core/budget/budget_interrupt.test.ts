/** Intent: budget interrupt state machine - suspend on overage, one resolution per interrupt, and the state changes each choice implies. */
import test from "node:test";
import assert from "node:assert/strict";
import {
  applyResolution,
  buildInterruptPrompt,
  CANCELLATION_NOTICE,
  formatWon,
  isBudgetChoice,
  needsResolutionApplied,
  recordCost,
  resolveBudgetInterrupt,
} from "../../../src/core/budget/budget_interrupt";
import { beginTurn } from "../../../src/core/turn/turn.state";
import type { ToolCall, TurnState } from "../../../src/core/turn/turn.types";

const beefCall: ToolCall = { id: "call-1", tool: "shopping_search", arguments: { query: "소고기" } };
const garlicCall: ToolCall = { id: "call-2", tool: "shopping_search", arguments: { query: "마늘" } };

function suspendedState(): TurnState {
  const base = beginTurn({
    sessionId: "s-1",
    userId: "u-1",
    turnInput: "스테이크 장보기",
    conversationHistory: [],
    shortTermMemory: [],
    longTermFacts: [],
    budgetCeiling: 10000,
  });
  const next = recordCost(base, beefCall, 15000);
  return {
    ...base,
    ...next,
    draftAnswer: "스테이크 초안",
    pendingToolCalls: [garlicCall],
    toolResults: {
      [beefCall.id]: { kind: "ok", tool: "shopping_search", value: { total: 15000 }, costEstimate: 15000 },
    },
    nextCallSeq: 3,
  };
}

test("formatWon groups thousands", () => {
  assert.equal(formatWon(0), "0원");
  assert.equal(formatWon(5000), "5,000원");
  assert.equal(formatWon(1234567), "1,234,567원");
});

test("cost within the ceiling keeps the interrupt inactive", () => {
  const ledger = { ceiling: 10000, spentEstimate: 0, overageTolerated: false };
  const atCeiling = recordCost({ budget: ledger, interrupt: { status: "NONE" } }, beefCall, 10000);
  assert.equal(atCeiling.budget.spentEstimate, 10000);
  assert.deepEqual(atCeiling.interrupt, { status: "NONE" });
});

test("cost over the ceiling suspends with a snapshot of the spend", () => {
  const state = suspendedState();
  assert.equal(state.budget.spentEstimate, 15000);
  assert.deepEqual(state.interrupt, {
    status: "AWAITING_USER_CHOICE",
    interruptId: 1,
    triggeredBy: beefCall,
    spentEstimate: 15000,
    ceiling: 10000,
  });
});

test("tolerated overage never suspends again", () => {
  const ledger = { ceiling: 10000, spentEstimate: 15000, overageTolerated: true };
  const next = recordCost({ budget: ledger, interrupt: { status: "NONE" } }, garlicCall, 3000);
  assert.equal(next.budget.spentEstimate, 18000);
  assert.deepEqual(next.interrupt, { status: "NONE" });
});

test("interrupt prompt names the ceiling and the overage", () => {
  const prompt = buildInterruptPrompt(suspendedState().interrupt);
  assert.deepEqual(prompt, {
    interruptId: 1,
    message: "예상 비용이 예산(10,000원)을 5,000원 초과합니다. 어떻게 할까요?",
    options: ["CONTINUE", "SUBSTITUTE", "CANCEL"],
    spentEstimate: 15000,
    ceiling: 10000,
  });
  assert.equal(buildInterruptPrompt({ status: "NONE" }), null);
});

test("resolving without an interrupt fails and resolving twice is a no-op", () => {
  assert.throws(
    () => resolveBudgetInterrupt({ status: "NONE" }, "CANCEL"),
    /BUDGET_INTERRUPT_ERROR/
  );

  const first = resolveBudgetInterrupt(suspendedState().interrupt, "CANCEL");
  assert.equal(first.changed, true);
  assert.equal(needsResolutionApplied(first.interrupt), true);

  const second = resolveBudgetInterrupt(first.interrupt, "CONTINUE");
  assert.equal(second.changed, false);
  assert.equal(second.interrupt, first.interrupt);
});

test("substitute data is only kept for a SUBSTITUTE choice", () => {
  const resolved = resolveBudgetInterrupt(suspendedState().interrupt, "CONTINUE", {
    value: "ignored",
    costEstimate: 1,
  });
  assert.equal(resolved.interrupt.status, "RESOLVED");
  if (resolved.interrupt.status === "RESOLVED") {
    assert.equal(resolved.interrupt.substitute, null);
  }
});

test("CANCEL discards pending calls and sets the cancellation notice", () => {
  const state = suspendedState();
  const patch = applyResolution({ ...state, interrupt: resolveBudgetInterrupt(state.interrupt, "CANCEL").interrupt });
  assert.deepEqual(patch.pendingToolCalls, []);
  assert.equal(patch.finalAnswer, CANCELLATION_NOTICE);
  assert.equal(patch.interrupt?.status === "RESOLVED" && patch.interrupt.applied, true);
});

test("CONTINUE tolerates overage for the rest of the turn", () => {
  const state = suspendedState();
  const patch = applyResolution({ ...state, interrupt: resolveBudgetInterrupt(state.interrupt, "CONTINUE").interrupt });
  assert.deepEqual(patch.budget, { ceiling: 10000, spentEstimate: 15000, overageTolerated: true });
  assert.equal(patch.pendingToolCalls, undefined);
  assert.equal(patch.finalAnswer, undefined);
});

test("SUBSTITUTE without data drops the trigger and re-issues it cheaper", () => {
  const state = suspendedState();
  const patch = applyResolution({ ...state, interrupt: resolveBudgetInterrupt(state.interrupt, "SUBSTITUTE").interrupt });
  assert.deepEqual(patch.toolResults, {});
  assert.equal(patch.budget?.spentEstimate, 0);
  assert.deepEqual(patch.pendingToolCalls, [
    { id: "call-1-cheaper", tool: "shopping_search", arguments: { query: "소고기", cheaper: true } },
    garlicCall,
  ]);
});

test("SUBSTITUTE with data stores it in place of the trigger", () => {
  const state = suspendedState();
  const resolved = resolveBudgetInterrupt(state.interrupt, "SUBSTITUTE", {
    value: { items: ["돼지고기 앞다리살"] },
    costEstimate: 7500,
  }).interrupt;
  const patch = applyResolution({ ...state, interrupt: resolved });

  assert.deepEqual(Object.keys(patch.toolResults ?? {}), ["call-1-substitute"]);
  assert.deepEqual(patch.toolResults?.["call-1-substitute"], {
    kind: "ok",
    tool: "shopping_search",
    value: { items: ["돼지고기 앞다리살"] },
    costEstimate: 7500,
  });
  assert.equal(patch.budget?.spentEstimate, 7500);
  assert.equal(patch.interrupt?.status, "RESOLVED");
  assert.equal(patch.pendingToolCalls, undefined);
});

test("an applied resolution is not applied again", () => {
  const state = suspendedState();
  const resolved = resolveBudgetInterrupt(state.interrupt, "CANCEL").interrupt;
  const patch = applyResolution({ ...state, interrupt: resolved });
  assert.deepEqual(applyResolution({ ...state, ...patch }), {});
});

test("isBudgetChoice accepts only the three choices", () => {
  assert.equal(isBudgetChoice("CONTINUE"), true);
  assert.equal(isBudgetChoice("cancel"), false);
  assert.equal(isBudgetChoice(1), false);
});
