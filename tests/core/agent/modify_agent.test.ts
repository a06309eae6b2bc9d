/** Intent: modification turns - instruction parsing into deltas, deterministic scaling and substitution of the prior answer, LLM rewrite for the rest. */
import test from "node:test";
import assert from "node:assert/strict";
import type { LLMClientPort } from "../../../src/core/agent/llm.port";
import {
  applyDeterministicDeltas,
  applyModification,
  parseModification,
  planModification,
  priorServings,
  scaleQuantities,
} from "../../../src/core/agent/modify_agent";
import { GenerationFailureError } from "../../../src/core/turn/errors";
import { beginTurn } from "../../../src/core/turn/turn.state";
import type { LongTermFact, TurnState } from "../../../src/core/turn/turn.types";

const PRIOR_ANSWER = "간단 스테이크 (1인분)\n- 소고기 등심 150g\n- 버터 10g\n- 마늘 2쪽";
const PEANUT_ALLERGY: LongTermFact = {
  key: "allergy:땅콩",
  kind: "allergy",
  subject: "땅콩",
  text: "땅콩 알레르기",
  reinforced: false,
  sessionIds: ["s-0"],
};

class StubLLM implements LLMClientPort {
  readonly prompts: string[] = [];

  constructor(private readonly reply: string | Error) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

function modifyTurn(turnInput: string): TurnState {
  const state = beginTurn({
    sessionId: "s-1",
    userId: "u-1",
    turnInput,
    conversationHistory: [{ user: "스테이크 레시피 알려줘", answer: PRIOR_ANSWER }],
    shortTermMemory: [],
    longTermFacts: [],
    budgetCeiling: 30000,
  });
  return { ...state, route: "MODIFY", ...planModification(state) };
}

test("servings, substitution, scale and note deltas are parsed", () => {
  assert.deepEqual(parseModification("2인분으로 바꿔줘"), [{ kind: "servings", servings: 2 }]);
  assert.deepEqual(parseModification("버터 대신 올리브유로 바꿔줘"), [
    { kind: "substitute", from: "버터", to: "올리브유" },
  ]);
  assert.deepEqual(parseModification("두 배로 늘려줘"), [{ kind: "scale", factor: 2 }]);
  assert.deepEqual(parseModification("좀 더 저렴하게 해줘"), [
    { kind: "budget", note: "좀 더 저렴하게 해줘" },
  ]);
  assert.deepEqual(parseModification("다른 느낌으로 해줘"), [
    { kind: "general", note: "다른 느낌으로 해줘" },
  ]);
});

test("a compound instruction yields several deltas", () => {
  assert.deepEqual(parseModification("3인분으로 하고 덜 맵게 해줘"), [
    { kind: "servings", servings: 3 },
    { kind: "dietary", note: "3인분으로 하고 덜 맵게 해줘" },
  ]);
});

test("quantities scale with their units", () => {
  assert.equal(
    scaleQuantities("소고기 등심 150g, 버터 10g, 마늘 2쪽, 가격 12,500원", 2),
    "소고기 등심 300g, 버터 20g, 마늘 4쪽, 가격 25,000원"
  );
  assert.equal(scaleQuantities("감자 1.5kg", 0.5), "감자 0.8kg");
  assert.equal(scaleQuantities("소금 약간", 3), "소금 약간");
});

test("prior servings come from the answer, then the constraint, then one", () => {
  assert.equal(priorServings("재료 (3인분)", undefined), 3);
  assert.equal(priorServings("재료", 4), 4);
  assert.equal(priorServings("재료", undefined), 1);
});

test("servings change rescales the prior answer from its own serving count", () => {
  assert.equal(
    applyDeterministicDeltas(PRIOR_ANSWER, [{ kind: "servings", servings: 2 }]),
    "[2인분 기준으로 조정했습니다]\n\n간단 스테이크 (2인분)\n- 소고기 등심 300g\n- 버터 20g\n- 마늘 4쪽"
  );
});

test("substitution replaces the ingredient text", () => {
  assert.equal(
    applyDeterministicDeltas(PRIOR_ANSWER, [{ kind: "substitute", from: "버터", to: "올리브유" }]),
    "[버터 대신 올리브유(으)로 바꿨습니다]\n\n간단 스테이크 (1인분)\n- 소고기 등심 150g\n- 올리브유 10g\n- 마늘 2쪽"
  );
});

test("a substitution queues a price lookup for the new ingredient", () => {
  const state = modifyTurn("버터 대신 올리브유로 바꿔줘");
  assert.deepEqual(state.pendingToolCalls, [
    { id: "call-1", tool: "shopping_search", arguments: { query: "올리브유" } },
  ]);
  assert.equal(state.nextCallSeq, 2);
});

test("deterministic modification needs no LLM and reports purchase cost", async () => {
  const llm = new StubLLM(new Error("should not be called"));
  const state: TurnState = {
    ...modifyTurn("버터 대신 올리브유로 바꿔줘"),
    pendingToolCalls: [],
    toolResults: {
      "call-1": { kind: "ok", tool: "shopping_search", value: { total: 8900 }, costEstimate: 8900 },
    },
    budget: { ceiling: 30000, spentEstimate: 8900, overageTolerated: false },
  };

  const patch = await applyModification(state, llm);
  assert.equal(
    patch.finalAnswer,
    "[버터 대신 올리브유(으)로 바꿨습니다]\n\n간단 스테이크 (1인분)\n- 소고기 등심 150g\n- 올리브유 10g\n- 마늘 2쪽\n\n[추가 구매 예상 비용: 8,900원]"
  );
  assert.equal(llm.prompts.length, 0);
});

test("a failed price lookup is noted in the answer", async () => {
  const state: TurnState = {
    ...modifyTurn("버터 대신 올리브유로 바꿔줘"),
    pendingToolCalls: [],
    toolResults: {
      "call-1": { kind: "failure", tool: "shopping_search", code: "TOOL_TIMEOUT", reason: "slow" },
    },
  };
  const patch = await applyModification(state, new StubLLM("unused"));
  assert.ok(patch.finalAnswer?.endsWith("\n\n[일부 재료의 가격 정보를 가져오지 못했습니다]"));
});

test("non-deterministic deltas go through one LLM rewrite", async () => {
  const llm = new StubLLM("  덜 맵게 고친 답변  ");
  const patch = await applyModification(modifyTurn("3인분으로 하고 덜 맵게 해줘"), llm);
  assert.equal(patch.finalAnswer, "덜 맵게 고친 답변");
  assert.equal(llm.prompts.length, 1);
  assert.ok(llm.prompts[0]?.includes("간단 스테이크 (3인분)"));
  assert.ok(llm.prompts[0]?.includes("- 3인분으로 하고 덜 맵게 해줘"));
});

test("the rewrite prompt carries the recent exchange", async () => {
  const llm = new StubLLM("덜 맵게 고친 답변");
  const state: TurnState = {
    ...modifyTurn("덜 맵게 해줘"),
    shortTermMemory: [{ user: "스테이크 레시피 알려줘", answer: PRIOR_ANSWER }],
  };
  await applyModification(state, llm);
  assert.ok(
    llm.prompts[0]?.includes(
      "[최근 대화]\n- Q: 스테이크 레시피 알려줘\n  A: 간단 스테이크 (1인분) - 소고기 등심 150g - 버터 10g - 마늘 2쪽"
    )
  );
});

test("a remembered allergy note is kept once on a modified answer", async () => {
  const state: TurnState = {
    ...modifyTurn("2인분으로 바꿔줘"),
    conversationHistory: [
      { user: "스테이크 레시피 알려줘", answer: `${PRIOR_ANSWER}\n\n[참고] 땅콩 알레르기` },
    ],
    longTermFacts: [PEANUT_ALLERGY],
  };
  const patch = await applyModification(state, new StubLLM(new Error("should not be called")));
  assert.equal(
    patch.finalAnswer,
    "[2인분 기준으로 조정했습니다]\n\n간단 스테이크 (2인분)\n- 소고기 등심 300g\n- 버터 20g\n- 마늘 4쪽\n\n[참고] 땅콩 알레르기"
  );
});

test("a rewrite that drops the allergy note gets it back", async () => {
  const state: TurnState = { ...modifyTurn("덜 맵게 해줘"), longTermFacts: [PEANUT_ALLERGY] };
  const patch = await applyModification(state, new StubLLM("덜 맵게 고친 답변"));
  assert.equal(patch.finalAnswer, "덜 맵게 고친 답변\n\n[참고] 땅콩 알레르기");
});

test("rewrite failure and a missing prior answer are generation failures", async () => {
  await assert.rejects(
    () => applyModification(modifyTurn("덜 맵게 해줘"), new StubLLM(new Error("timeout"))),
    (error: unknown) =>
      error instanceof GenerationFailureError &&
      error.message === "GENERATION_FAILURE modify: llm unavailable: timeout"
  );

  const noHistory: TurnState = { ...modifyTurn("2인분으로 바꿔줘"), conversationHistory: [] };
  await assert.rejects(() => applyModification(noHistory, new StubLLM("x")), GenerationFailureError);
});
