/** Intent: answers carry notes for remembered allergies and preferences - safety first, capped, never repeated. */
import test from "node:test";
import assert from "node:assert/strict";
import { groundAnswer, groundingNotes } from "../../../src/core/reflection/grounding";
import type { FactKind, LongTermFact } from "../../../src/core/turn/turn.types";

function fact(kind: FactKind, subject: string, text: string, reinforced = false): LongTermFact {
  return { key: `${kind}:${subject}`, kind, subject, text, reinforced, sessionIds: ["s-1"] };
}

test("no facts leaves the answer as it is", () => {
  assert.equal(groundAnswer("두부조림 추천", []), "두부조림 추천");
});

test("safety notes lead and the list is capped at three", () => {
  const notes = groundingNotes([
    fact("like", "소고기", "소고기 선호", true),
    fact("dislike", "오이", "오이 비선호"),
    fact("allergy", "땅콩", "땅콩 알레르기"),
    fact("restriction", "돼지고기", "돼지고기 섭취 불가"),
  ]);
  assert.deepEqual(notes, [
    "[참고] 땅콩 알레르기",
    "[참고] 돼지고기 섭취 불가",
    "[선호 반영] 소고기 선호",
  ]);
});

test("reinforced facts lead within their group", () => {
  const notes = groundingNotes([
    fact("allergy", "새우", "새우 알레르기"),
    fact("allergy", "땅콩", "땅콩 알레르기", true),
  ]);
  assert.deepEqual(notes, ["[참고] 땅콩 알레르기", "[참고] 새우 알레르기"]);
});

test("notes the answer already carries are not added again", () => {
  const facts = [fact("allergy", "땅콩", "땅콩 알레르기"), fact("diet", "채식", "채식 식단")];
  const once = groundAnswer("두부조림 추천", facts);
  assert.equal(once, "두부조림 추천\n\n[참고] 땅콩 알레르기\n[선호 반영] 채식 식단");
  assert.equal(groundAnswer(once, facts), once);
  assert.equal(
    groundAnswer("두부조림 추천\n\n[참고] 땅콩 알레르기", facts),
    "두부조림 추천\n\n[참고] 땅콩 알레르기\n\n[선호 반영] 채식 식단"
  );
});
