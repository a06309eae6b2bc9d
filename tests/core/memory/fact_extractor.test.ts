/** Intent: durable dietary facts are pulled from user text with normalized, deduplicated keys. */
import test from "node:test";
import assert from "node:assert/strict";
import { extractFacts, normalizeFactKey } from "../../../src/core/memory/fact_extractor";

test("allergy statement yields one allergy fact", () => {
  assert.deepEqual(extractFacts("저는 땅콩 알레르기가 있어요"), [
    { key: "allergy:땅콩", kind: "allergy", subject: "땅콩", text: "땅콩 알레르기" },
  ]);
});

test("cannot-eat statement strips the object particle", () => {
  assert.deepEqual(extractFacts("저는 새우를 못 먹어요"), [
    { key: "restriction:새우", kind: "restriction", subject: "새우", text: "새우 섭취 불가" },
  ]);
});

test("like and dislike in one sentence become two facts", () => {
  assert.deepEqual(extractFacts("소고기는 좋아하는데 돼지고기는 싫어해요"), [
    { key: "like:소고기", kind: "like", subject: "소고기", text: "소고기 선호" },
    { key: "dislike:돼지고기", kind: "dislike", subject: "돼지고기", text: "돼지고기 비선호" },
  ]);
});

test("diet statement yields a diet fact", () => {
  assert.deepEqual(extractFacts("저는 비건이에요"), [
    { key: "diet:비건", kind: "diet", subject: "비건", text: "비건 식단" },
  ]);
});

test("repeated statements are deduplicated", () => {
  const facts = extractFacts("땅콩 알레르기 있어요. 땅콩 알러지가 심해요");
  assert.deepEqual(
    facts.map((fact) => fact.key),
    ["allergy:땅콩"]
  );
});

test("negated statements are not stored as facts", () => {
  assert.deepEqual(extractFacts("새우 알레르기는 없어요"), []);
  assert.deepEqual(extractFacts("저는 알레르기가 없어요"), []);
  assert.deepEqual(extractFacts("우유는 안 좋아해요"), []);
  assert.deepEqual(extractFacts("오이는 싫어하지 않아요"), []);
});

test("the speaker is never a fact subject", () => {
  assert.deepEqual(extractFacts("저 알레르기 있어요"), []);
  assert.deepEqual(extractFacts("나는 알레르기가 있어"), []);
});

test("a negation in a later clause does not cancel an earlier fact", () => {
  assert.deepEqual(
    extractFacts("땅콩 알레르기가 있는데 우유는 문제 없어요").map((fact) => fact.key),
    ["allergy:땅콩"]
  );
});

test("plain requests produce no facts", () => {
  assert.deepEqual(extractFacts("오늘 저녁 뭐 먹을까?"), []);
  assert.deepEqual(extractFacts("2인분으로 바꿔줘"), []);
});

test("fact keys are case and whitespace normalized", () => {
  assert.equal(normalizeFactKey("like", "  Olive   Oil "), "like:olive oil");
});
