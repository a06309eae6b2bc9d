import type { FactKind } from "../turn/turn.types";
import type { ExtractedFact } from "./memory.types";

interface ClauseCue {
  readonly kind: Exclude<FactKind, "diet">;
  readonly pattern: RegExp;
}

const CLAUSE_CUES: readonly ClauseCue[] = Object.freeze([
  { kind: "allergy", pattern: /알[레러]르기|알러지/g },
  { kind: "restriction", pattern: /못\s*먹/g },
  { kind: "like", pattern: /좋아(?:해|하|합)|선호/g },
  { kind: "dislike", pattern: /싫어/g },
]);

const DIET_PATTERN =
  /(채식|비건|저염식?|키토|저탄고지|글루텐\s?프리)\s*(?:주의자|을\s*하고\s*있|을\s*해|중|이에요|예요|입니다|이라|라서|하고\s*있)/g;

const CLAUSE_BREAK = /[,.!?\n]|(?:는데|지만|그리고|하고)\s+/;
const LEADING_SPEAKER = /^(?:저는|나는|난|전|제가|내가|저도|나도|저|나)(?:\s+|$)/;
const SPEAKER_WORDS = new Set(["저", "나", "제", "내"]);
// A cue followed by these in its own clause states the opposite ("알레르기는 없어요").
const TRAILING_NEGATION = /^(?:안|못)$|없|않|아니/;
// Adverbs right before the cue flip it ("안 좋아해요").
const LEADING_NEGATION = /^(?:안|전혀|별로)$/;
const NEGATION_WINDOW_WORDS = 2;
const CUE_WORDS = /알[레러]르기|알러지|못\s*먹|좋아|싫어|선호/;
const MAX_SUBJECT_WORDS = 2;
const MAX_SUBJECT_LENGTH = 20;

const FACT_LABELS: Readonly<Record<FactKind, string>> = Object.freeze({
  allergy: "알레르기",
  restriction: "섭취 불가",
  diet: "식단",
  like: "선호",
  dislike: "비선호",
});

export function normalizeFactKey(kind: FactKind, subject: string): string {
  const normalized = subject.normalize("NFC").toLowerCase().replace(/\s+/g, " ").trim();
  return `${kind}:${normalized}`;
}

function hasFinalConsonant(syllable: string): boolean {
  const code = syllable.charCodeAt(0);
  if (code < 0xac00 || code > 0xd7a3) {
    return false;
  }
  return (code - 0xac00) % 28 !== 0;
}

// Subject particles only attach in one form depending on the preceding syllable.
function stripParticle(word: string): string {
  if (word.length < 2) {
    return word;
  }
  const last = word.slice(-1);
  const stem = word.slice(0, -1);
  const before = stem.slice(-1);
  if ((last === "이" || last === "은" || last === "을") && hasFinalConsonant(before)) {
    return stem;
  }
  if ((last === "가" || last === "는" || last === "를") && !hasFinalConsonant(before)) {
    return stem;
  }
  if (last === "도" || last === "만") {
    return stem;
  }
  return word;
}

function subjectBefore(text: string, index: number): string | null {
  const clauses = text.slice(0, index).split(CLAUSE_BREAK);
  const clause = (clauses[clauses.length - 1] ?? "").trim().replace(LEADING_SPEAKER, "");
  if (clause === "") {
    return null;
  }
  const words = clause.split(/\s+/).slice(-MAX_SUBJECT_WORDS);
  if (words.some((word) => LEADING_NEGATION.test(word))) {
    return null;
  }
  const lastWord = words.pop() ?? "";
  const subject = [...words, stripParticle(lastWord)].join(" ").trim();
  if (
    subject === "" ||
    subject.length > MAX_SUBJECT_LENGTH ||
    !/[\p{L}]/u.test(subject) ||
    CUE_WORDS.test(subject) ||
    SPEAKER_WORDS.has(subject)
  ) {
    return null;
  }
  return subject;
}

function isNegatedAfter(text: string, cueEnd: number): boolean {
  const clause = text.slice(cueEnd).split(CLAUSE_BREAK)[0] ?? "";
  return clause
    .trim()
    .split(/\s+/)
    .slice(0, NEGATION_WINDOW_WORDS)
    .some((word) => word !== "" && TRAILING_NEGATION.test(word));
}

function toFact(kind: FactKind, subject: string): ExtractedFact {
  return {
    key: normalizeFactKey(kind, subject),
    kind,
    subject,
    text: `${subject} ${FACT_LABELS[kind]}`,
  };
}

/**
 * Pulls durable dietary facts out of one user turn. Negated statements yield nothing.
 * Results are deduplicated by key and keep first-occurrence order.
 */
export function extractFacts(turnInput: string): readonly ExtractedFact[] {
  const text = turnInput.normalize("NFC");
  const found = new Map<string, ExtractedFact>();

  for (const cue of CLAUSE_CUES) {
    for (const match of text.matchAll(cue.pattern)) {
      const index = match.index ?? 0;
      if (isNegatedAfter(text, index + match[0].length)) {
        continue;
      }
      const subject = subjectBefore(text, index);
      if (subject === null) {
        continue;
      }
      const fact = toFact(cue.kind, subject);
      if (!found.has(fact.key)) {
        found.set(fact.key, fact);
      }
    }
  }

  for (const match of text.matchAll(DIET_PATTERN)) {
    const subject = (match[1] ?? "").replace(/\s+/g, " ");
    if (subject === "") {
      continue;
    }
    const fact = toFact("diet", subject);
    if (!found.has(fact.key)) {
      found.set(fact.key, fact);
    }
  }

  return [...found.values()];
}
