import type { FactKind, LongTermFact } from "../turn/turn.types";
import { rankFacts } from "../memory/memory.types";

export const MAX_GROUNDING_NOTES = 3;

const SAFETY_KINDS: ReadonlySet<FactKind> = new Set<FactKind>(["allergy", "restriction"]);

const NOTE_PREFIX = Object.freeze({
  safety: "[참고]",
  preference: "[선호 반영]",
} as const);

/**
 * Notes that tie an answer back to what the user has told us before.
 * Safety facts come first, then preferences; reinforced facts lead within each group.
 */
export function groundingNotes(facts: readonly LongTermFact[]): readonly string[] {
  const ranked = rankFacts(facts);
  const safety = ranked
    .filter((fact) => SAFETY_KINDS.has(fact.kind))
    .map((fact) => `${NOTE_PREFIX.safety} ${fact.text}`);
  const preference = ranked
    .filter((fact) => !SAFETY_KINDS.has(fact.kind))
    .map((fact) => `${NOTE_PREFIX.preference} ${fact.text}`);
  return [...safety, ...preference].slice(0, MAX_GROUNDING_NOTES);
}

/**
 * Appends the grounding notes the answer does not already carry.
 * A modified answer keeps the notes of the answer it was derived from, so nothing repeats.
 */
export function groundAnswer(answer: string, facts: readonly LongTermFact[]): string {
  const missing = groundingNotes(facts).filter((note) => !answer.includes(note));
  if (missing.length === 0) {
    return answer;
  }
  return `${answer}\n\n${missing.join("\n")}`;
}
