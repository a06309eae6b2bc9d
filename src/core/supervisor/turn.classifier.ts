export interface CueMatch {
  readonly cue: string;
  readonly category: CueCategory;
}

export type CueCategory = "servings" | "ingredient" | "quantity" | "budget" | "taste" | "general";

/**
 * Decides whether a turn refers back to the previous answer. Implementations must be pure:
 * the same text always yields the same match.
 */
export interface TurnClassifier {
  detectModificationCue(text: string): CueMatch | null;
}

interface CueRule {
  readonly category: CueCategory;
  readonly pattern: RegExp;
}

// Order matters: the first matching rule names the cue.
const DEFAULT_CUE_RULES: readonly CueRule[] = Object.freeze([
  { category: "servings", pattern: /\d+\s*인분\s*(?:으로|만|용으로|기준으로)/ },
  { category: "servings", pattern: /\d+\s*(?:명|사람)\s*(?:으로|이서|용으로|기준으로)/ },
  { category: "ingredient", pattern: /대신/ },
  { category: "ingredient", pattern: /바꿔|바꾸|바꿀/ },
  { category: "ingredient", pattern: /빼줘|빼고|빼 ?줘|제외/ },
  { category: "ingredient", pattern: /넣어|추가해/ },
  { category: "quantity", pattern: /늘려|줄여|두 ?배|\d+\s*배로|절반|반으로/ },
  { category: "budget", pattern: /저렴하게|싸게|예산/ },
  { category: "taste", pattern: /안 ?맵게|맵게|달게|짜게|싱겁게|담백하게/ },
  { category: "general", pattern: /수정|변경|고쳐|다시 (?:짜|만들|작성)/ },
]);

export class KeywordTurnClassifier implements TurnClassifier {
  private readonly rules: readonly CueRule[];

  constructor(rules: readonly CueRule[] = DEFAULT_CUE_RULES) {
    this.rules = rules;
  }

  detectModificationCue(text: string): CueMatch | null {
    const normalized = text.normalize("NFC");
    for (const rule of this.rules) {
      const matched = rule.pattern.exec(normalized);
      if (matched) {
        return { cue: matched[0], category: rule.category };
      }
    }
    return null;
  }
}
