import { formatWon } from "../budget/budget_interrupt";
import { groundAnswer } from "../reflection/grounding";
import { TOOL_NAMES } from "../tools/capabilities";
import { GenerationFailureError, asMessage } from "../turn/errors";
import { previousAnswer } from "../turn/turn.state";
import type { ModificationDelta, ToolCall, TurnPatch, TurnState } from "../turn/turn.types";
import type { LLMClientPort } from "./llm.port";
import { buildRewritePrompt } from "./prompts";

const SERVINGS_PATTERN = /(\d+)\s*(?:인분|명|사람)/;
const PRIOR_SERVINGS_PATTERN = /(\d+)\s*인분/;
const EXPLICIT_SCALE_PATTERN = /(\d+(?:\.\d+)?)\s*배/;
const SUBSTITUTE_INSTEAD_PATTERN =
  /([가-힣A-Za-z]+?)\s*대신(?:에)?\s*([가-힣A-Za-z]+?)(?:으로|로|를|을)?(?=\s|$|[,.!?])/;
const SUBSTITUTE_SWAP_PATTERN =
  /([가-힣A-Za-z]+?)(?:을|를)\s+([가-힣A-Za-z]+?)(?:으로|로)\s*(?:바꿔|바꾸|교체|변경)/;
const DIETARY_PATTERN = /안 ?맵게|덜 ?맵게|맵게|달게|짜게|싱겁게|담백하게|채식|비건|저염|저당/;
const BUDGET_PATTERN = /저렴하게|싸게|예산/;

const QUANTITY_PATTERN =
  /(\d{1,3}(?:,\d{3})+|\d+(?:\.\d+)?)(\s*)(kg|g|ml|L|l|개|큰술|작은술|컵|원|장|쪽|알|마리|모|인분)(?![A-Za-z])/g;

function parseScaleFactor(instruction: string): number | null {
  const explicit = EXPLICIT_SCALE_PATTERN.exec(instruction);
  if (explicit) {
    const factor = Number(explicit[1]);
    return factor > 0 ? factor : null;
  }
  if (/두 ?배/.test(instruction)) {
    return 2;
  }
  if (/절반|반으로/.test(instruction)) {
    return 0.5;
  }
  if (/늘려/.test(instruction)) {
    return 1.5;
  }
  if (/줄여/.test(instruction)) {
    return 0.75;
  }
  return null;
}

function parseSubstitution(instruction: string): ModificationDelta | null {
  const matched =
    SUBSTITUTE_INSTEAD_PATTERN.exec(instruction) ?? SUBSTITUTE_SWAP_PATTERN.exec(instruction);
  if (!matched) {
    return null;
  }
  const from = matched[1] ?? "";
  const to = matched[2] ?? "";
  if (from === "" || to === "" || from === to) {
    return null;
  }
  return { kind: "substitute", from, to };
}

/**
 * Splits one modification instruction into deltas. Compound instructions yield several;
 * an instruction nothing recognizes becomes a single `general` delta.
 */
export function parseModification(instruction: string): readonly ModificationDelta[] {
  const text = instruction.normalize("NFC").trim();
  const deltas: ModificationDelta[] = [];

  const servings = SERVINGS_PATTERN.exec(text);
  const servingsCount = servings ? Number(servings[1]) : 0;
  if (servingsCount >= 1) {
    deltas.push({ kind: "servings", servings: servingsCount });
  } else {
    const factor = parseScaleFactor(text);
    if (factor !== null) {
      deltas.push({ kind: "scale", factor });
    }
  }

  const substitution = parseSubstitution(text);
  if (substitution) {
    deltas.push(substitution);
  }
  if (DIETARY_PATTERN.test(text)) {
    deltas.push({ kind: "dietary", note: text });
  }
  if (BUDGET_PATTERN.test(text)) {
    deltas.push({ kind: "budget", note: text });
  }

  if (deltas.length === 0) {
    deltas.push({ kind: "general", note: text });
  }
  return deltas;
}

export function isDeterministic(delta: ModificationDelta): boolean {
  return delta.kind === "servings" || delta.kind === "scale" || delta.kind === "substitute";
}

function formatAmount(value: number, unit: string, grouped: boolean): string {
  if (unit === "원" || grouped) {
    return String(Math.round(value)).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  }
  if (Number.isInteger(value)) {
    return String(value);
  }
  return String(Math.round(value * 10) / 10);
}

export function scaleQuantities(text: string, factor: number): string {
  if (factor === 1) {
    return text;
  }
  return text.replace(QUANTITY_PATTERN, (_whole, amount: string, space: string, unit: string) => {
    const grouped = amount.includes(",");
    const value = Number(amount.replace(/,/g, "")) * factor;
    return `${formatAmount(value, unit, grouped)}${space}${unit}`;
  });
}

export function priorServings(answer: string, fallback: number | undefined): number {
  const matched = PRIOR_SERVINGS_PATTERN.exec(answer);
  const parsed = matched ? Number(matched[1]) : NaN;
  if (Number.isFinite(parsed) && parsed >= 1) {
    return parsed;
  }
  return typeof fallback === "number" && fallback >= 1 ? fallback : 1;
}

export function applyDeterministicDeltas(
  answer: string,
  deltas: readonly ModificationDelta[],
  fallbackServings?: number
): string {
  const headers: string[] = [];
  let body = answer;

  for (const delta of deltas) {
    if (delta.kind === "servings") {
      const prior = priorServings(body, fallbackServings);
      body = scaleQuantities(body, delta.servings / prior);
      headers.push(`[${delta.servings}인분 기준으로 조정했습니다]`);
    } else if (delta.kind === "scale") {
      body = scaleQuantities(body, delta.factor);
      headers.push(`[분량을 ${delta.factor}배로 조정했습니다]`);
    } else if (delta.kind === "substitute") {
      body = body.split(delta.from).join(delta.to);
      headers.push(`[${delta.from} 대신 ${delta.to}(으)로 바꿨습니다]`);
    }
  }

  return headers.length > 0 ? `${headers.join("\n")}\n\n${body}` : body;
}

/**
 * Parses the instruction and queues a price lookup for every newly introduced ingredient.
 */
export function planModification(state: TurnState): TurnPatch {
  const deltas = parseModification(state.turnInput);
  let seq = state.nextCallSeq;
  const calls: ToolCall[] = [];
  for (const delta of deltas) {
    if (delta.kind !== "substitute") {
      continue;
    }
    calls.push({
      id: `call-${seq}`,
      tool: TOOL_NAMES.SHOPPING_SEARCH,
      arguments: { query: delta.to },
    });
    seq += 1;
  }

  return {
    modification: deltas,
    pendingToolCalls: [...state.pendingToolCalls, ...calls],
    nextCallSeq: seq,
  };
}

function purchaseSummary(state: TurnState): string {
  const outcomes = Object.values(state.toolResults);
  const lines: string[] = [];
  const purchases = outcomes.filter(
    (outcome) => outcome.kind === "ok" && outcome.tool === TOOL_NAMES.SHOPPING_SEARCH
  );
  if (purchases.length > 0) {
    lines.push(`[추가 구매 예상 비용: ${formatWon(state.budget.spentEstimate)}]`);
  }
  if (outcomes.some((outcome) => outcome.kind === "failure")) {
    lines.push("[일부 재료의 가격 정보를 가져오지 못했습니다]");
  }
  return lines.length > 0 ? `\n\n${lines.join("\n")}` : "";
}

/**
 * Applies the parsed deltas to the previous answer. Quantity and ingredient changes are
 * rewritten in place; anything else goes through one LLM rewrite.
 */
export async function applyModification(state: TurnState, llm: LLMClientPort): Promise<TurnPatch> {
  const previous = previousAnswer(state);
  if (previous === null) {
    throw new GenerationFailureError("modify", "no previous answer to modify");
  }

  let answer = applyDeterministicDeltas(previous, state.modification, state.constraints.servings);
  const openDeltas = state.modification.filter((delta) => !isDeterministic(delta));
  if (openDeltas.length > 0) {
    let reply: string;
    try {
      reply = await llm.generate(
        buildRewritePrompt({
          previousAnswer: answer,
          instruction: state.turnInput,
          deltas: openDeltas,
          longTermFacts: state.longTermFacts,
          shortTermMemory: state.shortTermMemory,
        })
      );
    } catch (error) {
      throw new GenerationFailureError("modify", `llm unavailable: ${asMessage(error)}`, {
        cause: error,
      });
    }
    if (reply.trim() === "") {
      throw new GenerationFailureError("modify", "llm returned an empty reply");
    }
    answer = reply.trim();
  }

  return { finalAnswer: groundAnswer(`${answer}${purchaseSummary(state)}`, state.longTermFacts) };
}
