import type {
  ConversationTurn,
  KnowledgeSnippet,
  LongTermFact,
  ModificationDelta,
  ToolOutcome,
  TurnState,
  UserConstraints,
} from "../turn/turn.types";
import type { RegisteredTool } from "../tools/tool.types";
import { formatWon } from "../budget/budget_interrupt";
import { MAX_TOOL_CALLS_PER_TURN } from "./decision.parser";

const ASSISTANT_ROLE = "당신은 요리와 장보기를 도와주는 한국어 AI 어시스턴트입니다.";
const RECENT_TURNS_IN_PROMPT = 3;
const RECENT_ANSWER_CHARS = 100;

function formatKnowledge(snippets: readonly KnowledgeSnippet[]): string {
  if (snippets.length === 0) {
    return "- (검색 결과 없음)";
  }
  return snippets.map((snippet) => `- (${snippet.score.toFixed(2)}) ${snippet.text}`).join("\n");
}

function formatFacts(facts: readonly LongTermFact[]): string {
  if (facts.length === 0) {
    return "- (없음)";
  }
  return facts
    .map((fact) => `- ${fact.reinforced ? "[확정] " : ""}${fact.text}`)
    .join("\n");
}

/**
 * Last few short-term turns, oldest first. Answers are collapsed to one line and clipped.
 */
export function formatRecentTurns(turns: readonly ConversationTurn[]): string {
  const recent = turns.slice(-RECENT_TURNS_IN_PROMPT);
  if (recent.length === 0) {
    return "- (없음)";
  }
  return recent
    .map((turn) => {
      const answer = turn.answer.replace(/\s+/g, " ").trim();
      const clipped =
        answer.length > RECENT_ANSWER_CHARS ? `${answer.slice(0, RECENT_ANSWER_CHARS)}...` : answer;
      return `- Q: ${turn.user}\n  A: ${clipped}`;
    })
    .join("\n");
}

function formatConstraints(constraints: UserConstraints): string {
  const lines: string[] = [];
  if (typeof constraints.servings === "number") {
    lines.push(`- 인원: ${constraints.servings}인분`);
  }
  if (constraints.healthConditions && constraints.healthConditions.length > 0) {
    lines.push(`- 건강 상태: ${constraints.healthConditions.join(", ")}`);
  }
  if (constraints.goal) {
    lines.push(`- 목표: ${constraints.goal}`);
  }
  if (constraints.availableIngredients && constraints.availableIngredients.length > 0) {
    lines.push(`- 보유 재료: ${constraints.availableIngredients.join(", ")}`);
  }
  return lines.length > 0 ? lines.join("\n") : "- (없음)";
}

function formatTools(tools: readonly RegisteredTool[]): string {
  return tools
    .map((tool) => `- ${tool.name}: ${tool.description} / arguments ${tool.argumentHint}`)
    .join("\n");
}

export function buildDraftPrompt(state: TurnState, tools: readonly RegisteredTool[]): string {
  return [
    ASSISTANT_ROLE,
    "사용자의 요청에 대한 초안을 작성하고, 추가 정보가 필요하면 도구 호출을 제안하세요.",
    "",
    "반드시 아래 JSON 한 덩어리로만 응답하세요(추가 텍스트 금지):",
    '{"draft": "<초안>", "tool_calls": [{"tool": "<도구 이름>", "arguments": {}}]}',
    `도구가 필요 없으면 tool_calls는 빈 배열로 두세요. 최대 ${MAX_TOOL_CALLS_PER_TURN}개까지 허용됩니다.`,
    "",
    "[도구 목록]",
    formatTools(tools),
    "",
    "[사용자 요청]",
    state.turnInput,
    "",
    "[최근 대화]",
    formatRecentTurns(state.shortTermMemory),
    "",
    "[사용자 장기 기억]",
    formatFacts(state.longTermFacts),
    "",
    "[제약조건]",
    formatConstraints(state.constraints),
    `- 예산: ${formatWon(state.budget.ceiling)}`,
    "",
    "[지식 검색 결과]",
    formatKnowledge(state.retrievedKnowledge),
  ].join("\n");
}

function formatOutcome(id: string, outcome: ToolOutcome): string {
  if (outcome.kind === "failure") {
    return `- ${id} ${outcome.tool}: 사용 불가 (${outcome.code}) - 이 정보는 답변에서 제외하세요.`;
  }
  const cost = outcome.costEstimate > 0 ? ` / 예상 비용 ${formatWon(outcome.costEstimate)}` : "";
  return `- ${id} ${outcome.tool}: ${JSON.stringify(outcome.value)}${cost}`;
}

function formatResolution(state: TurnState): string | null {
  const interrupt = state.interrupt;
  if (interrupt.status !== "RESOLVED") {
    return null;
  }
  if (interrupt.choice === "CONTINUE") {
    return "사용자는 예산 초과를 감수하고 계속 진행하기로 했습니다. 초과 금액을 답변에 명시하세요.";
  }
  if (interrupt.choice === "SUBSTITUTE") {
    return "사용자는 예산 초과로 더 저렴한 대안을 선택했습니다. 대안 재료 기준으로 답변하세요.";
  }
  return null;
}

export function buildSynthesisPrompt(state: TurnState): string {
  const results = Object.entries(state.toolResults);
  const resolution = formatResolution(state);
  return [
    ASSISTANT_ROLE,
    "초안과 도구 결과를 종합해 최종 답변을 작성하세요. 가격은 도구 결과 기준으로 적고 총 예상 비용을 계산하세요.",
    "",
    "[초안]",
    state.draftAnswer ?? "",
    "",
    "[도구 결과]",
    results.length > 0 ? results.map(([id, outcome]) => formatOutcome(id, outcome)).join("\n") : "- (없음)",
    "",
    "[예산]",
    `- 한도: ${formatWon(state.budget.ceiling)}`,
    `- 예상 지출: ${formatWon(state.budget.spentEstimate)}`,
    ...(resolution ? ["", "[예산 결정]", resolution] : []),
    "",
    "[최근 대화]",
    formatRecentTurns(state.shortTermMemory),
    "",
    "[사용자 장기 기억]",
    formatFacts(state.longTermFacts),
    "",
    "[제약조건]",
    formatConstraints(state.constraints),
  ].join("\n");
}

function describeDelta(delta: ModificationDelta): string {
  switch (delta.kind) {
    case "servings":
      return `인원을 ${delta.servings}인분으로 조정`;
    case "scale":
      return `분량을 ${delta.factor}배로 조정`;
    case "substitute":
      return `${delta.from}을(를) ${delta.to}(으)로 교체`;
    case "dietary":
    case "budget":
    case "general":
      return delta.note;
  }
}

export function buildRewritePrompt(input: {
  readonly previousAnswer: string;
  readonly instruction: string;
  readonly deltas: readonly ModificationDelta[];
  readonly longTermFacts: readonly LongTermFact[];
  readonly shortTermMemory: readonly ConversationTurn[];
}): string {
  return [
    ASSISTANT_ROLE,
    "이전 답변을 사용자의 수정 요청에 맞게 고쳐 쓰세요. 요청과 관계없는 내용은 유지하고, 수정된 전체 답변만 출력하세요.",
    "",
    "[이전 답변]",
    input.previousAnswer,
    "",
    "[수정 요청]",
    input.instruction,
    "",
    "[반영할 변경]",
    input.deltas.map((delta) => `- ${describeDelta(delta)}`).join("\n"),
    "",
    "[최근 대화]",
    formatRecentTurns(input.shortTermMemory),
    "",
    "[사용자 장기 기억]",
    formatFacts(input.longTermFacts),
  ].join("\n");
}
