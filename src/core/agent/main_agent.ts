import { groundAnswer } from "../reflection/grounding";
import { asMessage, GenerationFailureError } from "../turn/errors";
import type { ToolCall, TurnPatch, TurnState } from "../turn/turn.types";
import type { RegisteredTool } from "../tools/tool.types";
import { parseDraftDecision } from "./decision.parser";
import type { LLMClientPort } from "./llm.port";
import { buildDraftPrompt, buildSynthesisPrompt } from "./prompts";

async function generate(llm: LLMClientPort, phase: string, prompt: string): Promise<string> {
  let reply: string;
  try {
    reply = await llm.generate(prompt);
  } catch (error) {
    throw new GenerationFailureError(phase, `llm unavailable: ${asMessage(error)}`, {
      cause: error,
    });
  }
  if (typeof reply !== "string" || reply.trim() === "") {
    throw new GenerationFailureError(phase, "llm returned an empty reply");
  }
  return reply;
}

/**
 * Phase 1: one LLM call producing a draft and the ordered list of tool calls to run.
 */
export async function runDraftPhase(
  state: TurnState,
  llm: LLMClientPort,
  tools: readonly RegisteredTool[]
): Promise<TurnPatch> {
  const reply = await generate(llm, "draft", buildDraftPrompt(state, tools));
  const decision = parseDraftDecision(reply);
  if (decision.droppedCalls > 0) {
    console.warn(`[agent] dropped ${decision.droppedCalls} tool call(s) over the per-turn limit`);
  }

  let seq = state.nextCallSeq;
  const calls: ToolCall[] = decision.toolCalls.map((proposed) => {
    const call = { id: `call-${seq}`, tool: proposed.tool, arguments: proposed.arguments };
    seq += 1;
    return call;
  });

  return {
    draftAnswer: decision.draft,
    pendingToolCalls: [...state.pendingToolCalls, ...calls],
    nextCallSeq: seq,
  };
}

/**
 * Phase 2: folds the draft, every tool outcome and any budget resolution into the answer,
 * then appends notes for the user's remembered allergies and preferences.
 */
export async function runSynthesisPhase(state: TurnState, llm: LLMClientPort): Promise<TurnPatch> {
  const reply = await generate(llm, "synthesis", buildSynthesisPrompt(state));
  return { finalAnswer: groundAnswer(reply.trim(), state.longTermFacts) };
}
