import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type { LLMClientPort } from "../../src/core/agent/llm.port";
import { runDraftPhase, runSynthesisPhase } from "../../src/core/agent/main_agent";
import { applyModification, planModification } from "../../src/core/agent/modify_agent";
import {
  applyResolution,
  isSuspended,
  needsResolutionApplied,
  recordCost,
} from "../../src/core/budget/budget_interrupt";
import type { LongTermMemoryStore } from "../../src/core/memory/memory.types";
import { writeTurnMemory } from "../../src/core/memory/memory_writer";
import { reflectOnTurn } from "../../src/core/reflection/reflection";
import type { RetrieverPort } from "../../src/core/retrieval/retriever.port";
import { CLARIFICATION_MESSAGE, routeTurn } from "../../src/core/supervisor/supervisor";
import type { TurnClassifier } from "../../src/core/supervisor/turn.classifier";
import type { ToolDispatcher } from "../../src/core/tools/tool.dispatcher";
import { asMessage } from "../../src/core/turn/errors";
import type {
  BudgetInterrupt,
  BudgetLedger,
  ConversationTurn,
  KnowledgeSnippet,
  LongTermFact,
  ModificationDelta,
  Route,
  ToolCall,
  ToolOutcome,
  TurnPatch,
  TurnState,
  UserConstraints,
} from "../../src/core/turn/turn.types";

export interface GraphDeps {
  readonly llm: LLMClientPort;
  readonly retriever: RetrieverPort;
  readonly classifier: TurnClassifier;
  readonly dispatcher: ToolDispatcher;
  readonly memory: LongTermMemoryStore;
}

export const TurnStateAnnotation = Annotation.Root({
  sessionId: Annotation<string>,
  userId: Annotation<string>,
  turnInput: Annotation<string>,
  constraints: Annotation<UserConstraints>,
  conversationHistory: Annotation<readonly ConversationTurn[]>,
  shortTermMemory: Annotation<readonly ConversationTurn[]>,
  longTermFacts: Annotation<readonly LongTermFact[]>,
  route: Annotation<Route | null>,
  retrievedKnowledge: Annotation<readonly KnowledgeSnippet[]>,
  modification: Annotation<readonly ModificationDelta[]>,
  draftAnswer: Annotation<string | null>,
  pendingToolCalls: Annotation<readonly ToolCall[]>,
  toolResults: Annotation<Readonly<Record<string, ToolOutcome>>>,
  nextCallSeq: Annotation<number>,
  budget: Annotation<BudgetLedger>,
  interrupt: Annotation<BudgetInterrupt>,
  finalAnswer: Annotation<string | null>,
  confidence: Annotation<number | null>,
  memoryWritten: Annotation<boolean>,
});

type GraphState = typeof TurnStateAnnotation.State;

async function retrieveNode(state: GraphState, deps: GraphDeps): Promise<TurnPatch> {
  try {
    const retrievedKnowledge = await deps.retriever.retrieve(state.turnInput);
    return { retrievedKnowledge };
  } catch (error) {
    console.warn(`[graph] retrieval failed, continuing without knowledge: ${asMessage(error)}`);
    return { retrievedKnowledge: [] };
  }
}

function supervisorNode(state: GraphState, deps: GraphDeps): TurnPatch {
  const decision = routeTurn(state, deps.classifier);
  console.log(
    `[graph] session=${state.sessionId} route=${decision.route}${decision.cue ? ` cue=${decision.cue.cue}` : ""}`
  );
  if (decision.route === "UNROUTABLE") {
    return { route: decision.route, finalAnswer: CLARIFICATION_MESSAGE, confidence: 0 };
  }
  return { route: decision.route };
}

/**
 * Runs pending calls strictly in order. Stops before the next call as soon as a cost pushes
 * the turn into AWAITING_USER_CHOICE; the remaining calls stay pending.
 */
async function dispatchNode(state: GraphState, deps: GraphDeps): Promise<TurnPatch> {
  let pending = [...state.pendingToolCalls];
  let toolResults = { ...state.toolResults };
  let budget = state.budget;
  let interrupt = state.interrupt;

  while (pending.length > 0 && !isSuspended(interrupt)) {
    const [call, ...rest] = pending;
    if (!call) {
      break;
    }
    pending = rest;

    const outcome = await deps.dispatcher.dispatch(call);
    toolResults = { ...toolResults, [call.id]: outcome };
    if (outcome.kind === "ok" && outcome.costEstimate > 0) {
      const next = recordCost({ budget, interrupt }, call, outcome.costEstimate);
      budget = next.budget;
      interrupt = next.interrupt;
    }
  }

  if (isSuspended(interrupt)) {
    console.log(
      `[graph] session=${state.sessionId} suspended on budget spent=${budget.spentEstimate} ceiling=${budget.ceiling}`
    );
  }

  return { pendingToolCalls: pending, toolResults, budget, interrupt };
}

function routeEntry(state: GraphState): "apply_resolution" | "retrieve" {
  return needsResolutionApplied(state.interrupt) ? "apply_resolution" : "retrieve";
}

function routeAfterSupervisor(state: GraphState): "draft" | "modify_plan" | "end" {
  if (state.route === "MODIFY") {
    return "modify_plan";
  }
  if (state.route === "NEW") {
    return "draft";
  }
  return "end";
}

function routeAfterDispatch(state: GraphState): "synthesize" | "modify_apply" | "end" {
  if (isSuspended(state.interrupt)) {
    return "end";
  }
  return state.route === "MODIFY" ? "modify_apply" : "synthesize";
}

function routeAfterResolution(state: GraphState): "memory_writer" | "dispatch" {
  return state.finalAnswer !== null ? "memory_writer" : "dispatch";
}

export function buildTurnGraph(deps: GraphDeps) {
  const graph = new StateGraph(TurnStateAnnotation)
    .addNode("retrieve", (state: GraphState) => retrieveNode(state, deps))
    .addNode("supervisor", (state: GraphState) => supervisorNode(state, deps))
    .addNode("draft", (state: GraphState) =>
      runDraftPhase(state, deps.llm, deps.dispatcher.toolRegistry.list())
    )
    .addNode("modify_plan", (state: GraphState) => planModification(state))
    .addNode("dispatch", (state: GraphState) => dispatchNode(state, deps))
    .addNode("apply_resolution", (state: GraphState) => applyResolution(state))
    .addNode("synthesize", (state: GraphState) => runSynthesisPhase(state, deps.llm))
    .addNode("modify_apply", (state: GraphState) => applyModification(state, deps.llm))
    .addNode("memory_writer", (state: GraphState) => writeTurnMemory(state, deps.memory))
    .addNode("reflection", (state: GraphState) => reflectOnTurn(state, deps.memory));

  graph.addConditionalEdges(START, routeEntry, {
    apply_resolution: "apply_resolution",
    retrieve: "retrieve",
  });
  graph.addEdge("retrieve", "supervisor");
  graph.addConditionalEdges("supervisor", routeAfterSupervisor, {
    draft: "draft",
    modify_plan: "modify_plan",
    end: END,
  });
  graph.addEdge("draft", "dispatch");
  graph.addEdge("modify_plan", "dispatch");
  graph.addConditionalEdges("dispatch", routeAfterDispatch, {
    synthesize: "synthesize",
    modify_apply: "modify_apply",
    end: END,
  });
  graph.addConditionalEdges("apply_resolution", routeAfterResolution, {
    memory_writer: "memory_writer",
    dispatch: "dispatch",
  });
  graph.addEdge("synthesize", "memory_writer");
  graph.addEdge("modify_apply", "memory_writer");
  graph.addEdge("memory_writer", "reflection");
  graph.addEdge("reflection", END);

  return graph.compile();
}

export type TurnGraph = ReturnType<typeof buildTurnGraph>;

export async function runTurnGraph(graph: TurnGraph, state: TurnState): Promise<TurnState> {
  return graph.invoke(state);
}
