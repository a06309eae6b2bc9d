import { createSnapshot } from "../../src/core/_shared/utils/snapshot";
import {
  buildInterruptPrompt,
  isSuspended,
  resolveBudgetInterrupt,
  type InterruptPrompt,
} from "../../src/core/budget/budget_interrupt";
import type { LongTermMemoryStore } from "../../src/core/memory/memory.types";
import { rankFacts } from "../../src/core/memory/memory.types";
import { TurnStateError } from "../../src/core/turn/errors";
import { beginTurn } from "../../src/core/turn/turn.state";
import type {
  BudgetChoice,
  KnowledgeSnippet,
  Route,
  SubstituteData,
  TurnState,
  UserConstraints,
} from "../../src/core/turn/turn.types";
import type { SessionStore } from "../../src/session/session.types";
import {
  createNoPendingInterruptError,
  createSessionConflictError,
  createTurnSuspendedError,
  toRuntimeError,
} from "../error";
import { runTurnGraph, type TurnGraph } from "../graph/graph";

export interface SubmitTurnRequest {
  readonly sessionId: string;
  readonly userId?: string;
  readonly text: string;
  readonly constraints?: UserConstraints;
  readonly budget?: number;
}

export interface ResolveInterruptRequest {
  readonly sessionId: string;
  readonly choice: BudgetChoice;
  readonly substitute?: SubstituteData;
}

export type TurnResult =
  | {
      readonly status: "completed";
      readonly finalAnswer: string;
      readonly confidence: number;
      readonly route: Route;
      readonly sources: readonly KnowledgeSnippet[];
    }
  | {
      readonly status: "awaiting_user_choice";
      readonly interruptPrompt: InterruptPrompt;
    }
  | {
      readonly status: "clarification";
      readonly finalAnswer: string;
      readonly confidence: 0;
    };

export interface TurnEngineDeps {
  readonly graph: TurnGraph;
  readonly sessions: SessionStore;
  readonly memory: LongTermMemoryStore;
  readonly defaultBudget: number;
}

/**
 * Owns the turn state of every session between graph runs. One turn per session runs at a
 * time; a suspended turn is kept as a frozen snapshot until its interrupt is resolved.
 */
export class TurnEngine {
  private readonly inFlight = new Set<string>();
  private readonly suspended = new Map<string, TurnState>();
  private readonly lastResolution = new Map<string, TurnResult>();

  constructor(private readonly deps: TurnEngineDeps) {}

  isSuspended(sessionId: string): boolean {
    return this.suspended.has(sessionId);
  }

  async submitTurn(request: SubmitTurnRequest): Promise<TurnResult> {
    const { sessionId } = request;
    this.acquire(sessionId);
    try {
      const pending = this.suspended.get(sessionId);
      if (pending) {
        throw createTurnSuspendedError(sessionId, interruptIdOf(pending));
      }
      this.lastResolution.delete(sessionId);

      const record = this.deps.sessions.load(sessionId);
      const userId = request.userId ?? record?.userId ?? sessionId;
      const longTermFacts = rankFacts(await this.deps.memory.loadFacts(userId));
      const state = beginTurn({
        sessionId,
        userId,
        turnInput: request.text,
        constraints: request.constraints,
        conversationHistory: record?.conversationHistory ?? [],
        shortTermMemory: record?.shortTermMemory ?? [],
        longTermFacts,
        budgetCeiling: request.budget ?? record?.budget ?? this.deps.defaultBudget,
      });

      console.log(
        `[engine] session=${sessionId} user=${userId} turn=${state.conversationHistory.length + 1} begin`
      );
      return await this.run(state);
    } catch (error) {
      throw toRuntimeError(error);
    } finally {
      this.inFlight.delete(sessionId);
    }
  }

  async resolveInterrupt(request: ResolveInterruptRequest): Promise<TurnResult> {
    const { sessionId } = request;
    this.acquire(sessionId);
    try {
      const snapshot = this.suspended.get(sessionId);
      if (!snapshot) {
        const previous = this.lastResolution.get(sessionId);
        if (previous) {
          console.log(`[engine] session=${sessionId} interrupt already resolved`);
          return previous;
        }
        throw createNoPendingInterruptError(sessionId);
      }

      const resolution = resolveBudgetInterrupt(
        snapshot.interrupt,
        request.choice,
        request.substitute ?? null
      );
      console.log(
        `[engine] session=${sessionId} interrupt=${interruptIdOf(snapshot)} choice=${request.choice}`
      );

      const result = await this.run({ ...snapshot, interrupt: resolution.interrupt });
      if (result.status !== "awaiting_user_choice") {
        this.lastResolution.set(sessionId, result);
      }
      return result;
    } catch (error) {
      throw toRuntimeError(error);
    } finally {
      this.inFlight.delete(sessionId);
    }
  }

  private acquire(sessionId: string): void {
    if (this.inFlight.has(sessionId)) {
      throw createSessionConflictError(sessionId);
    }
    this.inFlight.add(sessionId);
  }

  private async run(state: TurnState): Promise<TurnResult> {
    const finalState = await runTurnGraph(this.deps.graph, state);
    const { sessionId } = finalState;

    const prompt = buildInterruptPrompt(finalState.interrupt);
    if (isSuspended(finalState.interrupt) && prompt) {
      this.suspended.set(sessionId, createSnapshot(finalState));
      console.log(`[engine] session=${sessionId} awaiting user choice interrupt=${prompt.interruptId}`);
      return { status: "awaiting_user_choice", interruptPrompt: prompt };
    }
    this.suspended.delete(sessionId);

    if (finalState.route === "UNROUTABLE") {
      return {
        status: "clarification",
        finalAnswer: finalState.finalAnswer ?? "",
        confidence: 0,
      };
    }

    if (
      finalState.route === null ||
      finalState.finalAnswer === null ||
      finalState.confidence === null ||
      !finalState.memoryWritten
    ) {
      throw new TurnStateError(`TURN_STATE_ERROR session=${sessionId} turn ended incomplete`);
    }

    this.deps.sessions.save({
      sessionId,
      userId: finalState.userId,
      conversationHistory: finalState.conversationHistory,
      shortTermMemory: finalState.shortTermMemory,
      budget: finalState.budget.ceiling,
      spentEstimate: finalState.budget.spentEstimate,
      updatedAt: new Date().toISOString(),
    });
    console.log(
      `[engine] session=${sessionId} completed route=${finalState.route} confidence=${finalState.confidence.toFixed(2)}`
    );

    return {
      status: "completed",
      finalAnswer: finalState.finalAnswer,
      confidence: finalState.confidence,
      route: finalState.route,
      sources: finalState.retrievedKnowledge,
    };
  }
}

function interruptIdOf(state: TurnState): number {
  return state.interrupt.status === "NONE" ? 0 : state.interrupt.interruptId;
}
