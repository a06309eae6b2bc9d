import type { ToolCall, ToolFailureCode, ToolOutcome } from "../turn/turn.types";
import { asMessage } from "../turn/errors";
import type { ToolRegistry } from "./tool.registry";
import type { BoundInvocation, ToolInvocationResult } from "./tool.types";
import { ToolNoMatchError, ToolTimeoutError } from "./tool.types";

export interface ToolDispatcherOptions {
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly backoffMs?: readonly number[];
  readonly log?: (line: string) => void;
}

const RETRYABLE_CODES: ReadonlySet<ToolFailureCode> = new Set(["TOOL_TIMEOUT", "TOOL_ERROR"]);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function failure(tool: string, code: ToolFailureCode, reason: string): ToolOutcome {
  return { kind: "failure", tool, code, reason };
}

async function invokeWithTimeout(
  invoke: BoundInvocation,
  timeoutMs: number
): Promise<ToolInvocationResult> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ToolTimeoutError(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([invoke(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function classify(error: unknown): ToolFailureCode {
  if (error instanceof ToolNoMatchError) {
    return "NO_MATCH";
  }
  if (error instanceof ToolTimeoutError) {
    return "TOOL_TIMEOUT";
  }
  return "TOOL_ERROR";
}

/**
 * Executes one tool call against the static table. Never throws: every problem becomes a
 * failure outcome stored under the call id.
 */
export class ToolDispatcher {
  private readonly registry: ToolRegistry;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffMs: readonly number[];
  private readonly log: (line: string) => void;

  constructor(registry: ToolRegistry, options: ToolDispatcherOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error("TOOL_DISPATCHER_ERROR maxAttempts must be an integer >= 1");
    }
    if (!(options.timeoutMs > 0)) {
      throw new Error("TOOL_DISPATCHER_ERROR timeoutMs must be > 0");
    }
    this.registry = registry;
    this.timeoutMs = options.timeoutMs;
    this.maxAttempts = options.maxAttempts;
    this.backoffMs = options.backoffMs ?? [];
    this.log = options.log ?? ((line) => console.log(line));
  }

  get toolRegistry(): ToolRegistry {
    return this.registry;
  }

  async dispatch(call: ToolCall): Promise<ToolOutcome> {
    const tool = this.registry.get(call.tool);
    if (!tool) {
      this.log(`[tools] ${call.id} ${call.tool} -> TOOL_NOT_FOUND`);
      return failure(call.tool, "TOOL_NOT_FOUND", `unknown tool '${call.tool}'`);
    }

    const bound = tool.bind(call.arguments);
    if (!bound.ok) {
      this.log(`[tools] ${call.id} ${call.tool} -> INVALID_ARGUMENTS`);
      return failure(call.tool, "INVALID_ARGUMENTS", bound.reason);
    }

    let last: ToolOutcome = failure(call.tool, "TOOL_ERROR", "not attempted");
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (attempt > 1) {
        const delayMs = this.backoffMs[Math.min(attempt - 2, this.backoffMs.length - 1)] ?? 0;
        if (delayMs > 0) {
          await sleep(delayMs);
        }
      }

      last = await this.attempt(call, bound.args);
      if (last.kind === "ok" || !RETRYABLE_CODES.has(last.code)) {
        break;
      }
    }

    this.log(
      last.kind === "ok"
        ? `[tools] ${call.id} ${call.tool} -> ok cost=${last.costEstimate}`
        : `[tools] ${call.id} ${call.tool} -> ${last.code}`
    );
    return last;
  }

  private async attempt(call: ToolCall, invoke: BoundInvocation): Promise<ToolOutcome> {
    try {
      const result = await invokeWithTimeout(invoke, this.timeoutMs);
      if (!Number.isFinite(result.costEstimate) || result.costEstimate < 0) {
        return failure(call.tool, "TOOL_ERROR", "capability reported an invalid cost");
      }
      return {
        kind: "ok",
        tool: call.tool,
        value: result.value,
        costEstimate: result.costEstimate,
      };
    } catch (error) {
      return failure(call.tool, classify(error), asMessage(error));
    }
  }
}
