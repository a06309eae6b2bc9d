import { GenerationFailureError } from "../turn/errors";
import type { JsonValue, ToolArguments } from "../turn/turn.types";

export const MAX_TOOL_CALLS_PER_TURN = 5;

export interface ProposedToolCall {
  readonly tool: string;
  readonly arguments: ToolArguments;
}

export interface DraftDecision {
  readonly draft: string;
  readonly toolCalls: readonly ProposedToolCall[];
  readonly droppedCalls: number;
}

function fail(message: string, cause?: unknown): never {
  throw new GenerationFailureError("draft", message, { cause });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toJsonValue(value: unknown): JsonValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item));
  }
  if (isPlainObject(value)) {
    const row: Record<string, JsonValue> = {};
    for (const [key, item] of Object.entries(value)) {
      row[key] = toJsonValue(item);
    }
    return row;
  }
  return fail(`unsupported JSON value of type ${typeof value}`);
}

// Models often wrap JSON in a fenced block or add a sentence around it.
export function extractJsonObject(raw: string): string {
  const unfenced = raw.replace(/```(?:json)?/gi, "");
  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return fail("reply does not contain a JSON object");
  }
  return unfenced.slice(start, end + 1);
}

function parseToolCall(value: unknown, index: number): ProposedToolCall {
  if (!isPlainObject(value)) {
    return fail(`tool_calls[${index}] must be an object`);
  }
  const tool = value.tool;
  if (typeof tool !== "string" || tool.trim() === "") {
    return fail(`tool_calls[${index}].tool must be a non-empty string`);
  }

  const rawArgs = value.arguments ?? {};
  if (!isPlainObject(rawArgs)) {
    return fail(`tool_calls[${index}].arguments must be an object`);
  }
  const args: Record<string, JsonValue> = {};
  for (const [key, item] of Object.entries(rawArgs)) {
    args[key] = toJsonValue(item);
  }

  return { tool: tool.trim(), arguments: args };
}

/**
 * Validates the first-phase reply: a JSON object with a non-empty `draft` and an optional
 * `tool_calls` array. Unknown tool names are kept; the dispatcher reports them per call.
 */
export function parseDraftDecision(raw: string): DraftDecision {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonObject(raw)) as unknown;
  } catch (error) {
    if (error instanceof GenerationFailureError) {
      throw error;
    }
    return fail("reply is not valid JSON", error);
  }

  if (!isPlainObject(parsed)) {
    return fail("reply must be a JSON object");
  }

  const draft = parsed.draft;
  if (typeof draft !== "string" || draft.trim() === "") {
    return fail("draft must be a non-empty string");
  }

  const rawCalls = parsed.tool_calls ?? [];
  if (!Array.isArray(rawCalls)) {
    return fail("tool_calls must be an array");
  }

  const calls = rawCalls.map((call, idx) => parseToolCall(call, idx));
  return {
    draft: draft.trim(),
    toolCalls: calls.slice(0, MAX_TOOL_CALLS_PER_TURN),
    droppedCalls: Math.max(0, calls.length - MAX_TOOL_CALLS_PER_TURN),
  };
}
