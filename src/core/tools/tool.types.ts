import type { JsonValue, ToolArguments } from "../turn/turn.types";

export interface ToolInvocationResult {
  readonly value: JsonValue;
  readonly costEstimate: number;
}

export type ArgumentCheck<T> =
  | { readonly ok: true; readonly args: T }
  | { readonly ok: false; readonly reason: string };

/**
 * One external capability. `validate` narrows raw LLM-proposed arguments; `invoke` only ever
 * sees arguments that passed validation.
 */
export interface ToolCapability<TArgs> {
  readonly name: string;
  readonly description: string;
  readonly argumentHint: string;
  validate(args: ToolArguments): ArgumentCheck<TArgs>;
  invoke(args: TArgs, signal: AbortSignal): Promise<ToolInvocationResult>;
}

export type BoundInvocation = (signal: AbortSignal) => Promise<ToolInvocationResult>;

export interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  readonly argumentHint: string;
  bind(args: ToolArguments): ArgumentCheck<BoundInvocation>;
}

export class ToolNoMatchError extends Error {
  readonly kind = "ToolNoMatch";

  constructor(message: string) {
    super(message);
    this.name = "ToolNoMatchError";
  }
}

export class ToolTimeoutError extends Error {
  readonly kind = "ToolTimeout";

  constructor(message: string) {
    super(message);
    this.name = "ToolTimeoutError";
  }
}
