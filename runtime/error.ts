import { isGenerationFailure } from "../src/core/turn/errors";
import { ConfigurationError } from "./llm/errors";

export const RUNTIME_ERROR_CODES = Object.freeze({
  SESSION_CONFLICT: "SESSION_CONFLICT",
  TURN_SUSPENDED: "TURN_SUSPENDED",
  NO_PENDING_INTERRUPT: "NO_PENDING_INTERRUPT",
  GENERATION_FAILED: "GENERATION_FAILED",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  RUNTIME_FAILED: "RUNTIME_FAILED",
} as const);

export type RuntimeErrorCode = (typeof RUNTIME_ERROR_CODES)[keyof typeof RUNTIME_ERROR_CODES];

export class RuntimeError extends Error {
  readonly errorCode: RuntimeErrorCode;
  readonly guideMessage: string;
  readonly httpStatus: number;

  constructor(
    message: string,
    input: {
      readonly errorCode: RuntimeErrorCode;
      readonly guideMessage: string;
      readonly httpStatus: number;
      readonly cause?: unknown;
    }
  ) {
    super(message);
    this.name = "RuntimeError";
    this.errorCode = input.errorCode;
    this.guideMessage = input.guideMessage;
    this.httpStatus = input.httpStatus;
    if ("cause" in input) {
      (this as Error & { cause?: unknown }).cause = input.cause;
    }
  }
}

function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function createSessionConflictError(sessionId: string): RuntimeError {
  return new RuntimeError(`SESSION_CONFLICT session=${sessionId}`, {
    errorCode: RUNTIME_ERROR_CODES.SESSION_CONFLICT,
    guideMessage: "abort_with_error(session_conflict)",
    httpStatus: 409,
  });
}

export function createTurnSuspendedError(sessionId: string, interruptId: number): RuntimeError {
  return new RuntimeError(`TURN_SUSPENDED session=${sessionId} interrupt=${interruptId}`, {
    errorCode: RUNTIME_ERROR_CODES.TURN_SUSPENDED,
    guideMessage: "resolve_interrupt_first(continue|substitute|cancel)",
    httpStatus: 409,
  });
}

export function createNoPendingInterruptError(sessionId: string): RuntimeError {
  return new RuntimeError(`NO_PENDING_INTERRUPT session=${sessionId}`, {
    errorCode: RUNTIME_ERROR_CODES.NO_PENDING_INTERRUPT,
    guideMessage: "abort_with_error(no_pending_interrupt)",
    httpStatus: 409,
  });
}

export function toRuntimeError(error: unknown): RuntimeError {
  if (error instanceof RuntimeError) {
    return error;
  }

  const message = asMessage(error);
  if (isGenerationFailure(error)) {
    return new RuntimeError(message, {
      errorCode: RUNTIME_ERROR_CODES.GENERATION_FAILED,
      guideMessage: "retry_turn(generation_failed)",
      httpStatus: 502,
      cause: error,
    });
  }

  if (error instanceof ConfigurationError || message.includes("CONFIGURATION_ERROR")) {
    return new RuntimeError(message, {
      errorCode: RUNTIME_ERROR_CODES.CONFIGURATION_ERROR,
      guideMessage: "abort_with_error(configuration_invalid)",
      httpStatus: 400,
      cause: error,
    });
  }

  return new RuntimeError(message, {
    errorCode: RUNTIME_ERROR_CODES.RUNTIME_FAILED,
    guideMessage: "abort_with_error(runtime_failed)",
    httpStatus: 500,
    cause: error,
  });
}
