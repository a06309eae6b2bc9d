export class GenerationFailureError extends Error {
  readonly kind = "GenerationFailure";
  readonly phase: string;
  readonly cause?: unknown;

  constructor(phase: string, message: string, options?: { cause?: unknown }) {
    super(`GENERATION_FAILURE ${phase}: ${message}`);
    this.name = "GenerationFailureError";
    this.phase = phase;
    this.cause = options?.cause;
  }
}

export class TurnStateError extends Error {
  readonly kind = "TurnState";
  readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "TurnStateError";
    this.cause = options?.cause;
  }
}

export function isGenerationFailure(error: unknown): error is GenerationFailureError {
  return error instanceof GenerationFailureError;
}

export function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
