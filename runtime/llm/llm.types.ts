import type { LLMClientPort } from "../../src/core/agent/llm.port";

export type LLMClient = LLMClientPort;

export type LLMProvider = "ollama" | "gemini" | "openai";

export const LLM_PROVIDERS = Object.freeze([
  "ollama",
  "gemini",
  "openai",
] as const satisfies readonly LLMProvider[]);

/** Which backend answers prompts, and how hard each call is retried. */
export interface LLMSettings {
  readonly provider: LLMProvider;
  readonly model?: string;
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly backoffMs: readonly number[];
}
