import type { LLMClient, LLMSettings } from "./llm.types";
import { asObject, postJsonWithRetry, type RetryPolicy } from "./http.retry";

export const DEFAULT_OLLAMA_MODEL = "qwen3:8b";
const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";

function env(source: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const v = source[name];
  return typeof v === "string" && v.trim() !== "" ? v.trim() : fallback;
}

function extractResponseText(payload: unknown): string | null {
  const response = asObject(payload)?.response;
  return typeof response === "string" && response.trim() !== "" ? response : null;
}

export class LocalLLMClient implements LLMClient {
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly policy: RetryPolicy;

  constructor(config: LLMSettings, source: NodeJS.ProcessEnv = process.env) {
    this.model = config.model ?? env(source, "OLLAMA_MODEL", DEFAULT_OLLAMA_MODEL);
    this.baseUrl = env(source, "OLLAMA_BASE_URL", DEFAULT_OLLAMA_BASE_URL).replace(/\/+$/, "");
    this.policy = config;
  }

  async generate(prompt: string): Promise<string> {
    return postJsonWithRetry(this.policy, {
      label: "OLLAMA",
      url: `${this.baseUrl}/api/generate`,
      headers: {},
      body: { model: this.model, prompt, stream: false },
      extractText: extractResponseText,
    });
  }
}
