import type { LLMClient, LLMSettings } from "./llm.types";
import { ConfigurationError } from "./errors";
import { asObject, postJsonWithRetry, type RetryPolicy } from "./http.retry";

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";
const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta";

function extractResponseText(payload: unknown): string | null {
  const candidates = asObject(payload)?.candidates;
  if (!Array.isArray(candidates) || candidates.length === 0) {
    return null;
  }

  const parts = asObject(asObject(candidates[0])?.content)?.parts;
  if (!Array.isArray(parts)) {
    return null;
  }

  const text = parts
    .map((part) => {
      const value = asObject(part)?.text;
      return typeof value === "string" ? value : "";
    })
    .join("")
    .trim();

  return text === "" ? null : text;
}

export class GeminiAdapter implements LLMClient {
  private readonly model: string;
  private readonly policy: RetryPolicy;
  private readonly apiKey: string;

  constructor(config: LLMSettings, env: NodeJS.ProcessEnv = process.env) {
    this.model = config.model ?? DEFAULT_GEMINI_MODEL;
    this.policy = config;

    const apiKey = env.GEMINI_API_KEY;
    if (typeof apiKey !== "string" || apiKey.trim() === "") {
      throw new ConfigurationError(
        "CONFIGURATION_ERROR GEMINI_API_KEY is required when provider=gemini"
      );
    }
    this.apiKey = apiKey;
  }

  async generate(prompt: string): Promise<string> {
    return postJsonWithRetry(this.policy, {
      label: "GEMINI",
      url: `${GEMINI_API_BASE}/models/${encodeURIComponent(this.model)}:generateContent`,
      headers: { "x-goog-api-key": this.apiKey },
      body: { contents: [{ parts: [{ text: prompt }] }] },
      extractText: extractResponseText,
    });
  }
}
