import type { LLMClient, LLMSettings } from "./llm.types";
import { ConfigurationError } from "./errors";
import { asObject, postJsonWithRetry, type RetryPolicy } from "./http.retry";

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

function extractResponseText(payload: unknown): string | null {
  const choices = asObject(payload)?.choices;
  if (!Array.isArray(choices) || choices.length === 0) {
    return null;
  }
  const content = asObject(asObject(choices[0])?.message)?.content;
  if (typeof content !== "string" || content.trim() === "") {
    return null;
  }
  return content.trim();
}

export class OpenAIAdapter implements LLMClient {
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly policy: RetryPolicy;
  private readonly apiKey: string;

  constructor(config: LLMSettings, env: NodeJS.ProcessEnv = process.env) {
    this.model = config.model ?? DEFAULT_OPENAI_MODEL;
    this.policy = config;
    const baseUrl = env.OPENAI_BASE_URL;
    this.baseUrl =
      typeof baseUrl === "string" && baseUrl.trim() !== ""
        ? baseUrl.replace(/\/+$/, "")
        : DEFAULT_OPENAI_BASE_URL;

    const apiKey = env.OPENAI_API_KEY;
    if (typeof apiKey !== "string" || apiKey.trim() === "") {
      throw new ConfigurationError(
        "CONFIGURATION_ERROR OPENAI_API_KEY is required when provider=openai"
      );
    }
    this.apiKey = apiKey;
  }

  async generate(prompt: string): Promise<string> {
    return postJsonWithRetry(this.policy, {
      label: "OPENAI",
      url: `${this.baseUrl}/chat/completions`,
      headers: { authorization: `Bearer ${this.apiKey}` },
      body: {
        model: this.model,
        messages: [{ role: "user", content: prompt }],
      },
      extractText: extractResponseText,
    });
  }
}
