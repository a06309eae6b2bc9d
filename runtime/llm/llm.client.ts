import type { LLMClient, LLMSettings } from "./llm.types";
import { GeminiAdapter } from "./gemini.adapter";
import { LocalLLMClient } from "./local.adapter";
import { OpenAIAdapter } from "./openai.adapter";

export function createLLMClient(settings: LLMSettings, env: NodeJS.ProcessEnv = process.env): LLMClient {
  switch (settings.provider) {
    case "ollama":
      return new LocalLLMClient(settings, env);
    case "openai":
      return new OpenAIAdapter(settings, env);
    case "gemini":
      return new GeminiAdapter(settings, env);
  }
}
