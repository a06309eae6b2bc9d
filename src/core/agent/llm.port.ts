export interface LLMClientPort {
  generate(prompt: string): Promise<string>;
}
