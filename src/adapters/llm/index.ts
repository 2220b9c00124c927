/**
 * Text generation adapters. The factory picks the configured provider; a provider without a
 * credential degrades to an unavailable StubLLM, so every persona speaks canned lines until restart.
 */

import type { AppConfig, LlmProvider } from "../../config";
import type { ILLM } from "./types";
import { StubLLM } from "./stub";
import { OpenAILLM } from "./openai";
import { AnthropicLLM } from "./anthropic";
import { logger } from "../../logging";

export type { ILLM, Message, ChatOptions, ChatResponse } from "./types";
export { StubLLM } from "./stub";
export { OpenAILLM } from "./openai";
export { AnthropicLLM } from "./anthropic";

export const DEFAULT_LLM_MODELS = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-sonnet-20241022",
} as const satisfies Partial<Record<LlmProvider, string>>;

export function createLLM(config: AppConfig): ILLM {
  const llm = config.llm;
  switch (llm.provider) {
    case "openai":
      if (llm.openaiApiKey) {
        return new OpenAILLM({ apiKey: llm.openaiApiKey, model: llm.openaiModel || DEFAULT_LLM_MODELS.openai });
      }
      break;
    case "anthropic":
      if (llm.anthropicApiKey) {
        return new AnthropicLLM({
          apiKey: llm.anthropicApiKey,
          model: llm.anthropicModel || DEFAULT_LLM_MODELS.anthropic,
        });
      }
      break;
    case "stub":
      return new StubLLM();
  }
  logger.warn(
    { event: "LLM_PROVIDER_UNAVAILABLE", provider: llm.provider },
    "No API key for the text generation provider; personas will use canned lines"
  );
  return new StubLLM();
}
