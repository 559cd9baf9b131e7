/**
 * LLM adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import { ConfigError } from "../../errors";
import type { ILLM } from "./types";
import { StubLLM } from "./stub";
import { OpenAILLM } from "./openai";
import { AnthropicLLM } from "./anthropic";

export type { ILLM, Message, ChatOptions, ChatResponse } from "./types";
export { StubLLM } from "./stub";
export { OpenAILLM } from "./openai";
export { AnthropicLLM } from "./anthropic";

export function createLLM(config: AppConfig): ILLM {
  const { provider, openaiApiKey, openaiBaseUrl, openaiModel, anthropicApiKey, anthropicModel } = config.llm;
  if (provider === "openai") {
    if (!openaiApiKey) throw new ConfigError("LLM_PROVIDER=openai requires OPENAI_API_KEY or LLM_API_KEY");
    return new OpenAILLM({ apiKey: openaiApiKey, model: openaiModel, baseUrl: openaiBaseUrl });
  }
  if (provider === "anthropic") {
    if (!anthropicApiKey) throw new ConfigError("LLM_PROVIDER=anthropic requires ANTHROPIC_API_KEY");
    return new AnthropicLLM({ apiKey: anthropicApiKey, model: anthropicModel });
  }
  return new StubLLM();
}
