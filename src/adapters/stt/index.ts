/**
 * STT adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import { ConfigError } from "../../errors";
import type { ISTT } from "./types";
import { StubSTT } from "./stub";
import { OpenAISTT } from "./openai";

export type { ISTT, TranscriptResult, TranscribeOptions } from "./types";
export { StubSTT } from "./stub";
export { OpenAISTT } from "./openai";

export function createSTT(config: AppConfig): ISTT {
  const { provider, apiKey, baseUrl, model, language } = config.stt;
  if (provider === "stub") return new StubSTT();
  if (!apiKey) throw new ConfigError("STT_PROVIDER=openai requires OPENAI_API_KEY or STT_API_KEY");
  return new OpenAISTT({ apiKey, baseUrl, model, language });
}
