/**
 * TTS adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import { ConfigError } from "../../errors";
import type { ITTS } from "./types";
import { StubTTS } from "./stub";
import { OpenAITTS } from "./openai";
import { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";
import { AzureTTS } from "./azure";

export type { ITTS, VoiceOptions } from "./types";
export { StubTTS } from "./stub";
export { OpenAITTS } from "./openai";
export { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";
export { AzureTTS } from "./azure";

export function createTTS(config: AppConfig): ITTS {
  const { provider, openaiApiKey, openaiBaseUrl, openaiModel, openaiVoice, googleApiKey, googleVoiceName, azureKey, azureRegion, azureVoiceName } =
    config.tts;
  if (provider === "openai") {
    if (!openaiApiKey) throw new ConfigError("TTS_PROVIDER=openai requires OPENAI_API_KEY or TTS_API_KEY");
    return new OpenAITTS({ apiKey: openaiApiKey, model: openaiModel, voice: openaiVoice, baseUrl: openaiBaseUrl });
  }
  if (provider === "google") {
    if (googleApiKey) {
      return new GoogleCloudTTS({ apiKey: googleApiKey, voiceName: googleVoiceName, languageCode: "en-US" });
    }
    return new GoogleCloudTTSADC({ voiceName: googleVoiceName, languageCode: "en-US" });
  }
  if (provider === "azure") {
    if (!azureKey || !azureRegion) throw new ConfigError("TTS_PROVIDER=azure requires AZURE_TTS_KEY and AZURE_TTS_REGION");
    return new AzureTTS({ key: azureKey, region: azureRegion, voiceName: azureVoiceName });
  }
  return new StubTTS();
}
