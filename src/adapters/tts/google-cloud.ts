/**
 * Google Cloud Text-to-Speech adapter.
 * - With API key: REST API (env GOOGLE_CLOUD_TTS_API_KEY).
 * - Without API key: @google-cloud/text-to-speech client using Application Default
 *   Credentials (GOOGLE_APPLICATION_CREDENTIALS service account JSON).
 * LINEAR16 responses carry a WAV header.
 */

import { TextToSpeechClient } from "@google-cloud/text-to-speech";
import { providerErrorFromResponse } from "../policy";
import { ProviderError } from "../../errors";
import { SAMPLE_RATE_HZ } from "../../pipeline/audio-utils";
import type { ITTS, VoiceOptions } from "./types";

export interface GoogleCloudTTSConfig {
  apiKey: string;
  voiceName?: string;
  languageCode?: string;
}

const SYNTHESIZE_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";

function audioFromJson(data: unknown): Buffer {
  if (typeof data !== "object" || data === null) {
    throw new ProviderError("tts", "InvalidResponse", "Google TTS returned a non-object body");
  }
  const content: unknown = Reflect.get(data, "audioContent");
  if (content === undefined || content === "") return Buffer.alloc(0);
  if (typeof content !== "string") {
    throw new ProviderError("tts", "InvalidResponse", "Google TTS audioContent is not a string");
  }
  return Buffer.from(content, "base64");
}

/** TTS using REST API with API key. */
export class GoogleCloudTTS implements ITTS {
  constructor(private readonly config: GoogleCloudTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const voiceName = options?.voiceName ?? this.config.voiceName ?? "en-US-Neural2-D";
    const languageCode = options?.languageCode ?? this.config.languageCode ?? "en-US";
    const url = `${SYNTHESIZE_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const body = {
      input: { text },
      voice: { name: voiceName, languageCode },
      audioConfig: { audioEncoding: "LINEAR16", sampleRateHertz: SAMPLE_RATE_HZ },
    };
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal: options?.signal,
    });
    if (!response.ok) throw await providerErrorFromResponse("tts", response);
    const data: unknown = await response.json();
    return audioFromJson(data);
  }
}

/** TTS using official Node client and Application Default Credentials (OAuth2 / service account). */
export interface GoogleCloudTTSADCConfig {
  voiceName?: string;
  languageCode?: string;
}

export class GoogleCloudTTSADC implements ITTS {
  private readonly client: TextToSpeechClient;
  constructor(private readonly config: GoogleCloudTTSADCConfig = {}) {
    this.client = new TextToSpeechClient();
  }

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const voiceName = options?.voiceName ?? this.config.voiceName ?? "en-US-Neural2-D";
    const languageCode = options?.languageCode ?? this.config.languageCode ?? "en-US";
    // The gax client takes no AbortSignal; the stage policy abandons the call on timeout.
    const [response] = await this.client.synthesizeSpeech({
      input: { text },
      voice: { name: voiceName, languageCode },
      audioConfig: { audioEncoding: "LINEAR16", sampleRateHertz: SAMPLE_RATE_HZ },
    });
    const content = response.audioContent;
    if (!content) return Buffer.alloc(0);
    return typeof content === "string" ? Buffer.from(content, "base64") : Buffer.from(content);
  }
}
