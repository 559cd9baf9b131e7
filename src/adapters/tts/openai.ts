/**
 * OpenAI-compatible speech adapter. Requests WAV output.
 */

import OpenAI from "openai";
import type { ITTS, VoiceOptions } from "./types";

const OPENAI_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;
type OpenAIVoice = (typeof OPENAI_VOICES)[number];

function toOpenAIVoice(name: string | undefined): OpenAIVoice {
  return OPENAI_VOICES.find((v) => v === name) ?? "alloy";
}

export interface OpenAITTSConfig {
  apiKey: string;
  model: string;
  voice: string;
  baseUrl?: string;
}

export class OpenAITTS implements ITTS {
  private client: OpenAI;

  constructor(private readonly config: OpenAITTSConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 });
  }

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const response = await this.client.audio.speech.create(
      {
        model: this.config.model,
        voice: toOpenAIVoice(options?.voiceName ?? this.config.voice),
        input: text,
        response_format: "wav",
      },
      { signal: options?.signal }
    );
    return Buffer.from(await response.arrayBuffer());
  }
}
