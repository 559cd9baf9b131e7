/**
 * OpenAI-compatible transcription adapter (Whisper API or any host serving /audio/transcriptions).
 */

import OpenAI, { toFile } from "openai";
import type { ISTT, TranscribeOptions, TranscriptResult } from "./types";

export interface OpenAISttConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  language?: string;
}

export class OpenAISTT implements ISTT {
  private client: OpenAI;

  constructor(private readonly config: OpenAISttConfig) {
    // Retries and timeouts are owned by the stage adapter policy.
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 });
  }

  async transcribe(wav: Buffer, options?: TranscribeOptions): Promise<TranscriptResult> {
    const file = await toFile(wav, "utterance.wav", { type: "audio/wav" });
    const transcription = await this.client.audio.transcriptions.create(
      {
        file,
        model: this.config.model,
        language: this.config.language,
        response_format: "json",
      },
      { signal: options?.signal }
    );
    return { text: transcription.text };
  }
}
