/**
 * Azure Cognitive Services Text-to-Speech adapter.
 * Uses REST API with subscription key; output is RIFF (WAV) 16kHz 16-bit mono.
 */

import { providerErrorFromResponse } from "../policy";
import type { ITTS, VoiceOptions } from "./types";

export interface AzureTTSConfig {
  key: string;
  region: string;
  voiceName?: string;
}

export class AzureTTS implements ITTS {
  constructor(private readonly config: AzureTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const voiceName = options?.voiceName ?? this.config.voiceName ?? "en-US-JennyNeural";
    const url = `https://${this.config.region}.tts.speech.microsoft.com/cognitiveservices/v1`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Ocp-Apim-Subscription-Key": this.config.key,
        "Content-Type": "application/ssml+xml",
        "X-Microsoft-OutputFormat": "riff-16khz-16bit-mono-pcm",
      },
      body: `<speak version='1.0' xml:lang='en-US'><voice name='${escapeXml(voiceName)}'>${escapeXml(text)}</voice></speak>`,
      signal: options?.signal,
    });
    if (!response.ok) throw await providerErrorFromResponse("tts", response);
    return Buffer.from(await response.arrayBuffer());
  }
}

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
