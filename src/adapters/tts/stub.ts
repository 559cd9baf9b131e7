/**
 * Stub TTS adapter for tests or when no provider is configured.
 * Returns 100ms of silence as WAV.
 */

import { pcmToWav, SAMPLE_RATE_HZ, BYTES_PER_SAMPLE } from "../../pipeline/audio-utils";
import type { ITTS, VoiceOptions } from "./types";

const SILENCE_MS = 100;

export class StubTTS implements ITTS {
  async synthesize(_text: string, _options?: VoiceOptions): Promise<Buffer> {
    const pcm = Buffer.alloc((SAMPLE_RATE_HZ * BYTES_PER_SAMPLE * SILENCE_MS) / 1000);
    return pcmToWav(pcm, SAMPLE_RATE_HZ);
  }
}
