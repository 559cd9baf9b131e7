/**
 * TTS (Text-to-Speech) adapter types.
 * Implementations can be swapped via config (OpenAI-compatible, Google Cloud, Azure, stub).
 */

export interface VoiceOptions {
  /** Voice name or id (provider-specific). */
  voiceName?: string;
  /** Language code (e.g. en-US). */
  languageCode?: string;
  /** Aborted when the attempt times out or the session closes. */
  signal?: AbortSignal;
}

/**
 * TTS adapter interface: reply text in, one WAV (RIFF) buffer out.
 * An empty buffer means the provider produced no audio; the reply is then sent as text.
 */
export interface ITTS {
  synthesize(text: string, options?: VoiceOptions): Promise<Buffer>;
}
