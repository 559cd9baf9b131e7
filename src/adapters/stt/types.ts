/**
 * Speech-to-text adapter types.
 * Implementations can be swapped via config (OpenAI-compatible transcription, stub).
 */

export interface TranscriptResult {
  /** Transcribed text. */
  text: string;
  /** Optional language code. */
  language?: string;
}

export interface TranscribeOptions {
  /** Aborted when the attempt times out or the session closes. */
  signal?: AbortSignal;
}

/**
 * STT adapter interface: one complete WAV utterance in, transcript out.
 */
export interface ISTT {
  transcribe(wav: Buffer, options?: TranscribeOptions): Promise<TranscriptResult>;
}
