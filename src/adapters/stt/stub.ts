/**
 * Stub STT adapter for tests or when no provider is configured.
 * Returns an empty transcript.
 */

import type { ISTT, TranscribeOptions, TranscriptResult } from "./types";

export class StubSTT implements ISTT {
  async transcribe(_wav: Buffer, _options?: TranscribeOptions): Promise<TranscriptResult> {
    return { text: "" };
  }
}
