/**
 * Audio buffer assembler: turns a session's stream of PCM chunks into utterances.
 *
 * Every byte pushed ends up in exactly one emitted utterance or one discarded span,
 * in arrival order. Boundaries fall on 20ms frame edges except for endOfTurn() and
 * complete(), which also flush a partial trailing frame.
 */

import { EnergyVAD, DEFAULT_ENERGY_THRESHOLD } from "./vad";
import { FRAME_MS, FRAME_SIZE_BYTES, pcmDurationMs } from "./audio-utils";
import { logger as rootLogger } from "../logging";
import type { Logger } from "../logging";

export type UtteranceReason = "silence" | "end-of-turn" | "max-duration";

export interface Utterance {
  pcm: Buffer;
  durationMs: number;
  reason: UtteranceReason;
}

export type AssemblerEvent =
  | { kind: "utterance"; utterance: Utterance }
  /** A span with no speech frame; never forwarded to STT. */
  | { kind: "discarded"; pcm: Buffer; reason: UtteranceReason | "leading-silence" };

export interface AssemblerConfig {
  /** Trailing silence (ms) after speech that ends an utterance. */
  silenceMs: number;
  /** Forced flush at this duration. */
  maxUtteranceMs: number;
  energyThreshold?: number;
  log?: Logger;
}

export class AudioBufferAssembler {
  private readonly vad: EnergyVAD;
  private readonly silenceFrames: number;
  private readonly maxBytes: number;
  private readonly log: Logger;
  private current: Buffer = Buffer.alloc(0);
  /** Bytes of `current` already analysed as whole frames. */
  private analysed = 0;
  private hadSpeech = false;
  private silenceRun = 0;

  constructor(config: AssemblerConfig) {
    this.vad = new EnergyVAD(config.energyThreshold ?? DEFAULT_ENERGY_THRESHOLD);
    this.silenceFrames = Math.max(1, Math.ceil(config.silenceMs / FRAME_MS));
    this.maxBytes = Math.max(1, Math.floor(config.maxUtteranceMs / FRAME_MS)) * FRAME_SIZE_BYTES;
    this.log = config.log ?? rootLogger;
  }

  /** Bytes buffered but not yet emitted. */
  get bufferedBytes(): number {
    return this.current.length;
  }

  /** True once a speech frame has been seen in the current utterance. */
  get hasSpeech(): boolean {
    return this.hadSpeech;
  }

  push(chunk: Buffer): AssemblerEvent[] {
    const events: AssemblerEvent[] = [];
    if (chunk.length === 0) return events;
    this.current = this.current.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.current, chunk]);

    while (this.analysed + FRAME_SIZE_BYTES <= this.current.length) {
      const frame = this.current.subarray(this.analysed, this.analysed + FRAME_SIZE_BYTES);
      this.analysed += FRAME_SIZE_BYTES;
      if (this.vad.isSpeech(frame)) {
        this.hadSpeech = true;
        this.silenceRun = 0;
      } else {
        this.silenceRun++;
      }

      if (this.hadSpeech && this.silenceRun >= this.silenceFrames) {
        events.push(this.cut(this.analysed, "silence"));
      } else if (!this.hadSpeech && this.silenceRun >= this.silenceFrames) {
        // Leading silence is dropped as it arrives.
        events.push(this.cut(this.analysed, "leading-silence"));
      } else if (this.analysed >= this.maxBytes) {
        this.log.warn(
          { event: "UTTERANCE_TRUNCATED", durationMs: pcmDurationMs(this.analysed) },
          "Utterance reached max duration; flushing"
        );
        events.push(this.cut(this.analysed, "max-duration"));
      }
    }
    return events;
  }

  /** Flush everything buffered (explicit end-of-turn). Null when nothing is buffered. */
  endOfTurn(): AssemblerEvent | null {
    if (this.current.length === 0) return null;
    // Frames push() has not analysed yet, including a partial trailing frame.
    for (let at = this.analysed; !this.hadSpeech && at < this.current.length; at += FRAME_SIZE_BYTES) {
      if (this.vad.isSpeech(this.current.subarray(at, at + FRAME_SIZE_BYTES))) this.hadSpeech = true;
    }
    return this.cut(this.current.length, "end-of-turn");
  }

  /**
   * Take a whole recording as one utterance, together with anything already buffered.
   * No silence or max-duration cuts are made inside it.
   */
  complete(chunk: Buffer): AssemblerEvent | null {
    if (chunk.length > 0) {
      this.current = this.current.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.current, chunk]);
    }
    return this.endOfTurn();
  }

  /** Drop all buffered audio (e.g. text input interrupted listening). Returns the dropped byte count. */
  reset(): number {
    const dropped = this.current.length;
    this.current = Buffer.alloc(0);
    this.analysed = 0;
    this.hadSpeech = false;
    this.silenceRun = 0;
    return dropped;
  }

  private cut(at: number, reason: UtteranceReason | "leading-silence"): AssemblerEvent {
    const pcm = this.current.subarray(0, at);
    const hadSpeech = this.hadSpeech;
    this.current = this.current.subarray(at);
    this.analysed = 0;
    this.hadSpeech = false;
    this.silenceRun = 0;
    if (!hadSpeech || reason === "leading-silence") {
      return { kind: "discarded", pcm, reason };
    }
    return { kind: "utterance", utterance: { pcm, durationMs: pcmDurationMs(pcm.length), reason } };
  }
}
