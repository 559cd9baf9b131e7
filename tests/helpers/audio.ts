/**
 * PCM fixtures: 16kHz mono 16-bit frames of constant amplitude.
 */

import { FRAME_SIZE_BYTES } from "../../src/pipeline/audio-utils";

/** `frames` x 20ms of samples at `amplitude` (RMS equals |amplitude|). */
export function pcmFrames(frames: number, amplitude: number): Buffer {
  const buf = Buffer.alloc(frames * FRAME_SIZE_BYTES);
  for (let i = 0; i < buf.length; i += 2) buf.writeInt16LE(amplitude, i);
  return buf;
}

export const speech = (frames: number): Buffer => pcmFrames(frames, 3000);
export const silence = (frames: number): Buffer => pcmFrames(frames, 0);
