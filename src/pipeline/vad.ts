/**
 * Voice Activity Detection: energy-based speech/silence decision on 20ms frames
 * of 16kHz mono 16-bit PCM.
 */

/** Default RMS threshold (16-bit PCM): at or below = silence. */
export const DEFAULT_ENERGY_THRESHOLD = 500;

/** Root-mean-square amplitude of 16-bit LE samples; a trailing odd byte is ignored. */
export function frameRms(frame: Buffer): number {
  const samples = Math.floor(frame.length / 2);
  if (samples === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples * 2; i += 2) {
    const s = frame.readInt16LE(i);
    sum += s * s;
  }
  return Math.sqrt(sum / samples);
}

export class EnergyVAD {
  constructor(private readonly threshold: number = DEFAULT_ENERGY_THRESHOLD) {}

  isSpeech(frame: Buffer): boolean {
    return frameRms(frame) > this.threshold;
  }
}
