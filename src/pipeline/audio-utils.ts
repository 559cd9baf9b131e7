/**
 * Audio format helpers: PCM <-> WAV for the voice pipeline.
 * Session audio is 16kHz mono 16-bit little-endian PCM.
 */

export const SAMPLE_RATE_HZ = 16000;
export const BYTES_PER_SAMPLE = 2;
/** 20ms analysis frame. */
export const FRAME_MS = 20;
export const FRAME_SIZE_BYTES = (SAMPLE_RATE_HZ * FRAME_MS * BYTES_PER_SAMPLE) / 1000;

/** Duration (ms) of a mono 16-bit PCM buffer at 16kHz. */
export function pcmDurationMs(byteLength: number): number {
  return Math.round((byteLength / (SAMPLE_RATE_HZ * BYTES_PER_SAMPLE)) * 1000);
}

/**
 * Prepend a 44-byte WAV header to 16-bit mono PCM.
 */
export function pcmToWav(pcm: Buffer, sampleRateHz: number = SAMPLE_RATE_HZ): Buffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const dataSize = pcm.length;
  const headerSize = 44;
  const fileSize = headerSize + dataSize;
  const header = Buffer.alloc(headerSize);
  header.write("RIFF", 0);
  header.writeUInt32LE(fileSize - 8, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((numChannels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}

/** True when the buffer starts with a RIFF/WAVE header. */
export function isWav(buf: Buffer): boolean {
  return buf.length >= 12 && buf.toString("ascii", 0, 4) === "RIFF" && buf.toString("ascii", 8, 12) === "WAVE";
}

/**
 * Return the `data` chunk of a RIFF/WAVE buffer, or null when the container is malformed.
 * Chunks are walked in order; a data size past the end of the buffer is clamped.
 */
export function extractPcmFromWav(wav: Buffer): Buffer | null {
  if (!isWav(wav)) return null;
  let offset = 12;
  while (offset + 8 <= wav.length) {
    const id = wav.toString("ascii", offset, offset + 4);
    const size = wav.readUInt32LE(offset + 4);
    const start = offset + 8;
    if (id === "data") {
      return wav.subarray(start, Math.min(start + size, wav.length));
    }
    // Chunks are word-aligned.
    offset = start + size + (size % 2);
  }
  return null;
}
