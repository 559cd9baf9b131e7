/**
 * Unit tests for audio helpers and the energy VAD.
 */

import { extractPcmFromWav, isWav, pcmDurationMs, pcmToWav, FRAME_SIZE_BYTES } from "../../../src/pipeline/audio-utils";
import { EnergyVAD, frameRms } from "../../../src/pipeline/vad";
import { pcmFrames, silence, speech } from "../../helpers/audio";

describe("audio-utils", () => {
  it("uses 640-byte frames (20ms at 16kHz, 16-bit)", () => {
    expect(FRAME_SIZE_BYTES).toBe(640);
  });

  it("pcmToWav writes a 44-byte RIFF header", () => {
    const wav = pcmToWav(Buffer.alloc(320), 16000);
    expect(wav.length).toBe(364);
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
    expect(wav.readUInt32LE(4)).toBe(356);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(40)).toBe(320);
    expect(isWav(wav)).toBe(true);
  });

  it("extractPcmFromWav returns the data chunk", () => {
    const pcm = speech(2);
    expect(extractPcmFromWav(pcmToWav(pcm))?.equals(pcm)).toBe(true);
  });

  it("extractPcmFromWav skips chunks before data", () => {
    const pcm = Buffer.from([1, 0, 2, 0]);
    const wav = pcmToWav(pcm);
    const list = Buffer.alloc(8 + 3);
    list.write("LIST", 0);
    list.writeUInt32LE(3, 4);
    // Odd-sized chunk plus one pad byte.
    const withList = Buffer.concat([wav.subarray(0, 36), list, Buffer.alloc(1), wav.subarray(36)]);
    expect(extractPcmFromWav(withList)?.equals(pcm)).toBe(true);
  });

  it("extractPcmFromWav returns null for non-WAV input", () => {
    expect(isWav(Buffer.from("not a wav file"))).toBe(false);
    expect(extractPcmFromWav(Buffer.from("not a wav file"))).toBeNull();
  });

  it("pcmDurationMs converts byte length to ms", () => {
    expect(pcmDurationMs(32000)).toBe(1000);
    expect(pcmDurationMs(640)).toBe(20);
  });
});

describe("EnergyVAD", () => {
  it("frameRms of constant amplitude equals the amplitude", () => {
    expect(frameRms(pcmFrames(1, -1200))).toBe(1200);
    expect(frameRms(Buffer.alloc(0))).toBe(0);
  });

  it("classifies frames against the threshold", () => {
    const vad = new EnergyVAD(500);
    expect(vad.isSpeech(speech(1))).toBe(true);
    expect(vad.isSpeech(silence(1))).toBe(false);
    expect(vad.isSpeech(pcmFrames(1, 500))).toBe(false);
    expect(vad.isSpeech(pcmFrames(1, 501))).toBe(true);
  });
});
