/**
 * Unit tests for STT adapters (stub and factory).
 */

import { OpenAISTT, StubSTT, createSTT } from "../../../src/adapters/stt";
import { ConfigError } from "../../../src/errors";
import { pcmToWav } from "../../../src/pipeline/audio-utils";
import { testConfig } from "../../helpers/config";

describe("StubSTT", () => {
  it("returns an empty transcript", async () => {
    const result = await new StubSTT().transcribe(pcmToWav(Buffer.alloc(640)));
    expect(result).toEqual({ text: "" });
  });
});

describe("createSTT", () => {
  it("returns StubSTT when provider is stub", () => {
    expect(createSTT(testConfig())).toBeInstanceOf(StubSTT);
  });

  it("returns OpenAISTT with a key", () => {
    const config = testConfig();
    config.stt.provider = "openai";
    config.stt.apiKey = "test-secret";
    config.stt.baseUrl = "http://127.0.0.1:9/v1";
    expect(createSTT(config)).toBeInstanceOf(OpenAISTT);
  });

  it("throws ConfigError without a key", () => {
    const config = testConfig();
    config.stt.provider = "openai";
    expect(() => createSTT(config)).toThrow(ConfigError);
  });
});
