/**
 * Unit tests for LLM adapters (stub and factory).
 */

import { AnthropicLLM, OpenAILLM, StubLLM, createLLM } from "../../../src/adapters/llm";
import { ConfigError } from "../../../src/errors";
import { testConfig } from "../../helpers/config";

describe("StubLLM", () => {
  it("echoes the last user message", async () => {
    const llm = new StubLLM();
    const result = await llm.chat([
      { role: "system", content: "Be brief." },
      { role: "user", content: "First" },
      { role: "assistant", content: "You said: First" },
      { role: "user", content: "Hello" },
    ]);
    expect(result.text).toBe("You said: Hello");
  });

  it("greets when there is no user message", async () => {
    const result = await new StubLLM().chat([{ role: "system", content: "Be brief." }]);
    expect(result.text).toBe("Hello.");
  });
});

describe("createLLM", () => {
  it("returns StubLLM when provider is stub", () => {
    expect(createLLM(testConfig())).toBeInstanceOf(StubLLM);
  });

  it("builds the OpenAI and Anthropic adapters when keyed", () => {
    const config = testConfig();
    config.llm.provider = "openai";
    config.llm.openaiApiKey = "test-secret";
    expect(createLLM(config)).toBeInstanceOf(OpenAILLM);
    config.llm.provider = "anthropic";
    config.llm.anthropicApiKey = "test-secret";
    expect(createLLM(config)).toBeInstanceOf(AnthropicLLM);
  });

  it("throws ConfigError when the key is missing", () => {
    const config = testConfig();
    config.llm.provider = "anthropic";
    expect(() => createLLM(config)).toThrow(ConfigError);
  });
});
