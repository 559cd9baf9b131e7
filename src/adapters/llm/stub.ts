/**
 * Stub LLM adapter for tests or when no provider is configured.
 * Echoes the last user message.
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export class StubLLM implements ILLM {
  async chat(messages: Message[], _options?: ChatOptions): Promise<ChatResponse> {
    const lastUser = [...messages].reverse().find((m) => m.role === "user");
    return { text: lastUser ? `You said: ${lastUser.content}` : "Hello." };
  }
}
