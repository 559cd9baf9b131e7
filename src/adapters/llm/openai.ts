/**
 * OpenAI-compatible Chat Completions LLM adapter (OpenAI, Groq, or any compatible base URL).
 */

import OpenAI from "openai";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface OpenAILlmConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

export class OpenAILLM implements ILLM {
  private client: OpenAI;

  constructor(private readonly cfg: OpenAILlmConfig) {
    this.client = new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseUrl, maxRetries: 0 });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const response = await this.client.chat.completions.create(
      {
        model: this.cfg.model,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        max_tokens: options?.maxTokens ?? 256,
        temperature: options?.temperature,
        stream: false,
      },
      { signal: options?.signal }
    );
    const text = response.choices[0]?.message?.content ?? "";
    return { text };
  }
}
