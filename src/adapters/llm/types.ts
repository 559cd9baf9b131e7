/**
 * LLM adapter types.
 */

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  maxTokens?: number;
  temperature?: number;
  /** Aborted when the attempt times out or the session closes. */
  signal?: AbortSignal;
}

export interface ChatResponse {
  text: string;
}

/**
 * LLM adapter interface: messages in (system prompt first), final reply text out.
 */
export interface ILLM {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
