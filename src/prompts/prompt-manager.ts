import type { Message } from "../adapters/llm";
import type { Transcript } from "../memory/transcript";

export const ASSISTANT_SYSTEM_PROMPT = [
  "You are a personal voice assistant. Replies are spoken aloud, so keep them brief, natural and actionable.",
  "Avoid markdown, lists and code blocks. Be friendly but professional.",
].join("\n");

export const DELEGATE_PREFIX = "DELEGATE:";

/** Appended when the automation service is configured. */
export const DELEGATION_RULES = [
  "DELEGATION RULES:",
  `- If the user asks you to create, generate, build, design, analyze, research, write, develop or automate something complex, reply with exactly "${DELEGATE_PREFIX} <task description>" and nothing else.`,
  "- For simple questions, status checks or casual conversation, reply directly.",
  "",
  "Examples:",
  `- "Create a video about our product" -> "${DELEGATE_PREFIX} Create a video about our product"`,
  `- "How are you?" -> a short direct answer`,
].join("\n");

export interface PromptManagerConfig {
  /** Base system prompt. Defaults to ASSISTANT_SYSTEM_PROMPT. */
  systemPrompt?: string;
  /** Include DELEGATION_RULES in the system prompt. */
  delegationEnabled?: boolean;
  /** Transcript entries handed to the LLM. */
  maxContextMessages: number;
}

/**
 * PromptManager
 *
 * Builds the LLM message list from the system prompt and the recent transcript,
 * and recognises delegation replies.
 */
export class PromptManager {
  private readonly systemPrompt: string;
  private readonly delegationEnabled: boolean;
  private readonly maxContextMessages: number;

  constructor(cfg: PromptManagerConfig) {
    const base = cfg.systemPrompt ?? ASSISTANT_SYSTEM_PROMPT;
    this.delegationEnabled = cfg.delegationEnabled ?? false;
    this.systemPrompt = this.delegationEnabled ? [base, DELEGATION_RULES].join("\n\n") : base;
    this.maxContextMessages = cfg.maxContextMessages;
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  buildMessages(transcript: Transcript): Message[] {
    const recent = transcript.recent(this.maxContextMessages);
    return [{ role: "system", content: this.systemPrompt }, ...recent.map((m) => ({ role: m.role, content: m.content }))];
  }

  /** Task description when the reply asks for delegation; null otherwise (or when delegation is off). */
  parseDelegation(reply: string): string | null {
    if (!this.delegationEnabled) return null;
    const trimmed = reply.trim();
    if (!trimmed.toUpperCase().startsWith(DELEGATE_PREFIX)) return null;
    const task = trimmed.slice(DELEGATE_PREFIX.length).trim();
    return task.length > 0 ? task : null;
  }
}
