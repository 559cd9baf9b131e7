/**
 * Per-session conversation transcript: append-only, in conversation order.
 * Entries are frozen on creation; only the most recent ones go to the LLM.
 */

export type ChatRole = "user" | "assistant";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
  /** ISO-8601. */
  readonly timestamp: string;
}

export class Transcript {
  private readonly entries: ChatMessage[] = [];

  append(role: ChatRole, content: string, at: Date = new Date()): ChatMessage {
    const message: ChatMessage = Object.freeze({ role, content, timestamp: at.toISOString() });
    this.entries.push(message);
    return message;
  }

  get length(): number {
    return this.entries.length;
  }

  /** All entries, oldest first. */
  all(): readonly ChatMessage[] {
    return [...this.entries];
  }

  /** The last `n` entries, oldest first. */
  recent(n: number): readonly ChatMessage[] {
    if (n <= 0) return [];
    return this.entries.slice(-n);
  }
}
