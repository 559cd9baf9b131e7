/**
 * HTTP client for the core automation service: POST {baseUrl}/api/chat.
 */

import { providerErrorFromResponse } from "../policy";
import type { AutomationReceipt, AutomationTask, IAutomation, SubmitOptions } from "./types";

export interface HttpAutomationConfig {
  baseUrl: string;
  token?: string;
}

function receiptFrom(body: string): AutomationReceipt {
  if (!body.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === "object" && parsed !== null) {
      const message: unknown = Reflect.get(parsed, "response") ?? Reflect.get(parsed, "message");
      return typeof message === "string" ? { message } : {};
    }
  } catch {
    return { message: body.slice(0, 500) };
  }
  return {};
}

export class HttpAutomation implements IAutomation {
  private readonly endpoint: string;

  constructor(private readonly config: HttpAutomationConfig) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, "")}/api/chat`;
  }

  async submit(task: AutomationTask, options?: SubmitOptions): Promise<AutomationReceipt> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.config.token) headers.Authorization = `Bearer ${this.config.token}`;
    const response = await fetch(this.endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify({ message: task.description, conversation_id: task.conversationId }),
      signal: options?.signal,
    });
    if (!response.ok) throw await providerErrorFromResponse("automation", response);
    return receiptFrom(await response.text());
  }
}
