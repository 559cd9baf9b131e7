/**
 * Core automation service adapter types.
 * Work the assistant cannot finish in conversation is handed to this service.
 */

export interface AutomationTask {
  description: string;
  /** Conversation id sent to the service; one per delegated task. */
  conversationId: string;
}

export interface AutomationReceipt {
  /** Optional text returned by the service when it accepted the task. */
  message?: string;
}

export interface SubmitOptions {
  signal?: AbortSignal;
}

export interface IAutomation {
  submit(task: AutomationTask, options?: SubmitOptions): Promise<AutomationReceipt>;
}
