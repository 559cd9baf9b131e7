/**
 * In-memory record of tasks delegated to the core automation service.
 * Bounded; the oldest entries are evicted first.
 */

import { randomUUID } from "crypto";

export type DelegatedTaskStatus = "delegated" | "failed";

export interface DelegatedTask {
  taskId: string;
  sessionId: string;
  description: string;
  status: DelegatedTaskStatus;
  /** ISO-8601. */
  createdAt: string;
  /** Text returned by the service, or the failure reason. */
  message?: string;
}

export const DEFAULT_MAX_TASKS = 100;

export class TaskTracker {
  private readonly tasks = new Map<string, DelegatedTask>();

  constructor(private readonly maxTasks: number = DEFAULT_MAX_TASKS) {}

  /** Allocate an id for a task about to be submitted. */
  nextId(): string {
    return `task_${randomUUID()}`;
  }

  record(task: DelegatedTask): DelegatedTask {
    this.tasks.delete(task.taskId);
    this.tasks.set(task.taskId, { ...task });
    while (this.tasks.size > this.maxTasks) {
      const oldest = this.tasks.keys().next();
      if (oldest.done) break;
      this.tasks.delete(oldest.value);
    }
    return { ...task };
  }

  get(taskId: string): DelegatedTask | undefined {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : undefined;
  }

  /** Newest first. */
  list(): DelegatedTask[] {
    return [...this.tasks.values()].reverse().map((t) => ({ ...t }));
  }
}
