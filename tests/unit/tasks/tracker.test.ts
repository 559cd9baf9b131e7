import { TaskTracker } from "../../../src/tasks/tracker";
import type { DelegatedTask } from "../../../src/tasks/tracker";

function task(taskId: string, status: DelegatedTask["status"] = "delegated"): DelegatedTask {
  return { taskId, sessionId: "s1", description: `work ${taskId}`, status, createdAt: "2024-05-01T10:00:00.000Z" };
}

describe("TaskTracker", () => {
  it("allocates distinct task ids", () => {
    const tracker = new TaskTracker();
    const a = tracker.nextId();
    expect(a).toMatch(/^task_[0-9a-f-]{36}$/);
    expect(tracker.nextId()).not.toBe(a);
  });

  it("records and looks up tasks, newest first", () => {
    const tracker = new TaskTracker();
    tracker.record(task("a"));
    tracker.record(task("b", "failed"));
    expect(tracker.get("b")?.status).toBe("failed");
    expect(tracker.get("missing")).toBeUndefined();
    expect(tracker.list().map((t) => t.taskId)).toEqual(["b", "a"]);
  });

  it("evicts the oldest beyond the bound", () => {
    const tracker = new TaskTracker(2);
    tracker.record(task("a"));
    tracker.record(task("b"));
    tracker.record(task("c"));
    expect(tracker.list().map((t) => t.taskId)).toEqual(["c", "b"]);
    expect(tracker.get("a")).toBeUndefined();
  });

  it("returns copies", () => {
    const tracker = new TaskTracker();
    tracker.record(task("a"));
    const got = tracker.get("a");
    if (got) got.status = "failed";
    expect(tracker.get("a")?.status).toBe("delegated");
  });
});
