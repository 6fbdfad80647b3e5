import { randomUUID } from "node:crypto";

import {
  InvalidTaskStateError,
  InvalidTaskTransitionError,
  KeyedLock,
  TASK_STAGES,
  TaskNotFoundError,
  TaskSchema,
  computePercent,
  deepFreeze,
  isTerminalStatus,
  type PartialResultUpdate,
  type Task,
  type TaskKind,
  type TaskProgress,
  type TaskProgressUpdate,
  type TaskRegistry,
  type TaskResult,
  type TaskStatus,
} from "@reqcase/shared";

/**
 * InMemoryTaskStore - process-lifetime TaskRegistry.
 *
 * Every write runs under the task's lock and commits a new, deeply frozen
 * snapshot; reads return the last committed snapshot without waiting. Merge
 * functions receive frozen input and must build new objects. Nothing survives a
 * restart.
 */

const TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  pending: ["running", "failed"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

function assertCanMove(from: TaskStatus, to: TaskStatus) {
  if (!TRANSITIONS[from].includes(to)) {
    throw new InvalidTaskTransitionError(from, to);
  }
}

function toProgress(update: TaskProgressUpdate): TaskProgress {
  if (update.current > update.total) {
    throw new InvalidTaskStateError(
      `Progress current (${update.current}) must not exceed total (${update.total}).`
    );
  }
  return { ...update, percent: computePercent(update.current, update.total) };
}

export interface InMemoryTaskStoreOptions {
  now?: () => Date;
}

export class InMemoryTaskStore implements TaskRegistry {
  private readonly tasks = new Map<string, Task>();
  private readonly lock = new KeyedLock();
  private readonly now: () => Date;

  constructor(options: InMemoryTaskStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async create(kind: TaskKind): Promise<Task> {
    const timestamp = this.now().toISOString();
    return this.commit({
      id: randomUUID(),
      kind,
      status: "pending",
      progress: { stage: TASK_STAGES.queued, current: 0, total: 0, message: "Queued", percent: 0 },
      partial_result: null,
      result: null,
      error: null,
      created_at: timestamp,
      updated_at: timestamp,
    });
  }

  async get(taskId: string): Promise<Task> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  async list(): Promise<Task[]> {
    return [...this.tasks.values()].sort((a, b) => b.created_at.localeCompare(a.created_at));
  }

  async markRunning(taskId: string, progress: TaskProgressUpdate): Promise<Task> {
    return this.write(taskId, (task) => {
      assertCanMove(task.status, "running");
      const timestamp = this.now().toISOString();
      return { ...task, status: "running", progress: toProgress(progress), started_at: timestamp };
    });
  }

  async updateProgress(taskId: string, progress: TaskProgressUpdate): Promise<Task> {
    return this.write(taskId, (task) => {
      this.assertRunning(task, "update progress");
      return { ...task, progress: toProgress(progress) };
    });
  }

  async updatePartialResult(taskId: string, update: PartialResultUpdate): Promise<Task> {
    return this.write(taskId, (task) => {
      this.assertRunning(task, "update the partial result");
      const partial = typeof update === "function" ? update(task.partial_result) : update;
      return { ...task, partial_result: partial };
    });
  }

  async complete(taskId: string, result: TaskResult): Promise<Task> {
    return this.write(taskId, (task) => {
      if (isTerminalStatus(task.status)) {
        return task;
      }
      assertCanMove(task.status, "completed");
      return { ...task, status: "completed", result, completed_at: this.now().toISOString() };
    });
  }

  async fail(taskId: string, error: string): Promise<Task> {
    return this.write(taskId, (task) => {
      if (isTerminalStatus(task.status)) {
        return task;
      }
      return {
        ...task,
        status: "failed",
        error: error.trim() || "Task failed.",
        partial_result: null,
        completed_at: this.now().toISOString(),
      };
    });
  }

  async prune(olderThanMs: number): Promise<number> {
    const cutoff = this.now().getTime() - olderThanMs;
    let removed = 0;

    for (const task of [...this.tasks.values()]) {
      const finishedAt = task.completed_at ?? task.updated_at;
      if (isTerminalStatus(task.status) && Date.parse(finishedAt) < cutoff) {
        await this.lock.run(task.id, async () => {
          this.tasks.delete(task.id);
        });
        removed += 1;
      }
    }

    return removed;
  }

  private assertRunning(task: Task, action: string) {
    if (task.status !== "running") {
      throw new InvalidTaskStateError(`Cannot ${action} for task ${task.id} while it is ${task.status}.`);
    }
  }

  private write(taskId: string, apply: (task: Task) => Task): Promise<Task> {
    return this.lock.run(taskId, async () => {
      const current = await this.get(taskId);
      const next = apply(current);
      if (next === current) {
        return current;
      }
      return this.commit({ ...next, updated_at: this.now().toISOString() });
    });
  }

  private commit(task: Task): Task {
    const snapshot = deepFreeze(TaskSchema.parse(task));
    this.tasks.set(snapshot.id, snapshot);
    return snapshot;
  }
}
