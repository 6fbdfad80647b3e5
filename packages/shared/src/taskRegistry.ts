import type { GenerationPartialResult } from "./schemas/testCases";
import type { Task, TaskKind, TaskProgressUpdate, TaskResult, TaskStatus } from "./schemas/tasks";

/**
 * TaskRegistry - the only shared mutable state in the pipeline.
 *
 * Stages report into it; the polling API reads from it. Every operation is async
 * so an in-memory map and a durable store are interchangeable behind it.
 *
 * Writes for one task are serialized; writes for different tasks never contend.
 * Snapshots returned by any method are frozen and never change afterwards.
 */
export interface TaskRegistry {
  create(kind: TaskKind): Promise<Task>;
  get(taskId: string): Promise<Task>;
  list(): Promise<Task[]>;
  markRunning(taskId: string, progress: TaskProgressUpdate): Promise<Task>;
  updateProgress(taskId: string, progress: TaskProgressUpdate): Promise<Task>;
  updatePartialResult(taskId: string, update: PartialResultUpdate): Promise<Task>;
  /** No-op once the task is terminal. */
  complete(taskId: string, result: TaskResult): Promise<Task>;
  /** No-op once the task is terminal. */
  fail(taskId: string, error: string): Promise<Task>;
  /** Removes terminal tasks that finished more than `olderThanMs` ago; returns how many. */
  prune(olderThanMs: number): Promise<number>;
}

// Either a replacement snapshot or a merge applied under the task's lock.
export type PartialResultUpdate =
  | GenerationPartialResult
  | ((current: GenerationPartialResult | null) => GenerationPartialResult);

export class TaskNotFoundError extends Error {
  constructor(taskId: string) {
    super(`Task not found: ${taskId}`);
    this.name = "TaskNotFoundError";
  }
}

export class InvalidTaskStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTaskStateError";
  }
}

export class InvalidTaskTransitionError extends InvalidTaskStateError {
  constructor(from: TaskStatus, to: TaskStatus) {
    super(`Invalid task status transition: ${from} -> ${to}`);
    this.name = "InvalidTaskTransitionError";
  }
}
