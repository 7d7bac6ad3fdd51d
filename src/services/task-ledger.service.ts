import { randomUUID } from "crypto";

import { InvalidStateError, NotFoundError } from "../errors";
import { KeyedLock } from "../utils/keyed-lock";

import type { MetadataStore } from "./metadata-store.service";
import type { SyncTask, TaskKind, TaskStatus } from "../types";

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["running", "failed"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

/**
 * One record per lifecycle attempt. Status only moves forward; once a task is
 * completed or failed every further write is rejected.
 */
export class TaskLedger {
  private readonly locks = new KeyedLock();

  constructor(
    private readonly store: MetadataStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async create(repositoryId: string, kind: TaskKind, externalTaskId?: string): Promise<SyncTask> {
    const task: SyncTask = {
      id: randomUUID(),
      repositoryId,
      kind,
      status: "pending",
      errorMessage: "",
      commitsSynced: 0,
      attempts: 0,
      externalTaskId,
      createdAt: this.now().toISOString(),
    };
    await this.store.saveTask(task);
    return task;
  }

  async get(taskId: string): Promise<SyncTask> {
    const task = await this.store.getTask(taskId);
    if (!task) {
      throw new NotFoundError(`Sync task '${taskId}' not found`);
    }
    return task;
  }

  async listForRepository(repositoryId: string, status?: TaskStatus): Promise<SyncTask[]> {
    return this.store.listTasks({ repositoryId, status });
  }

  async markRunning(taskId: string): Promise<SyncTask> {
    return this.transition(taskId, "running", (task) => ({ ...task, startedAt: this.now().toISOString() }));
  }

  async recordAttempt(taskId: string): Promise<SyncTask> {
    return this.update(taskId, (task) => {
      if (task.status !== "running") {
        throw new InvalidStateError(`Sync task '${taskId}' is ${task.status}, attempts are only recorded while running`);
      }
      return { ...task, attempts: task.attempts + 1 };
    });
  }

  async markCompleted(taskId: string, commitsSynced: number): Promise<SyncTask> {
    return this.transition(taskId, "completed", (task) => ({
      ...task,
      commitsSynced,
      errorMessage: "",
      completedAt: this.now().toISOString(),
    }));
  }

  async markFailed(taskId: string, error: string): Promise<SyncTask> {
    return this.transition(taskId, "failed", (task) => ({
      ...task,
      errorMessage: error,
      completedAt: this.now().toISOString(),
    }));
  }

  private transition(taskId: string, next: TaskStatus, apply: (task: SyncTask) => SyncTask): Promise<SyncTask> {
    return this.update(taskId, (task) => {
      if (!ALLOWED_TRANSITIONS[task.status].includes(next)) {
        throw new InvalidStateError(`Sync task '${taskId}' cannot move from ${task.status} to ${next}`);
      }
      return { ...apply(task), status: next };
    });
  }

  private update(taskId: string, apply: (task: SyncTask) => SyncTask): Promise<SyncTask> {
    return this.locks.run(taskId, async () => {
      const updated = apply(await this.get(taskId));
      await this.store.saveTask(updated);
      return updated;
    });
  }
}
