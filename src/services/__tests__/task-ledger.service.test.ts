import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { cleanupTempDirectories, createTempDirectory } from "../../__tests__/test-utils";
import { InvalidStateError, NotFoundError } from "../../errors";
import { FileMetadataStore } from "../metadata-store.service";
import { TaskLedger, isTerminalTaskStatus } from "../task-ledger.service";

describe("TaskLedger", () => {
  let ledger: TaskLedger;
  let clock: Date;

  beforeEach(async () => {
    clock = new Date("2024-03-01T10:00:00.000Z");
    ledger = new TaskLedger(new FileMetadataStore(await createTempDirectory("repo-fleet-ledger-")), () => clock);
  });

  afterEach(async () => {
    await cleanupTempDirectories();
  });

  it("should create pending tasks", async () => {
    const task = await ledger.create("acme/demo", "migrate", "job-1");

    expect(task).toMatchObject({
      repositoryId: "acme/demo",
      kind: "migrate",
      status: "pending",
      errorMessage: "",
      commitsSynced: 0,
      attempts: 0,
      externalTaskId: "job-1",
      createdAt: "2024-03-01T10:00:00.000Z",
    });
    await expect(ledger.get(task.id)).resolves.toEqual(task);
  });

  it("should move pending -> running -> completed", async () => {
    const task = await ledger.create("acme/demo", "sync");

    clock = new Date("2024-03-01T10:00:05.000Z");
    const running = await ledger.markRunning(task.id);
    expect(running.status).toBe("running");
    expect(running.startedAt).toBe("2024-03-01T10:00:05.000Z");

    await ledger.recordAttempt(task.id);
    await ledger.recordAttempt(task.id);

    clock = new Date("2024-03-01T10:01:00.000Z");
    const completed = await ledger.markCompleted(task.id, 12);
    expect(completed).toMatchObject({
      status: "completed",
      commitsSynced: 12,
      attempts: 2,
      completedAt: "2024-03-01T10:01:00.000Z",
    });
  });

  it("should fail a task that never started", async () => {
    const task = await ledger.create("acme/demo", "sync");

    const failed = await ledger.markFailed(task.id, "Cancelled: shutting down");

    expect(failed.status).toBe("failed");
    expect(failed.errorMessage).toBe("Cancelled: shutting down");
  });

  it("should reject writes to terminal tasks", async () => {
    const task = await ledger.create("acme/demo", "sync");
    await ledger.markRunning(task.id);
    await ledger.markFailed(task.id, "boom");

    await expect(ledger.markCompleted(task.id, 1)).rejects.toBeInstanceOf(InvalidStateError);
    await expect(ledger.markRunning(task.id)).rejects.toThrow(
      `Sync task '${task.id}' cannot move from failed to running`,
    );
    await expect(ledger.recordAttempt(task.id)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("should not complete a task that is not running", async () => {
    const task = await ledger.create("acme/demo", "initialize");

    await expect(ledger.markCompleted(task.id, 0)).rejects.toThrow(
      `Sync task '${task.id}' cannot move from pending to completed`,
    );
  });

  it("should raise NotFound for unknown tasks", async () => {
    await expect(ledger.get("missing")).rejects.toBeInstanceOf(NotFoundError);
    await expect(ledger.markRunning("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should serialize concurrent updates of one task", async () => {
    const task = await ledger.create("acme/demo", "sync");
    await ledger.markRunning(task.id);

    await Promise.all([ledger.recordAttempt(task.id), ledger.recordAttempt(task.id), ledger.recordAttempt(task.id)]);

    expect((await ledger.get(task.id)).attempts).toBe(3);
  });

  it("should list tasks of a repository by status", async () => {
    const first = await ledger.create("acme/demo", "migrate");
    clock = new Date("2024-03-01T11:00:00.000Z");
    const second = await ledger.create("acme/demo", "sync");
    await ledger.create("acme/other", "sync");
    await ledger.markRunning(second.id);

    expect((await ledger.listForRepository("acme/demo")).map((task) => task.id)).toEqual([second.id, first.id]);
    expect((await ledger.listForRepository("acme/demo", "running")).map((task) => task.id)).toEqual([second.id]);
  });

  it("should know which statuses are terminal", () => {
    expect(isTerminalTaskStatus("completed")).toBe(true);
    expect(isTerminalTaskStatus("failed")).toBe(true);
    expect(isTerminalTaskStatus("pending")).toBe(false);
    expect(isTerminalTaskStatus("running")).toBe(false);
  });
});
