import { randomUUID } from "crypto";

import * as cron from "node-cron";
import pLimit from "p-limit";

import { getErrorMessage } from "../utils/error-message";
import { KeyedLock } from "../utils/keyed-lock";

import { Logger } from "./logger.service";

import type { LifecycleResult, RepositoryRef, SyncEngine } from "./sync-engine.service";
import type { TaskKind } from "../types";

export interface JobRequest {
  kind: TaskKind;
  repository: RepositoryRef;
  /** Migrate only */
  force?: boolean;
}

export interface JobOutcome {
  jobId: string;
  taskId: string;
  kind: TaskKind;
  repositoryId: string;
  result?: LifecycleResult;
  error?: unknown;
}

export interface EnqueuedJob {
  jobId: string;
  taskId: string;
  repositoryId: string;
  /** Settles when the job has run; never rejects */
  done: Promise<JobOutcome>;
}

export interface SyncDispatcherOptions {
  maxConcurrent?: number;
  cronSchedule?: string;
  logger?: Logger;
}

/**
 * Runs lifecycle jobs in the background. Jobs for different repositories
 * run in parallel up to `maxConcurrent`; jobs for the same repository queue
 * behind each other without holding a pool slot while they wait.
 */
export class SyncDispatcher {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly maxConcurrent: number;
  private readonly queues = new KeyedLock();
  private readonly inFlight = new Map<string, EnqueuedJob>();
  private readonly logger: Logger;
  private readonly cronSchedule: string;
  private cronJob?: cron.ScheduledTask;

  constructor(
    private readonly engine: SyncEngine,
    options: SyncDispatcherOptions = {},
  ) {
    this.maxConcurrent = options.maxConcurrent ?? engine.config.parallelism.maxRepositories;
    this.limit = pLimit(this.maxConcurrent);
    this.cronSchedule = options.cronSchedule ?? engine.config.cronSchedule;
    this.logger = options.logger ?? Logger.createDefault("dispatcher", engine.config.debug);
  }

  /**
   * Records a pending task for the job and queues it. The returned ids are
   * known before the job starts.
   */
  async enqueue(request: JobRequest): Promise<EnqueuedJob> {
    const repository = await this.engine.getRepository(request.repository);
    const jobId = randomUUID();
    const task = await this.engine.ledger.create(repository.id, request.kind, jobId);

    const done = this.queues.run(repository.id, () =>
      this.limit(() => this.execute(jobId, task.id, repository.id, request)),
    );
    const job: EnqueuedJob = { jobId, taskId: task.id, repositoryId: repository.id, done };

    this.inFlight.set(jobId, job);
    this.logger.debug(`Queued ${request.kind} for ${repository.id} (job ${jobId})`);
    return job;
  }

  /** Queues a sync for every active repository with auto-sync enabled and waits for all of them. */
  async syncAll(): Promise<JobOutcome[]> {
    const repositories = (await this.engine.listRepositories({ status: "active" })).filter((repo) => repo.autoSync);
    if (repositories.length === 0) {
      this.logger.debug("No repositories due for sync");
      return [];
    }

    this.logger.info(`Syncing ${repositories.length} repositories (max ${this.maxConcurrent} in parallel)`);
    const jobs = await Promise.all(repositories.map((repo) => this.enqueue({ kind: "sync", repository: repo.id })));
    const outcomes = await Promise.all(jobs.map((job) => job.done));

    const failed = outcomes.filter((outcome) => outcome.error !== undefined).length;
    this.logger.info(`Sync round finished: ${outcomes.length - failed} succeeded, ${failed} failed`);
    return outcomes;
  }

  start(): void {
    if (this.cronJob) {
      return;
    }
    if (!cron.validate(this.cronSchedule)) {
      throw new Error(`Invalid cron schedule '${this.cronSchedule}'`);
    }

    this.cronJob = cron.schedule(this.cronSchedule, async () => {
      try {
        await this.syncAll();
      } catch (error) {
        this.logger.error("Scheduled sync round failed:", error);
      }
    });
    this.logger.info(`Scheduled sync with cron "${this.cronSchedule}"`);
  }

  stop(): void {
    this.cronJob?.stop();
    this.cronJob = undefined;
  }

  isScheduled(): boolean {
    return this.cronJob !== undefined;
  }

  activeJobs(): EnqueuedJob[] {
    return [...this.inFlight.values()];
  }

  /** Waits for every queued and running job. */
  async drain(): Promise<JobOutcome[]> {
    return Promise.all(this.activeJobs().map((job) => job.done));
  }

  private async execute(jobId: string, taskId: string, repositoryId: string, request: JobRequest): Promise<JobOutcome> {
    const outcome: JobOutcome = { jobId, taskId, kind: request.kind, repositoryId };
    try {
      outcome.result = await this.run(taskId, request);
    } catch (error) {
      this.logger.error(`${request.kind} of ${repositoryId} failed: ${getErrorMessage(error)}`);
      outcome.error = error;
    } finally {
      this.inFlight.delete(jobId);
    }
    return outcome;
  }

  private run(taskId: string, request: JobRequest): Promise<LifecycleResult> {
    switch (request.kind) {
      case "initialize":
        return this.engine.initialize(request.repository, { taskId });
      case "migrate":
        return this.engine.migrate(request.repository, { taskId, force: request.force });
      case "sync":
        return this.engine.sync(request.repository, { taskId });
    }
  }
}
