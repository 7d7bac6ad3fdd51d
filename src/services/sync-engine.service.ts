import { GitError } from "simple-git";

import { GIT_CONSTANTS, NAME_PATTERN } from "../constants";
import {
  AlreadyExistsError,
  CancelledError,
  InvalidStateError,
  NotFoundError,
  TimeoutError,
  classifyGitError,
} from "../errors";
import { getErrorMessage } from "../utils/error-message";
import { buildCloneUrl, detectSourceKind, redactUrl } from "../utils/git-url";
import { KeyedLock } from "../utils/keyed-lock";
import { retry, sleep } from "../utils/retry";
import { Timer, formatDuration } from "../utils/timing";

import { ConfigLoaderService } from "./config-loader.service";
import { ContentHandler } from "./content-handler.service";
import { Logger } from "./logger.service";
import { FileMetadataStore, repositoryId } from "./metadata-store.service";
import { revParseCommit } from "./reference-resolver";
import { RefsHandler } from "./refs-handler.service";
import { RepositoryStore } from "./repository-store.service";
import { TaskLedger, isTerminalTaskStatus } from "./task-ledger.service";
import { WorktreeHandler } from "./worktree-handler.service";

import type { MetadataStore, RepositoryFilter } from "./metadata-store.service";
import type { CloneMode, StoreHandle } from "./repository-store.service";
import type {
  Branch,
  CommitInfo,
  RefInfo,
  CommitRecord,
  FleetConfig,
  LifecycleStatus,
  Repository,
  RepositoryDeclaration,
  RepositoryKey,
  ResolvedFleetConfig,
  SourceKind,
  SyncTask,
  TaskKind,
  TaskStatus,
} from "../types";
import type { SleepFn } from "../utils/retry";
import type { SimpleGit } from "simple-git";

/** `<organisation>/<name>` or the pair itself */
export type RepositoryRef = string | RepositoryKey;

export interface LifecycleOptions {
  /** Ledger task created up front by the caller; a new one is created otherwise */
  taskId?: string;
}

export interface MigrateOptions extends LifecycleOptions {
  force?: boolean;
}

export interface BranchChanges {
  added: string[];
  updated: string[];
  removed: string[];
}

export interface LifecycleResult {
  repository: Repository;
  task: SyncTask;
  commitsSynced: number;
  branchChanges?: BranchChanges;
}

export interface CommitQuery {
  limit?: number;
  skip?: number;
  authorEmail?: string;
}

export interface SyncEngineOptions {
  store?: RepositoryStore;
  metadata?: MetadataStore;
  ledger?: TaskLedger;
  logger?: Logger;
  sleep?: SleepFn;
  now?: () => Date;
}

/** What the store holds after a clone or fetch, read under the attempt's deadline. */
interface StoreSnapshot {
  branches: RefInfo[];
  defaultBranch: string;
  newCommits: CommitInfo[];
  totalCommits: number;
}

interface ProjectionOutcome {
  defaultBranch: string;
  headCommit?: string;
  totalCommits: number;
  commitsSynced: number;
  branchChanges: BranchChanges;
}

type RepositoryPatch = Partial<Omit<Repository, "id" | "organisation" | "name" | "status">>;

const LIFECYCLE_TRANSITIONS: Record<LifecycleStatus, readonly LifecycleStatus[]> = {
  pending: ["initializing", "mirroring"],
  initializing: ["active", "failed"],
  mirroring: ["active", "failed"],
  // a forced migrate re-clones an active repository
  active: ["initializing", "mirroring", "failed", "archived"],
  failed: ["pending"],
  archived: [],
};

export function canTransition(from: LifecycleStatus, to: LifecycleStatus): boolean {
  return LIFECYCLE_TRANSITIONS[from].includes(to);
}

const DEFAULT_COMMIT_LIMIT = 50;
const DEFAULT_CANCEL_REASON = "cancelled by operator";

/**
 * Drives repositories through their lifecycle and keeps the metadata
 * projection (branches, commit cache, counters) in step with the stores.
 *
 * Lifecycle operations on one repository run one at a time under its
 * repository lock; different repositories never wait on each other. Reads
 * take no lock.
 */
export class SyncEngine {
  readonly config: ResolvedFleetConfig;
  readonly store: RepositoryStore;
  readonly metadata: MetadataStore;
  readonly ledger: TaskLedger;

  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;
  private readonly repositoryLocks = new KeyedLock();
  private readonly worktreeLocks = new KeyedLock();
  private readonly cancellations = new Map<string, string>();

  constructor(config: FleetConfig, options: SyncEngineOptions = {}) {
    this.config = new ConfigLoaderService().resolveConfig(config);
    this.logger = options.logger ?? config.logger ?? Logger.createDefault("fleet", this.config.debug);
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
    this.store = options.store ?? new RepositoryStore(this.config.reposRoot, this.logger.child("store"));
    this.metadata = options.metadata ?? new FileMetadataStore(this.config.metadataDir);
    this.ledger = options.ledger ?? new TaskLedger(this.metadata, this.now);
  }

  async register(input: RepositoryDeclaration): Promise<Repository> {
    const storagePath = this.store.resolve(input.organisation, input.name);
    const id = repositoryId(input.organisation, input.name);

    return this.withRepositoryLock(id, async () => {
      if (await this.metadata.getRepository(id)) {
        throw new AlreadyExistsError(`Repository '${id}' already exists`);
      }

      const sourceUrl = input.sourceUrl?.trim() || undefined;
      if (input.isMirror && !sourceUrl) {
        throw new InvalidStateError(`Mirror '${id}' needs a source URL`);
      }

      const timestamp = this.timestamp();
      const repository: Repository = {
        id,
        organisation: input.organisation,
        name: input.name,
        description: input.description ?? "",
        sourceUrl,
        sourceKind: input.sourceKind ?? detectSourceKind(sourceUrl),
        storagePath,
        isBare: input.isMirror ? true : (input.isBare ?? true),
        isMirror: input.isMirror ?? false,
        isPublic: input.isPublic ?? false,
        autoSync: input.autoSync ?? sourceUrl !== undefined,
        defaultBranch: input.defaultBranch ?? this.config.defaultBranch,
        status: "pending",
        totalCommits: 0,
        errorMessage: "",
        consecutiveFailures: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
      };

      await this.metadata.saveRepository(repository);
      this.logger.info(`Registered ${id}${sourceUrl ? ` from ${redactUrl(sourceUrl)}` : ""}`);
      return repository;
    });
  }

  /**
   * Creates an empty store for a pending repository. Running it again on an
   * active repository whose store is intact changes nothing.
   */
  async initialize(ref: RepositoryRef, options: LifecycleOptions = {}): Promise<LifecycleResult> {
    const id = this.toId(ref);

    return this.withRepositoryLock(id, async () => {
      let repository = await this.load(id);
      const task = await this.openTask(repository, "initialize", options.taskId);
      const log = this.logger.child(id);

      if (repository.status === "active" && (await this.store.exists(repository.storagePath))) {
        log.info("Store already initialized");
        await this.ledger.markRunning(task.id);
        return { repository, task: await this.ledger.markCompleted(task.id, 0), commitsSynced: 0 };
      }

      if (repository.status !== "pending") {
        throw await this.rejectTask(
          task,
          new InvalidStateError(`Repository '${id}' is ${repository.status}; initialize needs pending`),
        );
      }

      await this.ledger.markRunning(task.id);
      repository = await this.transition(repository, "initializing", { errorMessage: "" });
      const timer = new Timer();
      const storagePath = repository.storagePath;
      const isBare = repository.isBare;
      const headRef = `${GIT_CONSTANTS.REFS.HEADS}${repository.defaultBranch}`;

      try {
        const current = repository;
        const snapshot = await this.runAttempts(repository, task.id, "initialize", async (signal) => {
          if (await this.store.exists(storagePath)) {
            log.info(`Adopting existing store at ${storagePath}`);
            return this.readSnapshot(current, await this.store.open(storagePath), signal);
          }
          // whatever is left at the path is not a usable store
          await this.store.remove(storagePath);
          const created = isBare ? await this.store.createBare(storagePath) : await this.store.createWorking(storagePath);
          await created.git.raw(["symbolic-ref", GIT_CONSTANTS.HEAD, headRef]);
          return this.readSnapshot(current, created, signal);
        });

        const outcome = await this.applySnapshot(repository, snapshot);
        repository = await this.transition(repository, "active", this.successPatch(outcome, false));
        const completed = await this.ledger.markCompleted(task.id, outcome.commitsSynced);
        log.info(`Initialized in ${formatDuration(timer.stop())}`);
        return { repository, task: completed, commitsSynced: outcome.commitsSynced, branchChanges: outcome.branchChanges };
      } catch (error) {
        throw await this.fail(repository, task.id, "initialize", error);
      }
    });
  }

  /**
   * Clones the repository's source into a fresh store. Without `force` an
   * existing valid store is left untouched and AlreadyExists is raised.
   */
  async migrate(ref: RepositoryRef, options: MigrateOptions = {}): Promise<LifecycleResult> {
    const id = this.toId(ref);

    return this.withRepositoryLock(id, async () => {
      let repository = await this.load(id);
      const task = await this.openTask(repository, "migrate", options.taskId);
      const log = this.logger.child(id);
      const sourceUrl = repository.sourceUrl;

      if (!sourceUrl || repository.sourceKind === "none") {
        throw await this.rejectTask(task, new InvalidStateError(`Repository '${id}' has no source URL to migrate from`));
      }
      if (repository.status !== "pending" && repository.status !== "active") {
        throw await this.rejectTask(
          task,
          new InvalidStateError(`Repository '${id}' is ${repository.status}; migrate needs pending or active`),
        );
      }
      if (!options.force && (await this.store.exists(repository.storagePath))) {
        throw await this.rejectTask(
          task,
          new AlreadyExistsError(`A store already exists at '${repository.storagePath}'; use force to replace it`),
        );
      }

      const cloneUrl = buildCloneUrl(repository.sourceKind, sourceUrl, this.config.credentials[repository.sourceKind]);
      const mode: CloneMode = repository.isMirror ? "mirror" : repository.isBare ? "bare" : "working";
      const storagePath = repository.storagePath;

      await this.ledger.markRunning(task.id);
      repository = await this.transition(repository, repository.isMirror ? "mirroring" : "initializing", {
        errorMessage: "",
      });
      const timer = new Timer();

      try {
        const current = repository;
        const snapshot = await this.runAttempts(repository, task.id, "migrate", async (signal) => {
          await this.store.remove(storagePath);
          let handle: StoreHandle;
          try {
            handle = await this.store.clone(storagePath, cloneUrl, mode, { signal });
          } catch (error) {
            await this.store.remove(storagePath);
            throw error;
          }
          return this.readSnapshot(current, handle, signal);
        });

        const outcome = await this.applySnapshot(repository, snapshot);
        repository = await this.transition(repository, "active", this.successPatch(outcome, true));
        const completed = await this.ledger.markCompleted(task.id, outcome.commitsSynced);
        log.info(
          `Migrated ${redactUrl(sourceUrl)} (${mode}) in ${formatDuration(timer.stop())}: ` +
            `${outcome.totalCommits} commits, ${outcome.commitsSynced} newly cached`,
        );
        return { repository, task: completed, commitsSynced: outcome.commitsSynced, branchChanges: outcome.branchChanges };
      } catch (error) {
        throw await this.fail(repository, task.id, "migrate", error);
      }
    });
  }

  /**
   * Fetches from the source and refreshes the projection. A repository left
   * in initializing or mirroring by an interrupted run is finished here when
   * its store is intact.
   */
  async sync(ref: RepositoryRef, options: LifecycleOptions = {}): Promise<LifecycleResult> {
    const id = this.toId(ref);

    return this.withRepositoryLock(id, async () => {
      let repository = await this.load(id);
      const task = await this.openTask(repository, "sync", options.taskId);
      const log = this.logger.child(id);
      const resuming = repository.status === "initializing" || repository.status === "mirroring";

      if (repository.status !== "active" && !resuming) {
        throw await this.rejectTask(
          task,
          new InvalidStateError(`Repository '${id}' is ${repository.status}; only active repositories sync`),
        );
      }
      if (resuming && !(await this.store.exists(repository.storagePath))) {
        throw await this.rejectTask(
          task,
          new InvalidStateError(`Repository '${id}' was interrupted while ${repository.status} and has no store`),
        );
      }

      await this.ledger.markRunning(task.id);
      const timer = new Timer();
      const current = repository;

      try {
        const handle = await this.store.open(repository.storagePath);
        const snapshot = await this.runAttempts(repository, task.id, "sync", async (signal) => {
          await this.fetch(current, handle, signal);
          return this.readSnapshot(current, handle, signal);
        });

        const outcome = await this.applySnapshot(repository, snapshot);
        const patch = this.successPatch(outcome, true);
        repository = resuming
          ? await this.transition(repository, "active", patch)
          : await this.save({ ...repository, ...patch });
        const completed = await this.ledger.markCompleted(task.id, outcome.commitsSynced);

        const { added, updated, removed } = outcome.branchChanges;
        log.info(
          `Synced in ${formatDuration(timer.stop())}: ${outcome.commitsSynced} new commits, ` +
            `branches +${added.length} ~${updated.length} -${removed.length}`,
        );
        return { repository, task: completed, commitsSynced: outcome.commitsSynced, branchChanges: outcome.branchChanges };
      } catch (error) {
        throw await this.fail(repository, task.id, "sync", error);
      }
    });
  }

  /** Points a repository at a new source; the next migrate clones from it. */
  async setSource(ref: RepositoryRef, sourceUrl: string, sourceKind?: SourceKind): Promise<Repository> {
    const id = this.toId(ref);

    return this.withRepositoryLock(id, async () => {
      const repository = await this.load(id);
      if (repository.status === "archived" || repository.status === "initializing" || repository.status === "mirroring") {
        throw new InvalidStateError(`Repository '${id}' is ${repository.status}; its source cannot change now`);
      }
      const trimmed = sourceUrl.trim();
      if (!trimmed) {
        throw new InvalidStateError(`Source URL for '${id}' must not be empty`);
      }
      this.logger.child(id).info(`Source set to ${redactUrl(trimmed)}`);
      return this.save({ ...repository, sourceUrl: trimmed, sourceKind: sourceKind ?? detectSourceKind(trimmed) });
    });
  }

  async archive(ref: RepositoryRef): Promise<Repository> {
    const id = this.toId(ref);
    return this.withRepositoryLock(id, async () => this.transition(await this.load(id), "archived"));
  }

  /** Puts a failed repository back to pending so it can be initialized or migrated again. */
  async reset(ref: RepositoryRef): Promise<Repository> {
    const id = this.toId(ref);
    return this.withRepositoryLock(id, async () =>
      this.transition(await this.load(id), "pending", { errorMessage: "", consecutiveFailures: 0 }),
    );
  }

  /**
   * Asks the operation currently running for `ref` to stop. It is observed
   * between attempts; an attempt in progress is not interrupted. Returns
   * false when nothing is running.
   */
  cancel(ref: RepositoryRef, reason = DEFAULT_CANCEL_REASON): boolean {
    const id = this.toId(ref);
    if (!this.repositoryLocks.isLocked(id)) {
      return false;
    }
    this.cancellations.set(id, reason);
    this.logger.child(id).warn(`Cancellation requested: ${reason}`);
    return true;
  }

  isBusy(ref: RepositoryRef): boolean {
    const id = this.toId(ref);
    return this.repositoryLocks.isLocked(id) || this.repositoryLocks.pending(id) > 0;
  }

  async getRepository(ref: RepositoryRef): Promise<Repository> {
    return this.load(this.toId(ref));
  }

  async listRepositories(filter: RepositoryFilter = {}): Promise<Repository[]> {
    return this.metadata.listRepositories(filter);
  }

  async listBranches(ref: RepositoryRef): Promise<Branch[]> {
    const repository = await this.getRepository(ref);
    return this.metadata.getBranches(repository.id);
  }

  /** Cached commits, newest first. `limit <= 0` returns every match. */
  async listCommits(ref: RepositoryRef, query: CommitQuery = {}): Promise<CommitRecord[]> {
    const repository = await this.getRepository(ref);
    const authorEmail = query.authorEmail?.toLowerCase();
    const commits = (await this.metadata.getCommits(repository.id)).filter(
      (commit) => !authorEmail || commit.authorEmail.toLowerCase() === authorEmail,
    );
    const start = Math.max(query.skip ?? 0, 0);
    const limit = query.limit ?? DEFAULT_COMMIT_LIMIT;
    return commits.slice(start, limit > 0 ? start + limit : undefined);
  }

  async listTasks(ref: RepositoryRef, status?: TaskStatus): Promise<SyncTask[]> {
    const repository = await this.getRepository(ref);
    return this.ledger.listForRepository(repository.id, status);
  }

  async content(ref: RepositoryRef): Promise<ContentHandler> {
    const handle = await this.openStore(ref);
    return new ContentHandler(handle.git, { includeRemoteBranches: !handle.isBare });
  }

  async refs(ref: RepositoryRef): Promise<RefsHandler> {
    const handle = await this.openStore(ref);
    return new RefsHandler(handle.git, { includeRemoteBranches: !handle.isBare });
  }

  async worktrees(ref: RepositoryRef): Promise<WorktreeHandler> {
    const id = this.toId(ref);
    const handle = await this.openStore(id);
    return new WorktreeHandler(handle.git, this.worktreeLocks, this.logger.child(`${id}:worktrees`));
  }

  private async openStore(ref: RepositoryRef): Promise<StoreHandle> {
    const repository = await this.getRepository(ref);
    return this.store.open(repository.storagePath);
  }

  private withRepositoryLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
    return this.repositoryLocks.run(id, async () => {
      try {
        return await fn();
      } finally {
        this.cancellations.delete(id);
      }
    });
  }

  private runAttempts<T>(
    repository: Repository,
    taskId: string,
    operation: TaskKind,
    attemptFn: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const log = this.logger.child(repository.id);
    const maxAttempts = this.config.retry.maxAttempts;

    return retry(
      async (attempt) => {
        await this.ledger.recordAttempt(taskId);
        log.debug(`${operation} attempt ${attempt}/${maxAttempts}`);
        return this.withTimeout(operation, attemptFn);
      },
      {
        ...this.config.retry,
        sleep: this.sleep,
        cancellationReason: () => this.cancellations.get(repository.id),
        onRetry: (error, attempt, delayMs) => {
          log.warn(
            `${operation} attempt ${attempt}/${maxAttempts} failed: ${redactUrl(getErrorMessage(error))}. ` +
              `Retrying in ${formatDuration(Math.round(delayMs))}`,
          );
        },
      },
    );
  }

  private async withTimeout<T>(operation: TaskKind, attemptFn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const timeoutMs = this.config.operationTimeoutMs;
    const controller = new AbortController();
    // Git processes are killed through the signal; anything else still running is abandoned
    const deadline = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(new TimeoutError(operation, timeoutMs)), { once: true });
    });
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await Promise.race([attemptFn(controller.signal), deadline]);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TimeoutError(operation, timeoutMs);
      }
      throw error instanceof GitError ? classifyGitError(error, operation) : error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async fetch(repository: Repository, handle: StoreHandle, signal: AbortSignal): Promise<void> {
    if (!repository.sourceUrl) {
      this.logger.child(repository.id).debug("No source configured, refreshing from the local store");
      return;
    }

    const git = this.store.createGit(handle.path, { signal });
    if (repository.isMirror) {
      await git.raw(["remote", "update", "--prune"]);
    } else if (handle.isBare) {
      await git.raw(["fetch", "--prune", "--tags", GIT_CONSTANTS.REMOTE_NAME, GIT_CONSTANTS.FETCH_CONFIG.BARE]);
    } else {
      await git.raw(["fetch", "--prune", "--tags", GIT_CONSTANTS.REMOTE_NAME]);
      await this.fastForward(repository, git, signal);
    }
  }

  /** Moves the checked-out branch of a working copy up to its fetched upstream when that is a fast-forward. */
  private async fastForward(repository: Repository, git: SimpleGit, signal: AbortSignal): Promise<void> {
    const branch = await new RefsHandler(git).getDefaultBranch();
    if (!branch) {
      return;
    }

    const upstream = `${GIT_CONSTANTS.REFS.REMOTES_ORIGIN}${branch}`;
    if (!(await revParseCommit(git, upstream))) {
      return;
    }

    try {
      await git.raw(["merge", "--ff-only", "--quiet", upstream]);
    } catch (error) {
      if (!(error instanceof GitError) || signal.aborted) {
        throw error;
      }
      this.logger.child(repository.id).warn(`Could not fast-forward '${branch}': ${getErrorMessage(error)}`);
    }
  }

  /**
   * Reads branches, the default branch, commits not cached yet (newest first,
   * at most `commitCacheLimit`) and the commit count. Git runs under `signal`.
   */
  private async readSnapshot(repository: Repository, handle: StoreHandle, signal: AbortSignal): Promise<StoreSnapshot> {
    const git = this.store.createGit(handle.path, { signal });
    const refs = new RefsHandler(git, { includeRemoteBranches: !handle.isBare });
    const branches = await refs.listBranches();
    const defaultBranch = (await refs.getDefaultBranch()) ?? repository.defaultBranch;

    const cached = new Set((await this.metadata.getCommits(repository.id)).map((commit) => commit.hash));
    const discovered = (await refs.listCommitHashes())
      .filter((hash) => !cached.has(hash))
      .slice(0, this.config.commitCacheLimit);

    return {
      branches,
      defaultBranch,
      newCommits: await refs.loadCommits(discovered),
      totalCommits: await refs.countCommits(),
    };
  }

  /** Replaces the branch projection and appends the new commits. */
  private async applySnapshot(repository: Repository, snapshot: StoreSnapshot): Promise<ProjectionOutcome> {
    const { defaultBranch } = snapshot;
    const timestamp = this.timestamp();

    const previous = new Map((await this.metadata.getBranches(repository.id)).map((branch) => [branch.name, branch]));
    const branchChanges: BranchChanges = { added: [], updated: [], removed: [] };

    const branches = snapshot.branches.map((ref): Branch => {
      const isDefault = ref.name === defaultBranch;
      const before = previous.get(ref.name);
      if (!before) {
        branchChanges.added.push(ref.name);
      } else if (before.commitHash !== ref.commitSha) {
        branchChanges.updated.push(ref.name);
      }
      return {
        repositoryId: repository.id,
        name: ref.name,
        commitHash: ref.commitSha,
        isDefault,
        lastUpdated:
          before && before.commitHash === ref.commitSha && before.isDefault === isDefault
            ? before.lastUpdated
            : timestamp,
      };
    });

    const currentNames = new Set(snapshot.branches.map((ref) => ref.name));
    branchChanges.removed = [...previous.keys()].filter((name) => !currentNames.has(name));
    await this.metadata.replaceBranches(repository.id, branches);

    const commitsSynced = await this.metadata.appendCommits(
      repository.id,
      snapshot.newCommits.map((commit) => toCommitRecord(repository.id, commit, timestamp)),
    );

    return {
      defaultBranch,
      headCommit: branches.find((branch) => branch.isDefault)?.commitHash,
      totalCommits: snapshot.totalCommits,
      commitsSynced,
      branchChanges,
    };
  }

  private successPatch(outcome: ProjectionOutcome, synced: boolean): RepositoryPatch {
    return {
      defaultBranch: outcome.defaultBranch,
      lastCommitHash: outcome.headCommit,
      totalCommits: outcome.totalCommits,
      consecutiveFailures: 0,
      errorMessage: "",
      ...(synced ? { lastSyncedAt: this.timestamp() } : {}),
    };
  }

  /**
   * Records a failed run on the task and the repository, then hands the
   * error back for rethrowing. A sync of an active repository only fails the
   * repository once the failure threshold is reached or it was cancelled.
   */
  private async fail(repository: Repository, taskId: string, operation: TaskKind, error: unknown): Promise<unknown> {
    const message = redactUrl(getErrorMessage(error));
    const log = this.logger.child(repository.id);
    log.error(`${operation} failed:`, message);

    await this.failTask(taskId, message);

    const consecutiveFailures = repository.consecutiveFailures + 1;
    const keepActive =
      operation === "sync" &&
      repository.status === "active" &&
      !(error instanceof CancelledError) &&
      consecutiveFailures < this.config.failureThreshold;

    if (keepActive) {
      await this.save({ ...repository, errorMessage: message, consecutiveFailures });
      log.warn(`${consecutiveFailures}/${this.config.failureThreshold} consecutive sync failures`);
    } else {
      await this.transition(repository, "failed", { errorMessage: message, consecutiveFailures });
    }
    return error;
  }

  /** Fails a task that never got to run and hands the error back for rethrowing. */
  private async rejectTask(task: SyncTask, error: Error): Promise<Error> {
    await this.failTask(task.id, error.message);
    return error;
  }

  private async failTask(taskId: string, message: string): Promise<void> {
    const task = await this.ledger.get(taskId);
    if (!isTerminalTaskStatus(task.status)) {
      await this.ledger.markFailed(taskId, message);
    }
  }

  private async openTask(repository: Repository, kind: TaskKind, taskId?: string): Promise<SyncTask> {
    if (!taskId) {
      return this.ledger.create(repository.id, kind);
    }
    const task = await this.ledger.get(taskId);
    if (task.repositoryId !== repository.id || task.kind !== kind) {
      throw new InvalidStateError(`Sync task '${taskId}' is a ${task.kind} task for '${task.repositoryId}'`);
    }
    return task;
  }

  private async transition(
    repository: Repository,
    next: LifecycleStatus,
    patch: RepositoryPatch = {},
  ): Promise<Repository> {
    if (!canTransition(repository.status, next)) {
      throw new InvalidStateError(`Repository '${repository.id}' cannot move from ${repository.status} to ${next}`);
    }
    const updated = await this.save({ ...repository, ...patch, status: next });
    this.logger.child(repository.id).info(`${repository.status} -> ${next}`);
    return updated;
  }

  private async save(repository: Repository): Promise<Repository> {
    const updated = { ...repository, updatedAt: this.timestamp() };
    await this.metadata.saveRepository(updated);
    return updated;
  }

  private async load(id: string): Promise<Repository> {
    const repository = await this.metadata.getRepository(id);
    if (!repository) {
      throw new NotFoundError(`Repository '${id}' not found`);
    }
    return repository;
  }

  private toId(ref: RepositoryRef): string {
    if (typeof ref !== "string") {
      return repositoryId(ref.organisation, ref.name);
    }
    const parts = ref.split("/");
    if (parts.length !== 2 || !parts.every((part) => NAME_PATTERN.test(part))) {
      throw new NotFoundError(`Repository '${ref}' not found`);
    }
    return ref;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function toCommitRecord(repositoryId: string, commit: CommitInfo, syncedAt: string): CommitRecord {
  return {
    repositoryId,
    hash: commit.sha,
    authorName: commit.authorName,
    authorEmail: commit.authorEmail,
    committerName: commit.committerName,
    committerEmail: commit.committerEmail,
    message: commit.message,
    summary: commit.summary,
    authoredAt: commit.authoredDate,
    committedAt: commit.committedDate,
    parents: commit.parents,
    syncedAt,
  };
}
