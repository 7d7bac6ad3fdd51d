import { RepoFleetError } from "../errors";
import { getErrorMessage } from "../utils/error-message";
import { redactUrl } from "../utils/git-url";

import type { JobOutcome, SyncDispatcher } from "./sync-dispatcher.service";
import type { SyncEngine } from "./sync-engine.service";
import type { Branch, CommitRecord, LifecycleStatus, Repository, SourceKind } from "../types";

export interface CreateRepositoryRequest {
  organisationId: string;
  name: string;
  description?: string;
  sourceUrl?: string;
  sourceType?: SourceKind;
  isPublic?: boolean;
  isMirror?: boolean;
  isBare?: boolean;
}

export interface CreateRepositoryResponse {
  repository: Repository;
  message: string;
}

export interface MigrateRepositoryRequest {
  repositoryId: string;
  /** Replaces the stored source URL before cloning */
  sourceUrl?: string;
  force?: boolean;
  /** Wait for the clone to finish instead of returning once it is queued */
  wait?: boolean;
}

export interface SyncRepositoryRequest {
  repositoryId: string;
  wait?: boolean;
}

export interface LifecycleResponse {
  repositoryId: string;
  /** Repository status after the job, "failed" when the job failed, or "queued" */
  status: LifecycleStatus | "queued";
  message: string;
  taskId: string;
}

export interface SyncRepositoryResponse extends LifecycleResponse {
  commitsSynced: number;
}

export interface ListRepositoriesRequest {
  organisationId?: string;
  status?: LifecycleStatus;
}

export interface ListCommitsRequest {
  repositoryId: string;
  limit?: number;
  skip?: number;
  authorEmail?: string;
}

/**
 * Entry points a transport maps its calls onto. Failures of the lifecycle
 * job come back as `status: "failed"` with a message; invalid requests
 * (unknown repository, bad name, wrong state) throw a RepoFleetError whose
 * `code` the transport can map.
 */
export class FleetApi {
  constructor(
    private readonly engine: SyncEngine,
    private readonly dispatcher: SyncDispatcher,
  ) {}

  /** Registers the repository, then clones its source or creates an empty store. */
  async createRepository(request: CreateRepositoryRequest): Promise<CreateRepositoryResponse> {
    const registered = await this.engine.register({
      organisation: request.organisationId,
      name: request.name,
      description: request.description,
      sourceUrl: request.sourceUrl,
      sourceKind: request.sourceType,
      isPublic: request.isPublic,
      isMirror: request.isMirror,
      isBare: request.isBare,
    });

    const kind = registered.sourceUrl ? "migrate" : "initialize";
    const job = await this.dispatcher.enqueue({ kind, repository: registered.id });
    const outcome = await job.done;
    const repository = await this.engine.getRepository(registered.id);

    if (outcome.error !== undefined) {
      return { repository, message: `Repository created but ${kind} failed: ${getErrorMessage(outcome.error)}` };
    }
    const message = registered.sourceUrl
      ? `Repository created from ${redactUrl(registered.sourceUrl)} with ${repository.totalCommits} commits`
      : "Repository created";
    return { repository, message };
  }

  async migrateRepository(request: MigrateRepositoryRequest): Promise<LifecycleResponse> {
    if (request.sourceUrl !== undefined) {
      const current = await this.engine.getRepository(request.repositoryId);
      if (current.sourceUrl !== request.sourceUrl.trim()) {
        await this.engine.setSource(request.repositoryId, request.sourceUrl);
      }
    }

    const job = await this.dispatcher.enqueue({
      kind: "migrate",
      repository: request.repositoryId,
      force: request.force,
    });

    if (!request.wait) {
      return { repositoryId: job.repositoryId, status: "queued", message: "Migration queued", taskId: job.taskId };
    }

    const outcome = await job.done;
    return this.toResponse(outcome, "Migration completed");
  }

  async syncRepository(request: SyncRepositoryRequest): Promise<SyncRepositoryResponse> {
    const job = await this.dispatcher.enqueue({ kind: "sync", repository: request.repositoryId });

    if (!request.wait) {
      return {
        repositoryId: job.repositoryId,
        status: "queued",
        message: "Sync queued",
        taskId: job.taskId,
        commitsSynced: 0,
      };
    }

    const outcome = await job.done;
    const commitsSynced = outcome.result?.commitsSynced ?? 0;
    return { ...this.toResponse(outcome, `Synced ${commitsSynced} new commits`), commitsSynced };
  }

  async listRepositories(request: ListRepositoriesRequest = {}): Promise<Repository[]> {
    return this.engine.listRepositories({ organisation: request.organisationId, status: request.status });
  }

  async listBranches(repositoryId: string): Promise<Branch[]> {
    return this.engine.listBranches(repositoryId);
  }

  async listCommits(request: ListCommitsRequest): Promise<CommitRecord[]> {
    return this.engine.listCommits(request.repositoryId, {
      limit: request.limit,
      skip: request.skip,
      authorEmail: request.authorEmail,
    });
  }

  private toResponse(outcome: JobOutcome, successMessage: string): LifecycleResponse {
    if (outcome.result) {
      return {
        repositoryId: outcome.repositoryId,
        status: outcome.result.repository.status,
        message: successMessage,
        taskId: outcome.taskId,
      };
    }

    const error = outcome.error;
    return {
      repositoryId: outcome.repositoryId,
      status: "failed",
      message: error instanceof RepoFleetError ? `${error.code}: ${error.message}` : getErrorMessage(error),
      taskId: outcome.taskId,
    };
  }
}
