export { SyncEngine, canTransition } from "./services/sync-engine.service";
export type {
  BranchChanges,
  CommitQuery,
  LifecycleOptions,
  LifecycleResult,
  MigrateOptions,
  RepositoryRef,
  SyncEngineOptions,
} from "./services/sync-engine.service";

export { SyncDispatcher } from "./services/sync-dispatcher.service";
export type { EnqueuedJob, JobOutcome, JobRequest, SyncDispatcherOptions } from "./services/sync-dispatcher.service";

export { FleetApi } from "./services/fleet-api.service";
export type {
  CreateRepositoryRequest,
  CreateRepositoryResponse,
  LifecycleResponse,
  ListCommitsRequest,
  ListRepositoriesRequest,
  MigrateRepositoryRequest,
  SyncRepositoryRequest,
  SyncRepositoryResponse,
} from "./services/fleet-api.service";

export { RepositoryStore } from "./services/repository-store.service";
export type { CloneMode, GitProcessOptions, StoreHandle } from "./services/repository-store.service";
export { ContentHandler } from "./services/content-handler.service";
export { RefsHandler } from "./services/refs-handler.service";
export { WorktreeHandler } from "./services/worktree-handler.service";
export type { CheckoutOptions, WorkdirEntry, WorkdirHandle } from "./services/worktree-handler.service";

export { FileMetadataStore, repositoryId } from "./services/metadata-store.service";
export type { MetadataStore, RepositoryFilter, TaskFilter } from "./services/metadata-store.service";
export { TaskLedger, isTerminalTaskStatus } from "./services/task-ledger.service";

export { ConfigLoaderService } from "./services/config-loader.service";
export { Logger } from "./services/logger.service";
export type { LogLevel, LogOutputFn, LoggerOptions } from "./services/logger.service";

export * from "./errors";
export * from "./types";
