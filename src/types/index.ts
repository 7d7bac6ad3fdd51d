import type { Logger } from "../services/logger.service";

export interface RetryConfig {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  jitterMs?: number;
}

/**
 * Controls how many repositories are worked on at once.
 * Work for a single repository is always serialized regardless of this value.
 */
export interface ParallelismConfig {
  /** Max concurrent lifecycle jobs across the fleet (default: 2) */
  maxRepositories?: number;
}

export interface SourceCredentials {
  username?: string;
  token: string;
}

export interface FleetConfig {
  reposRoot: string;
  metadataDir?: string;
  defaultBranch?: string;
  retry?: RetryConfig;
  parallelism?: ParallelismConfig;
  /** Wall-clock ceiling for a single attempt of a lifecycle operation */
  operationTimeoutMs?: number;
  /** Consecutive failed syncs after which a repository is marked failed */
  failureThreshold?: number;
  /** Max commits appended to the commit cache by a single migrate or sync */
  commitCacheLimit?: number;
  cronSchedule?: string;
  credentials?: Partial<Record<SourceKind, SourceCredentials>>;
  debug?: boolean;
  logger?: Logger;
}

/**
 * Repository the daemon registers on start-up when it is not known yet.
 */
export interface RepositoryDeclaration {
  organisation: string;
  name: string;
  description?: string;
  sourceUrl?: string;
  sourceKind?: SourceKind;
  isBare?: boolean;
  isMirror?: boolean;
  isPublic?: boolean;
  autoSync?: boolean;
  defaultBranch?: string;
}

export interface ConfigFile extends Partial<Omit<FleetConfig, "logger">> {
  reposRoot: string;
  repositories?: RepositoryDeclaration[];
}

export interface ResolvedFleetConfig {
  reposRoot: string;
  metadataDir: string;
  defaultBranch: string;
  retry: Required<RetryConfig>;
  parallelism: Required<ParallelismConfig>;
  operationTimeoutMs: number;
  failureThreshold: number;
  commitCacheLimit: number;
  cronSchedule: string;
  credentials: Partial<Record<SourceKind, SourceCredentials>>;
  debug: boolean;
}

export type SourceKind = "github" | "gitlab" | "gitea" | "custom" | "none";

export type LifecycleStatus = "pending" | "initializing" | "mirroring" | "active" | "failed" | "archived";

export type TaskStatus = "pending" | "running" | "completed" | "failed";

export type TaskKind = "initialize" | "migrate" | "sync";

export interface RepositoryKey {
  organisation: string;
  name: string;
}

export interface Repository extends RepositoryKey {
  id: string;
  description: string;
  sourceUrl?: string;
  sourceKind: SourceKind;
  storagePath: string;
  isBare: boolean;
  isMirror: boolean;
  isPublic: boolean;
  autoSync: boolean;
  defaultBranch: string;
  status: LifecycleStatus;
  lastSyncedAt?: string;
  lastCommitHash?: string;
  totalCommits: number;
  errorMessage: string;
  consecutiveFailures: number;
  createdAt: string;
  updatedAt: string;
}

export interface Branch {
  repositoryId: string;
  name: string;
  commitHash: string;
  isDefault: boolean;
  lastUpdated: string;
}

export interface CommitRecord {
  repositoryId: string;
  hash: string;
  authorName: string;
  authorEmail: string;
  committerName: string;
  committerEmail: string;
  message: string;
  summary: string;
  authoredAt: number;
  committedAt: number;
  parents: string[];
  syncedAt: string;
}

export interface SyncTask {
  id: string;
  repositoryId: string;
  kind: TaskKind;
  status: TaskStatus;
  startedAt?: string;
  completedAt?: string;
  errorMessage: string;
  commitsSynced: number;
  attempts: number;
  externalTaskId?: string;
  createdAt: string;
}

export type FileEntryType = "blob" | "tree" | "commit";

export interface FileEntry {
  name: string;
  path: string;
  type: FileEntryType;
  /** Size in bytes; only set for blobs */
  size?: number;
  mode: string;
  sha: string;
}

export interface TreeObject {
  sha: string;
  path: string;
  entries: FileEntry[];
}

export interface BlobObject {
  sha: string;
  path: string;
  mode: string;
  size: number;
}

export interface CommitInfo {
  sha: string;
  authorName: string;
  authorEmail: string;
  committerName: string;
  committerEmail: string;
  message: string;
  summary: string;
  /** Unix timestamp in seconds */
  authoredDate: number;
  /** Unix timestamp in seconds */
  committedDate: number;
  parents: string[];
}

export interface RefInfo {
  name: string;
  type: "branch" | "tag";
  commitSha: string;
  /** Annotated tags only */
  message?: string;
}

export type ResolvedReferenceKind = "commit" | "tag" | "branch" | "remote-branch" | "head";

export interface ResolvedReference {
  input: string;
  kind: ResolvedReferenceKind;
  sha: string;
  /** Full ref name for tags and branches */
  refName?: string;
}
