import * as fs from "fs/promises";
import * as path from "path";

import type { Branch, CommitRecord, LifecycleStatus, Repository, SyncTask, TaskStatus } from "../types";

export interface RepositoryFilter {
  organisation?: string;
  status?: LifecycleStatus;
  sourceUrl?: string;
}

export interface TaskFilter {
  repositoryId?: string;
  status?: TaskStatus;
}

/**
 * Durable records the engine reads and writes. Callers serialize writes per
 * repository; implementations only need whole-record atomicity.
 */
export interface MetadataStore {
  getRepository(id: string): Promise<Repository | null>;
  saveRepository(repository: Repository): Promise<void>;
  listRepositories(filter?: RepositoryFilter): Promise<Repository[]>;

  getBranches(repositoryId: string): Promise<Branch[]>;
  replaceBranches(repositoryId: string, branches: Branch[]): Promise<void>;

  /** Newest first by commit time */
  getCommits(repositoryId: string): Promise<CommitRecord[]>;
  /** Appends commits not yet cached; returns how many were new */
  appendCommits(repositoryId: string, commits: CommitRecord[]): Promise<number>;

  getTask(id: string): Promise<SyncTask | null>;
  saveTask(task: SyncTask): Promise<void>;
  listTasks(filter?: TaskFilter): Promise<SyncTask[]>;
}

export function repositoryId(organisation: string, name: string): string {
  return `${organisation}/${name}`;
}

/**
 * JSON files under one directory:
 *
 *   repositories/<organisation>/<name>.json
 *   repositories/<organisation>/<name>.branches.json
 *   repositories/<organisation>/<name>.commits.json
 *   tasks/<task-id>.json
 *
 * Each write goes to a temp file that is renamed over the target, so readers
 * never see a half-written record.
 */
export class FileMetadataStore implements MetadataStore {
  private writeCounter = 0;

  constructor(private readonly baseDir: string) {}

  getBaseDir(): string {
    return this.baseDir;
  }

  async getRepository(id: string): Promise<Repository | null> {
    const data = await this.readJson(this.repositoryFile(id, ""));
    return isRepository(data) ? data : null;
  }

  async saveRepository(repository: Repository): Promise<void> {
    await this.writeJson(this.repositoryFile(repository.id, ""), repository);
  }

  async listRepositories(filter: RepositoryFilter = {}): Promise<Repository[]> {
    const root = path.join(this.baseDir, "repositories");
    const organisations = filter.organisation ? [filter.organisation] : await listDir(root);
    const repositories: Repository[] = [];

    for (const organisation of organisations) {
      for (const file of await listDir(path.join(root, organisation))) {
        if (!file.endsWith(".json") || file.endsWith(".branches.json") || file.endsWith(".commits.json")) {
          continue;
        }
        const data = await this.readJson(path.join(root, organisation, file));
        if (!isRepository(data)) continue;
        if (filter.status && data.status !== filter.status) continue;
        if (filter.sourceUrl && data.sourceUrl !== filter.sourceUrl) continue;
        repositories.push(data);
      }
    }

    return repositories.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  async getBranches(repositoryId: string): Promise<Branch[]> {
    const data = await this.readJson(this.repositoryFile(repositoryId, ".branches"));
    return Array.isArray(data) ? data.filter(isBranch) : [];
  }

  async replaceBranches(repositoryId: string, branches: Branch[]): Promise<void> {
    const sorted = [...branches].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    await this.writeJson(this.repositoryFile(repositoryId, ".branches"), sorted);
  }

  async getCommits(repositoryId: string): Promise<CommitRecord[]> {
    const data = await this.readJson(this.repositoryFile(repositoryId, ".commits"));
    return Array.isArray(data) ? data.filter(isCommitRecord) : [];
  }

  async appendCommits(repositoryId: string, commits: CommitRecord[]): Promise<number> {
    const existing = await this.getCommits(repositoryId);
    const known = new Set(existing.map((commit) => commit.hash));
    const added = commits.filter((commit) => {
      if (known.has(commit.hash)) return false;
      known.add(commit.hash);
      return true;
    });

    if (added.length === 0) {
      return 0;
    }

    const merged = [...existing, ...added].sort(
      (a, b) => b.committedAt - a.committedAt || (a.hash < b.hash ? -1 : a.hash > b.hash ? 1 : 0),
    );
    await this.writeJson(this.repositoryFile(repositoryId, ".commits"), merged);
    return added.length;
  }

  async getTask(id: string): Promise<SyncTask | null> {
    const data = await this.readJson(this.taskFile(id));
    return isSyncTask(data) ? data : null;
  }

  async saveTask(task: SyncTask): Promise<void> {
    await this.writeJson(this.taskFile(task.id), task);
  }

  async listTasks(filter: TaskFilter = {}): Promise<SyncTask[]> {
    const dir = path.join(this.baseDir, "tasks");
    const tasks: SyncTask[] = [];

    for (const file of await listDir(dir)) {
      if (!file.endsWith(".json")) continue;
      const data = await this.readJson(path.join(dir, file));
      if (!isSyncTask(data)) continue;
      if (filter.repositoryId && data.repositoryId !== filter.repositoryId) continue;
      if (filter.status && data.status !== filter.status) continue;
      tasks.push(data);
    }

    return tasks.sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0));
  }

  private repositoryFile(id: string, suffix: string): string {
    const [organisation, name] = id.split("/");
    return path.join(this.baseDir, "repositories", organisation, `${name}${suffix}.json`);
  }

  private taskFile(id: string): string {
    return path.join(this.baseDir, "tasks", `${path.basename(id)}.json`);
  }

  private async readJson(file: string): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
    return JSON.parse(content);
  }

  private async writeJson(file: string, data: unknown): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });
    const tempFile = `${file}.${process.pid}.${++this.writeCounter}.tmp`;
    await fs.writeFile(tempFile, JSON.stringify(data, null, 2), "utf-8");
    await fs.rename(tempFile, file);
  }
}

async function listDir(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRepository(value: unknown): value is Repository {
  return (
    isObject(value) &&
    typeof value.id === "string" &&
    typeof value.organisation === "string" &&
    typeof value.name === "string" &&
    typeof value.storagePath === "string" &&
    typeof value.status === "string"
  );
}

function isBranch(value: unknown): value is Branch {
  return isObject(value) && typeof value.name === "string" && typeof value.commitHash === "string";
}

function isCommitRecord(value: unknown): value is CommitRecord {
  return isObject(value) && typeof value.hash === "string" && typeof value.committedAt === "number";
}

function isSyncTask(value: unknown): value is SyncTask {
  return (
    isObject(value) &&
    typeof value.id === "string" &&
    typeof value.repositoryId === "string" &&
    typeof value.status === "string"
  );
}
