import * as fs from "fs/promises";
import * as path from "path";

import simpleGit from "simple-git";

import { GIT_CONSTANTS, NAME_PATTERN } from "../constants";
import { InvalidNameError, NotFoundError } from "../errors";
import { redactUrl } from "../utils/git-url";

import { Logger } from "./logger.service";

import type { SimpleGit } from "simple-git";

export type CloneMode = "mirror" | "bare" | "working";

export interface StoreHandle {
  path: string;
  isBare: boolean;
  git: SimpleGit;
}

export interface GitProcessOptions {
  /** Aborting kills the running Git process */
  signal?: AbortSignal;
}

/**
 * On-disk layout of the fleet: one repository per `<root>/<organisation>/<name>`.
 *
 * Opened repositories are kept in a handle registry keyed by absolute path so
 * repeated reads skip the filesystem check. Anything that changes a
 * repository's structure (create, clone, remove) drops its entry first.
 */
export class RepositoryStore {
  private readonly root: string;
  private readonly handles = new Map<string, StoreHandle>();
  private readonly logger: Logger;

  constructor(root: string, logger?: Logger) {
    this.root = path.resolve(root);
    this.logger = logger ?? Logger.createDefault("store");
  }

  getRoot(): string {
    return this.root;
  }

  resolve(organisation: string, name: string): string {
    assertValidSegment("organisation", organisation);
    assertValidSegment("repository name", name);
    return path.join(this.root, organisation, name);
  }

  createGit(baseDir: string, options: GitProcessOptions = {}): SimpleGit {
    return options.signal ? simpleGit({ baseDir, abort: options.signal }) : simpleGit(baseDir);
  }

  /**
   * True when `repoPath` is itself the root of a Git repository, bare or
   * with a `.git` directory. A directory nested inside some other
   * repository does not count.
   */
  async exists(repoPath: string): Promise<boolean> {
    const absolutePath = path.resolve(repoPath);
    try {
      const stat = await fs.stat(absolutePath);
      if (!stat.isDirectory()) {
        return false;
      }
      const realPath = await fs.realpath(absolutePath);
      const gitDir = (await simpleGit(absolutePath).revparse(["--absolute-git-dir"])).trim();
      return gitDir === realPath || gitDir === path.join(realPath, ".git");
    } catch {
      return false;
    }
  }

  async open(repoPath: string): Promise<StoreHandle> {
    const absolutePath = path.resolve(repoPath);
    const cached = this.handles.get(absolutePath);
    if (cached) {
      return cached;
    }

    if (!(await this.exists(absolutePath))) {
      throw new NotFoundError(`No repository at '${absolutePath}'`);
    }

    const git = simpleGit(absolutePath);
    const isBare = (await git.revparse(["--is-bare-repository"])).trim() === "true";
    const handle: StoreHandle = { path: absolutePath, isBare, git };
    this.handles.set(absolutePath, handle);
    this.logger.debug(`Opened ${isBare ? "bare" : "working"} repository at ${absolutePath}`);
    return handle;
  }

  async createBare(repoPath: string): Promise<StoreHandle> {
    return this.init(repoPath, true);
  }

  async createWorking(repoPath: string): Promise<StoreHandle> {
    return this.init(repoPath, false);
  }

  async createMirror(repoPath: string, cloneUrl: string, options: GitProcessOptions = {}): Promise<StoreHandle> {
    return this.clone(repoPath, cloneUrl, "mirror", options);
  }

  async clone(
    repoPath: string,
    cloneUrl: string,
    mode: CloneMode,
    options: GitProcessOptions = {},
  ): Promise<StoreHandle> {
    const absolutePath = path.resolve(repoPath);
    this.invalidate(absolutePath);

    const parentDir = path.dirname(absolutePath);
    await fs.mkdir(parentDir, { recursive: true });

    const cloneArgs = mode === "mirror" ? ["--mirror"] : mode === "bare" ? ["--bare"] : [];
    this.logger.info(`Cloning ${redactUrl(cloneUrl)} (${mode}) into ${absolutePath}`);
    await this.createGit(parentDir, options).clone(cloneUrl, absolutePath, cloneArgs);

    const git = this.createGit(absolutePath, options);
    if (mode === "mirror") {
      // --mirror already fetches +refs/*:refs/*; make sure nobody pushes through it
      await git.addConfig(`remote.${GIT_CONSTANTS.REMOTE_NAME}.pushurl`, GIT_CONSTANTS.DISABLED_PUSH_URL);
    } else if (mode === "bare") {
      await git.addConfig(`remote.${GIT_CONSTANTS.REMOTE_NAME}.fetch`, GIT_CONSTANTS.FETCH_CONFIG.BARE);
    }

    return this.open(absolutePath);
  }

  async remove(repoPath: string): Promise<void> {
    const absolutePath = path.resolve(repoPath);
    this.invalidate(absolutePath);
    await fs.rm(absolutePath, { recursive: true, force: true });
    this.logger.debug(`Removed ${absolutePath}`);
  }

  invalidate(repoPath: string): void {
    this.handles.delete(path.resolve(repoPath));
  }

  isCached(repoPath: string): boolean {
    return this.handles.has(path.resolve(repoPath));
  }

  private async init(repoPath: string, bare: boolean): Promise<StoreHandle> {
    const absolutePath = path.resolve(repoPath);
    this.invalidate(absolutePath);
    await fs.mkdir(absolutePath, { recursive: true });
    await simpleGit(absolutePath).init(bare);
    this.logger.info(`Created ${bare ? "bare" : "working"} repository at ${absolutePath}`);
    return this.open(absolutePath);
  }
}

function assertValidSegment(field: string, value: string): void {
  if (!NAME_PATTERN.test(value) || value.includes("..") || value.endsWith(".lock") || value.endsWith(".git")) {
    throw new InvalidNameError(field, value);
  }
}
