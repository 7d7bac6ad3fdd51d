import * as fs from "fs/promises";
import * as path from "path";

import simpleGit from "simple-git";

import { ERROR_MESSAGES, GIT_CONSTANTS } from "../constants";
import {
  CheckoutConflictError,
  DirtyWorkdirError,
  GitOperationError,
  InUseError,
  InvalidReferenceError,
  NotFoundError,
} from "../errors";
import { getErrorMessage } from "../utils/error-message";
import { KeyedLock } from "../utils/keyed-lock";

import { Logger } from "./logger.service";
import { resolveReference, revParseCommit, shortRefName } from "./reference-resolver";

import type { ResolvedReference } from "../types";
import type { SimpleGit, StatusResult } from "simple-git";

export interface WorkdirHandle {
  path: string;
  reference: ResolvedReference;
  head: string;
  /** Set when a local branch is checked out; undefined for a detached HEAD */
  branch?: string;
}

export interface WorkdirEntry {
  path: string;
  head?: string;
  branch?: string;
  detached: boolean;
  locked: boolean;
  prunable: boolean;
}

export interface CheckoutOptions {
  force?: boolean;
}

/**
 * Working directories materialized from a repository store. Every mutating
 * call holds the lock for its worktree path; calls on different paths, and
 * syncs of the store itself, proceed independently.
 */
export class WorktreeHandler {
  private readonly logger: Logger;

  constructor(
    private readonly git: SimpleGit,
    private readonly locks: KeyedLock = new KeyedLock(),
    logger?: Logger,
  ) {
    this.logger = logger ?? Logger.createDefault("worktree");
  }

  async createWorkdir(workdirPath: string, reference: string, options: CheckoutOptions = {}): Promise<WorkdirHandle> {
    const absolutePath = path.resolve(workdirPath);

    return this.locks.run(absolutePath, async () => {
      const resolved = await resolveReference(this.git, reference);

      if (await isNonEmptyDirectory(absolutePath)) {
        if (!options.force) {
          throw new CheckoutConflictError(absolutePath, "target directory exists and is not empty");
        }
        this.logger.warn(`Clearing non-empty directory '${absolutePath}' before checkout`);
        await fs.rm(absolutePath, { recursive: true, force: true });
        await this.git.raw(["worktree", "prune"]);
      }

      await fs.mkdir(path.dirname(absolutePath), { recursive: true });

      const branch = resolved.kind === "branch" && resolved.refName ? shortRefName(resolved.refName) : undefined;
      const args = ["worktree", "add"];
      if (options.force) args.push("--force");
      if (branch) {
        args.push(absolutePath, branch);
      } else {
        args.push("--detach", absolutePath, resolved.sha);
      }

      try {
        await this.git.raw(args);
      } catch (error) {
        throw toCheckoutError(error, absolutePath, "worktree add");
      }

      const head = (await simpleGit(absolutePath).revparse([GIT_CONSTANTS.HEAD])).trim();
      this.logger.info(`Created worktree at '${absolutePath}' on ${branch ?? head}`);
      return { path: absolutePath, reference: resolved, head, branch };
    });
  }

  /**
   * Removes a worktree. Without `force`, a worktree holding uncommitted
   * changes or untracked files is refused with InUse.
   */
  async deleteWorkdir(workdirPath: string, force = false): Promise<void> {
    const absolutePath = path.resolve(workdirPath);

    await this.locks.run(absolutePath, async () => {
      if (!(await this.findWorkdir(absolutePath))) {
        throw new NotFoundError(`No worktree registered at '${absolutePath}'`);
      }

      if (!force) {
        const changes = changedPaths(await simpleGit(absolutePath).status(), true);
        if (changes.length > 0) {
          throw new InUseError(absolutePath, changes);
        }
      }

      const args = ["worktree", "remove"];
      if (force) args.push("--force");
      args.push(absolutePath);

      try {
        await this.git.raw(args);
      } catch (error) {
        throw new GitOperationError("worktree remove", getErrorMessage(error), toError(error));
      }
      await this.git.raw(["worktree", "prune"]);
      this.logger.info(`Removed worktree at '${absolutePath}'`);
    });
  }

  async checkoutBranch(workdirPath: string, branch: string, options: CheckoutOptions = {}): Promise<WorkdirHandle> {
    const absolutePath = path.resolve(workdirPath);

    return this.locks.run(absolutePath, async () => {
      const workdirGit = simpleGit(absolutePath);
      const refName = `${GIT_CONSTANTS.REFS.HEADS}${branch}`;
      const sha = await revParseCommit(workdirGit, refName);
      if (!sha) {
        throw new InvalidReferenceError(branch);
      }

      await this.assertClean(workdirGit, absolutePath, options);

      const args = ["checkout"];
      if (options.force) args.push("--force");
      args.push(branch, "--");

      try {
        await workdirGit.raw(args);
      } catch (error) {
        throw toCheckoutError(error, absolutePath, "checkout");
      }

      return { path: absolutePath, reference: { input: branch, kind: "branch", sha, refName }, head: sha, branch };
    });
  }

  async checkoutCommit(workdirPath: string, sha: string, options: CheckoutOptions = {}): Promise<WorkdirHandle> {
    const absolutePath = path.resolve(workdirPath);

    return this.locks.run(absolutePath, async () => {
      const workdirGit = simpleGit(absolutePath);
      const resolved = await resolveReference(workdirGit, sha);

      await this.assertClean(workdirGit, absolutePath, options);

      const args = ["checkout", "--detach"];
      if (options.force) args.push("--force");
      args.push(resolved.sha, "--");

      try {
        await workdirGit.raw(args);
      } catch (error) {
        throw toCheckoutError(error, absolutePath, "checkout");
      }

      return { path: absolutePath, reference: resolved, head: resolved.sha };
    });
  }

  async listWorkdirs(): Promise<WorkdirEntry[]> {
    const output = await this.git.raw(["worktree", "list", "--porcelain"]);
    return parseWorktreeList(output);
  }

  private async findWorkdir(absolutePath: string): Promise<WorkdirEntry | undefined> {
    const target = await realPathOrSelf(absolutePath);
    for (const entry of await this.listWorkdirs()) {
      if ((await realPathOrSelf(entry.path)) === target) {
        return entry;
      }
    }
    return undefined;
  }

  private async assertClean(workdirGit: SimpleGit, absolutePath: string, options: CheckoutOptions): Promise<void> {
    if (options.force) {
      return;
    }
    const changes = changedPaths(await workdirGit.status(), false);
    if (changes.length > 0) {
      throw new DirtyWorkdirError(absolutePath, changes);
    }
  }
}

/**
 * Parses `git worktree list --porcelain`. The store's own entry (bare, or
 * the main working copy) is left out.
 */
export function parseWorktreeList(output: string): WorkdirEntry[] {
  const entries: WorkdirEntry[] = [];
  const blocks = output.split(/\n\s*\n/);

  blocks.forEach((block, index) => {
    const lines = block.split("\n").filter((line) => line.length > 0);
    const worktreeLine = lines.find((line) => line.startsWith("worktree "));
    if (!worktreeLine || index === 0 || lines.includes("bare")) {
      return;
    }

    const headLine = lines.find((line) => line.startsWith("HEAD "));
    const branchLine = lines.find((line) => line.startsWith("branch "));
    entries.push({
      path: worktreeLine.substring("worktree ".length),
      head: headLine?.substring("HEAD ".length),
      branch: branchLine ? shortRefName(branchLine.substring("branch ".length)) : undefined,
      detached: lines.includes("detached"),
      locked: lines.some((line) => line === "locked" || line.startsWith("locked ")),
      prunable: lines.some((line) => line === "prunable" || line.startsWith("prunable ")),
    });
  });

  return entries;
}

function changedPaths(status: StatusResult, includeUntracked: boolean): string[] {
  return status.files
    .filter((file) => includeUntracked || !(file.index === "?" && file.working_dir === "?"))
    .map((file) => file.path);
}

function toCheckoutError(error: unknown, absolutePath: string, operation: string): Error {
  const message = getErrorMessage(error);
  if (ERROR_MESSAGES.DIRTY_WORKDIR.some((pattern) => message.includes(pattern))) {
    return new DirtyWorkdirError(absolutePath, [message.trim()], toError(error));
  }
  if (ERROR_MESSAGES.CHECKOUT_CONFLICT.some((pattern) => message.includes(pattern))) {
    return new CheckoutConflictError(absolutePath, message.trim(), toError(error));
  }
  return new GitOperationError(operation, message, toError(error));
}

function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

async function isNonEmptyDirectory(target: string): Promise<boolean> {
  try {
    const entries = await fs.readdir(target);
    return entries.length > 0;
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return error.code === "ENOTDIR";
    }
    throw error;
  }
}

async function realPathOrSelf(target: string): Promise<string> {
  try {
    return await fs.realpath(target);
  } catch {
    return path.resolve(target);
  }
}
