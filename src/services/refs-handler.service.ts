import { GitError } from "simple-git";

import { GIT_CONSTANTS, SHA_PATTERN } from "../constants";
import { NotFoundError } from "../errors";

import { findCommitByPrefix, resolveReference } from "./reference-resolver";

import type { CommitInfo, RefInfo } from "../types";
import type { SimpleGit } from "simple-git";

const FIELD = "\x1f";
const RECORD = "\x1e";

const COMMIT_FORMAT = ["%H", "%an", "%ae", "%cn", "%ce", "%at", "%ct", "%P", "%B"].join("%x1f") + "%x1e";
const BRANCH_FORMAT = ["%(refname)", "%(objectname)"].join("%1f") + "%1e";
const TAG_FORMAT =
  ["%(refname)", "%(objectname)", "%(objecttype)", "%(*objectname)", "%(*objecttype)", "%(contents)"].join("%1f") +
  "%1e";

export const DEFAULT_COMMIT_PAGE_SIZE = 50;
// Hashes passed to one `git log` call; keeps the command line under the OS argument limit
export const DEFAULT_COMMIT_BATCH_SIZE = 500;

export interface RefsHandlerOptions {
  /** Working copies keep most branches under refs/remotes/origin */
  includeRemoteBranches?: boolean;
  commitBatchSize?: number;
}

export class RefsHandler {
  constructor(
    private readonly git: SimpleGit,
    private readonly options: RefsHandlerOptions = {},
  ) {}

  async listBranches(): Promise<RefInfo[]> {
    const branches = new Map<string, RefInfo>();

    if (this.options.includeRemoteBranches) {
      for (const branch of await this.readBranches(GIT_CONSTANTS.REFS.REMOTES_ORIGIN)) {
        if (branch.name !== GIT_CONSTANTS.HEAD) {
          branches.set(branch.name, branch);
        }
      }
    }

    // Local branches win over their remote-tracking counterparts
    for (const branch of await this.readBranches(GIT_CONSTANTS.REFS.HEADS)) {
      branches.set(branch.name, branch);
    }

    return [...branches.values()].sort(byName);
  }

  async listTags(): Promise<RefInfo[]> {
    const output = await this.git.raw(["for-each-ref", `--format=${TAG_FORMAT}`, GIT_CONSTANTS.REFS.TAGS]);
    const tags: RefInfo[] = [];

    for (const fields of splitRecords(output)) {
      const [refName, objectName, objectType, peeledName, peeledType, contents = ""] = fields;
      const annotated = objectType === "tag";
      const commitSha = annotated ? peeledName : objectName;
      if ((annotated ? peeledType : objectType) !== "commit" || !commitSha) {
        continue;
      }

      tags.push({
        name: refName.slice(GIT_CONSTANTS.REFS.TAGS.length),
        type: "tag",
        commitSha,
        message: annotated ? contents.replace(/\s+$/, "") : undefined,
      });
    }

    return tags.sort(byName);
  }

  async getBranchInfo(name: string): Promise<RefInfo> {
    const branch = (await this.listBranches()).find((candidate) => candidate.name === name);
    if (!branch) {
      throw new NotFoundError(`Branch '${name}' not found`);
    }
    return branch;
  }

  async getTagInfo(name: string): Promise<RefInfo> {
    const tag = (await this.listTags()).find((candidate) => candidate.name === name);
    if (!tag) {
      throw new NotFoundError(`Tag '${name}' not found`);
    }
    return tag;
  }

  /** Branch `HEAD` points at, or null for a detached `HEAD`. */
  async getDefaultBranch(): Promise<string | null> {
    try {
      const name = (await this.git.raw(["symbolic-ref", "--quiet", "--short", GIT_CONSTANTS.HEAD])).trim();
      return name.length > 0 ? name : null;
    } catch (error) {
      if (error instanceof GitError) {
        return null;
      }
      throw error;
    }
  }

  /**
   * History reachable from `reference`, newest first by committer time with
   * ties broken by ascending hash. `skip` and `limit` apply after ordering;
   * `limit <= 0` returns everything.
   */
  async getCommits(reference: string, limit = DEFAULT_COMMIT_PAGE_SIZE, skip = 0): Promise<CommitInfo[]> {
    const resolved = await resolveReference(this.git, reference, {
      includeRemoteBranches: this.options.includeRemoteBranches,
    });

    const output = await this.git.raw(["rev-list", "--timestamp", resolved.sha]);
    const ordered = output
      .split("\n")
      .map((line) => line.trim().split(" "))
      .filter((parts): parts is [string, string] => parts.length === 2)
      .map(([timestamp, sha]) => ({ timestamp: parseInt(timestamp, 10), sha }))
      .sort((a, b) => b.timestamp - a.timestamp || (a.sha < b.sha ? -1 : a.sha > b.sha ? 1 : 0));

    const start = Math.max(skip, 0);
    const page = ordered.slice(start, limit > 0 ? start + limit : undefined);
    return this.loadCommits(page.map((entry) => entry.sha));
  }

  async getCommitDetails(sha: string): Promise<CommitInfo> {
    const fullSha = SHA_PATTERN.test(sha) ? await findCommitByPrefix(this.git, sha) : null;
    if (!fullSha) {
      throw new NotFoundError(`Commit '${sha}' not found`);
    }
    const [commit] = await this.loadCommits([fullSha]);
    return commit;
  }

  async getBranchCommits(branchName: string, limit = DEFAULT_COMMIT_PAGE_SIZE, skip = 0): Promise<CommitInfo[]> {
    const branch = await this.getBranchInfo(branchName);
    return this.getCommits(branch.commitSha, limit, skip);
  }

  async getTagCommits(tagName: string, limit = DEFAULT_COMMIT_PAGE_SIZE, skip = 0): Promise<CommitInfo[]> {
    const tag = await this.getTagInfo(tagName);
    return this.getCommits(tag.commitSha, limit, skip);
  }

  /** Commits reachable from `reference`, or from every ref when omitted. */
  async countCommits(reference?: string): Promise<number> {
    const target = reference
      ? (await resolveReference(this.git, reference, { includeRemoteBranches: this.options.includeRemoteBranches }))
          .sha
      : "--all";
    const output = await this.git.raw(["rev-list", "--count", target]);
    return parseInt(output.trim(), 10) || 0;
  }

  /** Every commit reachable from any ref, newest first. */
  async listCommitHashes(): Promise<string[]> {
    const output = await this.git.raw(["rev-list", "--all"]);
    return output
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  /** Commit details in the order the hashes were given. */
  async loadCommits(shas: string[]): Promise<CommitInfo[]> {
    if (shas.length === 0) {
      return [];
    }
    const batchSize = Math.max(this.options.commitBatchSize ?? DEFAULT_COMMIT_BATCH_SIZE, 1);
    const commits: CommitInfo[] = [];
    for (let start = 0; start < shas.length; start += batchSize) {
      const batch = shas.slice(start, start + batchSize);
      const output = await this.git.raw(["log", "--no-walk=unsorted", `--format=${COMMIT_FORMAT}`, ...batch]);
      commits.push(...splitRecords(output).map(toCommitInfo));
    }
    return commits;
  }

  private async readBranches(prefix: string): Promise<RefInfo[]> {
    const output = await this.git.raw(["for-each-ref", `--format=${BRANCH_FORMAT}`, prefix]);
    return splitRecords(output).map(([refName, commitSha]) => ({
      name: refName.slice(prefix.length),
      type: "branch" as const,
      commitSha,
    }));
  }
}

function splitRecords(output: string): string[][] {
  return output
    .split(RECORD)
    .map((record) => record.replace(/^\n/, ""))
    .filter((record) => record.length > 0)
    .map((record) => record.split(FIELD));
}

function toCommitInfo(fields: string[]): CommitInfo {
  const [sha, authorName, authorEmail, committerName, committerEmail, authoredAt, committedAt, parents, body = ""] =
    fields;
  const message = body.replace(/\n+$/, "");
  return {
    sha,
    authorName,
    authorEmail,
    committerName,
    committerEmail,
    message,
    summary: message.split("\n")[0],
    authoredDate: parseInt(authoredAt, 10),
    committedDate: parseInt(committedAt, 10),
    parents: parents ? parents.split(" ").filter((parent) => parent.length > 0) : [],
  };
}

function byName(a: RefInfo, b: RefInfo): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}
