import { GitError } from "simple-git";

import { GIT_CONSTANTS, SHA_PATTERN } from "../constants";
import { InvalidReferenceError } from "../errors";

import type { ResolvedReference } from "../types";
import type { SimpleGit } from "simple-git";

// SHA-1 and SHA-256 object ids
const FULL_SHA_LENGTHS = [40, 64];

/**
 * `rev-parse --verify` for a revision peeled to a commit. Null when the
 * revision does not name a commit.
 */
export async function revParseCommit(git: SimpleGit, revision: string): Promise<string | null> {
  try {
    const sha = (await git.raw(["rev-parse", "--verify", "--quiet", `${revision}^{commit}`])).trim();
    return sha.length > 0 ? sha : null;
  } catch (error) {
    if (error instanceof GitError) {
      return null;
    }
    throw error;
  }
}

/**
 * Finds the single commit whose id starts with `prefix`. Objects of other
 * types sharing the prefix are ignored; two matching commits resolve to null.
 */
export async function findCommitByPrefix(git: SimpleGit, prefix: string): Promise<string | null> {
  if (!SHA_PATTERN.test(prefix)) {
    return null;
  }

  let candidates: string[];
  try {
    const output = await git.raw(["rev-parse", `--disambiguate=${prefix.toLowerCase()}`]);
    candidates = output
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  } catch (error) {
    if (error instanceof GitError) {
      return null;
    }
    throw error;
  }

  const commits: string[] = [];
  for (const candidate of candidates) {
    const type = (await git.raw(["cat-file", "-t", candidate])).trim();
    if (type === "commit") {
      commits.push(candidate);
    }
  }

  return commits.length === 1 ? commits[0] : null;
}

export interface ResolveOptions {
  /** Also look at `refs/remotes/origin/<name>` after local branches (working copies) */
  includeRemoteBranches?: boolean;
}

/**
 * Resolves a user-supplied reference in a fixed order: full commit SHA, tag,
 * branch, remote-tracking branch, `HEAD`, abbreviated commit SHA. Full ref
 * names (`refs/...`) are taken as they are.
 */
export async function resolveReference(
  git: SimpleGit,
  reference: string,
  options: ResolveOptions = {},
): Promise<ResolvedReference> {
  const input = reference.trim();
  if (input.length === 0 || input.startsWith("-")) {
    throw new InvalidReferenceError(reference);
  }

  if (input.startsWith("refs/")) {
    const sha = await revParseCommit(git, input);
    if (!sha) {
      throw new InvalidReferenceError(reference);
    }
    const kind = input.startsWith(GIT_CONSTANTS.REFS.TAGS) ? "tag" : "branch";
    return { input, kind, sha, refName: input };
  }

  const isFullSha = FULL_SHA_LENGTHS.includes(input.length) && SHA_PATTERN.test(input);
  if (isFullSha) {
    const commitSha = await findCommitByPrefix(git, input);
    if (commitSha) {
      return { input, kind: "commit", sha: commitSha };
    }
  }

  const tagRef = `${GIT_CONSTANTS.REFS.TAGS}${input}`;
  const tagSha = await revParseCommit(git, tagRef);
  if (tagSha) {
    return { input, kind: "tag", sha: tagSha, refName: tagRef };
  }

  const branchRef = `${GIT_CONSTANTS.REFS.HEADS}${input}`;
  const branchSha = await revParseCommit(git, branchRef);
  if (branchSha) {
    return { input, kind: "branch", sha: branchSha, refName: branchRef };
  }

  if (options.includeRemoteBranches) {
    const remoteRef = `${GIT_CONSTANTS.REFS.REMOTES_ORIGIN}${input}`;
    const remoteSha = await revParseCommit(git, remoteRef);
    if (remoteSha) {
      return { input, kind: "remote-branch", sha: remoteSha, refName: remoteRef };
    }
  }

  if (input === GIT_CONSTANTS.HEAD) {
    const headSha = await revParseCommit(git, GIT_CONSTANTS.HEAD);
    if (headSha) {
      return { input, kind: "head", sha: headSha };
    }
  }

  const abbreviatedSha = isFullSha ? null : await findCommitByPrefix(git, input);
  if (abbreviatedSha) {
    return { input, kind: "commit", sha: abbreviatedSha };
  }

  throw new InvalidReferenceError(reference);
}

/** `refs/heads/feature/x` -> `feature/x` */
export function shortRefName(refName: string): string {
  for (const prefix of [GIT_CONSTANTS.REFS.HEADS, GIT_CONSTANTS.REFS.TAGS, GIT_CONSTANTS.REFS.REMOTES_ORIGIN]) {
    if (refName.startsWith(prefix)) {
      return refName.slice(prefix.length);
    }
  }
  return refName;
}
