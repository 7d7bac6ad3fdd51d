import { NotADirectoryError, NotAFileError, NotFoundError } from "../errors";

import { resolveReference } from "./reference-resolver";

import type { BlobObject, FileEntry, FileEntryType, ResolvedReference, TreeObject } from "../types";
import type { SimpleGit } from "simple-git";

const LS_TREE_ENTRY = /^(\d+) (blob|tree|commit) ([0-9a-f]+) +(-|\d+)\t([\s\S]+)$/;

export interface ContentHandlerOptions {
  includeRemoteBranches?: boolean;
}

/**
 * Read-only access to files, directories, trees and blobs at a reference.
 * Every call resolves the reference afresh, so results reflect either the
 * pre- or post-fetch state of a repository being synced, never a mix.
 */
export class ContentHandler {
  constructor(
    private readonly git: SimpleGit,
    private readonly options: ContentHandlerOptions = {},
  ) {}

  /**
   * Whole blob in memory. There is no streaming variant: check
   * {@link getFileSize} first when the file may be large.
   */
  async getFileContent(filePath: string, reference: string): Promise<Buffer> {
    const blob = await this.getBlob(reference, filePath);
    const data: unknown = await this.git.binaryCatFile(["blob", blob.sha]);
    if (!Buffer.isBuffer(data)) {
      throw new NotFoundError(`Blob ${blob.sha} for '${blob.path}' could not be read`);
    }
    return data;
  }

  /** Directories first, then files, each group by name. Not paginated. */
  async listDirectory(dirPath: string, reference: string): Promise<FileEntry[]> {
    const tree = await this.getTree(reference, dirPath);
    return tree.entries;
  }

  async getFilePath(filePath: string, reference: string): Promise<FileEntry> {
    const resolved = await this.resolve(reference);
    return this.locate(resolved, normalizePath(filePath, reference));
  }

  async getTree(reference: string, dirPath = ""): Promise<TreeObject> {
    const resolved = await this.resolve(reference);
    const entry = await this.locate(resolved, normalizePath(dirPath, reference));
    if (entry.type !== "tree") {
      throw new NotADirectoryError(entry.path, reference);
    }

    const output = await this.git.raw(["ls-tree", "-l", "-z", entry.sha]);
    const entries = parseLsTree(output, entry.path).sort(compareEntries);
    return { sha: entry.sha, path: entry.path, entries };
  }

  async getBlob(reference: string, filePath: string): Promise<BlobObject> {
    const resolved = await this.resolve(reference);
    const entry = await this.locate(resolved, normalizePath(filePath, reference));
    if (entry.type !== "blob" || entry.size === undefined) {
      throw new NotAFileError(entry.path, reference);
    }
    return { sha: entry.sha, path: entry.path, mode: entry.mode, size: entry.size };
  }

  async getFileSize(filePath: string, reference: string): Promise<number> {
    const blob = await this.getBlob(reference, filePath);
    return blob.size;
  }

  private resolve(reference: string): Promise<ResolvedReference> {
    return resolveReference(this.git, reference, { includeRemoteBranches: this.options.includeRemoteBranches });
  }

  private async locate(resolved: ResolvedReference, relativePath: string): Promise<FileEntry> {
    if (relativePath === "") {
      const treeSha = (await this.git.raw(["rev-parse", `${resolved.sha}^{tree}`])).trim();
      return { name: "", path: "", type: "tree", mode: "040000", sha: treeSha };
    }

    const output = await this.git.raw(["ls-tree", "-l", "-z", "--full-tree", resolved.sha, "--", relativePath]);
    const match = parseLsTree(output, "").find((entry) => entry.path === relativePath);
    if (!match) {
      throw new NotFoundError(`Path '${relativePath}' does not exist at '${resolved.input}'`);
    }
    return match;
  }
}

function normalizePath(input: string, reference: string): string {
  const segments = input.split("/").filter((segment) => segment.length > 0);
  if (segments.some((segment) => segment === "." || segment === "..")) {
    throw new NotFoundError(`Path '${input}' does not exist at '${reference}'`);
  }
  return segments.join("/");
}

/**
 * Parses `git ls-tree -l -z` output. Names are taken verbatim (no quoting
 * with -z) and prefixed with `parentPath`.
 */
export function parseLsTree(output: string, parentPath: string): FileEntry[] {
  const entries: FileEntry[] = [];

  for (const record of output.split("\0")) {
    if (record.length === 0) continue;

    const match = LS_TREE_ENTRY.exec(record);
    if (!match) continue;

    const [, mode, rawType, sha, size, name] = match;
    const type = toEntryType(rawType);
    if (!type) continue;

    const entryPath = parentPath ? `${parentPath}/${name}` : name;
    entries.push({
      name: entryPath.slice(entryPath.lastIndexOf("/") + 1),
      path: entryPath,
      type,
      size: size === "-" ? undefined : parseInt(size, 10),
      mode,
      sha,
    });
  }

  return entries;
}

function toEntryType(value: string): FileEntryType | null {
  return value === "blob" || value === "tree" || value === "commit" ? value : null;
}

function compareEntries(a: FileEntry, b: FileEntry): number {
  const aRank = a.type === "tree" ? 0 : 1;
  const bRank = b.type === "tree" ? 0 : 1;
  if (aRank !== bRank) {
    return aRank - bRank;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}
