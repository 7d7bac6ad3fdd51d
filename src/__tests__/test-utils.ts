import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import simpleGit from "simple-git";

import { Logger } from "../services/logger.service";
import { RepositoryStore } from "../services/repository-store.service";

import type { LogLevel } from "../services/logger.service";
import type { StoreHandle } from "../services/repository-store.service";
import type { SimpleGit } from "simple-git";

export const TEST_AUTHOR = { name: "Test User", email: "test@example.com" };

// Seconds since the epoch; every fixture commit is dated from here on
export const BASE_TIMESTAMP = 1_700_000_000;

// Temporary Directory Helper
let tempDirs: string[] = [];

export async function createTempDirectory(prefix = "repo-fleet-test-"): Promise<string> {
  const tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
  tempDirs.push(tempDir);
  return tempDir;
}

export async function cleanupTempDirectories(): Promise<void> {
  await Promise.all(tempDirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
  tempDirs = [];
}

export interface CapturedLine {
  level: LogLevel;
  message: string;
}

/** Logger that records lines instead of printing them. */
export function createCapturingLogger(scope?: string): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = new Logger({ scope, debug: true, outputFn: (message, level) => lines.push({ level, message }) });
  return { logger, lines };
}

export interface CommitOptions {
  /** Seconds since the epoch, used for both author and committer date */
  timestamp?: number;
  author?: { name: string; email: string };
}

/**
 * A working repository with `main` as its unborn branch and a local
 * identity, ready for fixture commits.
 */
export async function createSourceRepository(dir: string): Promise<SimpleGit> {
  await fs.mkdir(dir, { recursive: true });
  const git = simpleGit(dir);
  await git.init();
  await git.raw(["symbolic-ref", "HEAD", "refs/heads/main"]);
  await git.addConfig("user.name", TEST_AUTHOR.name);
  await git.addConfig("user.email", TEST_AUTHOR.email);
  await git.addConfig("commit.gpgsign", "false");
  await git.addConfig("tag.gpgsign", "false");
  return git;
}

/**
 * Only what git needs to run. simple-git refuses variables such as `EDITOR`
 * in a custom environment, and test runners often set them.
 */
function inheritedGitEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const name of ["PATH", "HOME"]) {
    const value = process.env[name];
    if (value !== undefined) {
      env[name] = value;
    }
  }
  return env;
}

/** Writes `files` (path → content) and commits them; returns the new commit hash. */
export async function commitFiles(
  repoDir: string,
  files: Record<string, string | Buffer>,
  message: string,
  options: CommitOptions = {},
): Promise<string> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(repoDir, relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }

  const timestamp = options.timestamp ?? BASE_TIMESTAMP;
  const author = options.author ?? TEST_AUTHOR;
  const date = `@${timestamp} +0000`;
  const git = simpleGit(repoDir).env({
    ...inheritedGitEnv(),
    GIT_AUTHOR_DATE: date,
    GIT_COMMITTER_DATE: date,
    GIT_AUTHOR_NAME: author.name,
    GIT_AUTHOR_EMAIL: author.email,
  });

  await git.add(Object.keys(files).length > 0 ? Object.keys(files) : ".");
  await git.commit(message);
  return (await git.revparse(["HEAD"])).trim();
}

/** `count` commits on the current branch, one second apart; returns hashes oldest first. */
export async function commitSeries(repoDir: string, count: number, startTimestamp = BASE_TIMESTAMP): Promise<string[]> {
  const hashes: string[] = [];
  for (let i = 0; i < count; i++) {
    hashes.push(
      await commitFiles(repoDir, { "history.txt": `entry ${i}\n` }, `Commit ${i}`, { timestamp: startTimestamp + i }),
    );
  }
  return hashes;
}

/** Holds every `open` while `gate` is set, until it settles. */
export class GatedStore extends RepositoryStore {
  gate?: Promise<void>;
  gatedOpens = 0;

  async open(repoPath: string): Promise<StoreHandle> {
    if (this.gate) {
      this.gatedOpens++;
      await this.gate;
    }
    return super.open(repoPath);
  }
}
