import * as fs from "fs/promises";
import * as path from "path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  cleanupTempDirectories,
  commitSeries,
  createCapturingLogger,
  createSourceRepository,
  createTempDirectory,
} from "../../__tests__/test-utils";
import { InvalidNameError, NotFoundError } from "../../errors";
import { RepositoryStore } from "../repository-store.service";

describe("RepositoryStore", () => {
  let workDir: string;
  let root: string;
  let store: RepositoryStore;

  beforeEach(async () => {
    workDir = await createTempDirectory("repo-fleet-store-");
    root = path.join(workDir, "repos");
    store = new RepositoryStore(root, createCapturingLogger().logger);
  });

  afterEach(async () => {
    await cleanupTempDirectories();
  });

  describe("resolve", () => {
    it("should place repositories under <root>/<organisation>/<name>", () => {
      expect(store.resolve("acme", "demo")).toBe(path.join(root, "acme", "demo"));
    });

    it.each([
      ["acme corp", "demo"],
      ["acme", "demo.git"],
      ["acme", "a..b"],
      [".hidden", "demo"],
      ["acme", ""],
    ])("should reject %s/%s", (organisation, name) => {
      expect(() => store.resolve(organisation, name)).toThrow(InvalidNameError);
    });

    it("should name the offending field", () => {
      expect(() => store.resolve("acme", "demo.git")).toThrow("Invalid repository name 'demo.git'");
    });
  });

  describe("exists", () => {
    it("should be false for missing and empty directories", async () => {
      const empty = path.join(workDir, "empty");
      await fs.mkdir(empty);

      await expect(store.exists(path.join(workDir, "missing"))).resolves.toBe(false);
      await expect(store.exists(empty)).resolves.toBe(false);
    });

    it("should be false for a directory nested in another repository", async () => {
      const repoPath = store.resolve("acme", "work");
      await store.createWorking(repoPath);
      const nested = path.join(repoPath, "sub");
      await fs.mkdir(nested);

      await expect(store.exists(repoPath)).resolves.toBe(true);
      await expect(store.exists(nested)).resolves.toBe(false);
    });
  });

  describe("create", () => {
    it("should create bare and working repositories", async () => {
      const bare = await store.createBare(store.resolve("acme", "bare"));
      const working = await store.createWorking(store.resolve("acme", "work"));

      expect(bare).toMatchObject({ path: path.join(root, "acme", "bare"), isBare: true });
      expect(working).toMatchObject({ path: path.join(root, "acme", "work"), isBare: false });
      await expect(fs.stat(path.join(working.path, ".git", "HEAD"))).resolves.toBeTruthy();
    });
  });

  describe("open", () => {
    it("should cache handles until invalidated", async () => {
      const repoPath = store.resolve("acme", "demo");
      const created = await store.createBare(repoPath);

      const opened = await store.open(repoPath);
      expect(opened).toBe(created);
      expect(store.isCached(repoPath)).toBe(true);

      store.invalidate(repoPath);
      expect(store.isCached(repoPath)).toBe(false);
      const reopened = await store.open(repoPath);
      expect(reopened).not.toBe(created);
      expect(reopened.isBare).toBe(true);
    });

    it("should throw NotFoundError when nothing is there", async () => {
      const repoPath = store.resolve("acme", "ghost");

      await expect(store.open(repoPath)).rejects.toThrow(NotFoundError);
      await expect(store.open(repoPath)).rejects.toThrow(`No repository at '${repoPath}'`);
    });
  });

  describe("clone", () => {
    let sourceDir: string;
    let hashes: string[];

    beforeEach(async () => {
      sourceDir = path.join(workDir, "source");
      await createSourceRepository(sourceDir);
      hashes = await commitSeries(sourceDir, 2);
    });

    it("should make mirrors pull-only", async () => {
      const handle = await store.createMirror(store.resolve("acme", "mirror"), sourceDir);

      expect(handle.isBare).toBe(true);
      expect((await handle.git.getConfig("remote.origin.pushurl")).value).toBe("no_push");
      expect((await handle.git.revparse(["main"])).trim()).toBe(hashes[1]);
    });

    it("should map branches onto local heads in a bare clone", async () => {
      const handle = await store.clone(store.resolve("acme", "bare"), sourceDir, "bare");

      expect((await handle.git.getConfig("remote.origin.fetch")).value).toBe("+refs/heads/*:refs/heads/*");
    });

    it("should check out the default branch in a working clone", async () => {
      const handle = await store.clone(store.resolve("acme", "work"), sourceDir, "working");

      expect(handle.isBare).toBe(false);
      await expect(fs.readFile(path.join(handle.path, "history.txt"), "utf8")).resolves.toBe("entry 1\n");
    });
  });

  describe("remove", () => {
    it("should delete the directory and forget the handle", async () => {
      const repoPath = store.resolve("acme", "demo");
      await store.createBare(repoPath);

      await store.remove(repoPath);

      expect(store.isCached(repoPath)).toBe(false);
      await expect(store.exists(repoPath)).resolves.toBe(false);
    });
  });
});
