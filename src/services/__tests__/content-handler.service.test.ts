import * as path from "path";

import simpleGit from "simple-git";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import {
  BASE_TIMESTAMP,
  cleanupTempDirectories,
  commitFiles,
  createSourceRepository,
  createTempDirectory,
} from "../../__tests__/test-utils";
import { InvalidReferenceError, NotADirectoryError, NotAFileError, NotFoundError } from "../../errors";
import { ContentHandler, parseLsTree } from "../content-handler.service";

describe("ContentHandler", () => {
  let repoDir: string;
  let handler: ContentHandler;
  let firstCommit: string;
  let secondCommit: string;

  beforeAll(async () => {
    repoDir = path.join(await createTempDirectory("repo-fleet-content-"), "source");
    const git = await createSourceRepository(repoDir);

    firstCommit = await commitFiles(
      repoDir,
      {
        "README.md": "# Demo\n",
        "src/index.ts": "export const x = 1;\n",
        "src/lib/util.ts": "export {};\n",
        "docs/guide.md": "Guide\n",
        "assets/logo.bin": Buffer.from([0, 1, 2, 255]),
      },
      "Initial commit",
    );
    await git.raw(["tag", "v1", firstCommit]);

    secondCommit = await commitFiles(repoDir, { "README.md": "# Demo v2\n" }, "Update readme", {
      timestamp: BASE_TIMESTAMP + 10,
    });
    // same name as the tag, pointing at the newer commit
    await git.raw(["branch", "v1", secondCommit]);

    handler = new ContentHandler(git);
  });

  afterAll(async () => {
    await cleanupTempDirectories();
  });

  describe("getFileContent", () => {
    it("should return the file at a branch", async () => {
      const content = await handler.getFileContent("README.md", "main");

      expect(content.toString("utf-8")).toBe("# Demo v2\n");
    });

    it("should prefer a tag over a branch of the same name", async () => {
      const content = await handler.getFileContent("README.md", "v1");

      expect(content.toString("utf-8")).toBe("# Demo\n");
    });

    it("should resolve full and abbreviated commit hashes", async () => {
      expect((await handler.getFileContent("README.md", firstCommit)).toString("utf-8")).toBe("# Demo\n");
      expect((await handler.getFileContent("README.md", secondCommit.slice(0, 10))).toString("utf-8")).toBe(
        "# Demo v2\n",
      );
    });

    it("should prefer branches and tags over a commit they abbreviate", async () => {
      const git = simpleGit(repoDir);
      const branchName = firstCommit.slice(0, 8);
      const tagName = secondCommit.slice(0, 8);
      await git.raw(["branch", branchName, secondCommit]);
      await git.raw(["tag", tagName, firstCommit]);

      try {
        expect((await handler.getFileContent("README.md", branchName)).toString("utf-8")).toBe("# Demo v2\n");
        expect((await handler.getFileContent("README.md", tagName)).toString("utf-8")).toBe("# Demo\n");
      } finally {
        await git.raw(["branch", "-D", branchName]);
        await git.raw(["tag", "-d", tagName]);
      }
    });

    it("should return binary content byte for byte", async () => {
      const content = await handler.getFileContent("assets/logo.bin", "main");

      expect([...content]).toEqual([0, 1, 2, 255]);
    });

    it("should refuse a directory", async () => {
      await expect(handler.getFileContent("src", "main")).rejects.toBeInstanceOf(NotAFileError);
    });

    it("should raise NotFound for a missing path", async () => {
      await expect(handler.getFileContent("missing.txt", "main")).rejects.toThrow(
        "Path 'missing.txt' does not exist at 'main'",
      );
    });

    it("should raise NotFound for paths escaping the tree", async () => {
      await expect(handler.getFileContent("../README.md", "main")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("should raise InvalidReference for an unknown reference", async () => {
      await expect(handler.getFileContent("README.md", "no-such-ref")).rejects.toBeInstanceOf(
        InvalidReferenceError,
      );
    });
  });

  describe("listDirectory", () => {
    it("should list the root with directories first", async () => {
      const entries = await handler.listDirectory("", "main");

      expect(entries.map((entry) => [entry.name, entry.type])).toEqual([
        ["assets", "tree"],
        ["docs", "tree"],
        ["src", "tree"],
        ["README.md", "blob"],
      ]);
    });

    it("should give nested entries their full path", async () => {
      const entries = await handler.listDirectory("src", "main");

      expect(entries.map((entry) => entry.path)).toEqual(["src/lib", "src/index.ts"]);
      expect(entries[1].size).toBe(20);
      expect(entries[0].size).toBeUndefined();
    });

    it("should accept leading and trailing slashes", async () => {
      const entries = await handler.listDirectory("/src/lib/", "main");

      expect(entries.map((entry) => entry.path)).toEqual(["src/lib/util.ts"]);
    });

    it("should refuse a file", async () => {
      await expect(handler.listDirectory("README.md", "main")).rejects.toBeInstanceOf(NotADirectoryError);
    });
  });

  describe("getFilePath", () => {
    it("should describe a blob", async () => {
      const entry = await handler.getFilePath("src/index.ts", "main");

      expect(entry).toMatchObject({ name: "index.ts", path: "src/index.ts", type: "blob", mode: "100644", size: 20 });
      expect(entry.sha).toMatch(/^[0-9a-f]{40}$/);
    });

    it("should describe a tree", async () => {
      const entry = await handler.getFilePath("docs", "main");

      expect(entry).toMatchObject({ name: "docs", path: "docs", type: "tree", mode: "040000" });
    });
  });

  describe("getTree and getBlob", () => {
    it("should return the root tree of a commit", async () => {
      const tree = await handler.getTree("main");
      const expectedSha = (await simpleGit(repoDir).raw(["rev-parse", "main^{tree}"])).trim();

      expect(tree.sha).toBe(expectedSha);
      expect(tree.path).toBe("");
      expect(tree.entries).toHaveLength(4);
    });

    it("should return blob metadata", async () => {
      const blob = await handler.getBlob("main", "README.md");

      expect(blob).toMatchObject({ path: "README.md", mode: "100644", size: 10 });
    });

    it("should report file sizes", async () => {
      await expect(handler.getFileSize("README.md", "v1")).resolves.toBe(7);
    });
  });
});

describe("parseLsTree", () => {
  it("should parse NUL separated long listings", () => {
    const output =
      "100644 blob 3b18e512dba79e4c8300dd08aeb37f8e728b8dad      12\thello world.txt\0" +
      "040000 tree 4b825dc642cb6eb9a060e54bf8d69288fbee4904       -\tdocs\0" +
      "160000 commit 1111111111111111111111111111111111111111       -\tvendor/lib\0";

    expect(parseLsTree(output, "root")).toEqual([
      {
        name: "hello world.txt",
        path: "root/hello world.txt",
        type: "blob",
        size: 12,
        mode: "100644",
        sha: "3b18e512dba79e4c8300dd08aeb37f8e728b8dad",
      },
      {
        name: "docs",
        path: "root/docs",
        type: "tree",
        size: undefined,
        mode: "040000",
        sha: "4b825dc642cb6eb9a060e54bf8d69288fbee4904",
      },
      {
        name: "lib",
        path: "root/vendor/lib",
        type: "commit",
        size: undefined,
        mode: "160000",
        sha: "1111111111111111111111111111111111111111",
      },
    ]);
  });

  it("should skip lines it does not understand", () => {
    expect(parseLsTree("garbage\0\0", "")).toEqual([]);
  });
});
