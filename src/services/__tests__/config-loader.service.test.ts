import * as fs from "fs/promises";
import * as path from "path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { cleanupTempDirectories, createTempDirectory } from "../../__tests__/test-utils";
import { ConfigValidationError } from "../../errors";
import { ConfigLoaderService } from "../config-loader.service";

describe("ConfigLoaderService", () => {
  let service: ConfigLoaderService;
  let tempDir: string;

  beforeEach(async () => {
    service = new ConfigLoaderService();
    tempDir = await createTempDirectory("repo-fleet-config-");
  });

  afterEach(async () => {
    await cleanupTempDirectories();
  });

  async function writeConfig(content: unknown): Promise<string> {
    const configPath = path.join(tempDir, "repo-fleet.config.json");
    await fs.writeFile(configPath, typeof content === "string" ? content : JSON.stringify(content));
    return configPath;
  }

  describe("loadConfigFile", () => {
    it("should resolve paths relative to the config file", async () => {
      const configPath = await writeConfig({
        reposRoot: "./repos",
        metadataDir: "state",
        repositories: [{ organisation: "acme", name: "demo", sourceUrl: "https://example.com/demo.git" }],
      });

      const config = await service.loadConfigFile(configPath);

      expect(config.reposRoot).toBe(path.join(tempDir, "repos"));
      expect(config.metadataDir).toBe(path.join(tempDir, "state"));
      expect(config.repositories).toEqual([
        { organisation: "acme", name: "demo", sourceUrl: "https://example.com/demo.git" },
      ]);
    });

    it("should keep absolute paths", async () => {
      const configPath = await writeConfig({ reposRoot: "/srv/repos" });

      const config = await service.loadConfigFile(configPath);

      expect(config.reposRoot).toBe("/srv/repos");
      expect(config.metadataDir).toBeUndefined();
    });

    it("should report a missing file", async () => {
      await expect(service.loadConfigFile(path.join(tempDir, "missing.json"))).rejects.toThrow(
        `Invalid configuration for 'config': file not found: ${path.join(tempDir, "missing.json")}`,
      );
    });

    it("should report malformed JSON", async () => {
      const configPath = await writeConfig("{ not json");

      await expect(service.loadConfigFile(configPath)).rejects.toBeInstanceOf(ConfigValidationError);
    });
  });

  describe("validateConfigFile", () => {
    it("should accept a complete configuration", () => {
      expect(() =>
        service.validateConfigFile({
          reposRoot: "/srv/repos",
          defaultBranch: "trunk",
          cronSchedule: "*/15 * * * *",
          retry: { maxAttempts: 5, initialDelayMs: 1000, maxDelayMs: 8000, backoffMultiplier: 2, jitterMs: 100 },
          parallelism: { maxRepositories: 4 },
          operationTimeoutMs: 60000,
          failureThreshold: 5,
          commitCacheLimit: 200,
          credentials: { github: { token: "test-secret" }, gitea: { username: "robot", token: "test-secret" } },
          debug: true,
        }),
      ).not.toThrow();
    });

    it("should require reposRoot", () => {
      expect(() => service.validateConfigFile({})).toThrow(
        "Invalid configuration for 'reposRoot': must be a non-empty string",
      );
    });

    it("should reject a config that is not an object", () => {
      expect(() => service.validateConfigFile([])).toThrow("Invalid configuration for 'config': must be an object");
    });

    it("should reject an invalid cron expression", () => {
      expect(() => service.validateConfigFile({ reposRoot: "/r", cronSchedule: "every hour" })).toThrow(
        "Invalid configuration for 'cronSchedule': 'every hour' is not a valid cron expression",
      );
    });

    it("should reject non-positive limits", () => {
      expect(() => service.validateConfigFile({ reposRoot: "/r", failureThreshold: 0 })).toThrow(
        "Invalid configuration for 'failureThreshold': must be a positive integer",
      );
      expect(() => service.validateConfigFile({ reposRoot: "/r", parallelism: { maxRepositories: 1.5 } })).toThrow(
        "Invalid configuration for 'parallelism.maxRepositories': must be a positive integer",
      );
    });

    it("should reject a backoff multiplier below 1", () => {
      expect(() => service.validateConfigFile({ reposRoot: "/r", retry: { backoffMultiplier: 0.5 } })).toThrow(
        "Invalid configuration for 'retry.backoffMultiplier': must be a number of at least 1",
      );
    });

    it("should reject credentials for unknown hosts or without a token", () => {
      expect(() => service.validateConfigFile({ reposRoot: "/r", credentials: { bitbucket: { token: "x" } } })).toThrow(
        "Invalid configuration for 'credentials.bitbucket': unknown source kind",
      );
      expect(() => service.validateConfigFile({ reposRoot: "/r", credentials: { github: { username: "u" } } })).toThrow(
        "Invalid configuration for 'credentials.github': must have a string 'token'",
      );
    });

    it("should validate declared repositories", () => {
      expect(() =>
        service.validateConfigFile({ reposRoot: "/r", repositories: [{ organisation: "acme", name: "../x" }] }),
      ).toThrow("Invalid configuration for 'repositories[0].name': must be a valid name");

      expect(() =>
        service.validateConfigFile({ reposRoot: "/r", repositories: [{ organisation: "acme", name: "demo", isMirror: true }] }),
      ).toThrow("Invalid configuration for 'repositories[0].sourceUrl': is required for a mirror");
    });

    it("should reject duplicate repositories", () => {
      expect(() =>
        service.validateConfigFile({
          reposRoot: "/r",
          repositories: [
            { organisation: "acme", name: "demo" },
            { organisation: "acme", name: "demo" },
          ],
        }),
      ).toThrow("Invalid configuration for 'repositories[1]': duplicate repository 'acme/demo'");
    });
  });

  describe("resolveConfig", () => {
    it("should apply defaults", () => {
      const resolved = service.resolveConfig({ reposRoot: "/srv/repos" });

      expect(resolved).toEqual({
        reposRoot: "/srv/repos",
        metadataDir: "/srv/repos/.fleet",
        defaultBranch: "main",
        retry: { maxAttempts: 3, initialDelayMs: 60000, maxDelayMs: 240000, backoffMultiplier: 2, jitterMs: 0 },
        parallelism: { maxRepositories: 2 },
        operationTimeoutMs: 1800000,
        failureThreshold: 3,
        commitCacheLimit: 1000,
        cronSchedule: "0 * * * *",
        credentials: {},
        debug: false,
      });
    });

    it("should keep explicit values and merge partial retry settings", () => {
      const resolved = service.resolveConfig({
        reposRoot: "/srv/repos",
        metadataDir: "/var/lib/fleet",
        retry: { maxAttempts: 1 },
        failureThreshold: 1,
      });

      expect(resolved.metadataDir).toBe("/var/lib/fleet");
      expect(resolved.retry).toEqual({
        maxAttempts: 1,
        initialDelayMs: 60000,
        maxDelayMs: 240000,
        backoffMultiplier: 2,
        jitterMs: 0,
      });
      expect(resolved.failureThreshold).toBe(1);
    });
  });
});
