import * as fs from "fs/promises";
import * as path from "path";

import * as cron from "node-cron";

import { DEFAULT_CONFIG, NAME_PATTERN } from "../constants";
import { ConfigValidationError } from "../errors";
import { getErrorMessage } from "../utils/error-message";

import type {
  ConfigFile,
  FleetConfig,
  RepositoryDeclaration,
  ResolvedFleetConfig,
  SourceCredentials,
  SourceKind,
} from "../types";

const SOURCE_KINDS: readonly SourceKind[] = ["github", "gitlab", "gitea", "custom", "none"];

export class ConfigLoaderService {
  /**
   * Reads a JSON config file. Relative `reposRoot` and `metadataDir` are
   * taken relative to the file's directory.
   */
  async loadConfigFile(configPath: string): Promise<ConfigFile> {
    const absolutePath = path.resolve(configPath);

    let content: string;
    try {
      content = await fs.readFile(absolutePath, "utf-8");
    } catch {
      throw new ConfigValidationError("config", `file not found: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigValidationError("config", `not valid JSON: ${getErrorMessage(error)}`);
    }

    this.validateConfigFile(parsed);

    const configDir = path.dirname(absolutePath);
    return {
      ...parsed,
      reposRoot: path.resolve(configDir, parsed.reposRoot),
      metadataDir: parsed.metadataDir ? path.resolve(configDir, parsed.metadataDir) : undefined,
    };
  }

  validateConfigFile(config: unknown): asserts config is ConfigFile {
    if (!isObject(config)) {
      throw new ConfigValidationError("config", "must be an object");
    }

    if (typeof config.reposRoot !== "string" || config.reposRoot.length === 0) {
      throw new ConfigValidationError("reposRoot", "must be a non-empty string");
    }

    for (const field of ["metadataDir", "defaultBranch", "cronSchedule"] as const) {
      if (config[field] !== undefined && typeof config[field] !== "string") {
        throw new ConfigValidationError(field, "must be a string");
      }
    }

    if (typeof config.cronSchedule === "string" && !cron.validate(config.cronSchedule)) {
      throw new ConfigValidationError("cronSchedule", `'${config.cronSchedule}' is not a valid cron expression`);
    }

    if (config.debug !== undefined && typeof config.debug !== "boolean") {
      throw new ConfigValidationError("debug", "must be a boolean");
    }

    assertPositiveInteger(config.operationTimeoutMs, "operationTimeoutMs");
    assertPositiveInteger(config.failureThreshold, "failureThreshold");
    assertPositiveInteger(config.commitCacheLimit, "commitCacheLimit");

    if (config.retry !== undefined) {
      if (!isObject(config.retry)) {
        throw new ConfigValidationError("retry", "must be an object");
      }
      assertPositiveInteger(config.retry.maxAttempts, "retry.maxAttempts");
      assertNonNegativeNumber(config.retry.initialDelayMs, "retry.initialDelayMs");
      assertNonNegativeNumber(config.retry.maxDelayMs, "retry.maxDelayMs");
      assertNonNegativeNumber(config.retry.jitterMs, "retry.jitterMs");
      const multiplier = config.retry.backoffMultiplier;
      if (multiplier !== undefined && (typeof multiplier !== "number" || multiplier < 1)) {
        throw new ConfigValidationError("retry.backoffMultiplier", "must be a number of at least 1");
      }
    }

    if (config.parallelism !== undefined) {
      if (!isObject(config.parallelism)) {
        throw new ConfigValidationError("parallelism", "must be an object");
      }
      assertPositiveInteger(config.parallelism.maxRepositories, "parallelism.maxRepositories");
    }

    if (config.credentials !== undefined) {
      if (!isObject(config.credentials)) {
        throw new ConfigValidationError("credentials", "must be an object");
      }
      for (const [kind, credentials] of Object.entries(config.credentials)) {
        if (!isSourceKind(kind)) {
          throw new ConfigValidationError(`credentials.${kind}`, "unknown source kind");
        }
        if (!isCredentials(credentials)) {
          throw new ConfigValidationError(`credentials.${kind}`, "must have a string 'token'");
        }
      }
    }

    if (config.repositories !== undefined) {
      if (!Array.isArray(config.repositories)) {
        throw new ConfigValidationError("repositories", "must be an array");
      }
      const seen = new Set<string>();
      config.repositories.forEach((repo: unknown, index: number) => {
        validateDeclaration(repo, index);
        const id = `${repo.organisation}/${repo.name}`;
        if (seen.has(id)) {
          throw new ConfigValidationError(`repositories[${index}]`, `duplicate repository '${id}'`);
        }
        seen.add(id);
      });
    }
  }

  /**
   * Fills every optional setting with its default.
   */
  resolveConfig(config: FleetConfig): ResolvedFleetConfig {
    const reposRoot = path.resolve(config.reposRoot);
    return {
      reposRoot,
      metadataDir: config.metadataDir
        ? path.resolve(config.metadataDir)
        : path.join(reposRoot, DEFAULT_CONFIG.METADATA_DIR_NAME),
      defaultBranch: config.defaultBranch ?? DEFAULT_CONFIG.DEFAULT_BRANCH,
      retry: {
        maxAttempts: config.retry?.maxAttempts ?? DEFAULT_CONFIG.RETRY.MAX_ATTEMPTS,
        initialDelayMs: config.retry?.initialDelayMs ?? DEFAULT_CONFIG.RETRY.INITIAL_DELAY_MS,
        maxDelayMs: config.retry?.maxDelayMs ?? DEFAULT_CONFIG.RETRY.MAX_DELAY_MS,
        backoffMultiplier: config.retry?.backoffMultiplier ?? DEFAULT_CONFIG.RETRY.BACKOFF_MULTIPLIER,
        jitterMs: config.retry?.jitterMs ?? DEFAULT_CONFIG.RETRY.JITTER_MS,
      },
      parallelism: {
        maxRepositories: config.parallelism?.maxRepositories ?? DEFAULT_CONFIG.PARALLELISM.MAX_REPOSITORIES,
      },
      operationTimeoutMs: config.operationTimeoutMs ?? DEFAULT_CONFIG.OPERATION_TIMEOUT_MS,
      failureThreshold: config.failureThreshold ?? DEFAULT_CONFIG.FAILURE_THRESHOLD,
      commitCacheLimit: config.commitCacheLimit ?? DEFAULT_CONFIG.COMMIT_CACHE_LIMIT,
      cronSchedule: config.cronSchedule ?? DEFAULT_CONFIG.CRON_SCHEDULE,
      credentials: config.credentials ?? {},
      debug: config.debug ?? false,
    };
  }
}

function validateDeclaration(repo: unknown, index: number): asserts repo is RepositoryDeclaration {
  const field = `repositories[${index}]`;
  if (!isObject(repo)) {
    throw new ConfigValidationError(field, "must be an object");
  }
  if (typeof repo.organisation !== "string" || !NAME_PATTERN.test(repo.organisation)) {
    throw new ConfigValidationError(`${field}.organisation`, "must be a valid name");
  }
  if (typeof repo.name !== "string" || !NAME_PATTERN.test(repo.name)) {
    throw new ConfigValidationError(`${field}.name`, "must be a valid name");
  }
  for (const key of ["description", "sourceUrl", "defaultBranch"] as const) {
    if (repo[key] !== undefined && typeof repo[key] !== "string") {
      throw new ConfigValidationError(`${field}.${key}`, "must be a string");
    }
  }
  for (const key of ["isBare", "isMirror", "isPublic", "autoSync"] as const) {
    if (repo[key] !== undefined && typeof repo[key] !== "boolean") {
      throw new ConfigValidationError(`${field}.${key}`, "must be a boolean");
    }
  }
  if (repo.sourceKind !== undefined && !isSourceKind(repo.sourceKind)) {
    throw new ConfigValidationError(`${field}.sourceKind`, `must be one of ${SOURCE_KINDS.join(", ")}`);
  }
  if (repo.isMirror === true && typeof repo.sourceUrl !== "string") {
    throw new ConfigValidationError(`${field}.sourceUrl`, "is required for a mirror");
  }
}

function assertPositiveInteger(value: unknown, field: string): void {
  if (value !== undefined && (typeof value !== "number" || !Number.isInteger(value) || value < 1)) {
    throw new ConfigValidationError(field, "must be a positive integer");
  }
}

function assertNonNegativeNumber(value: unknown, field: string): void {
  if (value !== undefined && (typeof value !== "number" || value < 0)) {
    throw new ConfigValidationError(field, "must be a non-negative number");
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSourceKind(value: unknown): value is SourceKind {
  return SOURCE_KINDS.some((kind) => kind === value);
}

function isCredentials(value: unknown): value is SourceCredentials {
  return (
    isObject(value) &&
    typeof value.token === "string" &&
    (value.username === undefined || typeof value.username === "string")
  );
}
