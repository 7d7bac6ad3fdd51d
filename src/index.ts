#!/usr/bin/env node

import * as path from "path";

import { ConfigLoaderService } from "./services/config-loader.service";
import { Logger } from "./services/logger.service";
import { repositoryId } from "./services/metadata-store.service";
import { SyncDispatcher } from "./services/sync-dispatcher.service";
import { SyncEngine } from "./services/sync-engine.service";
import { applyCliOverrides, parseArguments } from "./utils/cli";
import { getErrorMessage } from "./utils/error-message";
import { formatRepositoryTable, formatRoundTable } from "./utils/report";

import type { JobOutcome } from "./services/sync-dispatcher.service";
import type { ConfigFile, RepositoryDeclaration } from "./types";
import type { CliOptions } from "./utils/cli";

async function loadConfig(options: CliOptions): Promise<ConfigFile> {
  const loader: ConfigLoaderService = new ConfigLoaderService();
  const file = options.config ? await loader.loadConfigFile(options.config) : undefined;
  const merged = applyCliOverrides(file, options);
  loader.validateConfigFile(merged);
  return { ...merged, reposRoot: path.resolve(merged.reposRoot) };
}

/**
 * Registers declared repositories the fleet does not know yet, then brings
 * up pending ones and resumes any left half-way by an earlier run.
 */
async function bootstrap(
  engine: SyncEngine,
  dispatcher: SyncDispatcher,
  declarations: RepositoryDeclaration[],
  logger: Logger,
): Promise<JobOutcome[]> {
  const known = new Set((await engine.listRepositories()).map((repository) => repository.id));
  for (const declaration of declarations) {
    if (!known.has(repositoryId(declaration.organisation, declaration.name))) {
      await engine.register(declaration);
    }
  }

  const repositories = await engine.listRepositories();
  const jobs = await Promise.all(
    repositories.flatMap((repository) => {
      switch (repository.status) {
        case "pending":
          return [
            dispatcher.enqueue({ kind: repository.sourceUrl ? "migrate" : "initialize", repository: repository.id }),
          ];
        case "initializing":
        case "mirroring":
          logger.info(`Resuming ${repository.id}, interrupted while ${repository.status}`);
          return [dispatcher.enqueue({ kind: "sync", repository: repository.id })];
        default:
          return [];
      }
    }),
  );

  return Promise.all(jobs.map((job) => job.done));
}

async function runOnce(engine: SyncEngine, dispatcher: SyncDispatcher, config: ConfigFile, logger: Logger) {
  const outcomes = [
    ...(await bootstrap(engine, dispatcher, config.repositories ?? [], logger)),
    ...(await dispatcher.syncAll()),
  ];

  if (outcomes.length === 0) {
    logger.info("Nothing to do");
    return;
  }
  logger.table(formatRoundTable(outcomes));

  if (outcomes.some((outcome) => outcome.error !== undefined)) {
    process.exitCode = 1;
  }
}

async function runDaemon(engine: SyncEngine, dispatcher: SyncDispatcher, config: ConfigFile, logger: Logger) {
  await bootstrap(engine, dispatcher, config.repositories ?? [], logger);
  await dispatcher.syncAll();
  dispatcher.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, waiting for running jobs`);

    dispatcher.stop();
    for (const job of dispatcher.activeJobs()) {
      engine.cancel(job.repositoryId, `shutting down (${signal})`);
    }
    await dispatcher.drain();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error("Shutdown failed:", error);
        process.exit(1);
      });
    });
  }
}

async function main(): Promise<void> {
  const options = parseArguments();

  let config: ConfigFile;
  try {
    config = await loadConfig(options);
  } catch (error) {
    console.error(`❌ ${getErrorMessage(error)}`);
    process.exit(1);
  }

  const logger = Logger.createDefault("repo-fleet", config.debug);
  const engine = new SyncEngine(config, { logger });
  const dispatcher = new SyncDispatcher(engine, { logger: logger.child("dispatcher") });

  if (options.list) {
    logger.table(formatRepositoryTable(await engine.listRepositories()));
    return;
  }

  if (options.runOnce) {
    await runOnce(engine, dispatcher, config, logger);
  } else {
    await runDaemon(engine, dispatcher, config, logger);
  }
}

main().catch((error) => {
  console.error("❌ Unhandled error:", error);
  process.exit(1);
});
