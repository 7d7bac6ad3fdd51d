import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import type { ConfigFile } from "../types";

export interface CliOptions {
  config?: string;
  reposRoot?: string;
  cronSchedule?: string;
  runOnce: boolean;
  list: boolean;
  debug?: boolean;
  maxParallel?: number;
}

export function parseArguments(args: string[] = hideBin(process.argv)): CliOptions {
  const argv = yargs(args)
    .scriptName("repo-fleet")
    .option("config", {
      alias: "c",
      type: "string",
      description: "Path to a JSON config file",
    })
    .option("reposRoot", {
      alias: "r",
      type: "string",
      description: "Directory holding the repository stores (overrides the config file)",
    })
    .option("cronSchedule", {
      alias: "s",
      type: "string",
      description: "Cron schedule for sync rounds (overrides the config file)",
    })
    .option("runOnce", {
      type: "boolean",
      description: "Run one sync round and exit, without scheduling.",
      default: false,
    })
    .option("list", {
      alias: "l",
      type: "boolean",
      description: "List known repositories and exit",
      default: false,
    })
    .option("debug", {
      alias: "d",
      type: "boolean",
      description: "Enable debug logging",
    })
    .option("maxParallel", {
      alias: "p",
      type: "number",
      description: "Max repositories worked on at once",
    })
    .check((parsed) => {
      if (!parsed.config && !parsed.reposRoot) {
        throw new Error("Either --config or --reposRoot is required");
      }
      return true;
    })
    .strict()
    .help()
    .alias("help", "h")
    .parseSync();

  return {
    config: argv.config,
    reposRoot: argv.reposRoot,
    cronSchedule: argv.cronSchedule,
    runOnce: argv.runOnce,
    list: argv.list,
    debug: argv.debug,
    maxParallel: argv.maxParallel,
  };
}

/** Command-line values win over the file; anything not given is left to the file or the defaults. */
export function applyCliOverrides(file: ConfigFile | undefined, options: CliOptions): ConfigFile {
  const reposRoot = options.reposRoot ?? file?.reposRoot ?? "";
  const merged: ConfigFile = { ...file, reposRoot };

  if (options.cronSchedule !== undefined) {
    merged.cronSchedule = options.cronSchedule;
  }
  if (options.debug !== undefined) {
    merged.debug = options.debug;
  }
  if (options.maxParallel !== undefined) {
    merged.parallelism = { ...file?.parallelism, maxRepositories: options.maxParallel };
  }

  return merged;
}
