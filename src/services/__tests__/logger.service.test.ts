import { describe, expect, it, vi } from "vitest";

import { Logger } from "../logger.service";

import type { LogLevel } from "../logger.service";

function capture(debug = false, scope?: string) {
  const lines: Array<[LogLevel, string]> = [];
  const logger = new Logger({ scope, debug, outputFn: (message, level) => lines.push([level, message]) });
  return { logger, lines };
}

describe("Logger", () => {
  it("should prefix messages with the scope", () => {
    const { logger, lines } = capture(false, "fleet");

    logger.info("Starting");
    logger.warn("Slow");

    expect(lines).toEqual([
      ["info", "[fleet] Starting"],
      ["warn", "[fleet] Slow"],
    ]);
  });

  it("should nest scopes in child loggers and keep the sink", () => {
    const { logger, lines } = capture(true, "fleet");

    logger.child("acme/demo").debug("Fetching");

    expect(lines).toEqual([["debug", "[fleet:acme/demo] Fetching"]]);
  });

  it("should drop debug lines unless enabled", () => {
    const { logger, lines } = capture();

    logger.debug("hidden");

    expect(lines).toEqual([]);
  });

  it("should substitute %s placeholders", () => {
    const { logger, lines } = capture();

    logger.info("Synced %s commits in %s", 3, "acme/demo");

    expect(lines).toEqual([["info", "Synced 3 commits in acme/demo"]]);
  });

  it("should append the error message", () => {
    const { logger, lines } = capture(false, "dispatcher");

    logger.error("Round failed:", new Error("boom"));
    logger.error("Plain");

    expect(lines).toEqual([
      ["error", "[dispatcher] Round failed: boom"],
      ["error", "[dispatcher] Plain"],
    ]);
  });

  it("should fall back to the console", () => {
    const logger = Logger.createDefault("store");
    const error = new Error("boom");

    logger.info("hello");
    logger.error("failed", error);

    expect(console.log).toHaveBeenCalledWith("[store] hello");
    expect(console.error).toHaveBeenCalledWith("[store] failed", error);
  });

  it("should surround tables with blank lines", () => {
    const log = vi.mocked(console.log);
    const logger = new Logger();

    logger.table("| a |");

    expect(log).toHaveBeenCalledWith("\n| a |\n");
  });
});
