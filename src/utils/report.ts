import Table from "cli-table3";

import { getErrorMessage } from "./error-message";

import type { JobOutcome } from "../services/sync-dispatcher.service";
import type { Repository } from "../types";

const TABLE_STYLE = {
  head: ["cyan", "bold"],
  border: ["gray"],
};

export function formatRepositoryTable(repositories: Repository[]): string {
  const table = new Table({
    head: ["Repository", "Status", "Kind", "Commits", "Last synced", "Error"],
    style: TABLE_STYLE,
  });

  for (const repository of repositories) {
    table.push([
      repository.id,
      repository.status,
      repository.isMirror ? "mirror" : repository.isBare ? "bare" : "working",
      String(repository.totalCommits),
      repository.lastSyncedAt ?? "never",
      truncate(repository.errorMessage, 60),
    ]);
  }

  return table.toString();
}

export function formatRoundTable(outcomes: JobOutcome[]): string {
  const table = new Table({
    head: ["Repository", "Job", "Result", "New commits"],
    style: TABLE_STYLE,
  });

  const failed = outcomes.filter((outcome) => outcome.error !== undefined).length;
  table.push([
    {
      colSpan: 4,
      content: `Sync round: ${outcomes.length - failed} succeeded, ${failed} failed`,
      hAlign: "center",
    },
  ]);

  for (const outcome of outcomes) {
    table.push([
      outcome.repositoryId,
      outcome.kind,
      outcome.error === undefined ? "ok" : truncate(getErrorMessage(outcome.error), 60),
      String(outcome.result?.commitsSynced ?? 0),
    ]);
  }

  return table.toString();
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 1)}…` : value;
}
