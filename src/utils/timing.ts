export type Clock = () => number;

/** Wall-clock stopwatch; started on construction. */
export class Timer {
  private readonly startedAt: number;
  private stoppedAt?: number;

  constructor(private readonly clock: Clock = Date.now) {
    this.startedAt = clock();
  }

  stop(): number {
    this.stoppedAt ??= this.clock();
    return this.getDuration();
  }

  getDuration(): number {
    return (this.stoppedAt ?? this.clock()) - this.startedAt;
  }
}

/** `850ms`, `5.5s`, `2m 30s`, `1h 5m` */
export function formatDuration(ms: number): string {
  const rounded = Math.max(Math.round(ms), 0);
  if (rounded < 1000) {
    return `${rounded}ms`;
  }
  if (rounded < 60_000) {
    return `${(rounded / 1000).toFixed(1)}s`;
  }
  if (rounded < 3_600_000) {
    return `${Math.floor(rounded / 60_000)}m ${Math.floor((rounded % 60_000) / 1000)}s`;
  }
  return `${Math.floor(rounded / 3_600_000)}h ${Math.floor((rounded % 3_600_000) / 60_000)}m`;
}
