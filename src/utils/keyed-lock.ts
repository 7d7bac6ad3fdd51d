import pLimit from "p-limit";

type Limit = ReturnType<typeof pLimit>;

/**
 * Exclusive lock per key. Callers for the same key run one at a time in
 * arrival order; different keys never wait on each other.
 */
export class KeyedLock {
  private limits = new Map<string, Limit>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let limit = this.limits.get(key);
    if (!limit) {
      limit = pLimit(1);
      this.limits.set(key, limit);
    }

    const keyLimit = limit;
    try {
      return await keyLimit(fn);
    } finally {
      if (keyLimit.activeCount === 0 && keyLimit.pendingCount === 0 && this.limits.get(key) === keyLimit) {
        this.limits.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    const limit = this.limits.get(key);
    return limit !== undefined && limit.activeCount > 0;
  }

  pending(key: string): number {
    return this.limits.get(key)?.pendingCount ?? 0;
  }
}
