import { DEFAULT_CONFIG } from "../constants";
import { CancelledError, isTransientError } from "../errors";

export type SleepFn = (ms: number) => Promise<void>;

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /**
   * Add random jitter to retry delays so that many repositories failing at
   * once do not all hit the remote again at the same moment.
   * Default: 0 (no jitter)
   */
  jitterMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /**
   * Polled between attempts. Returning a reason stops the loop with a
   * CancelledError; the pending attempt is never started.
   */
  cancellationReason?: () => string | undefined;
  sleep?: SleepFn;
}

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, "cancellationReason">> = {
  maxAttempts: DEFAULT_CONFIG.RETRY.MAX_ATTEMPTS,
  initialDelayMs: DEFAULT_CONFIG.RETRY.INITIAL_DELAY_MS,
  maxDelayMs: DEFAULT_CONFIG.RETRY.MAX_DELAY_MS,
  backoffMultiplier: DEFAULT_CONFIG.RETRY.BACKOFF_MULTIPLIER,
  jitterMs: DEFAULT_CONFIG.RETRY.JITTER_MS,
  shouldRetry: isTransientError,
  onRetry: () => {},
  sleep,
};

export function computeBackoffDelay(
  attempt: number,
  options: Pick<RetryOptions, "initialDelayMs" | "maxDelayMs" | "backoffMultiplier"> = {},
): number {
  const initialDelayMs = options.initialDelayMs ?? DEFAULT_OPTIONS.initialDelayMs;
  const multiplier = options.backoffMultiplier ?? DEFAULT_OPTIONS.backoffMultiplier;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs;
  return Math.min(initialDelayMs * Math.pow(multiplier, attempt - 1), maxDelayMs);
}

/**
 * Runs `fn` until it succeeds, fails with a non-retryable error, or runs out
 * of attempts. `fn` receives the 1-based attempt number.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let attempt = 1;

  const throwIfCancelled = (): void => {
    const reason = options.cancellationReason?.();
    if (reason !== undefined) {
      throw new CancelledError(reason);
    }
  };

  while (true) {
    throwIfCancelled();

    try {
      return await fn(attempt);
    } catch (error) {
      if (!opts.shouldRetry(error)) {
        throw error;
      }

      if (attempt >= opts.maxAttempts) {
        throw error;
      }

      const baseDelay = computeBackoffDelay(attempt, opts);
      const jitter = opts.jitterMs > 0 ? Math.random() * opts.jitterMs : 0;
      const delay = baseDelay + jitter;

      opts.onRetry(error, attempt, delay);

      throwIfCancelled();
      await opts.sleep(delay);
      attempt++;
    }
  }
}
