import { getLogger } from "./logger";

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export interface RetryOptions {
  maxRetries?: number;
  delayMs?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
  label?: string;
}

/**
 * Runs `fn`, retrying with exponential backoff until it resolves or the
 * retry budget is spent. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const logger = getLogger("util/async");
  const {
    maxRetries = 2,
    delayMs = 250,
    backoffMultiplier = 2,
    shouldRetry = () => true,
    label = "operation",
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!shouldRetry(err) || attempt >= maxRetries) {
        throw err;
      }
      const delay = delayMs * Math.pow(backoffMultiplier, attempt);
      logger.warn(
        { label, attempt: attempt + 1, delay, err },
        "attempt failed, retrying"
      );
      await sleep(delay);
    }
  }
}

/**
 * Rejects with TimeoutError when `promise` has not settled within
 * `timeoutMs`. The timer is always cleared.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label = "operation"
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
