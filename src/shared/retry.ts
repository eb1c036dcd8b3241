import { getLogger } from './logger.js';
import { sleep } from './timing.js';

const log = getLogger('discovery', { component: 'retry' });

export interface RetryOptions {
  /** Maximum number of attempts (including the first call). Default: 3 */
  maxAttempts?: number;
  /** Initial delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Upper bound on delay in milliseconds. Default: 10000 */
  maxDelayMs?: number;
  /** Multiplier applied to the delay after each attempt. Default: 2 */
  backoffMultiplier?: number;
  /** Jitter as a fraction of the computed delay (0-1). Default: 0.1 */
  jitterFactor?: number;
  /**
   * Decides whether an error is worth another attempt. Defaults to
   * retrying everything.
   */
  shouldRetry?: (error: unknown) => boolean;
  /** Stops retrying (and waiting) once aborted. */
  signal?: AbortSignal;
}

function computeDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitterFactor: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(backoffMultiplier, attempt - 1);
  const capped = Math.min(exponentialDelay, maxDelayMs);
  const jitter = capped * jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

/**
 * Executes `fn` and retries on failure using exponential backoff with jitter.
 * Used for single HTTP requests inside one fetch; a failed fetch as a whole
 * is never retried within the same cycle.
 *
 * @example
 * ```ts
 * const page = await retry(() => client.get(url).text(), { maxAttempts: 2 });
 * ```
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 1000,
    maxDelayMs = 10_000,
    backoffMultiplier = 2,
    jitterFactor = 0.1,
    shouldRetry = () => true,
    signal,
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error) || attempt >= maxAttempts || signal?.aborted) {
        break;
      }

      const delayMs = computeDelay(
        attempt,
        baseDelayMs,
        maxDelayMs,
        backoffMultiplier,
        jitterFactor,
      );

      log.warn(
        {
          attempt,
          maxAttempts,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        },
        `Retry attempt ${attempt}/${maxAttempts} after ${delayMs}ms`,
      );

      await sleep(delayMs, signal);
    }
  }

  throw lastError;
}
