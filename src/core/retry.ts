import * as log from '../utils/logger.js';
import { sleep } from '../utils/deadline.js';

export type AttemptFn<T> = (attemptIndex: number) => Promise<T>;

/**
 * Call `fn` up to `attempts` times with linear backoff
 * (`backoffMs * (attemptIndex + 1)` between tries).
 * The last error is re-raised unchanged. An aborted signal stops retrying.
 */
export async function withRetries<T>(
  fn: AttemptFn<T>,
  attempts: number,
  backoffMs: number,
  signal?: AbortSignal,
): Promise<T> {
  const total = Math.max(1, Math.floor(attempts));
  let lastError: unknown;

  for (let i = 0; i < total; i++) {
    try {
      return await fn(i);
    } catch (err) {
      lastError = err;
      if (i >= total - 1 || signal?.aborted) break;

      const waitMs = backoffMs * (i + 1);
      if (waitMs > 0) log.retry(i, total, waitMs);
      const aborted = await sleep(waitMs, signal).then(
        () => false,
        () => true,
      );
      if (aborted) break;
    }
  }

  throw lastError;
}
