import { setTimeout as sleep } from 'node:timers/promises';
import { ProviderError } from './review.errors.js';

export interface RetryOptions {
  maxRetries: number;
  label: string;
  logger: { warn(message: string): void };
  /** First retry waits about this long; doubles per attempt. Defaults to 500ms. */
  baseDelayMs?: number;
  /** Aborting stops both the backoff wait and further attempts. */
  signal?: AbortSignal;
}

/** Mask potential tokens/secrets in error messages. */
export function sanitizeErrorMessage(error: unknown): string {
  const msg = error instanceof Error ? error.message : String(error);
  return msg
    .replace(/[A-Za-z0-9+/=_-]{32,}/g, '[REDACTED]')
    .replace(/(Api-Key|Bearer)\s+\S+/gi, '$1 [REDACTED]')
    .replace(/(?:sk-|AQVN|t1\.)[A-Za-z0-9+/=_.-]+/g, '[REDACTED]');
}

/** Only provider failures are retried. */
export function isRetryable(error: unknown): boolean {
  return error instanceof ProviderError && error.retryable;
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    label,
    logger,
    baseDelayMs = 500,
    signal,
  } = options;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt < maxRetries && !signal?.aborted && isRetryable(error)) {
        // Jitter (0.75x-1.25x) so concurrent requests do not retry in lockstep
        const delay = Math.round(
          baseDelayMs * Math.pow(2, attempt) * (0.75 + Math.random() * 0.5),
        );
        logger.warn(
          `${label} attempt ${attempt + 1} failed (${sanitizeErrorMessage(error)}), retrying in ${delay}ms...`,
        );
        await sleep(delay, undefined, { signal });
        continue;
      }
      throw error;
    }
  }
  throw new Error(`${label} exhausted all retries`);
}
