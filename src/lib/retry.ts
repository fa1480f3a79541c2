/**
 * Busy-retry policy for a single inference call
 *
 * Only ServiceBusyError is retried. The delay grows linearly:
 * baseDelayMs * 1, * 2, * 3 ... (500ms, 1000ms, 1500ms with defaults).
 */
import { CancelledError, isBusyError, MaxRetriesExceededError } from './errors';

export type RetryOptions = {
  /** Total attempts, including the first (default: 3) */
  maxRetries?: number;
  /** Delay unit in ms (default: 500) */
  baseDelayMs?: number;
  /** Checked before every attempt */
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: Error }) => void;
};

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number };

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 500;

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs = DEFAULT_BASE_DELAY_MS): number {
  return baseDelayMs * (attempt + 1);
}

export async function withBusyRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const wait = options.sleep ?? sleep;

  let attempts = 0;
  for (let attempt = 0; attempt < maxRetries; attempt++) {
    if (options.signal?.aborted) {
      return { ok: false, error: new CancelledError(), attempts };
    }

    attempts++;
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts };
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      if (!isBusyError(error)) {
        return { ok: false, error, attempts };
      }
      if (attempt < maxRetries - 1) {
        const delayMs = backoffDelay(attempt, baseDelayMs);
        options.onRetry?.({ attempt: attempts, delayMs, error });
        await wait(delayMs);
      }
    }
  }

  return { ok: false, error: new MaxRetriesExceededError(attempts), attempts };
}
