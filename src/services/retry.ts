/**
 * Retry and timeout helpers for payer connector calls.
 */

import {
  ConnectorTimeoutError,
  PayerConnectorError,
  toConnectorError,
} from "./errors.js";

export interface RetryOptions {
  /** Total calls allowed, first one included */
  attempts: number;

  /** Delay before retry n (0-based) is `baseDelayMs * 2^n` */
  baseDelayMs: number;

  /** Optional sleep function for retry backoff. Injectable for testing. */
  sleep?: (ms: number) => Promise<void>;

  /** Called before each retry */
  onRetry?: (error: PayerConnectorError, attempt: number, delayMs: number) => void;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: PayerConnectorError; attempts: number };

/**
 * Promise-based sleep for retry backoff.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Backoff delay before retry `attempt` (0-based).
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** attempt;
}

/**
 * Call `fn` until it succeeds, fails non-transiently, or runs out of attempts.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const sleepFn = options.sleep ?? sleep;
  let lastError: PayerConnectorError | undefined;

  for (let attempt = 0; attempt < options.attempts; attempt++) {
    try {
      const value = await fn();
      return { ok: true, value, attempts: attempt + 1 };
    } catch (err) {
      lastError = toConnectorError(err);
      if (!lastError.transient) {
        return { ok: false, error: lastError, attempts: attempt + 1 };
      }

      if (attempt < options.attempts - 1) {
        const delayMs = backoffDelay(options.baseDelayMs, attempt);
        options.onRetry?.(lastError, attempt + 1, delayMs);
        await sleepFn(delayMs);
      }
    }
  }

  return {
    ok: false,
    error: lastError ?? new PayerConnectorError("No attempts made", "NO_ATTEMPTS", false),
    attempts: options.attempts,
  };
}

/**
 * Reject with ConnectorTimeoutError if `fn` does not settle within `timeoutMs`.
 * The signal handed to `fn` is aborted at the deadline so the call can
 * tear down whatever it still holds.
 */
export async function withTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new ConnectorTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
