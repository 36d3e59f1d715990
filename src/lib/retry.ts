import type { RetryPolicy } from "./config";
import {
  CancelledError,
  isTransient,
  toTransferError,
  TransferTimeoutError,
  type TransferError,
} from "./errors";

/** Resolve after `ms`, or reject with CancelledError as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Delay before attempt `attempt + 1`, given that `attempt` (1-based) just failed. */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const expDelay = Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
  return expDelay + random() * policy.jitterMs;
}

/**
 * Run `fn` with its own AbortSignal that fires when `parent` aborts or when
 * `timeoutMs` elapses. After a timeout the attempt is awaited: a late success
 * is kept, anything else surfaces as TransferTimeoutError (transient).
 */
export async function withAttemptTimeout<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  if (parent?.aborted) throw new CancelledError();
  parent?.addEventListener("abort", onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | null = null;
  let timedOut = false;
  const timeout =
    timeoutMs > 0
      ? new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
            reject(new TransferTimeoutError(timeoutMs));
          }, timeoutMs);
        })
      : null;

  let work: Promise<T> | null = null;
  try {
    work = fn(controller.signal);
    return await (timeout ? Promise.race([work, timeout]) : work);
  } catch (err) {
    if (parent?.aborted) throw new CancelledError();
    if (timedOut) {
      // an attempt that ignores its signal still holds the unit; the next one waits for it
      const late = await work?.then(
        (value) => ({ value }),
        () => null
      );
      if (late) return late.value;
      throw new TransferTimeoutError(timeoutMs);
    }
    throw err;
  } finally {
    if (timer) clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

export interface RetryOptions {
  policy: RetryPolicy;
  attemptTimeoutMs: number;
  signal?: AbortSignal;
  onAttempt?: (attempt: number) => void;
  onRetry?: (attempt: number, delayMs: number, error: TransferError) => void;
  random?: () => number;
}

/**
 * Retry `fn` on transient failures with exponential backoff and jitter.
 * Non-transient errors and the last transient error are rethrown as
 * TransferErrors. Attempts never overlap.
 */
export async function withRetry<T>(fn: (signal: AbortSignal) => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, attemptTimeoutMs, signal } = options;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) throw new CancelledError();
    options.onAttempt?.(attempt);

    try {
      return await withAttemptTimeout(attemptTimeoutMs, signal, fn);
    } catch (err) {
      const error = toTransferError(err);
      if (!isTransient(error) || attempt >= policy.maxAttempts) {
        throw error;
      }
      const delay = backoffDelay(attempt, policy, options.random);
      options.onRetry?.(attempt, delay, error);
      await sleep(delay, signal);
    }
  }
}
