/**
 * Retry utilities for remote shard calls: tagged call results, per-call
 * timeouts and an exponential backoff driver bounded by both a retry count
 * and an elapsed-time budget.
 */

import {
  FatalRemoteError,
  ReplayAbortedError,
  RetriesExhaustedError,
  RetryTimeoutError,
  TransientRemoteError,
} from "./errors";
import { NOOP_LOGGER } from "./logger";
import type { ReplayLogger } from "./types";

export interface RetryPolicy {
  /** Maximum number of attempts before giving up (default: 3) */
  maxRetries: number;
  /** Delay before the first retry, doubled after every retry (default: 100ms) */
  retryWaitTimeMs: number;
  /** Elapsed-time budget across all attempts (default: 10000ms) */
  retryTimeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  retryWaitTimeMs: 100,
  retryTimeoutMs: 10000,
};

/** Timeout applied to every single remote call (default: 5000ms) */
export const DEFAULT_CALL_TIMEOUT_MS = 5000;

/**
 * Outcome of one remote call. Clients never throw across this boundary:
 * throttling comes back as `retryable`, everything else that failed as `fatal`.
 */
export type RemoteCallResult<T> =
  | { kind: "success"; value: T }
  | { kind: "retryable"; error: Error }
  | { kind: "fatal"; error: Error };

export function success<T>(value: T): RemoteCallResult<T> {
  return { kind: "success", value };
}

export function retryable<T = never>(error: Error): RemoteCallResult<T> {
  return { kind: "retryable", error };
}

export function fatal<T = never>(error: Error): RemoteCallResult<T> {
  return { kind: "fatal", error };
}

/**
 * Run one remote operation under a timeout and classify its outcome.
 * `TransientRemoteError` and its subclasses are retryable; any other failure,
 * a timeout included, is fatal.
 */
export async function guardRemoteCall<T>(
  work: () => Promise<T>,
  timeoutMs: number,
): Promise<RemoteCallResult<T>> {
  try {
    return success(await withTimeout(work(), timeoutMs));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    return error instanceof TransientRemoteError ? retryable(error) : fatal(error);
  }
}

/**
 * Enforce `timeoutMs` on a call that already returns a `RemoteCallResult`,
 * for clients that do not honour the timeout they are given. A call still
 * pending when the timer fires comes back as `fatal` with a `TimeoutError`.
 */
export async function withCallTimeout<T>(
  call: () => Promise<RemoteCallResult<T>>,
  timeoutMs: number,
): Promise<RemoteCallResult<T>> {
  const outcome = await guardRemoteCall(call, timeoutMs);
  return outcome.kind === "success" ? outcome.value : outcome;
}

export interface RetryRunOptions {
  logger?: ReplayLogger;
  /** Checked before every attempt and after every backoff sleep */
  signal?: AbortSignal;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Drive `call` until it succeeds, fails fatally, or the policy runs out.
 *
 * There is no wait before the first attempt. Each retry waits
 * `retryWaitTimeMs * 2^(retry - 1)`. The loop stops as soon as either
 * `maxRetries` attempts were made or `retryTimeoutMs` elapsed; the thrown
 * error tells which bound triggered and carries the last retryable error.
 *
 * @throws FatalRemoteError on a fatal result
 * @throws RetryTimeoutError | RetriesExhaustedError when the policy is spent
 * @throws ReplayAbortedError when `signal` is aborted
 */
export async function retryRemoteCall<T>(
  description: string,
  call: () => Promise<RemoteCallResult<T>>,
  policy: RetryPolicy,
  options: RetryRunOptions = {},
): Promise<T> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? delay;
  const logger = options.logger ?? NOOP_LOGGER;

  const startedAt = now();
  const isTimedOut = (): boolean => now() - startedAt >= policy.retryTimeoutMs;

  let retryCount = 0;
  let lastError: Error | undefined;

  while (!isTimedOut() && retryCount < policy.maxRetries) {
    if (retryCount > 0) {
      await sleep(calculateBackoff(retryCount - 1, policy.retryWaitTimeMs));
    }
    throwIfAborted(options.signal, description, lastError);

    const result = await call();
    if (result.kind === "success") {
      if (retryCount > 0) {
        logger.debug(`succeeded after ${retryCount} retries while ${description}`);
      }
      return result.value;
    }
    if (result.kind === "fatal") {
      throw new FatalRemoteError(`Error while ${description}: ${result.error.message}`, {
        cause: result.error,
      });
    }

    lastError = result.error;
    logger.warn(`error while ${description}`, {
      attempt: retryCount + 1,
      err: result.error.message,
    });
    retryCount += 1;
  }

  if (isTimedOut()) {
    throw new RetryTimeoutError(description, policy.retryTimeoutMs, retryCount, lastError);
  }
  throw new RetriesExhaustedError(description, retryCount, lastError);
}

function throwIfAborted(signal: AbortSignal | undefined, description: string, lastError?: Error): void {
  if (signal?.aborted) {
    throw new ReplayAbortedError(description, { cause: lastError ?? signal.reason });
  }
}

/**
 * Calculate exponential backoff delay for a given retry.
 *
 * @param retry - Zero-based retry number (0 = first retry)
 * @param baseDelayMs - Delay before the first retry
 * @param maxDelayMs - Upper bound for any single delay
 */
export function calculateBackoff(retry: number, baseDelayMs: number, maxDelayMs = Infinity): number {
  const delayMs = baseDelayMs * Math.pow(2, retry);
  return Math.min(delayMs, maxDelayMs);
}

/**
 * Wrap a promise with a timeout. Rejects with TimeoutError if the promise
 * doesn't settle within the specified time.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(`Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

/**
 * Error thrown when a single remote call times out.
 */
export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * Delay execution for a specified number of milliseconds.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
