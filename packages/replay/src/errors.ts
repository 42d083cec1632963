import { describeRange, type SequenceRange } from "./types";

/**
 * Remote failure worth retrying. Stream clients throw this (or a subclass)
 * when the source pushes back; `guardRemoteCall` maps it to a retryable result.
 */
export class TransientRemoteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransientRemoteError";
  }
}

/** The source rejected a call because the shard's read throughput was exceeded. */
export class ThrottledError extends TransientRemoteError {
  constructor(message = "Read throughput exceeded", options?: ErrorOptions) {
    super(message, options);
    this.name = "ThrottledError";
  }
}

/** Non-retryable remote failure. */
export class FatalRemoteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FatalRemoteError";
  }
}

export type RetryFailureReason = "timed-out" | "retries-exhausted";

export class RetryFailedError extends Error {
  constructor(
    message: string,
    readonly reason: RetryFailureReason,
    readonly attempts: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RetryFailedError";
  }
}

export class RetryTimeoutError extends RetryFailedError {
  constructor(description: string, timeoutMs: number, attempts: number, lastError?: Error) {
    super(
      `Timed out after ${timeoutMs} ms while ${description}${lastErrorSuffix(lastError)}`,
      "timed-out",
      attempts,
      { cause: lastError },
    );
    this.name = "RetryTimeoutError";
  }
}

export class RetriesExhaustedError extends RetryFailedError {
  constructor(description: string, attempts: number, lastError?: Error) {
    super(
      `Gave up after ${attempts} retries while ${description}${lastErrorSuffix(lastError)}`,
      "retries-exhausted",
      attempts,
      { cause: lastError },
    );
    this.name = "RetriesExhaustedError";
  }
}

/** Replay could not reach the upper bound of its range. */
export class RangeExhaustedError extends Error {
  constructor(readonly range: SequenceRange, detail: string) {
    super(`Could not read until the end sequence number of ${describeRange(range)}: ${detail}`);
    this.name = "RangeExhaustedError";
  }
}

export class ReplayAbortedError extends Error {
  constructor(description: string, options?: ErrorOptions) {
    super(`Aborted while ${description}`, options);
    this.name = "ReplayAbortedError";
  }
}

function lastErrorSuffix(lastError?: Error): string {
  return lastError ? `, last error: ${lastError.message}` : "";
}
