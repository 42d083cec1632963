/**
 * Receiver-side errors. Remote-call errors live in @shardstream/replay.
 */

/** The accounting state disagrees with itself. Always receiver-fatal. */
export class ConsistencyViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConsistencyViolationError";
  }
}

/** Every attempt to store a batch failed. */
export class StoreFailureError extends Error {
  constructor(
    readonly batchId: string,
    readonly attempts: number,
    lastError?: Error,
  ) {
    super(
      `Could not store batch ${batchId} after ${attempts} attempts${lastError ? `: ${lastError.message}` : ""}`,
      { cause: lastError },
    );
    this.name = "StoreFailureError";
  }
}

export class ReceiverStoppedError extends Error {
  constructor(streamName: string, options?: ErrorOptions) {
    super(`Receiver for stream "${streamName}" is stopped and accepts no more records`, options);
    this.name = "ReceiverStoppedError";
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends Error {
  constructor(readonly issues: readonly ConfigIssue[]) {
    super(
      `Invalid receiver configuration:\n${issues.map((issue) => `  - ${issue.path}: ${issue.message}`).join("\n")}`,
    );
    this.name = "ConfigValidationError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
