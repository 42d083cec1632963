/**
 * Receiver configuration, validated with zod.
 */

import { MAX_RECORDS_PER_PAGE, type RetryPolicy, type SequenceRangeReplayOptions } from "@shardstream/replay";
import { z } from "zod";
import { ConfigValidationError } from "./errors";

export const ReadConfigSchema = z.object({
  /** Attempts per remote call before giving up */
  maxRetries: z.number().int().positive().default(3),
  /** First backoff delay, doubled after every retry */
  retryWaitTimeMs: z.number().int().nonnegative().default(100),
  /** Elapsed-time budget for one retried call */
  retryTimeoutMs: z.number().int().positive().default(10000),
  /** Timeout of a single remote call */
  callTimeoutMs: z.number().int().positive().default(5000),
  maxPageSize: z.number().int().positive().max(MAX_RECORDS_PER_PAGE).default(MAX_RECORDS_PER_PAGE),
});

export const ReceiverConfigSchema = z.object({
  streamName: z.string().min(1),
  /** Used in batch ids: `input-<receiverId>-<n>` */
  receiverId: z.string().min(1).default("0"),
  checkpointIntervalMs: z.number().int().positive().default(10000),
  batchIntervalMs: z.number().int().positive().default(200),
  maxBatchRecords: z.number().int().positive().default(1000),
  /** Unlimited when absent */
  maxRecordsPerSecond: z.number().int().positive().optional(),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  read: ReadConfigSchema.default({}),
});

export type ReadConfig = z.infer<typeof ReadConfigSchema>;
export type ReceiverConfig = z.infer<typeof ReceiverConfigSchema>;
/** Configuration as the host writes it, before defaults are applied */
export type ReceiverConfigInput = z.input<typeof ReceiverConfigSchema>;

/**
 * Validate raw configuration and fill in defaults.
 *
 * @throws ConfigValidationError listing every failing path
 */
export function parseReceiverConfig(input: unknown): ReceiverConfig {
  const result = ReceiverConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  throw new ConfigValidationError(
    result.error.errors.map((e) => ({ path: e.path.join("."), message: e.message })),
  );
}

export function toRetryPolicy(read: ReadConfig): RetryPolicy {
  return {
    maxRetries: read.maxRetries,
    retryWaitTimeMs: read.retryWaitTimeMs,
    retryTimeoutMs: read.retryTimeoutMs,
  };
}

export type ReplayReadOptions = Required<Pick<SequenceRangeReplayOptions, "retryPolicy" | "callTimeoutMs" | "maxPageSize">>;

/** Everything a range replay takes from the `read` block. */
export function toReplayOptions(read: ReadConfig): ReplayReadOptions {
  return {
    retryPolicy: toRetryPolicy(read),
    callTimeoutMs: read.callTimeoutMs,
    maxPageSize: read.maxPageSize,
  };
}
