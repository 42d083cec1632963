export { SequenceRangeReplay, MAX_RECORDS_PER_PAGE } from "./range-replay";
export type { RangeReplayMetrics, RangeReplayPhase, SequenceRangeReplayOptions } from "./range-replay";

export { replayBatch } from "./batch-replay";
export type { BatchReplayOptions } from "./batch-replay";

export type {
  CursorPosition, OpenCursorRequest, RemoteCallOptions, ShardPage, ShardStreamClient, ShardStreamClientFactory
} from "./stream-client";

export {
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_RETRY_POLICY,
  TimeoutError,
  calculateBackoff,
  delay,
  fatal,
  guardRemoteCall,
  retryRemoteCall,
  retryable,
  success,
  withCallTimeout,
  withTimeout,
} from "./retry";
export type { RemoteCallResult, RetryPolicy, RetryRunOptions } from "./retry";

export {
  FatalRemoteError,
  RangeExhaustedError,
  ReplayAbortedError,
  RetriesExhaustedError,
  RetryFailedError,
  RetryTimeoutError,
  ThrottledError,
  TransientRemoteError,
} from "./errors";
export type { RetryFailureReason } from "./errors";

export { compareSequenceNumbers, isAfter } from "./sequence-number";

export { describeRange } from "./types";
export type {
  BatchRangeSet, BatchReader, LogLevel, MessageHandler, ReplayLogger, SequenceNumber, SequenceRange, StreamRecord
} from "./types";

export { createConsoleLogger, NOOP_LOGGER } from "./logger";
