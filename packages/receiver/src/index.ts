export { ShardReceiver } from "./runtime/receiver";
export type {
  BatchingEngineFactory,
  EngineContext,
  IngestionTarget,
  ShardReceiverOptions,
} from "./runtime/receiver";

export { ShardRecordProcessor } from "./runtime/shard-processor";
export type { ShutdownReason } from "./runtime/shard-processor";

export { RangeAccumulator } from "./accounting/range-accumulator";
export type { RangeAccumulatorOptions, RangeForwarder } from "./accounting/range-accumulator";
export { BatchStoreCoordinator, STORE_ATTEMPTS } from "./accounting/batch-store-coordinator";
export type { BatchStoreCoordinatorOptions, RangeSource } from "./accounting/batch-store-coordinator";
export { LatestStoredSequences } from "./accounting/latest-stored";

export { BlockGenerator } from "./batching/block-generator";
export type { BlockGeneratorOptions } from "./batching/block-generator";
export { RateLimiter, UNLIMITED_RATE } from "./batching/rate-limiter";
export type { RateLimiterOptions } from "./batching/rate-limiter";
export type { BatchingEngine, BatchingListener } from "./batching/types";

export { InMemoryBatchStore } from "./storage/in-memory-batch-store";
export type { BatchStore, StoredBatch } from "./storage/types";

export {
  CheckpointTracker,
  DrizzleShardCheckpointStore,
  InMemoryShardCheckpointStore,
  PersistentCheckpointHandle,
  deleteShardCheckpoint,
  getShardCheckpoint,
  getStreamCheckpoints,
  shardCheckpointTable,
  updateShardCheckpoint,
} from "./checkpoint";
export type {
  CheckpointHandle,
  CheckpointTrackerOptions,
  DatabaseClient,
  ShardCheckpoint,
  ShardCheckpointStore,
} from "./checkpoint";

export { parseReceiverConfig, toReplayOptions, toRetryPolicy, ReadConfigSchema, ReceiverConfigSchema } from "./config";
export type { ReadConfig, ReceiverConfig, ReceiverConfigInput, ReplayReadOptions } from "./config";

export { AccountingLock } from "./lock";

export {
  ConfigValidationError,
  ConsistencyViolationError,
  ReceiverStoppedError,
  StoreFailureError,
} from "./errors";
export type { ConfigIssue } from "./errors";
