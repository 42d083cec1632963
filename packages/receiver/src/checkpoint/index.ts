/**
 * Checkpoint module exports.
 */

export { shardCheckpointTable, type ShardCheckpoint } from "./table";
export {
  getShardCheckpoint,
  updateShardCheckpoint,
  deleteShardCheckpoint,
  getStreamCheckpoints,
  type DatabaseClient,
} from "./repository";
export {
  DrizzleShardCheckpointStore,
  InMemoryShardCheckpointStore,
  type ShardCheckpointStore,
} from "./store";
export { PersistentCheckpointHandle } from "./handle";
export { CheckpointTracker, type CheckpointTrackerOptions } from "./tracker";
export type { CheckpointHandle } from "./types";
