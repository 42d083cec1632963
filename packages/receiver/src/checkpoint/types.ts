import type { SequenceNumber } from "@shardstream/replay";

/** Records a shard's progress with the lease layer or a checkpoint store. */
export interface CheckpointHandle {
  checkpointAt(sequenceNumber: SequenceNumber): Promise<void>;
}
