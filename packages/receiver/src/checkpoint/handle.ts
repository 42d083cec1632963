import { isAfter, type CursorPosition, type SequenceNumber } from "@shardstream/replay";
import type { ShardCheckpointStore } from "./store";
import type { CheckpointHandle } from "./types";

/**
 * Checkpoint handle for one shard that writes through a ShardCheckpointStore.
 * A sequence number at or before the persisted one is ignored.
 */
export class PersistentCheckpointHandle implements CheckpointHandle {
  constructor(
    private readonly store: ShardCheckpointStore,
    readonly streamName: string,
    readonly shardId: string,
  ) {}

  async checkpointAt(sequenceNumber: SequenceNumber): Promise<void> {
    const current = await this.store.get(this.streamName, this.shardId);
    if (current !== null && !isAfter(sequenceNumber, current)) {
      return;
    }
    await this.store.put(this.streamName, this.shardId, sequenceNumber);
  }

  /** Where a new reader of this shard resumes, or null without a checkpoint. */
  async resumePosition(): Promise<CursorPosition | null> {
    const current = await this.store.get(this.streamName, this.shardId);
    return current === null ? null : { type: "AFTER_SEQUENCE_NUMBER", sequenceNumber: current };
  }
}
