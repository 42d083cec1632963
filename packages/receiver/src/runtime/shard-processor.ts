import { NOOP_LOGGER, type ReplayLogger, type StreamRecord } from "@shardstream/replay";
import type { CheckpointHandle } from "../checkpoint/types";
import { toError } from "../errors";
import type { IngestionTarget } from "./receiver";

/**
 * Why the lease layer ends a shard assignment.
 * - `terminate`: the shard was closed (split or merged) and fully read
 * - `requested`: the host is shutting down
 * - `lease-lost`: another worker took the shard; it must not be checkpointed
 */
export type ShutdownReason = "terminate" | "requested" | "lease-lost";

/**
 * Feeds the records of one assigned shard into a receiver and keeps the
 * shard's checkpoint handle registered for as long as the assignment lasts.
 */
export class ShardRecordProcessor {
  private shardId: string | null = null;
  private handle: CheckpointHandle | null = null;
  private readonly logger: ReplayLogger;

  constructor(
    private readonly receiver: IngestionTarget,
    logger?: ReplayLogger,
  ) {
    this.logger = logger ?? NOOP_LOGGER;
  }

  initialize(shardId: string, handle: CheckpointHandle): void {
    this.shardId = shardId;
    this.handle = handle;
    this.receiver.setCheckpointer(shardId, handle);
    this.logger.info("initialized shard processor", { shardId });
  }

  /**
   * Hand records to the receiver in chunks no larger than its current
   * ingestion limit. Records arriving after the receiver stopped are dropped,
   * since they will be read again from the last checkpoint.
   */
  async processRecords(records: readonly StreamRecord[]): Promise<void> {
    const shardId = this.requireShardId();
    if (this.receiver.isStopped()) {
      this.logger.warn("receiver is stopped, not processing records", { shardId, records: records.length });
      return;
    }

    const chunkSize = Math.max(1, this.receiver.getCurrentIngestionLimit());
    try {
      for (let start = 0; start < records.length; start += chunkSize) {
        await this.receiver.addRecords(shardId, records.slice(start, start + chunkSize));
      }
    } catch (err) {
      this.logger.error("error while adding records to the receiver", {
        shardId,
        err: toError(err).message,
      });
      throw err;
    }
  }

  async shutdown(reason: ShutdownReason): Promise<void> {
    const shardId = this.requireShardId();
    this.logger.info("shutting down shard processor", { shardId, reason });
    await this.receiver.removeCheckpointer(shardId, reason === "lease-lost" ? null : this.handle);
    this.shardId = null;
    this.handle = null;
  }

  private requireShardId(): string {
    if (this.shardId === null) {
      throw new Error("ShardRecordProcessor used before initialize()");
    }
    return this.shardId;
  }
}
