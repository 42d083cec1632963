import { isAfter, NOOP_LOGGER, type ReplayLogger, type SequenceNumber } from "@shardstream/replay";
import { toError } from "../errors";
import type { LatestStoredSequences } from "../accounting/latest-stored";
import type { CheckpointHandle } from "./types";

export interface CheckpointTrackerOptions {
  latest: LatestStoredSequences;
  intervalMs: number;
  logger?: ReplayLogger;
}

/**
 * Periodically checkpoints every shard that has a handle at the latest
 * sequence number whose batch was stored. A shard is only checkpointed when
 * that value moved forward since its last successful checkpoint.
 */
export class CheckpointTracker {
  private readonly options: CheckpointTrackerOptions;
  private readonly logger: ReplayLogger;
  private readonly handles = new Map<string, CheckpointHandle>();
  private readonly lastCheckpointed = new Map<string, SequenceNumber>();
  /** Bumped on every removal; a checkpoint only counts for the generation it started in */
  private readonly generations = new Map<string, number>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private cycle: Promise<void> | null = null;

  constructor(options: CheckpointTrackerOptions) {
    this.options = options;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  setHandle(shardId: string, handle: CheckpointHandle): void {
    this.handles.set(shardId, handle);
  }

  /**
   * Stop tracking a shard. With a handle, first checkpoint whatever was
   * stored since the last checkpoint; `null` means the lease is gone.
   * A cycle already checkpointing the shard is awaited, so the final
   * checkpoint never repeats it.
   */
  async removeHandle(shardId: string, handle: CheckpointHandle | null): Promise<void> {
    this.handles.delete(shardId);
    try {
      if (this.cycle) await this.cycle;
      if (handle && this.hasProgress(shardId)) {
        const latest = this.options.latest.get(shardId);
        if (latest !== undefined) await this.checkpoint(shardId, handle, latest);
      }
    } finally {
      this.lastCheckpointed.delete(shardId);
      this.generations.set(shardId, this.generationOf(shardId) + 1);
    }
  }

  /** One checkpoint cycle. Joins the running cycle instead of overlapping it. */
  checkpointAll(): Promise<void> {
    if (!this.cycle) {
      this.cycle = this.runCycle().finally(() => {
        this.cycle = null;
      });
    }
    return this.cycle;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.checkpointAll().catch((err: unknown) =>
        this.logger.error("checkpoint cycle failed", { err: toError(err).message }),
      );
    }, this.options.intervalMs);
  }

  /** Clear the timer and run a final cycle. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.cycle) await this.cycle;
    await this.checkpointAll();
  }

  getLastCheckpointed(shardId: string): SequenceNumber | undefined {
    return this.lastCheckpointed.get(shardId);
  }

  trackedShards(): string[] {
    return [...this.handles.keys()];
  }

  private async runCycle(): Promise<void> {
    for (const [shardId, handle] of [...this.handles]) {
      // removed or replaced while an earlier shard was checkpointing
      if (this.handles.get(shardId) !== handle || !this.hasProgress(shardId)) continue;
      const latest = this.options.latest.get(shardId);
      if (latest !== undefined) await this.checkpoint(shardId, handle, latest);
    }
  }

  private hasProgress(shardId: string): boolean {
    const latest = this.options.latest.get(shardId);
    if (latest === undefined) {
      return false;
    }
    const last = this.lastCheckpointed.get(shardId);
    return last === undefined || isAfter(latest, last);
  }

  private generationOf(shardId: string): number {
    return this.generations.get(shardId) ?? 0;
  }

  private async checkpoint(shardId: string, handle: CheckpointHandle, sequenceNumber: SequenceNumber): Promise<void> {
    const generation = this.generationOf(shardId);
    try {
      await handle.checkpointAt(sequenceNumber);
      if (this.generationOf(shardId) !== generation) {
        this.logger.debug("shard was removed while checkpointing", { shardId, sequenceNumber });
        return;
      }
      this.lastCheckpointed.set(shardId, sequenceNumber);
      this.logger.debug("checkpointed shard", { shardId, sequenceNumber });
    } catch (err) {
      this.logger.warn("failed to checkpoint shard", {
        shardId,
        sequenceNumber,
        err: toError(err).message,
      });
    }
  }
}
