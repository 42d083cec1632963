import {
  NOOP_LOGGER,
  type BatchRangeSet,
  type MessageHandler,
  type ReplayLogger,
  type SequenceRange,
  type StreamRecord,
} from "@shardstream/replay";
import { ConsistencyViolationError } from "../errors";
import { AccountingLock } from "../lock";

/** Hands transformed items and their range to the batching engine in one call. */
export type RangeForwarder<T> = (items: readonly T[], range: SequenceRange) => Promise<void>;

export interface RangeAccumulatorOptions<T> {
  streamName: string;
  messageHandler: MessageHandler<T>;
  forward: RangeForwarder<T>;
  logger?: ReplayLogger;
}

/**
 * Tracks which sequence ranges went into which batch.
 *
 * Ranges added since the last seal sit in an open buffer; sealing a batch
 * moves the buffer under the batch id, where the store coordinator picks it up
 * exactly once. Buffer mutations only happen while `lock` is held, and the
 * batching engine must be given this same lock.
 */
export class RangeAccumulator<T> {
  readonly lock = new AccountingLock();

  private readonly options: RangeAccumulatorOptions<T>;
  private readonly logger: ReplayLogger;
  private openRanges: SequenceRange[] = [];
  private readonly finalized = new Map<string, BatchRangeSet>();

  constructor(options: RangeAccumulatorOptions<T>) {
    this.options = options;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async addRecords(shardId: string, records: readonly StreamRecord[]): Promise<void> {
    if (!records.length) {
      return;
    }

    const range: SequenceRange = Object.freeze({
      streamName: this.options.streamName,
      shardId,
      fromSeq: records[0].sequenceNumber,
      toSeq: records[records.length - 1].sequenceNumber,
      recordCount: records.length,
    });
    const items = records.map((record) => this.options.messageHandler(record));
    await this.options.forward(items, range);
  }

  onAddData(range: SequenceRange): void {
    this.assertLocked("add a sequence range");
    this.openRanges.push(range);
  }

  onGenerateBlock(batchId: string): void {
    this.assertLocked("finalize a batch");
    if (this.finalized.has(batchId)) {
      throw new ConsistencyViolationError(`Sequence ranges of batch ${batchId} were already finalized`);
    }

    const ranges = Object.freeze(this.openRanges);
    this.openRanges = [];
    this.finalized.set(batchId, ranges);
    this.logger.debug("finalized batch ranges", { batchId, ranges: ranges.length });
  }

  /** Remove and return the ranges of a sealed batch. */
  takeRanges(batchId: string): BatchRangeSet | undefined {
    const ranges = this.finalized.get(batchId);
    this.finalized.delete(batchId);
    return ranges;
  }

  pendingRangeCount(): number {
    return this.openRanges.length;
  }

  finalizedBatchCount(): number {
    return this.finalized.size;
  }

  private assertLocked(action: string): void {
    if (!this.lock.isHeld()) {
      throw new ConsistencyViolationError(`Tried to ${action} without holding the accounting lock`);
    }
  }
}
