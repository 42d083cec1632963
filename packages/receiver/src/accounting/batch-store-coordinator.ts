import { NOOP_LOGGER, type BatchRangeSet, type ReplayLogger } from "@shardstream/replay";
import { ConsistencyViolationError, StoreFailureError, toError } from "../errors";
import type { BatchStore } from "../storage/types";
import type { LatestStoredSequences } from "./latest-stored";

/** One first attempt plus three retries. */
export const STORE_ATTEMPTS = 4;

export interface RangeSource {
  takeRanges(batchId: string): BatchRangeSet | undefined;
}

export interface BatchStoreCoordinatorOptions<T> {
  ranges: RangeSource;
  store: BatchStore<T>;
  latest: LatestStoredSequences;
  logger?: ReplayLogger;
}

/**
 * Stores sealed batches together with their sequence ranges and, once a
 * store succeeds, advances the latest stored sequence number of every shard
 * the batch covers.
 */
export class BatchStoreCoordinator<T> {
  private readonly options: BatchStoreCoordinatorOptions<T>;
  private readonly logger: ReplayLogger;

  constructor(options: BatchStoreCoordinatorOptions<T>) {
    this.options = options;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  /**
   * @throws ConsistencyViolationError when the batch has no finalized ranges
   * @throws StoreFailureError when every attempt failed
   */
  async storeBatch(batchId: string, items: readonly T[]): Promise<void> {
    const ranges = this.options.ranges.takeRanges(batchId);
    if (!ranges) {
      throw new ConsistencyViolationError(`Could not find sequence number ranges for batch ${batchId}`);
    }

    let lastError: Error | undefined;
    for (let attempt = 1; attempt <= STORE_ATTEMPTS; attempt++) {
      try {
        await this.options.store.store({ batchId, items, ranges });
      } catch (err) {
        lastError = toError(err);
        this.logger.warn(`failed to store batch ${batchId}`, { attempt, err: lastError.message });
        continue;
      }

      // last write wins when a batch holds several ranges of one shard
      for (const range of ranges) this.options.latest.record(range);
      this.logger.debug("stored batch", { batchId, items: items.length, ranges: ranges.length, attempt });
      return;
    }

    throw new StoreFailureError(batchId, STORE_ATTEMPTS, lastError);
  }
}
