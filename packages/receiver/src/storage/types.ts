import type { BatchRangeSet } from "@shardstream/replay";

export interface StoredBatch<T> {
  batchId: string;
  items: readonly T[];
  ranges: BatchRangeSet;
}

/** Durable home for sealed batches. Throws when a batch could not be stored. */
export interface BatchStore<T> {
  store(batch: StoredBatch<T>): Promise<void>;
}
