import type { BatchRangeSet, BatchReader } from "@shardstream/replay";
import type { BatchStore, StoredBatch } from "./types";

/**
 * Keeps stored batches in a map. Doubles as the local reader for batch
 * replay; `evict` drops a batch to force regeneration from the source.
 */
export class InMemoryBatchStore<T> implements BatchStore<T>, BatchReader<T> {
  private readonly batches = new Map<string, StoredBatch<T>>();

  async store(batch: StoredBatch<T>): Promise<void> {
    this.batches.set(batch.batchId, {
      batchId: batch.batchId,
      items: [...batch.items],
      ranges: batch.ranges,
    });
  }

  async get(batchId: string): Promise<readonly T[] | undefined> {
    return this.batches.get(batchId)?.items;
  }

  getRanges(batchId: string): BatchRangeSet | undefined {
    return this.batches.get(batchId)?.ranges;
  }

  evict(batchId: string): boolean {
    return this.batches.delete(batchId);
  }

  batchIds(): string[] {
    return [...this.batches.keys()];
  }

  get size(): number {
    return this.batches.size;
  }
}
