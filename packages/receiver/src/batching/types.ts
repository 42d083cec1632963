/**
 * Contract between the receiver and the engine that groups records into
 * batches. `M` is the metadata carried with every add; the receiver passes
 * the sequence range of the added records.
 */

export interface BatchingListener<T, M> {
  /** Called under the accounting lock, after the items joined the open block */
  onAddData(items: readonly T[], metadata: M): void;
  /** Called under the accounting lock when the open block is sealed */
  onGenerateBlock(batchId: string): void;
  /** Called for each sealed block, one at a time, in seal order */
  onPushBlock(batchId: string, items: readonly T[]): Promise<void>;
  onError(message: string, error: Error): void;
}

export interface BatchingEngine<T, M> {
  addWithMetadata(item: T, metadata: M): Promise<void>;
  addMultipleWithMetadata(items: readonly T[], metadata: M): Promise<void>;
  /** Records per second the engine currently admits */
  getCurrentLimit(): number;
  start(): void;
  /** Seal the open block and wait until every sealed block was pushed */
  stop(): Promise<void>;
}
