/** Source-assigned position of a record within a shard. Opaque, but ordered. */
export type SequenceNumber = string;

/**
 * A contiguous slice of one shard consumed for one batch.
 * Both bounds are inclusive.
 */
export interface SequenceRange {
  readonly streamName: string;
  readonly shardId: string;
  readonly fromSeq: SequenceNumber;
  readonly toSeq: SequenceNumber;
  readonly recordCount: number;
}

/** Ranges that make up one batch, in the order they were added. */
export type BatchRangeSet = readonly SequenceRange[];

export interface StreamRecord {
  sequenceNumber: SequenceNumber;
  partitionKey: string;
  data: Uint8Array;
  approximateArrivalTimestamp?: Date;
}

export type MessageHandler<T> = (record: StreamRecord) => T;

export interface ReplayLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Local view of stored batches, consulted before replaying from the source. */
export interface BatchReader<T> {
  get(batchId: string): Promise<readonly T[] | undefined>;
}

export function describeRange(range: SequenceRange): string {
  return `${range.streamName}/${range.shardId}[${range.fromSeq}..${range.toSeq}] (${range.recordCount} records)`;
}
