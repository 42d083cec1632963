import { NOOP_LOGGER } from "./logger";
import { SequenceRangeReplay, type SequenceRangeReplayOptions } from "./range-replay";
import type { BatchRangeSet, BatchReader, MessageHandler } from "./types";

export interface BatchReplayOptions<T> extends Omit<SequenceRangeReplayOptions, "range"> {
  batchId: string;
  ranges: BatchRangeSet;
  messageHandler: MessageHandler<T>;
  /** Local store holding batches that were written successfully */
  reader?: BatchReader<T>;
  /** Whether the locally stored copy may be trusted (default: true) */
  batchValid?: boolean;
}

/**
 * Read a batch back: from the local store when it still holds a valid copy,
 * otherwise by replaying every range of the batch from the source, in order.
 */
export async function* replayBatch<T>(options: BatchReplayOptions<T>): AsyncGenerator<T> {
  const { batchId, ranges, messageHandler, reader, batchValid = true, ...replayOptions } = options;
  const logger = options.logger ?? NOOP_LOGGER;

  if (batchValid && reader) {
    const stored = await reader.get(batchId);
    if (stored) {
      logger.debug("read batch from local store", { batchId, items: stored.length });
      yield* stored;
      return;
    }
  }

  logger.info("regenerating batch from source", { batchId, ranges: ranges.length });
  for (const range of ranges) {
    const replay = new SequenceRangeReplay({ ...replayOptions, range });
    for await (const record of replay) yield messageHandler(record);
  }
}
