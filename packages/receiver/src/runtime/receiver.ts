/**
 * Receiver runtime: wires the accounting, batching and checkpoint components
 * of one stream together.
 */

import {
  createConsoleLogger,
  replayBatch,
  type BatchRangeSet,
  type BatchReader,
  type MessageHandler,
  type ReplayLogger,
  type SequenceNumber,
  type SequenceRange,
  type ShardStreamClientFactory,
  type StreamRecord,
} from "@shardstream/replay";
import { BatchStoreCoordinator } from "../accounting/batch-store-coordinator";
import { LatestStoredSequences } from "../accounting/latest-stored";
import { RangeAccumulator } from "../accounting/range-accumulator";
import { BlockGenerator } from "../batching/block-generator";
import { RateLimiter, UNLIMITED_RATE } from "../batching/rate-limiter";
import type { BatchingEngine, BatchingListener } from "../batching/types";
import { CheckpointTracker } from "../checkpoint/tracker";
import type { CheckpointHandle } from "../checkpoint/types";
import { parseReceiverConfig, toReplayOptions, type ReceiverConfig, type ReceiverConfigInput } from "../config";
import { ReceiverStoppedError, toError } from "../errors";
import type { AccountingLock } from "../lock";
import type { BatchStore } from "../storage/types";

export interface EngineContext<T> {
  config: ReceiverConfig;
  lock: AccountingLock;
  listener: BatchingListener<T, SequenceRange>;
  logger: ReplayLogger;
}

export type BatchingEngineFactory<T> = (context: EngineContext<T>) => BatchingEngine<T, SequenceRange>;

export interface ShardReceiverOptions<T> {
  config: ReceiverConfigInput;
  store: BatchStore<T>;
  /** Local copies of stored batches for `readBatch`, often the store itself */
  reader?: BatchReader<T>;
  messageHandler: MessageHandler<T>;
  /** Defaults to a console logger at `config.logLevel` */
  logger?: ReplayLogger;
  /** Supervisor hook, called once with the error that stopped the receiver */
  onAbort?: (error: Error) => void;
  /** Defaults to a BlockGenerator built from the config */
  createEngine?: BatchingEngineFactory<T>;
}

/** The ingestion surface shard processors talk to. */
export interface IngestionTarget {
  addRecords(shardId: string, records: readonly StreamRecord[]): Promise<void>;
  getCurrentIngestionLimit(): number;
  setCheckpointer(shardId: string, handle: CheckpointHandle): void;
  removeCheckpointer(shardId: string, handle: CheckpointHandle | null): Promise<void>;
  isStopped(): boolean;
}

type ReceiverState = "created" | "started" | "stopping" | "stopped";

/**
 * Receives records from many shards of one stream, stores them in batches and
 * checkpoints each shard only up to what was stored.
 *
 * @example
 * ```ts
 * const receiver = new ShardReceiver({
 *   config: { streamName: "orders" },
 *   store,
 *   messageHandler: (record) => record.data,
 * });
 * receiver.start();
 * await receiver.addRecords("shardId-000000000000", records);
 * ```
 */
export class ShardReceiver<T> implements IngestionTarget {
  readonly config: ReceiverConfig;

  private readonly options: ShardReceiverOptions<T>;
  private readonly logger: ReplayLogger;
  private readonly latest = new LatestStoredSequences();
  private readonly accumulator: RangeAccumulator<T>;
  private readonly coordinator: BatchStoreCoordinator<T>;
  private readonly tracker: CheckpointTracker;
  private readonly engine: BatchingEngine<T, SequenceRange>;

  private state: ReceiverState = "created";
  private stopping: Promise<void> | null = null;
  private failure: Error | null = null;

  constructor(options: ShardReceiverOptions<T>) {
    this.options = options;
    this.config = parseReceiverConfig(options.config);
    this.logger =
      options.logger ?? createConsoleLogger(`Receiver:${this.config.streamName}`, this.config.logLevel);

    this.accumulator = new RangeAccumulator<T>({
      streamName: this.config.streamName,
      messageHandler: options.messageHandler,
      forward: (items, range) => this.engine.addMultipleWithMetadata(items, range),
      logger: this.logger,
    });
    this.coordinator = new BatchStoreCoordinator<T>({
      ranges: this.accumulator,
      store: options.store,
      latest: this.latest,
      logger: this.logger,
    });
    this.tracker = new CheckpointTracker({
      latest: this.latest,
      intervalMs: this.config.checkpointIntervalMs,
      logger: this.logger,
    });

    const listener: BatchingListener<T, SequenceRange> = {
      onAddData: (_items, range) => this.accumulator.onAddData(range),
      onGenerateBlock: (batchId) => this.accumulator.onGenerateBlock(batchId),
      onPushBlock: (batchId, items) => this.coordinator.storeBatch(batchId, items),
      onError: (message, error) => this.abort(message, error),
    };
    const createEngine = options.createEngine ?? createBlockGenerator;
    this.engine = createEngine({
      config: this.config,
      lock: this.accumulator.lock,
      listener,
      logger: this.logger,
    });
  }

  start(): void {
    if (this.state !== "created") {
      throw new Error(`Cannot start receiver for stream "${this.config.streamName}" as it is ${this.state}`);
    }
    this.engine.start();
    this.tracker.start();
    this.state = "started";
    this.logger.info("receiver started", {
      receiverId: this.config.receiverId,
      checkpointIntervalMs: this.config.checkpointIntervalMs,
    });
  }

  /** Flush and store the open batch, then run a final checkpoint cycle. */
  stop(): Promise<void> {
    if (!this.stopping) {
      const wasStarted = this.state === "started";
      this.state = "stopping";
      this.stopping = this.shutdown(wasStarted);
    }
    return this.stopping;
  }

  /** @throws ReceiverStoppedError once the receiver is stopping or stopped */
  async addRecords(shardId: string, records: readonly StreamRecord[]): Promise<void> {
    if (this.state !== "started") {
      throw new ReceiverStoppedError(this.config.streamName, { cause: this.failure ?? undefined });
    }
    await this.accumulator.addRecords(shardId, records);
  }

  getCurrentIngestionLimit(): number {
    return Math.min(this.engine.getCurrentLimit(), UNLIMITED_RATE);
  }

  /** The sequence number a shard may safely be checkpointed at, if any. */
  getLatestSequenceToCheckpoint(shardId: string): SequenceNumber | undefined {
    return this.latest.get(shardId);
  }

  setCheckpointer(shardId: string, handle: CheckpointHandle): void {
    this.tracker.setHandle(shardId, handle);
  }

  removeCheckpointer(shardId: string, handle: CheckpointHandle | null): Promise<void> {
    return this.tracker.removeHandle(shardId, handle);
  }

  /** Run one checkpoint cycle now instead of waiting for the timer. */
  checkpointNow(): Promise<void> {
    return this.tracker.checkpointAll();
  }

  /**
   * Read a batch back, from `reader` while it holds a valid copy and
   * otherwise by replaying the batch's ranges with the `read` settings.
   */
  readBatch(
    batchId: string,
    ranges: BatchRangeSet,
    clientFactory: ShardStreamClientFactory,
    options: { batchValid?: boolean; signal?: AbortSignal } = {},
  ): AsyncGenerator<T> {
    return replayBatch<T>({
      ...toReplayOptions(this.config.read),
      batchId,
      ranges,
      clientFactory,
      reader: this.options.reader,
      batchValid: options.batchValid,
      signal: options.signal,
      messageHandler: this.options.messageHandler,
      logger: this.logger,
    });
  }

  isStopped(): boolean {
    return this.state === "stopping" || this.state === "stopped";
  }

  getFailure(): Error | null {
    return this.failure;
  }

  private async shutdown(wasStarted: boolean): Promise<void> {
    if (wasStarted) {
      await this.engine.stop();
      await this.tracker.stop();
    }
    this.state = "stopped";
    this.logger.info("receiver stopped", { failed: this.failure !== null });
  }

  private abort(message: string, error: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    this.logger.error(message, { err: error.message, name: error.name });
    this.options.onAbort?.(error);
    this.stop().catch((err: unknown) =>
      this.logger.error("error while stopping receiver", { err: toError(err).message }),
    );
  }
}

function createBlockGenerator<T>(context: EngineContext<T>): BatchingEngine<T, SequenceRange> {
  const { config } = context;
  return new BlockGenerator<T, SequenceRange>({
    receiverId: config.receiverId,
    lock: context.lock,
    listener: context.listener,
    batchIntervalMs: config.batchIntervalMs,
    maxBatchRecords: config.maxBatchRecords,
    rateLimiter: new RateLimiter({ recordsPerSecond: config.maxRecordsPerSecond }),
    logger: context.logger,
  });
}
